import { EventEmitter } from 'events'
import type { Answer } from 'dns-packet'
import type { MulticastDNS, ResponsePacket } from 'multicast-dns'

import { backendDebug, decodeTXT, nameEquals, type TxtMap } from '../utils'

/**
 * What a resolve found. `address` is `null` and `port` is `0` when the instance never answered.
 */
export interface ResolvedInstance {
  host: string
  address: string | null
  port: number
  txt: TxtMap | null
}

interface ServiceResolverEventMap {
  done: [result: ResolvedInstance]
}

// MARK: ServiceResolver
/**
 * One-shot lookup of an instance's SRV, TXT and host address records.
 *
 * Queries SRV and TXT for the instance, then A and AAAA for the SRV target if no address came along as
 * additionals. Emits `done` exactly once: when all three are known, or with whatever was gathered when
 * the timeout fires.
 *
 * @see {@link https://datatracker.ietf.org/doc/html/rfc6763#section-4.1 | RFC 6763 §4.1 Structured Service Instance Names}
 * @see {@link https://datatracker.ietf.org/doc/html/rfc6762#section-5.4 | RFC 6762 §5.4 Questions Requesting Unicast Responses}
 */
export class ServiceResolver extends EventEmitter<ServiceResolverEventMap> {
  static TLD = '.local'

  readonly fqdn: string

  private mdns: MulticastDNS
  private timeoutMs: number

  private target?: string
  private port = 0
  private txt?: TxtMap
  private address?: string
  private queriedHost = false

  private timer?: NodeJS.Timeout
  private onresponse?: (packet: ResponsePacket) => void

  constructor(mdns: MulticastDNS, instanceName: string, fullType: string, timeoutMs: number) {
    super()

    this.mdns = mdns
    this.timeoutMs = timeoutMs
    this.fqdn = `${instanceName}.${fullType}${ServiceResolver.TLD}`
  }

  start() {
    if (this.onresponse) return

    this.onresponse = packet => {
      this.collect(packet)
      this.advance()
    }
    this.mdns.on('response', this.onresponse)

    this.timer = setTimeout(() => this.finish(), this.timeoutMs)
    this.timer.unref()

    backendDebug('resolve query %s', this.fqdn)
    this.mdns.query(this.fqdn, 'SRV')
    this.mdns.query(this.fqdn, 'TXT')
  }

  /**
   * Stops without emitting `done`.
   */
  cancel() {
    this.detach()
  }

  // MARK: private
  private collect(packet: ResponsePacket) {
    const answers: Answer[] = []
    for (const answer of [...packet.answers, ...packet.additionals]) {
      if ('ttl' in answer && answer.ttl !== undefined && answer.ttl > 0) {
        answers.push(answer)
      }
    }

    for (const answer of answers) {
      if (answer.type === 'SRV' && nameEquals(answer.name, this.fqdn)) {
        this.target = answer.data.target
        this.port = answer.data.port
      } else if (answer.type === 'TXT' && nameEquals(answer.name, this.fqdn)) {
        this.txt = decodeTXT(answer.data)
      }
    }

    const target = this.target
    if (target === undefined || this.address !== undefined) return

    for (const answer of answers) {
      if ((answer.type === 'A' || answer.type === 'AAAA') && nameEquals(answer.name, target)) {
        this.address = answer.data
        return
      }
    }
  }

  private advance() {
    if (this.target === undefined) return

    if (this.address === undefined) {
      if (!this.queriedHost) {
        this.queriedHost = true
        this.mdns.query(this.target, 'A')
        this.mdns.query(this.target, 'AAAA')
      }
      return
    }

    if (this.txt !== undefined) {
      this.finish()
    }
  }

  private finish() {
    if (!this.detach()) return

    const resolved = this.target !== undefined && this.address !== undefined
    const result: ResolvedInstance = {
      host: stripTLD(this.target ?? ''),
      address: resolved ? (this.address ?? null) : null,
      port: resolved ? this.port : 0,
      txt: this.txt ?? null,
    }
    backendDebug('resolved %s: %o', this.fqdn, { ...result, txt: result.txt ? [...result.txt.keys()] : null })
    this.emit('done', result)
  }

  private detach(): boolean {
    if (!this.onresponse) return false

    this.mdns.removeListener('response', this.onresponse)
    this.onresponse = undefined
    clearTimeout(this.timer)
    return true
  }
}

function stripTLD(host: string): string {
  return host.endsWith(ServiceResolver.TLD) ? host.slice(0, -ServiceResolver.TLD.length) : host
}
