import type { RemoteInfo } from 'dgram'
import { EventEmitter } from 'events'
import type { MulticastDNS, ResponsePacket } from 'multicast-dns'

import { backendDebug, type BrowseQueryType, nameEquals } from '../utils'

interface ServiceBrowserEventMap {
  up: [instanceName: string]
  down: [instanceName: string]
}

// MARK: ServiceBrowser
/**
 * Watches the PTR records of one service type (optionally narrowed to a subtype) and reports instance names.
 *
 * Emits:
 * - `up`: the first time an instance is seen, and again after it said goodbye and came back.
 * - `down`: when an instance sends a goodbye (TTL = 0).
 */
export class ServiceBrowser extends EventEmitter<ServiceBrowserEventMap> {
  static TLD = '.local'

  readonly instances: string[] = []

  private mdns: MulticastDNS
  private query: BrowseQueryType

  private onresponse?: (packet: ResponsePacket, rinfo: RemoteInfo) => void

  constructor(mdns: MulticastDNS, query: BrowseQueryType) {
    super()

    this.mdns = mdns
    this.query = query
  }

  get queryName(): string {
    const { fullType, subtype } = this.query
    return subtype !== undefined
      ? `${subtype}._sub.${fullType}${ServiceBrowser.TLD}`
      : `${fullType}${ServiceBrowser.TLD}`
  }

  /**
   * Starts listening and sends the initial query. Has no effect if already started.
   */
  start() {
    if (this.onresponse) return

    this.onresponse = (packet: ResponsePacket) => {
      for (const answer of [...packet.answers, ...packet.additionals]) {
        if (answer.type !== 'PTR' || !nameEquals(answer.name, this.queryName)) continue

        // See https://tools.ietf.org/html/rfc6762#section-8.4
        if (answer.ttl === 0) {
          this.removeInstance(this.instanceNameOf(answer.data))
        } else {
          this.addInstance(this.instanceNameOf(answer.data))
        }
      }
    }

    this.mdns.on('response', this.onresponse)
    this.update()
  }

  /**
   * Stops listening and forgets every instance seen. Has no effect if already stopped.
   */
  stop() {
    if (!this.onresponse) return

    this.mdns.removeListener('response', this.onresponse)
    this.onresponse = undefined
    this.instances.length = 0
  }

  /**
   * Sends an active PTR query, prompting responders to announce their current instances.
   */
  update() {
    backendDebug('browse query %s', this.queryName)
    this.mdns.query(this.queryName, 'PTR')
  }

  // MARK: private
  /**
   * Strips `.<type>.local` from an instance FQDN, so instance names may themselves contain dots.
   */
  private instanceNameOf(fqdn: string): string {
    const suffix = `.${this.query.fullType}${ServiceBrowser.TLD}`
    if (fqdn.length > suffix.length && nameEquals(fqdn.slice(-suffix.length), suffix)) {
      return fqdn.slice(0, -suffix.length)
    }
    return fqdn.split('.')[0] ?? fqdn
  }

  private addInstance(name: string) {
    if (this.instances.some(instance => nameEquals(instance, name))) return

    this.instances.push(name)
    this.emit('up', name)
  }

  private removeInstance(name: string) {
    const index = this.instances.findIndex(instance => nameEquals(instance, name))
    if (index === -1) return

    this.instances.splice(index, 1)
    this.emit('down', name)
  }
}
