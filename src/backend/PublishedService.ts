import os from 'os'
import type { SrvAnswer, StringAnswer, TxtAnswer } from 'dns-packet'

import { DnssdError, encodeTXT, type MDNSRecord } from '../utils'

// MARK: PublishedServiceOptions
export interface PublishedServiceOptions {
  /**
   * Instance name. Dots are replaced with dashes.
   */
  name: string
  /**
   * Host name, with or without the `.local` suffix.
   * @default os.hostname()
   */
  hostName?: string
  /**
   * Full type with protocol, e.g. `_matter._tcp`.
   */
  fullType: string
  port: number
  keys?: readonly string[]
  values?: readonly (Uint8Array | null)[]
  subtypes?: readonly string[]
  /**
   * TTL in seconds for every record.
   * @default 28800
   */
  ttl?: number
  /**
   * Addresses to advertise for the host. When omitted, every external interface address is used.
   */
  addresses?: readonly string[]
  /**
   * Whether to leave IPv6 interface addresses out.
   * @default false
   */
  disableIPv6?: boolean
}

// MARK: PublishedService
/**
 * The DNS resource records of one published service instance: PTR, SRV, TXT, the service-type
 * enumeration PTR, one PTR per subtype, and A/AAAA records for the host.
 *
 * @see {@link https://datatracker.ietf.org/doc/html/rfc6763 | RFC 6763 - DNS-Based Service Discovery}
 */
export class PublishedService {
  static TLD = '.local'

  readonly name: string
  readonly fullType: string
  readonly host: string
  readonly port: number
  readonly keys: readonly string[]
  readonly values: readonly (Uint8Array | null)[]
  readonly subtypes: readonly string[]
  readonly ttl: number
  readonly fqdn: string

  private addresses?: readonly string[]
  private disableIPv6: boolean

  constructor(options: PublishedServiceOptions) {
    if (!Number.isInteger(options.port) || options.port <= 0 || options.port > 65535) {
      throw new DnssdError('InvalidArgument', `Invalid port number ${options.port}`)
    }

    this.name = options.name.split('.').join('-')
    this.fullType = options.fullType
    this.host = qualifyHostName(options.hostName || os.hostname())
    this.port = options.port
    this.keys = options.keys ?? []
    this.values = options.values ?? []
    this.subtypes = options.subtypes ?? []
    this.ttl = options.ttl ?? 28800
    this.addresses = options.addresses
    this.disableIPv6 = options.disableIPv6 ?? false

    this.fqdn = `${this.name}.${this.fullType}${PublishedService.TLD}`
  }

  /**
   * Every record announcing this instance, in announcement order.
   */
  getRecords(): MDNSRecord[] {
    const records: MDNSRecord[] = [
      this.getRecordPTR(),
      this.getRecordSRV(),
      this.getRecordTXT(),
      this.getRecordPTRServiceTypeEnumeration(),
    ]

    for (const subtype of this.subtypes) {
      records.push(this.getRecordPTRSubtype(subtype))
    }

    for (const address of this.getAddresses()) {
      records.push({ type: address.includes(':') ? 'AAAA' : 'A', name: this.host, ttl: this.ttl, data: address })
    }

    return records
  }

  // MARK: private
  private getAddresses(): string[] {
    if (this.addresses) {
      return [...this.addresses]
    }

    const addresses: string[] = []
    for (const iface of Object.values(os.networkInterfaces())) {
      for (const addr of iface ?? []) {
        if (addr.internal || addr.mac === '00:00:00:00:00:00') continue
        if (addr.family !== 'IPv4' && this.disableIPv6) continue
        addresses.push(addr.address)
      }
    }
    return addresses
  }

  /**
   * @see {@link https://datatracker.ietf.org/doc/html/rfc6763#section-4.1 | RFC 6763 §4.1 - Structured Service Instance Names}
   */
  private getRecordPTR(): StringAnswer {
    return {
      type: 'PTR',
      name: `${this.fullType}${PublishedService.TLD}`,
      ttl: this.ttl,
      data: this.fqdn,
    }
  }

  /**
   * Subtype names are used as given, so `_L3840` publishes `_L3840._sub._matterc._udp.local`.
   *
   * @see {@link https://datatracker.ietf.org/doc/html/rfc6763#section-7.1 | RFC 6763 §7.1 - Selective Instance Enumeration (Subtypes)}
   */
  private getRecordPTRSubtype(subtype: string): StringAnswer {
    return {
      type: 'PTR',
      name: `${subtype}._sub.${this.fullType}${PublishedService.TLD}`,
      ttl: this.ttl,
      data: this.fqdn,
    }
  }

  /**
   * @see {@link https://datatracker.ietf.org/doc/html/rfc6763#section-9 | RFC 6763 §9 - Service Type Enumeration}
   */
  private getRecordPTRServiceTypeEnumeration(): StringAnswer {
    return {
      type: 'PTR',
      name: `_services._dns-sd._udp${PublishedService.TLD}`,
      ttl: this.ttl,
      data: `${this.fullType}${PublishedService.TLD}`,
    }
  }

  /**
   * @see {@link https://datatracker.ietf.org/doc/html/rfc2782 | RFC 2782 - A DNS RR for specifying the location of services (DNS SRV)}
   */
  private getRecordSRV(): SrvAnswer {
    return {
      type: 'SRV',
      name: this.fqdn,
      ttl: this.ttl,
      data: {
        port: this.port,
        target: this.host,
      },
    }
  }

  /**
   * @see {@link https://datatracker.ietf.org/doc/html/rfc6763#section-6 | RFC 6763 §6 - Data Syntax for DNS-SD TXT Records}
   */
  private getRecordTXT(): TxtAnswer {
    return {
      type: 'TXT',
      name: this.fqdn,
      ttl: this.ttl,
      data: encodeTXT(this.keys, this.values),
    }
  }
}

function qualifyHostName(hostName: string): string {
  return hostName.endsWith(PublishedService.TLD) ? hostName : hostName + PublishedService.TLD
}
