import type { Options as MulticastDNSOptions } from 'multicast-dns'

import type {
  DiscoveryBackend,
  DnssdBrowseCallback,
  DnssdResolveCallback,
  ResultDispatcher,
  TextEntryReader,
} from '../bridge'
import { backendDebug, MDNSServer, parseBrowseQueryType, type MDNSRecord, type TxtMap } from '../utils'
import { PublishedService } from './PublishedService'
import { ServiceBrowser } from './ServiceBrowser'
import { ServiceResolver } from './ServiceResolver'

// MARK: MulticastDNSBackendOptions
export interface MulticastDNSBackendOptions extends MulticastDNSOptions {
  /**
   * How long a resolve waits for SRV, TXT and address records before giving up.
   * @default 5000
   */
  resolveTimeoutMs?: number
  /**
   * TTL in seconds of published records.
   * @default 28800
   */
  recordTtl?: number
  /**
   * Host addresses to publish instead of the external interface addresses.
   */
  addresses?: string[]
  /**
   * Whether to leave IPv6 interface addresses out of published records.
   * @default false
   */
  disableIPv6?: boolean
}

// MARK: MulticastDNSBackend
/**
 * Discovery backend running mDNS in-process over `multicast-dns`.
 *
 * Browse results are delivered one instance at a time as instances appear. A resolve delivers exactly
 * one result, with no address and port `0` if nothing answered in time. Publishing registers the
 * records with the responder and announces them; removing sends goodbyes for all of them.
 *
 * @example
 * const backend = new MulticastDNSBackend({ resolveTimeoutMs: 3000 })
 * bridge.bind({ resolver: backend, browser: backend, textEntries: backend })
 */
export class MulticastDNSBackend implements DiscoveryBackend<TxtMap>, TextEntryReader<TxtMap> {
  static REANNOUNCE_MAX_MS: number = 60 * 60 * 1000
  static REANNOUNCE_FACTOR = 3

  readonly server: MDNSServer

  private resolveTimeoutMs: number
  private recordTtl?: number
  private addresses?: string[]
  private disableIPv6: boolean

  private browsers = new Map<DnssdBrowseCallback, ServiceBrowser[]>()
  private resolvers = new Set<ServiceResolver>()
  private published: PublishedService[] = []
  private announceTimers = new Map<PublishedService, NodeJS.Timeout>()

  constructor(options: MulticastDNSBackendOptions = {}) {
    const { resolveTimeoutMs, recordTtl, addresses, disableIPv6, ...mdnsOptions } = options

    this.server = new MDNSServer(mdnsOptions)
    this.resolveTimeoutMs = resolveTimeoutMs ?? 5000
    this.recordTtl = recordTtl
    this.addresses = addresses
    this.disableIPv6 = disableIPv6 ?? false
  }

  get publishedServices(): readonly PublishedService[] {
    return this.published
  }

  // MARK: browse
  browse(
    fullType: string,
    callbackHandle: DnssdBrowseCallback,
    contextHandle: unknown,
    dispatcher: ResultDispatcher<TxtMap>,
  ): void {
    const query = parseBrowseQueryType(fullType)
    const browser = new ServiceBrowser(this.server.mdns, query)

    browser.on('up', instanceName => {
      dispatcher.handleBrowse([instanceName], query.fullType, callbackHandle, contextHandle)
    })
    // Goodbyes are not reported to the caller; the instance is reported again if it comes back.
    browser.on('down', instanceName => {
      backendDebug('instance %s of %s said goodbye', instanceName, query.fullType)
    })

    const browsers = this.browsers.get(callbackHandle) ?? []
    browsers.push(browser)
    this.browsers.set(callbackHandle, browsers)

    browser.start()
  }

  stopBrowse(callbackHandle: DnssdBrowseCallback): void {
    for (const browser of this.browsers.get(callbackHandle) ?? []) {
      browser.stop()
      browser.removeAllListeners()
    }
    this.browsers.delete(callbackHandle)
  }

  // MARK: resolve
  resolve(
    instanceName: string,
    fullType: string,
    callbackHandle: DnssdResolveCallback,
    contextHandle: unknown,
    dispatcher: ResultDispatcher<TxtMap>,
  ): void {
    const resolver = new ServiceResolver(this.server.mdns, instanceName, fullType, this.resolveTimeoutMs)
    this.resolvers.add(resolver)

    resolver.once('done', ({ host, address, port, txt }) => {
      this.resolvers.delete(resolver)
      dispatcher.handleResolve(instanceName, fullType, host, address, port, txt, callbackHandle, contextHandle)
    })
    resolver.start()
  }

  // MARK: publish
  publish(
    name: string,
    hostName: string,
    fullType: string,
    port: number,
    keys: readonly string[],
    values: readonly (Uint8Array | null)[],
    subtypes: readonly string[],
  ): void {
    const service = new PublishedService({
      name,
      hostName,
      fullType,
      port,
      keys,
      values,
      subtypes,
      ttl: this.recordTtl,
      addresses: this.addresses,
      disableIPv6: this.disableIPv6,
    })

    // Publishing the same instance again replaces its records.
    for (const previous of this.published.filter(p => p.fqdn === service.fqdn)) {
      this.withdraw(previous)
    }

    this.published.push(service)
    this.server.register(service.getRecords())
    this.announce(service)
  }

  removeServices(): void {
    const services = this.published
    this.published = []
    if (services.length === 0) return

    const records = services.flatMap(service => this.withdraw(service)).map(record => ({ ...record, ttl: 0 }))

    backendDebug('mdns goodbye: %d records', records.length)
    void this.server.send(records).catch((error: unknown) => {
      console.warn('Error during goodbye:', error)
    })
  }

  // MARK: TXT
  textEntryKeys(map: TxtMap): readonly string[] {
    return [...map.keys()]
  }

  textEntryData(map: TxtMap, key: string): Uint8Array | null {
    return map.get(key) ?? null
  }

  // MARK: destroy
  /**
   * Stops every browse and pending resolve and closes the socket. Published services are not withdrawn;
   * call {@link removeServices} first for that.
   */
  async destroy(): Promise<void> {
    for (const callbackHandle of [...this.browsers.keys()]) {
      this.stopBrowse(callbackHandle)
    }
    for (const resolver of this.resolvers) {
      resolver.cancel()
    }
    this.resolvers.clear()
    for (const timer of this.announceTimers.values()) {
      clearTimeout(timer)
    }
    this.announceTimers.clear()
    this.published = []

    await this.server.destroy()
  }

  // MARK: private
  /**
   * Sends the records right away, then re-announces at growing intervals (1s, 3s, 9s...) up to one hour.
   *
   * @see {@link https://datatracker.ietf.org/doc/html/rfc6762#section-8.3 | Announcing}
   */
  private announce(service: PublishedService) {
    const records = service.getRecords()

    let delay = 1000
    const broadcast = () => {
      this.announceTimers.delete(service)
      if (!this.published.includes(service)) return

      backendDebug('mdns broadcast: %s', service.fqdn)
      void this.server.send(records).then(
        () => {
          delay = delay * MulticastDNSBackend.REANNOUNCE_FACTOR
          if (delay < MulticastDNSBackend.REANNOUNCE_MAX_MS && this.published.includes(service)) {
            this.announceTimers.set(service, setTimeout(broadcast, delay).unref())
          }
        },
        (error: unknown) => {
          console.warn('Error during announcement:', error)
        },
      )
    }

    broadcast()
  }

  /**
   * Drops a service's records from the responder and stops its announcements.
   */
  private withdraw(service: PublishedService): MDNSRecord[] {
    clearTimeout(this.announceTimers.get(service))
    this.announceTimers.delete(service)
    this.published = this.published.filter(p => p !== service)

    const records = service.getRecords()
    this.server.unregister(records)
    return records
  }
}
