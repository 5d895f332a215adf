import {
  bindCapabilities,
  type BoundEntryPoints,
  type BridgeCapabilities,
  DEFAULT_LIMITS,
  DispatchCoordinator,
  type EntryPointName,
  HeapTextEntryAllocator,
  type ResultDispatcher,
  ResultMarshaller,
  SessionRegistry,
} from './bridge'
import type {
  BridgeLimits,
  BrowseIdentifier,
  DnssdAsyncReturnCallback,
  DnssdBrowseCallback,
  DnssdPublishCallback,
  DnssdResolveCallback,
  DnssdService,
  IPAddressType,
  StackLock,
  TextEntryAllocator,
} from './bridge'
import { bridgeDebug, DnssdError, encodeFullType, encodeFullTypeWithSubtype } from './utils'
import type { DnssdServiceProtocol, IPAddress, TxtMap } from './utils'

// MARK: BridgeOptions
export interface BridgeOptions {
  /**
   * Overrides for the fixed sizes results and publish requests are checked against.
   */
  limits?: Partial<BridgeLimits>
  /**
   * Owner of the TXT copies lent to resolve callbacks.
   * @default new HeapTextEntryAllocator()
   */
  allocator?: TextEntryAllocator
  /**
   * Stack lock shared with the host. Results are only delivered while nobody holds it.
   * @default new StackLock()
   */
  lock?: StackLock
}

// MARK: DnssdBridge
/**
 * Asynchronous DNS-SD front end that delegates every network operation to a discovery backend.
 *
 * The bridge owns the caller-facing side: argument checks, the service-type codec, browse sessions,
 * turning backend results into {@link DnssdService} records, and the locking rules around backend
 * call-outs and result callbacks. The backend owns mDNS itself.
 *
 * @example
 * const backend = new MulticastDNSBackend()
 * const bridge = new DnssdBridge()
 * bridge.bind({ resolver: backend, browser: backend, textEntries: backend })
 *
 * const id = bridge.browse('_http', 'tcp', 'any', undefined, (context, services, final, error) => {
 *   for (const service of services) console.log('Found', service.name)
 * }, null)
 * // later
 * bridge.stopBrowse(id)
 */
export class DnssdBridge<TMap = TxtMap> {
  readonly limits: Readonly<BridgeLimits>
  readonly coordinator: DispatchCoordinator
  readonly sessions: SessionRegistry
  /**
   * Result entry points handed to the backend with every browse and resolve.
   */
  readonly dispatcher: ResultDispatcher<TMap>

  private entryPoints: BoundEntryPoints<TMap> = {}
  private marshaller: ResultMarshaller<TMap>

  constructor(options: BridgeOptions = {}) {
    this.limits = { ...DEFAULT_LIMITS, ...options.limits }
    this.coordinator = new DispatchCoordinator(options.lock)
    this.sessions = new SessionRegistry(this.limits.maxBrowseSessions)
    this.marshaller = new ResultMarshaller<TMap>(
      this.coordinator,
      options.allocator ?? new HeapTextEntryAllocator(),
      this.limits,
      () => this.entryPoints,
    )

    this.dispatcher = {
      handleResolve: (...args) => this.marshaller.handleResolve(...args),
      handleBrowse: (...args) => this.marshaller.handleBrowse(...args),
      textEntryKeys: map => this.requireEntryPoint('textEntryKeys')(map),
      textEntryData: (map, key) => this.requireEntryPoint('textEntryData')(map, key),
    }
  }

  get lock(): StackLock {
    return this.coordinator.lock
  }

  // MARK: binding
  /**
   * Wires the host's resolver, browser and TXT reader in. Each entry point is looked up once, here;
   * missing ones are reported and make the operations that need them fail with `IncorrectState`.
   */
  bind(capabilities: BridgeCapabilities<TMap>): void {
    this.entryPoints = bindCapabilities(capabilities)
  }

  isBound(entryPoint: EntryPointName): boolean {
    return this.entryPoints[entryPoint] !== undefined
  }

  // MARK: lifecycle
  /**
   * Always succeeds, reporting so through `onSuccess` before returning.
   */
  init(
    onSuccess: DnssdAsyncReturnCallback | null,
    onError: DnssdAsyncReturnCallback | null,
    context: unknown = null,
  ): void {
    if (!onSuccess || !onError) {
      throw new DnssdError('InvalidArgument', 'Init requires both a success and an error callback')
    }
    onSuccess(context, null)
  }

  shutdown(): void {
    bridgeDebug('shutdown')
  }

  // MARK: browse
  /**
   * Starts browsing for `type`, which may carry a `._sub.<subtype>` filter.
   *
   * The address type and interface are accepted for API parity; the backend browses on all of them.
   *
   * @returns the identifier to pass to {@link stopBrowse}.
   * @throws {DnssdError} `InvalidArgument`, `IncorrectState`, `OutOfMemory` or `BackendFault`.
   */
  browse(
    type: string | null,
    protocol: DnssdServiceProtocol,
    addressType: IPAddressType,
    interfaceId: string | undefined,
    callback: DnssdBrowseCallback | null,
    context: unknown,
  ): BrowseIdentifier {
    return this.coordinator.run(() => {
      if (!type || !callback) {
        throw new DnssdError('InvalidArgument', 'Browse requires a type and a callback')
      }
      const onResult = callback
      const browse = this.requireEntryPoint('browse')
      if (this.sessions.size >= this.limits.maxBrowseSessions) {
        throw new DnssdError('OutOfMemory', 'No room for another browse session')
      }

      const fullType = encodeFullTypeWithSubtype(type, protocol)
      bridgeDebug('browse %s (address type %s, interface %s)', fullType, addressType, interfaceId ?? 'any')
      this.coordinator.callOut('browse', () => browse(fullType, onResult, context, this.dispatcher))

      return this.sessions.create(onResult)
    })
  }

  /**
   * Ends a browse. The session is reclaimed even when the backend fails to stop; one more result may
   * still arrive for it afterwards.
   *
   * Stopping an identifier that was already stopped is a caller error.
   */
  stopBrowse(browseIdentifier: BrowseIdentifier): void {
    this.coordinator.run(() => {
      if (browseIdentifier === 0) {
        throw new DnssdError('InvalidArgument', 'Browse identifier must not be 0')
      }
      const stopBrowse = this.requireEntryPoint('stopBrowse')

      const callback = this.sessions.reclaim(browseIdentifier)
      if (!callback) {
        console.warn(`stopBrowse called with unknown browse identifier ${browseIdentifier}`)
        return
      }

      bridgeDebug('stop browse %d', browseIdentifier)
      this.coordinator.callOut('stopBrowse', () => stopBrowse(callback))
    })
  }

  // MARK: resolve
  /**
   * Asks the backend to resolve one instance. Success here only means the request went out; the
   * outcome reaches `callback` exactly once.
   */
  resolve(
    service: DnssdService | null,
    interfaceId: string | undefined,
    callback: DnssdResolveCallback | null,
    context: unknown,
  ): void {
    this.coordinator.run(() => {
      if (!service || !callback) {
        throw new DnssdError('InvalidArgument', 'Resolve requires a service and a callback')
      }
      const resolve = this.requireEntryPoint('resolve')

      const { name } = service
      const onResult = callback
      const fullType = encodeFullType(service.type, service.protocol)
      bridgeDebug('resolve %s.%s (interface %s)', name, fullType, interfaceId ?? 'any')
      this.coordinator.callOut('resolve', () => resolve(name, fullType, onResult, context, this.dispatcher))
    })
  }

  /**
   * Hint that a resolve result is no longer wanted. The backend offers no cancellation, so nothing happens.
   */
  resolveNoLongerNeeded(instanceName: string): void {
    bridgeDebug('resolve of %s no longer needed', instanceName)
  }

  // MARK: publish
  /**
   * Publishes `service` in one backend call. There are no incremental updates: publishing again replaces
   * nothing, it publishes again.
   *
   * When given, `callback` is told about the published type and name once the lock is next free.
   */
  publishService(
    service: DnssdService | null,
    callback: DnssdPublishCallback | null = null,
    context: unknown = null,
  ): void {
    this.coordinator.run(() => {
      if (!service) {
        throw new DnssdError('InvalidArgument', 'Publish requires a service')
      }
      const publish = this.requireEntryPoint('publish')

      if (!Number.isInteger(service.port) || service.port <= 0 || service.port > 0xffff) {
        throw new DnssdError('InvalidArgument', `Invalid port number ${service.port}`)
      }
      const max = this.limits.maxPublishCount
      if (service.textEntries.length > max || service.subtypes.length > max) {
        throw new DnssdError('InvalidArgument', `TXT entries and subtypes are limited to ${max} each`)
      }
      if (service.textEntries.some(entry => entry.data !== null && entry.data.length > max)) {
        throw new DnssdError('InvalidArgument', `TXT values are limited to ${max} bytes`)
      }

      const { name, hostName, port } = service
      const keys = service.textEntries.map(entry => entry.key)
      const values = service.textEntries.map(entry => entry.data)
      const subtypes = [...service.subtypes]
      const fullType = encodeFullType(service.type, service.protocol)

      bridgeDebug('publish %s.%s on port %d', name, fullType, port)
      this.coordinator.callOut('publish', () => publish(name, hostName, fullType, port, keys, values, subtypes))

      const onPublished = callback
      if (onPublished) {
        this.coordinator.deliver(() => onPublished(context, fullType, name, null))
      }
    })
  }

  /**
   * Publishing is already atomic, so there is nothing to finalize.
   */
  finalizeServiceUpdate(): void {
    return
  }

  /**
   * Withdraws every service published through the backend.
   */
  removeServices(): void {
    this.coordinator.run(() => {
      const removeServices = this.requireEntryPoint('removeServices')
      bridgeDebug('remove services')
      this.coordinator.callOut('removeServices', () => removeServices())
    })
  }

  /**
   * @throws {DnssdError} always `Unsupported`.
   */
  reconfirmRecord(hostName: string, address: IPAddress, interfaceId?: string): never {
    bridgeDebug('reconfirm %s %s (interface %s) is not supported', hostName, address.address, interfaceId ?? 'any')
    throw new DnssdError('Unsupported', 'Record reconfirmation is not supported')
  }

  // MARK: private
  private requireEntryPoint<K extends EntryPointName>(name: K): NonNullable<BoundEntryPoints<TMap>[K]> {
    const entryPoint = this.entryPoints[name]
    if (entryPoint === undefined || entryPoint === null) {
      throw new DnssdError('IncorrectState', `Backend entry point "${name}" is not bound`)
    }
    return entryPoint
  }
}
