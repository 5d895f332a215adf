import { marshalDebug } from '../utils/debug'
import { DnssdError, type DnssdErrorCode, isDnssdError } from '../utils/DnssdError'
import { type IPAddress, parseScopedAddress } from '../utils/dns-utils'
import { decodeProtocol, type DecodedServiceType } from '../utils/ServiceType'
import type { BoundEntryPoints } from './capabilities'
import type { DispatchCoordinator } from './DispatchCoordinator'
import type { BridgeLimits } from './limits'
import type { TextEntryAllocator } from './TextEntryAllocator'
import type { DnssdBrowseCallback, DnssdResolveCallback, DnssdService, TextEntry } from './types'

// MARK: ResultMarshaller
/**
 * Turns raw backend results into {@link DnssdService} records and hands them to the caller's callback.
 *
 * Resolve: one completion yields exactly one callback invocation, success or failure. TXT keys and
 * values are copied through the {@link TextEntryAllocator} before the callback and released after it.
 *
 * Browse: one batch yields exactly one callback invocation. The first bad instance name fails the
 * whole batch; nothing before it is delivered.
 */
export class ResultMarshaller<TMap> {
  constructor(
    private readonly coordinator: DispatchCoordinator,
    private readonly allocator: TextEntryAllocator,
    private readonly limits: Readonly<BridgeLimits>,
    private readonly entryPoints: () => BoundEntryPoints<TMap>,
  ) {}

  // MARK: resolve
  handleResolve(
    instanceName: string,
    serviceType: string,
    hostName: string,
    address: string | null,
    port: number,
    textEntries: TMap | null,
    callbackHandle: DnssdResolveCallback | null,
    contextHandle: unknown,
  ): void {
    if (!callbackHandle) {
      console.error('Resolve result delivered without a callback handle')
      return
    }
    const callback = callbackHandle

    const dispatch = (error: DnssdError | null, service?: DnssdService, addr?: IPAddress, release?: () => void) => {
      this.coordinator.deliver(() => callback(contextHandle, service ?? null, addr ? [addr] : [], error), release)
    }
    const fail = (code: DnssdErrorCode, message: string) => {
      marshalDebug('resolve of %s failed: %s', instanceName, message)
      dispatch(new DnssdError(code, message))
    }

    if (address === null || address === '' || port === 0) {
      fail('UnknownResourceId', `No address or port resolved for "${instanceName}"`)
      return
    }
    if (instanceName.length > this.limits.instanceNameMaxLength) {
      fail('InvalidArgument', `Instance name "${instanceName}" is too long`)
      return
    }
    if (serviceType.length > this.limits.typeAndProtocolMaxSize) {
      fail('InvalidArgument', `Service type "${serviceType}" is too long`)
      return
    }
    if (!Number.isInteger(port) || port < 0 || port > 0xffff) {
      fail('InvalidArgument', `Port ${port} does not fit 16 bits`)
      return
    }

    const scoped = parseScopedAddress(address)
    if (!scoped) {
      fail('InvalidArgument', `Cannot parse address "${address}"`)
      return
    }

    let decoded: DecodedServiceType
    let entries: TextEntry[]
    try {
      decoded = decodeProtocol(serviceType, this.limits.typeMaxSize)
      entries = textEntries === null ? [] : this.copyTextEntries(textEntries)
    } catch (error) {
      if (!isDnssdError(error)) throw error
      marshalDebug('resolve of %s failed: %s', instanceName, error.message)
      dispatch(error)
      return
    }

    const service: DnssdService = {
      name: instanceName,
      hostName: hostName.slice(0, this.limits.hostNameMaxLength),
      type: decoded.name,
      protocol: decoded.protocol,
      port,
      interfaceId: scoped.interfaceId,
      textEntries: entries,
      subtypes: [],
    }

    dispatch(null, service, scoped.address, () => this.releaseTextEntries(entries))
  }

  // MARK: browse
  handleBrowse(
    instanceNames: readonly string[],
    serviceType: string,
    callbackHandle: DnssdBrowseCallback | null,
    contextHandle: unknown,
  ): void {
    if (!callbackHandle) {
      console.error('Browse result delivered without a callback handle')
      return
    }
    const callback = callbackHandle

    const dispatch = (error: DnssdError | null, services: DnssdService[] = []) => {
      this.coordinator.deliver(
        () => callback(contextHandle, services, true, error),
        () => {
          services.length = 0
        },
      )
    }

    let decoded: DecodedServiceType
    try {
      decoded = decodeProtocol(serviceType, this.limits.typeMaxSize)
    } catch (error) {
      if (!isDnssdError(error)) throw error
      dispatch(error)
      return
    }

    const services: DnssdService[] = []
    for (const name of instanceNames) {
      if (name.length > this.limits.instanceNameMaxLength) {
        marshalDebug('browse batch for %s rejected at "%s"', serviceType, name)
        dispatch(new DnssdError('InvalidArgument', `Instance name "${name}" is too long`))
        return
      }
      services.push({
        name,
        hostName: '',
        type: decoded.name,
        protocol: decoded.protocol,
        port: 0,
        textEntries: [],
        subtypes: [],
      })
    }

    dispatch(null, services)
  }

  // MARK: private
  /**
   * Copies every TXT attribute in the backend's key order. On failure, copies made so far are released.
   */
  private copyTextEntries(map: TMap): TextEntry[] {
    const { textEntryKeys, textEntryData } = this.entryPoints()
    if (!textEntryKeys || !textEntryData) {
      throw new DnssdError('IncorrectState', 'Text entry reader is not bound')
    }

    const keys = this.coordinator.guard('textEntryKeys', () => textEntryKeys(map))
    const entries: TextEntry[] = []
    try {
      keys.forEach((rawKey, i) => {
        const key = this.allocator.copyKey(rawKey)
        if (key === null) {
          throw new DnssdError('OutOfMemory', 'Failed to allocate TXT key')
        }
        const entry: TextEntry = { key, data: null }
        entries.push(entry)

        const bytes = this.coordinator.guard('textEntryData', () => textEntryData(map, rawKey))
        if (bytes !== null) {
          entry.data = this.allocator.copyData(bytes)
          if (entry.data === null) {
            throw new DnssdError('OutOfMemory', 'Failed to allocate TXT data')
          }
          marshalDebug(' ----- entry [%d] : %s %s', i, key, Buffer.from(entry.data).toString('utf8'))
        } else {
          marshalDebug(' ----- entry [%d] : %s NULL', i, key)
        }
      })
    } catch (error) {
      this.releaseTextEntries(entries)
      throw error
    }
    return entries
  }

  private releaseTextEntries(entries: TextEntry[]): void {
    for (const { key, data } of entries) {
      this.allocator.releaseKey(key)
      if (data !== null) {
        this.allocator.releaseData(data)
      }
    }
    entries.length = 0
  }
}
