import type { DnssdError } from '../utils/DnssdError'
import type { IPAddress } from '../utils/dns-utils'
import type { DnssdServiceProtocol } from '../utils/ServiceType'

export type IPAddressType = 'any' | 'ipv4' | 'ipv6'

// MARK: TextEntry
/**
 * One TXT attribute. `data` is `null` when the key carried no value at all, which differs from an empty buffer.
 */
export interface TextEntry {
  key: string
  data: Uint8Array | null
}

// MARK: DnssdService
/**
 * A service instance as exchanged with callers: published by them, or built from a backend result.
 */
export interface DnssdService {
  /** Instance name. */
  name: string
  hostName: string
  /** Base type without the protocol suffix, e.g. `_matter`. */
  type: string
  protocol: DnssdServiceProtocol
  port: number
  /** Interface the result arrived on; `undefined` means any. */
  interfaceId?: string
  addressType?: IPAddressType
  textEntries: TextEntry[]
  subtypes: string[]
}

// MARK: callbacks
/**
 * Completion of an init request.
 */
export type DnssdAsyncReturnCallback = (context: unknown, error: DnssdError | null) => void

/**
 * Receives the outcome of one resolve. `service` and its TXT buffers are only valid during the call.
 */
export type DnssdResolveCallback = (
  context: unknown,
  service: DnssdService | null,
  addresses: readonly IPAddress[],
  error: DnssdError | null,
) => void

/**
 * Receives one browse batch. `finalBrowse` is always `true`: every batch is complete on its own.
 */
export type DnssdBrowseCallback = (
  context: unknown,
  services: readonly DnssdService[],
  finalBrowse: boolean,
  error: DnssdError | null,
) => void

export type DnssdPublishCallback = (
  context: unknown,
  type: string,
  instanceName: string,
  error: DnssdError | null,
) => void

/**
 * Opaque, non-zero identifier of a running browse.
 */
export type BrowseIdentifier = number
