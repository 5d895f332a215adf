import { MulticastDNSBackend, type MulticastDNSBackendOptions } from './backend'
import {
  type BridgeCapabilities,
  type BridgeLimits,
  type BrowseIdentifier,
  CountingTextEntryAllocator,
  DEFAULT_LIMITS,
  type DiscoveryBackend,
  type DnssdAsyncReturnCallback,
  type DnssdBrowseCallback,
  type DnssdPublishCallback,
  type DnssdResolveCallback,
  type DnssdService,
  HeapTextEntryAllocator,
  type IPAddressType,
  type ResultDispatcher,
  StackLock,
  type TextEntry,
  type TextEntryAllocator,
  type TextEntryReader,
} from './bridge'
import { type BridgeOptions, DnssdBridge } from './DnssdBridge'
import {
  decodeProtocol,
  decodeTXT,
  DnssdError,
  type DnssdErrorCode,
  type DnssdServiceProtocol,
  encodeFullType,
  encodeFullTypeWithSubtype,
  encodeTXT,
  type IPAddress,
  isDnssdError,
  parseBrowseQueryType,
  type TxtMap,
} from './utils'

export {
  DnssdBridge,
  MulticastDNSBackend,
  StackLock,
  HeapTextEntryAllocator,
  CountingTextEntryAllocator,
  DnssdError,
  isDnssdError,
  DEFAULT_LIMITS,
  encodeFullType,
  encodeFullTypeWithSubtype,
  decodeProtocol,
  parseBrowseQueryType,
  encodeTXT,
  decodeTXT,
}
export type {
  BridgeOptions,
  BridgeLimits,
  BridgeCapabilities,
  BrowseIdentifier,
  DiscoveryBackend,
  DnssdAsyncReturnCallback,
  DnssdBrowseCallback,
  DnssdErrorCode,
  DnssdPublishCallback,
  DnssdResolveCallback,
  DnssdService,
  DnssdServiceProtocol,
  IPAddress,
  IPAddressType,
  MulticastDNSBackendOptions,
  ResultDispatcher,
  TextEntry,
  TextEntryAllocator,
  TextEntryReader,
  TxtMap,
}
