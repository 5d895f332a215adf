import { DnssdError } from './DnssdError'

// MARK: protocol
/**
 * Transport protocol of a service type. `unknown` only appears on records that were never decoded.
 */
export type DnssdServiceProtocol = 'tcp' | 'udp' | 'unknown'

export const PROTOCOL_TCP_SUFFIX = '._tcp'
export const PROTOCOL_UDP_SUFFIX = '._udp'
export const SUBTYPE_MARKER = '._sub.'

/**
 * Largest base type (protocol suffix excluded) a decoded record can hold.
 */
export const DEFAULT_TYPE_MAX_SIZE = 32

/**
 * Result of splitting a dotted wire type into its base name and protocol.
 */
export interface DecodedServiceType {
  name: string
  protocol: Exclude<DnssdServiceProtocol, 'unknown'>
}

// MARK: encode
/**
 * Appends the protocol suffix to a base service type.
 *
 * Anything but `udp` is encoded as TCP.
 *
 * @example
 * encodeFullType('_matter', 'tcp') // '_matter._tcp'
 * encodeFullType('_matterc', 'udp') // '_matterc._udp'
 */
export function encodeFullType(type: string, protocol: DnssdServiceProtocol): string {
  return type + (protocol === 'udp' ? PROTOCOL_UDP_SUFFIX : PROTOCOL_TCP_SUFFIX)
}

/**
 * Encodes a browse type, rewriting a `._sub.` marker into the backend's subtype query grammar
 * `<subtype>,<type>._tcp`.
 *
 * @example
 * encodeFullTypeWithSubtype('_matter._sub.foo', 'tcp') // 'foo,_matter._tcp'
 * encodeFullTypeWithSubtype('_matter', 'tcp') // '_matter._tcp'
 *
 * @see {@link https://datatracker.ietf.org/doc/html/rfc6763#section-7.1 | RFC 6763 §7.1 Selective Instance Enumeration (Subtypes)}
 */
export function encodeFullTypeWithSubtype(type: string, protocol: DnssdServiceProtocol): string {
  const position = type.indexOf(SUBTYPE_MARKER)
  if (position === -1) {
    return encodeFullType(type, protocol)
  }

  const base = type.slice(0, position)
  const subtype = type.slice(position + SUBTYPE_MARKER.length)
  return `${subtype},${encodeFullType(base, protocol)}`
}

// MARK: decode
/**
 * Splits a dotted wire type at its last `.` into base name and protocol.
 *
 * @param wireType - e.g. `_matter._tcp`
 * @param maxNameLength - size limit of the base name
 * @throws {DnssdError} `InvalidArgument` when there is no dot, the suffix is neither `._tcp` nor `._udp`,
 * or the base name exceeds `maxNameLength`.
 */
export function decodeProtocol(wireType: string, maxNameLength = DEFAULT_TYPE_MAX_SIZE): DecodedServiceType {
  const dotPosition = wireType.lastIndexOf('.')
  if (dotPosition === -1) {
    throw new DnssdError('InvalidArgument', `Service type "${wireType}" has no protocol suffix`)
  }

  const name = wireType.slice(0, dotPosition)
  if (name.length > maxNameLength) {
    throw new DnssdError('InvalidArgument', `Service type "${wireType}" exceeds ${maxNameLength} characters`)
  }

  const suffix = wireType.slice(dotPosition)
  if (suffix === PROTOCOL_TCP_SUFFIX) {
    return { name, protocol: 'tcp' }
  }
  if (suffix === PROTOCOL_UDP_SUFFIX) {
    return { name, protocol: 'udp' }
  }

  throw new DnssdError('InvalidArgument', `Service type "${wireType}" is neither TCP nor UDP`)
}

// MARK: browse query
/**
 * A browse type as received by a backend: the full type plus an optional subtype filter.
 */
export interface BrowseQueryType {
  fullType: string
  subtype?: string
}

/**
 * Reverses {@link encodeFullTypeWithSubtype} on the backend side.
 *
 * @example
 * parseBrowseQueryType('foo,_matter._tcp') // { fullType: '_matter._tcp', subtype: 'foo' }
 */
export function parseBrowseQueryType(query: string): BrowseQueryType {
  const comma = query.indexOf(',')
  if (comma === -1) {
    return { fullType: query }
  }
  return { fullType: query.slice(comma + 1), subtype: query.slice(0, comma) }
}
