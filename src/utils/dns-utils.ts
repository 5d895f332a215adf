import { isIP } from 'net'

// MARK: nameEquals
const capitalLetterRegex = /[A-Z]/g

/**
 * Compares two strings for equality in a case-insensitive manner,
 * but only ASCII uppercase letters (`A-Z`) are converted to lowercase before comparison.
 */
export function nameEquals(a: string, b: string): boolean {
  const aFormatted = a.replace(capitalLetterRegex, s => s.toLowerCase())
  const bFormatted = b.replace(capitalLetterRegex, s => s.toLowerCase())
  return aFormatted === bFormatted
}

// MARK: TXT
/**
 * Key/value attributes of a TXT record. A `null` value is a boolean attribute (a bare `key` with no `=`),
 * which is distinct from an empty value (`key=`).
 *
 * @see {@link https://datatracker.ietf.org/doc/html/rfc6763#section-6.4 | RFC 6763 §6.4 Rules for Keys in DNS-SD Key/Value Pairs}
 */
export type TxtMap = Map<string, Uint8Array | null>

/**
 * Encodes parallel key/value lists into TXT strings.
 *
 * @example
 * ```ts
 * encodeTXT(['foo', 'flag'], [Buffer.from('bar'), null])
 * // [Buffer.from("foo=bar"), Buffer.from("flag")]
 * ```
 */
export function encodeTXT(keys: readonly string[], values: readonly (Uint8Array | null)[]): Buffer[] {
  const buffers: Buffer[] = []
  keys.forEach((key, i) => {
    const value = values[i]
    if (value === null || value === undefined) {
      buffers.push(Buffer.from(key))
    } else {
      buffers.push(Buffer.concat([Buffer.from(`${key}=`), value]))
    }
  })
  return buffers
}

/**
 * Decodes TXT strings into an ordered map, keeping bytes as they arrived.
 *
 * Empty strings are skipped and only the first occurrence of a key is kept.
 *
 * @example
 * ```ts
 * decodeTXT([Buffer.from("foo=bar"), "flag", "empty="])
 * // Map { "foo" => <62 61 72>, "flag" => null, "empty" => <> }
 * ```
 *
 * @see {@link https://datatracker.ietf.org/doc/html/rfc6763#section-6.3 | RFC 6763 §6.3 Semantics of Key/Value Pairs}
 */
export function decodeTXT(data: string | Buffer | (string | Buffer)[]): TxtMap {
  const result: TxtMap = new Map()
  for (const item of [data].flat()) {
    const buf = Buffer.isBuffer(item) ? item : Buffer.from(item)
    if (buf.length === 0) continue

    const eqIndex = buf.indexOf(0x3d)
    const key = (eqIndex === -1 ? buf : buf.subarray(0, eqIndex)).toString('ascii')
    if (key.length === 0 || result.has(key)) continue

    result.set(key, eqIndex === -1 ? null : Uint8Array.from(buf.subarray(eqIndex + 1)))
  }
  return result
}

// MARK: address
export type IPAddressFamily = 'IPv4' | 'IPv6'

export interface IPAddress {
  address: string
  family: IPAddressFamily
}

export interface ScopedAddress {
  address: IPAddress
  /** Zone (scope id) carried after `%`, e.g. `wlan0` in `fe80::1%wlan0`. */
  interfaceId?: string
}

/**
 * Parses an address string, splitting off an IPv6 zone into the interface identifier.
 *
 * @returns `null` when the text is not an IP address.
 */
export function parseScopedAddress(text: string): ScopedAddress | null {
  const percent = text.indexOf('%')
  const host = percent === -1 ? text : text.slice(0, percent)
  const zone = percent === -1 ? undefined : text.slice(percent + 1)

  const version = isIP(host)
  if (version === 0) return null
  if (zone !== undefined && (version !== 6 || zone.length === 0)) return null

  const address: IPAddress = { address: host, family: version === 4 ? 'IPv4' : 'IPv6' }
  return zone === undefined ? { address } : { address, interfaceId: zone }
}
