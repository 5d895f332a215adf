import { bridgeDebug } from '../utils/debug'
import type { DnssdBrowseCallback, DnssdResolveCallback } from './types'

// MARK: ResultDispatcher
/**
 * Entry points the backend calls when results are ready, plus the helpers that read its TXT map.
 *
 * The callback and context handles are the values the backend was given by the matching `browse` or
 * `resolve` call, passed back untouched.
 */
export interface ResultDispatcher<TMap> {
  handleResolve(
    instanceName: string,
    serviceType: string,
    hostName: string,
    address: string | null,
    port: number,
    textEntries: TMap | null,
    callbackHandle: DnssdResolveCallback | null,
    contextHandle: unknown,
  ): void
  handleBrowse(
    instanceNames: readonly string[],
    serviceType: string,
    callbackHandle: DnssdBrowseCallback | null,
    contextHandle: unknown,
  ): void
  textEntryKeys(map: TMap): readonly string[]
  textEntryData(map: TMap, key: string): Uint8Array | null
}

// MARK: backend capability
export interface ResolverCapability<TMap> {
  resolve(
    instanceName: string,
    fullType: string,
    callbackHandle: DnssdResolveCallback,
    contextHandle: unknown,
    dispatcher: ResultDispatcher<TMap>,
  ): void
  /**
   * Publishes one service atomically. `values[i]` belongs to `keys[i]`; `null` marks a key without value.
   */
  publish(
    name: string,
    hostName: string,
    fullType: string,
    port: number,
    keys: readonly string[],
    values: readonly (Uint8Array | null)[],
    subtypes: readonly string[],
  ): void
  /** Withdraws everything published so far. */
  removeServices(): void
}

export interface BrowserCapability<TMap> {
  browse(
    fullType: string,
    callbackHandle: DnssdBrowseCallback,
    contextHandle: unknown,
    dispatcher: ResultDispatcher<TMap>,
  ): void
  /** Cancels every browse started with `callbackHandle`. */
  stopBrowse(callbackHandle: DnssdBrowseCallback): void
}

/**
 * Reads the backend's opaque TXT map in the backend's own key order.
 */
export interface TextEntryReader<TMap> {
  textEntryKeys(map: TMap): readonly string[]
  textEntryData(map: TMap, key: string): Uint8Array | null
}

/**
 * A backend that implements the whole resolver and browser capability.
 */
export interface DiscoveryBackend<TMap> extends ResolverCapability<TMap>, BrowserCapability<TMap> {}

/**
 * What a host hands to {@link bindCapabilities}. Any entry point may be missing.
 */
export interface BridgeCapabilities<TMap> {
  resolver?: Partial<ResolverCapability<TMap>>
  browser?: Partial<BrowserCapability<TMap>>
  textEntries?: Partial<TextEntryReader<TMap>>
}

export type BoundEntryPoints<TMap> = Partial<ResolverCapability<TMap> & BrowserCapability<TMap> & TextEntryReader<TMap>>

export type EntryPointName = keyof BoundEntryPoints<unknown>

// MARK: bindCapabilities
/**
 * Resolves every entry point once. Missing ones are reported here and left unbound, so operations that
 * need them fail with `IncorrectState` instead of probing the host on every call.
 */
export function bindCapabilities<TMap>(capabilities: BridgeCapabilities<TMap>): BoundEntryPoints<TMap> {
  const { resolver, browser, textEntries } = capabilities

  const bound: BoundEntryPoints<TMap> = {
    resolve: bindEntryPoint(resolver, resolver?.resolve, "Resolver 'resolve'"),
    publish: bindEntryPoint(resolver, resolver?.publish, "Resolver 'publish'"),
    removeServices: bindEntryPoint(resolver, resolver?.removeServices, "Resolver 'removeServices'"),
    browse: bindEntryPoint(browser, browser?.browse, "Browser 'browse'"),
    stopBrowse: bindEntryPoint(browser, browser?.stopBrowse, "Browser 'stopBrowse'"),
    textEntryKeys: bindEntryPoint(textEntries, textEntries?.textEntryKeys, "TextEntryReader 'textEntryKeys'"),
    textEntryData: bindEntryPoint(textEntries, textEntries?.textEntryData, "TextEntryReader 'textEntryData'"),
  }

  bridgeDebug(
    'bound entry points: %o',
    Object.entries(bound)
      .filter(([, fn]) => fn !== undefined)
      .map(([name]) => name),
  )
  return bound
}

function bindEntryPoint<A extends unknown[], R>(
  owner: object | undefined,
  method: ((...args: A) => R) | undefined,
  description: string,
): ((...args: A) => R) | undefined {
  if (typeof method !== 'function') {
    console.error(`Failed to access ${description} entry point`)
    return undefined
  }
  return (...args: A) => method.apply(owner, args)
}
