import { vi } from 'vitest'

import type { BrowserCapability, ResolverCapability } from '../src/bridge'
import type { TxtMap } from '../src'

export function catchError(fn: () => unknown): unknown {
  try {
    fn()
  } catch (error) {
    return error
  }
  return undefined
}

/**
 * Backend whose every entry point is a mock. TXT maps are read like the multicast backend reads them.
 */
export function createFakeBackend() {
  return {
    resolve: vi.fn<ResolverCapability<TxtMap>['resolve']>(),
    publish: vi.fn<ResolverCapability<TxtMap>['publish']>(),
    removeServices: vi.fn<ResolverCapability<TxtMap>['removeServices']>(),
    browse: vi.fn<BrowserCapability<TxtMap>['browse']>(),
    stopBrowse: vi.fn<BrowserCapability<TxtMap>['stopBrowse']>(),
    textEntryKeys: vi.fn((map: TxtMap): readonly string[] => [...map.keys()]),
    textEntryData: vi.fn((map: TxtMap, key: string): Uint8Array | null => map.get(key) ?? null),
  }
}

export type FakeBackend = ReturnType<typeof createFakeBackend>
