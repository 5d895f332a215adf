import { DnssdError } from '../utils/DnssdError'
import type { BrowseIdentifier, DnssdBrowseCallback } from './types'

export const DEFAULT_MAX_BROWSE_SESSIONS = 1024

// MARK: SessionRegistry
/**
 * Tracks running browses by opaque identifier.
 *
 * A session retains only the caller's callback: stopping a browse asks the backend to cancel by that
 * callback. The context is never kept here.
 *
 * Mutations happen inside the stack lock held by the bridge operation; there is no per-session locking.
 */
export class SessionRegistry {
  private sessions = new Map<BrowseIdentifier, DnssdBrowseCallback>()
  private nextIdentifier: BrowseIdentifier = 1

  constructor(private readonly maxSessions = DEFAULT_MAX_BROWSE_SESSIONS) {}

  get size(): number {
    return this.sessions.size
  }

  /**
   * Allocates a session for `callback` and returns its identifier, never `0`.
   *
   * @throws {DnssdError} `OutOfMemory` when the registry is full.
   */
  create(callback: DnssdBrowseCallback): BrowseIdentifier {
    if (this.sessions.size >= this.maxSessions) {
      throw new DnssdError('OutOfMemory', `Cannot allocate more than ${this.maxSessions} browse sessions`)
    }

    const identifier = this.allocateIdentifier()
    this.sessions.set(identifier, callback)
    return identifier
  }

  /**
   * Removes a session and hands back its callback. Each identifier is reclaimed once; reclaiming a stale
   * identifier is a caller error and yields `undefined`.
   */
  reclaim(identifier: BrowseIdentifier): DnssdBrowseCallback | undefined {
    const callback = this.sessions.get(identifier)
    this.sessions.delete(identifier)
    return callback
  }

  has(identifier: BrowseIdentifier): boolean {
    return this.sessions.has(identifier)
  }

  clear(): void {
    this.sessions.clear()
  }

  private allocateIdentifier(): BrowseIdentifier {
    // Skip 0 and identifiers still in use after wrapping around.
    for (;;) {
      const identifier = this.nextIdentifier
      this.nextIdentifier = identifier >= Number.MAX_SAFE_INTEGER ? 1 : identifier + 1
      if (!this.sessions.has(identifier)) return identifier
    }
  }
}
