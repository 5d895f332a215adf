// MARK: TextEntryAllocator
/**
 * Owner of the key and data copies made while a resolve result is turned into a record.
 *
 * Copies live for exactly one callback invocation: they are made before it, lent to it, and released
 * right after it returns. A `null` return means the copy could not be made.
 */
export interface TextEntryAllocator {
  copyKey(key: string): string | null
  copyData(bytes: Uint8Array): Uint8Array | null
  releaseKey(key: string): void
  releaseData(buffer: Uint8Array): void
}

// MARK: HeapTextEntryAllocator
/**
 * Default allocator. Released data buffers are zero-filled, so a callback that kept one past its own
 * invocation reads zeros instead of stale attributes.
 */
export class HeapTextEntryAllocator implements TextEntryAllocator {
  copyKey(key: string): string | null {
    return key
  }

  copyData(bytes: Uint8Array): Uint8Array | null {
    return Uint8Array.from(bytes)
  }

  releaseKey(): void {
    // strings are immutable, nothing to scrub
  }

  releaseData(buffer: Uint8Array): void {
    buffer.fill(0)
  }
}

// MARK: CountingTextEntryAllocator
/**
 * Heap allocator that keeps a tally of what it handed out, for leak checks and diagnostics.
 *
 * @example
 * const allocator = new CountingTextEntryAllocator()
 * const bridge = new DnssdBridge({ allocator })
 * // ... after a resolve has been delivered
 * allocator.liveKeys // 0
 */
export class CountingTextEntryAllocator extends HeapTextEntryAllocator {
  allocatedKeys = 0
  allocatedData = 0
  releasedKeys = 0
  releasedData = 0

  /**
   * Number of further allocations that succeed before every copy fails; `Infinity` never fails.
   */
  remainingAllocations = Infinity

  get liveKeys(): number {
    return this.allocatedKeys - this.releasedKeys
  }

  get liveData(): number {
    return this.allocatedData - this.releasedData
  }

  override copyKey(key: string): string | null {
    if (!this.take()) return null
    this.allocatedKeys++
    return super.copyKey(key)
  }

  override copyData(bytes: Uint8Array): Uint8Array | null {
    if (!this.take()) return null
    this.allocatedData++
    return super.copyData(bytes)
  }

  override releaseKey(): void {
    this.releasedKeys++
  }

  override releaseData(buffer: Uint8Array): void {
    this.releasedData++
    super.releaseData(buffer)
  }

  private take(): boolean {
    if (this.remainingAllocations <= 0) return false
    this.remainingAllocations--
    return true
  }
}
