import { DnssdError } from '../utils/DnssdError'

// MARK: StackLock
/**
 * The single exclusive lock guarding the bridge's shared state.
 *
 * JavaScript never runs two stacks at once, so "held" always means held by the current call chain or by a
 * host that locked it and is now awaiting something. Work that must run under the lock while it is held
 * elsewhere is queued with {@link whenAvailable} and drained on the next {@link unlock}.
 */
export class StackLock {
  private held = false
  private waiters: (() => void)[] = []

  get isHeld(): boolean {
    return this.held
  }

  get pending(): number {
    return this.waiters.length
  }

  lock(): void {
    if (this.held) {
      throw new DnssdError('IncorrectState', 'Stack lock is already held')
    }
    this.held = true
  }

  unlock(): void {
    if (!this.held) {
      throw new DnssdError('IncorrectState', 'Stack lock is not held')
    }
    this.held = false
    this.drain()
  }

  /**
   * Runs `fn` with the lock held, taking it only if it is free. The lock is left as it was found.
   */
  withLock<T>(fn: () => T): T {
    if (this.held) {
      return fn()
    }
    this.lock()
    try {
      return fn()
    } finally {
      this.unlock()
    }
  }

  /**
   * Runs `fn` with the lock released, then takes it back if it was held on entry.
   *
   * Queued tasks are left queued: they wait for the owner's {@link unlock}, not for this window.
   */
  withoutLock<T>(fn: () => T): T {
    if (!this.held) {
      return fn()
    }
    this.held = false
    try {
      return fn()
    } finally {
      this.held = true
    }
  }

  /**
   * Runs `task` now if the lock is free, otherwise once it is released.
   */
  whenAvailable(task: () => void): void {
    if (this.held) {
      this.waiters.push(task)
    } else {
      task()
    }
  }

  /**
   * Runs queued tasks until the queue is empty or one of them takes the lock and keeps it.
   * A task that throws does not stop the ones behind it; the first error is rethrown afterwards.
   */
  private drain(): void {
    let failure: { error: unknown } | undefined
    while (!this.held) {
      const task = this.waiters.shift()
      if (task === undefined) break
      try {
        task()
      } catch (error) {
        failure ??= { error }
      }
    }
    if (failure) {
      throw failure.error
    }
  }
}
