import { bridgeDebug } from '../utils/debug'
import { DnssdError } from '../utils/DnssdError'
import { StackLock } from './StackLock'

// MARK: DispatchCoordinator
/**
 * Enforces the locking discipline between callers, the discovery backend and result callbacks.
 *
 * - Public operations run under the stack lock ({@link run}).
 * - Every call into the backend runs with the lock released ({@link callOut}); the backend may take
 *   unbounded time and may re-enter the bridge. The backend is never invoked while the lock is held
 *   by the bridge.
 * - TXT reads on the result path leave the lock as they found it ({@link guard}).
 * - Every result coming back from the backend takes the lock before the caller's callback runs and
 *   releases it once the callback returns ({@link deliver}).
 */
export class DispatchCoordinator {
  readonly lock: StackLock

  constructor(lock: StackLock = new StackLock()) {
    this.lock = lock
  }

  run<T>(operation: () => T): T {
    return this.lock.withLock(operation)
  }

  /**
   * Invokes a backend entry point with the lock released.
   *
   * Anything the backend throws is logged once and rethrown as `BackendFault`; nothing is retried.
   */
  callOut<T>(entryPoint: string, call: () => T): T {
    return this.guard(entryPoint, () => this.lock.withoutLock(call))
  }

  /**
   * Invokes a backend entry point without touching the lock, for calls made on the result path where
   * the lock belongs to whoever holds it. Throws are reported like {@link callOut}.
   */
  guard<T>(entryPoint: string, call: () => T): T {
    try {
      return call()
    } catch (error) {
      console.error(`Backend fault in ${entryPoint}:`, error)
      throw new DnssdError('BackendFault', `Backend fault in ${entryPoint}`, { cause: error })
    }
  }

  /**
   * Runs a result delivery under the lock, waiting for it if needed. `release` always runs after
   * `callback`, whether the callback returned or threw.
   *
   * A callback that throws during an immediate delivery propagates to the caller. A deferred delivery
   * has no caller to report to, so its error is logged instead of surfacing from an unrelated `unlock`.
   */
  deliver(callback: () => void, release?: () => void): void {
    const deferred = this.lock.isHeld
    if (deferred) {
      bridgeDebug('lock held, deferring result delivery (%d already waiting)', this.lock.pending)
    }
    this.lock.whenAvailable(() => {
      this.lock.lock()
      try {
        callback()
      } catch (error) {
        if (!deferred) throw error
        console.error('Deferred result callback threw:', error)
      } finally {
        try {
          release?.()
        } finally {
          this.lock.unlock()
        }
      }
    })
  }
}
