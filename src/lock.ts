/**
 * @latchkey/core — RefCountLock
 *
 * A reference-counted lock that reports its 0 → 1 and 1 → 0 transitions to
 * a LockObserver. Holders do not exclude each other: any number of readers
 * may hold the lock at once. What the lock provides is the transition
 * contract a GuardedSequence relies on:
 *
 *   lock()    0 → 1   observer.onFirstAcquire() runs before lock() returns
 *   unlock()  1 → 0   observer.onLastRelease()  runs before unlock() returns
 *
 * Hooks run synchronously, so within one isolate no other task can observe
 * the lock mid-transition. A hook that calls back into lock() or unlock()
 * throws LockStateError.
 *
 * Holding the lock across awaits is the intended use:
 *
 *   await lock.runAsync(async () => {
 *     for (const item of sequence.getLockedView() ?? []) await visit(item);
 *   });
 */

import type { Logger } from 'pino';

import { DEFAULT_LOCK_NAME } from './constants';
import { createLogger } from './logger';
import type { LockObserver, RefCountLockOptions } from './types';

// ─── Errors ───────────────────────────────────────────────────────────────────

/**
 * Thrown when the lock protocol is violated: unlocking an unheld lock,
 * re-entering a transition from inside a hook, or a lifecycle hook invoked
 * out of order. Not recoverable; it means a caller broke the contract.
 */
export class LockStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LockStateError';
  }
}

// ─── LockGuard ────────────────────────────────────────────────────────────────

/** One hold on a RefCountLock. release() gives it back exactly once. */
export class LockGuard {
  private _released = false;

  /** @internal — use RefCountLock.acquire() */
  constructor(private readonly _lock: RefCountLock) {}

  get released(): boolean {
    return this._released;
  }

  /**
   * Unlock the owning lock. Subsequent calls are no-ops.
   * If the last-release hook throws, the guard stays held and may be
   * released again.
   */
  release(): void {
    if (this._released) return;
    this._lock.unlock();
    this._released = true;
  }
}

// ─── RefCountLock ─────────────────────────────────────────────────────────────

export class RefCountLock {
  readonly name: string;

  private _count         = 0;
  private _transitioning = false;
  private readonly log: Logger;

  constructor(
    private readonly observer: LockObserver,
    options: RefCountLockOptions = {},
  ) {
    const name = options.name ?? DEFAULT_LOCK_NAME;
    if (typeof name !== 'string' || name.length === 0) {
      throw new TypeError(`RefCountLock: name must be a non-empty string; got '${String(name)}'.`);
    }
    this.name = name;
    this.log  = createLogger('lock', name, options.logger);
  }

  /** Number of current holders. */
  get count(): number {
    return this._count;
  }

  get isLocked(): boolean {
    return this._count > 0;
  }

  /**
   * Add a holder. The first holder triggers observer.onFirstAcquire(); if
   * that hook throws, the count stays at 0 and the error propagates.
   */
  lock(): void {
    this.assertNotTransitioning('lock');
    if (this._count === 0) {
      this.transition(() => this.observer.onFirstAcquire());
      this.log.debug('first acquire');
    }
    this._count++;
  }

  /**
   * Remove a holder. The last holder triggers observer.onLastRelease(); if
   * that hook throws, the count stays at 1 and the error propagates.
   *
   * @throws LockStateError if the lock is not held.
   */
  unlock(): void {
    this.assertNotTransitioning('unlock');
    if (this._count === 0) {
      throw new LockStateError(
        `unlock() on '${this.name}' with no holders. ` +
        `Every unlock() must pair with an earlier lock().`,
      );
    }
    if (this._count === 1) {
      this.transition(() => this.observer.onLastRelease());
      this.log.debug('last release');
    }
    this._count--;
  }

  // ── Scoped holds ───────────────────────────────────────────────────────────

  acquire(): LockGuard {
    this.lock();
    return new LockGuard(this);
  }

  /** Hold the lock for the duration of a synchronous callback. */
  run<R>(fn: () => R): R {
    const guard = this.acquire();
    try {
      return fn();
    } finally {
      guard.release();
    }
  }

  /** Hold the lock until the promise returned by `fn` settles. */
  async runAsync<R>(fn: () => Promise<R>): Promise<R> {
    const guard = this.acquire();
    try {
      return await fn();
    } finally {
      guard.release();
    }
  }

  // ── Private ────────────────────────────────────────────────────────────────

  private transition(hook: () => void): void {
    this._transitioning = true;
    try {
      hook();
    } finally {
      this._transitioning = false;
    }
  }

  private assertNotTransitioning(op: string): void {
    if (this._transitioning) {
      throw new LockStateError(
        `${op}() on '${this.name}' from inside a lock transition hook. ` +
        `onFirstAcquire / onLastRelease must not lock or unlock.`,
      );
    }
  }
}
