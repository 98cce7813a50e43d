/**
 * @latchkey/core — type definitions
 *
 * These types describe the contract between a GuardedSequence, the readers
 * that iterate it, and the lock primitive that tells it when readers come and
 * go. The storage IS the truth; views and cursors are lenses into it.
 */

import type { Logger } from 'pino';

// ─── Element Traits ───────────────────────────────────────────────────────────

/**
 * Decides whether a slot's current content counts as present. Must be pure:
 * the same element always yields the same answer for the lifetime of a lock
 * window, otherwise view sizes drift between calls.
 */
export type ValidityPredicate<T> = (item: T) => boolean;

/**
 * Per-container description of the element type.
 *
 * isValid:  The validity predicate. Slots failing it are skipped by every
 *           cursor and removed by the compaction sweep at last release.
 *
 * empty:    Produces the tombstone written into a slot that is erased or
 *           cleared while inside the stable view. isValid(empty()) must be
 *           false; GuardedSequence rejects traits that break this.
 *
 * equals:   Equality used by SequenceView.find(). Defaults to Object.is.
 */
export interface ElementTraits<T> {
  readonly isValid: ValidityPredicate<T>;
  readonly empty:   () => T;
  readonly equals?: (a: T, b: T) => boolean;
}

// ─── Lock Bridge ──────────────────────────────────────────────────────────────

/**
 * Lifecycle hooks a reference-counted lock primitive calls on its observer.
 *
 * onFirstAcquire  — exactly once on the 0 → 1 holder transition, before the
 *                   first locker regains control.
 * onLastRelease   — exactly once on the 1 → 0 transition, before the last
 *                   unlocker regains control.
 *
 * The primitive guarantees the two hooks never run concurrently with each
 * other or with any mutation of the observed container.
 */
export interface LockObserver {
  onFirstAcquire(): void;
  onLastRelease(): void;
}

// ─── Cursors ──────────────────────────────────────────────────────────────────

export type CursorDirection = 'forward' | 'reverse';

/**
 * Indirection cell shared by a GuardedSequence and every view and cursor it
 * hands out. Bumping `value` retires all of them at once without tracking
 * them individually.
 *
 * `tail` advances when slots past the end of the locked view move while the
 * lock is held; it retires only cursors standing on those slots.
 */
export interface EpochCell {
  value: number;
  tail:  number;
}

// ─── Container options ────────────────────────────────────────────────────────

/**
 * What pushBack() does while the sequence is locked.
 *
 * allow   Append after the stable view. Slot positions are indices and the
 *         view's end index is fixed, so no protected slot moves.
 * reject  Refuse the append and return null, like an insert into the view.
 */
export type AppendPolicy = 'allow' | 'reject';

export interface GuardedSequenceOptions<T> {
  /** Elements loaded into storage before first use. */
  readonly initial?: Iterable<T>;
  /** Defaults to 'allow'. */
  readonly appendWhileLocked?: AppendPolicy;
  /** Bound into every log record as `label`. Defaults to 'sequence'. */
  readonly name?: string;
  /** Parent logger. Defaults to the package root logger. */
  readonly logger?: Logger;
}

export interface RefCountLockOptions {
  readonly name?:   string;
  readonly logger?: Logger;
}
