/**
 * @latchkey/core — SlotCursor
 *
 * A predicate-filtering, step-in-place cursor over the slots of a
 * GuardedSequence. A cursor never copies elements: it holds the storage
 * array, a slot index, the bounds it may walk, and a direction.
 *
 * Stepping (advance / retreat) skips every slot whose content fails the
 * sequence's validity predicate, so tombstones left by an erase under lock
 * are invisible to traversal while their slot still exists.
 *
 *   forward   walks lo → hi; end sentinel is slot hi
 *   reverse   walks hi-1 → lo; end sentinel is slot lo-1
 *
 * Read-only and mutable variants are the same object seen through
 * ReadonlyCursor<T> or Cursor<T>.
 *
 * Every cursor remembers the epoch it was created under. Once the owning
 * sequence moves slots for all holders (a mutation while unlocked, or the
 * compaction sweep at last release) the epoch advances and every older
 * cursor throws StaleCursorError instead of reading a slot that now holds
 * something else.
 *
 * Slots past the end of a locked view can still move while the lock is held
 * (an erase or insert there, or a clear). Cursors handed out by the sequence
 * during a lock window also remember the tail epoch and the view end; once
 * the tail epoch advances, such a cursor standing at or past the view end is
 * stale too.
 */

import type { CursorDirection, ElementTraits, EpochCell } from './types';

// ─── Errors ───────────────────────────────────────────────────────────────────

/**
 * Thrown when a cursor or view is used after the slot positions it refers to
 * have moved. This is a programming error: the holder kept a position past
 * the end of the lock window (or across an unlocked mutation) that made it
 * meaningful.
 */
export class StaleCursorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StaleCursorError';
  }
}

// ─── Public types ─────────────────────────────────────────────────────────────

export interface ReadonlyCursor<T> {
  /** Physical slot index. Equals the end sentinel when atEnd is true. */
  readonly index: number;
  readonly direction: CursorDirection;
  /** Epoch of the owning sequence when this cursor was created. */
  readonly epoch: number;
  readonly isStale: boolean;
  readonly atEnd: boolean;
  /** True when the cursor is on a slot holding a live element. */
  readonly isValid: boolean;
  /** The live element at the cursor. Throws RangeError at the end sentinel or on a tombstone. */
  readonly value: T;

  advance(): this;
  retreat(): this;
  seekLive(): this;
  equals(other: ReadonlyCursor<T>): boolean;
  clone(): ReadonlyCursor<T>;
  /** True when this cursor addresses `storage`. */
  isOver(storage: readonly unknown[]): boolean;
}

export interface Cursor<T> extends ReadonlyCursor<T> {
  /** Overwrite the content of the current slot. Slot count never changes. */
  set(value: T): void;
  clone(): Cursor<T>;
}

// ─── SlotCursor ───────────────────────────────────────────────────────────────

export class SlotCursor<T> implements Cursor<T> {
  readonly epoch: number;

  private _index: number;
  private readonly _step: 1 | -1;
  private readonly _tailEpoch: number;

  /** @internal — obtain cursors from SequenceView or GuardedSequence */
  constructor(
    private readonly _slots:     T[],
    index:                       number,
    private readonly _lo:        number,
    private readonly _hi:        number,
    readonly direction:          CursorDirection,
    private readonly _traits:    ElementTraits<T>,
    private readonly _epochCell: EpochCell,
    /** First slot whose position is not protected by a view. */
    private readonly _tailStart: number = Number.POSITIVE_INFINITY,
  ) {
    this._index     = index;
    this._step      = direction === 'forward' ? 1 : -1;
    this.epoch      = _epochCell.value;
    this._tailEpoch = _epochCell.tail;
  }

  get index(): number {
    return this._index;
  }

  get isStale(): boolean {
    return this.epoch !== this._epochCell.value || this.tailMoved();
  }

  get atEnd(): boolean {
    return this._step === 1
      ? this._index >= this._hi || this._index >= this._slots.length
      : this._index < this._lo;
  }

  get isValid(): boolean {
    this.assertFresh();
    return !this.atEnd && this.liveAt(this._index);
  }

  get value(): T {
    this.assertFresh();
    this.assertOnSlot('value');
    const item = this._slots[this._index];
    if (!this._traits.isValid(item)) {
      throw new RangeError(
        `Slot ${this._index} holds no live element. ` +
        `It was erased or cleared while the sequence was locked; ` +
        `call advance() or seekLive() to move to the next live element.`,
      );
    }
    return item;
  }

  set(value: T): void {
    this.assertFresh();
    this.assertOnSlot('set');
    this._slots[this._index] = value;
  }

  // ── Stepping ───────────────────────────────────────────────────────────────

  /**
   * Step once in the cursor's direction, then keep stepping over tombstones
   * until a live slot or the end sentinel is reached.
   *
   * @throws RangeError when already at the end sentinel.
   */
  advance(): this {
    this.assertFresh();
    if (this.atEnd) {
      throw new RangeError(
        `advance(): cursor is already at its end sentinel (slot ${this._index}).`,
      );
    }
    this._index += this._step;
    this.skipInvalid();
    return this;
  }

  /**
   * Step against the cursor's direction to the previous live slot.
   * Retreating from the end sentinel lands on the last live slot.
   *
   * @throws RangeError when no live slot precedes the cursor within its bounds.
   *         The cursor does not move in that case.
   */
  retreat(): this {
    this.assertFresh();
    for (let i = this._index - this._step; i >= this._lo && i < this._hi; i -= this._step) {
      if (this.liveAt(i)) {
        this._index = i;
        return this;
      }
    }
    throw new RangeError(
      `retreat(): no live element before slot ${this._index} ` +
      `within [${this._lo}, ${this._hi}).`,
    );
  }

  /**
   * Move in the cursor's direction to the nearest live slot, staying put when
   * already on one. Use after erase() under lock returned a cursor on the
   * tombstoned slot.
   */
  seekLive(): this {
    this.assertFresh();
    this.skipInvalid();
    return this;
  }

  // ── Identity ───────────────────────────────────────────────────────────────

  equals(other: ReadonlyCursor<T>): boolean {
    return other.isOver(this._slots)
      && other.index     === this._index
      && other.direction === this.direction
      && other.atEnd     === this.atEnd;
  }

  clone(): SlotCursor<T> {
    this.assertFresh();
    return new SlotCursor(
      this._slots,
      this._index,
      this._lo,
      this._hi,
      this.direction,
      this._traits,
      this._epochCell,
      this._tailStart,
    );
  }

  isOver(storage: readonly unknown[]): boolean {
    return this._slots === storage;
  }

  // ── Private ────────────────────────────────────────────────────────────────

  private tailMoved(): boolean {
    return this._index >= this._tailStart && this._tailEpoch !== this._epochCell.tail;
  }

  private liveAt(i: number): boolean {
    return i >= 0 && i < this._slots.length && this._traits.isValid(this._slots[i]);
  }

  private skipInvalid(): void {
    while (!this.atEnd && !this.liveAt(this._index)) {
      this._index += this._step;
    }
  }

  private assertOnSlot(op: string): void {
    if (this.atEnd || this._index < 0 || this._index >= this._slots.length) {
      throw new RangeError(
        `${op}: cursor is at its end sentinel (slot ${this._index}); ` +
        `there is no element to access.`,
      );
    }
  }

  private assertFresh(): void {
    if (this.epoch === this._epochCell.value && this.tailMoved()) {
      throw new StaleCursorError(
        `Cursor on slot ${this._index} lies past the locked view, which ends at ` +
        `slot ${this._tailStart}, and slots there have moved since it was created. ` +
        `Obtain a fresh cursor from the sequence.`,
      );
    }
    if (this.isStale) {
      throw new StaleCursorError(
        `Cursor created at epoch ${this.epoch} used at epoch ${this._epochCell.value}. ` +
        `Slot positions have moved since (a mutation while unlocked, or compaction ` +
        `at last release). Obtain a fresh cursor from the sequence or its locked view.`,
      );
    }
  }
}
