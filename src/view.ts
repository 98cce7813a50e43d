/**
 * @latchkey/core — SequenceView
 *
 * Read-only lens over the slot range of a GuardedSequence captured when its
 * first lock was taken.
 *
 * SequenceView is the reader-facing API. It:
 *   1. Fixes a [beginIndex, endIndex) slot pair at construction. The owning
 *      sequence guarantees the number of slots in that range never changes
 *      while the view is current: erase and clear write tombstones instead
 *      of removing slots, and insert refuses positions inside the range.
 *   2. Hands out forward and reverse cursors, mutable or read-only, all of
 *      which skip tombstoned slots.
 *   3. Goes stale at last release. Every method then throws
 *      StaleCursorError, and so does every cursor it handed out.
 *
 * Reader pattern (async task holding the lock across awaits):
 *
 *   await lock.runAsync(async () => {
 *     const view = sequence.getLockedView();
 *     if (view === null) return;
 *     for (const listener of view) {
 *       await listener.handle(event);   // may erase itself from `sequence`
 *     }
 *   });
 *
 * Views are short-lived guard objects, so membership and search are linear.
 */

import { SlotCursor, StaleCursorError, type Cursor, type ReadonlyCursor } from './cursor';
import type { CursorDirection, ElementTraits, EpochCell } from './types';

export class SequenceView<T> implements Iterable<T> {
  /** First slot of the protected range. */
  readonly beginIndex: number;

  /** One past the last slot of the protected range. */
  readonly endIndex: number;

  /** Epoch of the owning sequence when the view was captured. */
  readonly epoch: number;

  /** @internal — use GuardedSequence.getLockedView() */
  constructor(
    private readonly _slots:     T[],
    beginIndex:                  number,
    endIndex:                    number,
    private readonly _traits:    ElementTraits<T>,
    private readonly _epochCell: EpochCell,
  ) {
    this.beginIndex = beginIndex;
    this.endIndex   = endIndex;
    this.epoch      = _epochCell.value;
  }

  get isStale(): boolean {
    return this.epoch !== this._epochCell.value;
  }

  /** Number of physical slots in the range, tombstones included. Constant. */
  get slotCount(): number {
    return this.endIndex - this.beginIndex;
  }

  // ── Cursors ────────────────────────────────────────────────────────────────

  /** Forward cursor on the first live slot, or end() when none is live. */
  begin(): Cursor<T> {
    return this.cursor(this.beginIndex, 'forward').seekLive();
  }

  end(): Cursor<T> {
    return this.cursor(this.endIndex, 'forward');
  }

  /** Reverse cursor on the last live slot, or rend() when none is live. */
  rbegin(): Cursor<T> {
    return this.cursor(this.endIndex - 1, 'reverse').seekLive();
  }

  rend(): Cursor<T> {
    return this.cursor(this.beginIndex - 1, 'reverse');
  }

  cbegin(): ReadonlyCursor<T> {
    return this.begin();
  }

  cend(): ReadonlyCursor<T> {
    return this.end();
  }

  crbegin(): ReadonlyCursor<T> {
    return this.rbegin();
  }

  crend(): ReadonlyCursor<T> {
    return this.rend();
  }

  // ── Membership & search ───────────────────────────────────────────────────

  /**
   * True when `position` addresses a slot of this view's range.
   *
   * Membership is by slot, not by content: a tombstoned slot is still inside
   * the view, so a second erase of it rewrites the tombstone rather than
   * removing the slot. Cursors over another sequence are never in view.
   *
   * @throws StaleCursorError if the view or `position` is stale.
   */
  inView(position: ReadonlyCursor<T>): boolean {
    this.assertFresh();
    if (!position.isOver(this._slots)) return false;
    if (position.isStale) {
      throw new StaleCursorError(
        `inView(): position was created at epoch ${position.epoch}; ` +
        `the view belongs to epoch ${this.epoch}.`,
      );
    }
    return position.index >= this.beginIndex && position.index < this.endIndex;
  }

  /**
   * Linear scan for the first live element equal to `item` under the
   * sequence's equality (Object.is unless its traits say otherwise).
   *
   * @returns A cursor on the match, or end() when there is none.
   */
  find(item: T): Cursor<T> {
    const equals = this._traits.equals ?? Object.is;
    const cursor = this.begin();
    while (!cursor.atEnd) {
      if (equals(cursor.value, item)) return cursor;
      cursor.advance();
    }
    return cursor;
  }

  // ── Capacity ───────────────────────────────────────────────────────────────

  /** Number of live elements in the view. Tombstones are not counted. */
  size(): number {
    this.assertFresh();
    let count = 0;
    for (let i = this.beginIndex; i < this.endIndex; i++) {
      if (this._traits.isValid(this._slots[i])) count++;
    }
    return count;
  }

  isEmpty(): boolean {
    return this.size() === 0;
  }

  // ── Iteration ──────────────────────────────────────────────────────────────

  /**
   * Yields the live elements of the view in slot order. Elements tombstoned
   * after iteration started are skipped when the iterator reaches them.
   */
  *[Symbol.iterator](): Iterator<T> {
    for (const cursor = this.begin(); !cursor.atEnd; cursor.advance()) {
      yield cursor.value;
    }
  }

  toArray(): T[] {
    return [...this];
  }

  // ── Private ────────────────────────────────────────────────────────────────

  private cursor(index: number, direction: CursorDirection): SlotCursor<T> {
    this.assertFresh();
    return new SlotCursor(
      this._slots,
      index,
      this.beginIndex,
      this.endIndex,
      direction,
      this._traits,
      this._epochCell,
    );
  }

  private assertFresh(): void {
    if (this.isStale) {
      throw new StaleCursorError(
        `SequenceView captured at epoch ${this.epoch} used at epoch ${this._epochCell.value}. ` +
        `The lock it was captured under has been fully released; ` +
        `re-acquire the lock and call getLockedView() again.`,
      );
    }
  }
}
