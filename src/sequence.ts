/**
 * @latchkey/core — GuardedSequence (writer-facing container)
 *
 * An ordered, index-addressed sequence that readers iterate through a locked
 * view while a writer keeps mutating it.
 *
 * ── Lock window ──────────────────────────────────────────────────────────────
 *
 * A RefCountLock (or any primitive honouring LockObserver) reports the first
 * holder and the last one:
 *
 *   onFirstAcquire  → acquireFirstLock()   capture [0, slotCount) as the view
 *   onLastRelease   → releaseLastLock()    sweep tombstones, drop the view
 *
 * Between the two, the number of slots inside the view never changes:
 *
 *   erase  inside view     → slot overwritten with traits.empty()
 *   erase  outside view    → slot removed (only slots past the view end move)
 *   insert inside view     → rejected, returns null
 *   insert outside view    → slot inserted past the view end
 *   clear                  → every view slot tombstoned, later slots removed
 *   pushBack               → appended past the view end, or rejected under
 *                            appendWhileLocked: 'reject'
 *
 * Tombstones are skipped by every cursor, so readers see the logical content
 * immediately; physical compaction waits for the last release.
 *
 * ── Epochs ───────────────────────────────────────────────────────────────────
 *
 * The epoch advances whenever slots move for every holder: insert, erase or
 * clear while unlocked, and the compaction sweep. Views and cursors from an
 * older epoch throw StaleCursorError. Appending never moves a slot, so
 * pushBack leaves the epoch alone.
 *
 * While locked, slots past the view end still move on an erase or insert
 * there and on clear. Those advance the tail epoch instead, which retires
 * only the cursors standing at or past the view end.
 *
 * ── Writers ──────────────────────────────────────────────────────────────────
 *
 * One writer at a time. The sequence does not serialize writers and does not
 * order them; it only keeps the positions of in-flight readers valid.
 */

import type { Logger } from 'pino';

import {
  APPEND_POLICIES,
  DEFAULT_APPEND_POLICY,
  DEFAULT_SEQUENCE_NAME,
  INITIAL_EPOCH,
} from './constants';
import { SlotCursor, StaleCursorError, type Cursor, type ReadonlyCursor } from './cursor';
import { LockStateError } from './lock';
import { createLogger } from './logger';
import { defineTraits } from './traits';
import type {
  AppendPolicy,
  ElementTraits,
  EpochCell,
  GuardedSequenceOptions,
  LockObserver,
} from './types';
import { SequenceView } from './view';

export class GuardedSequence<T> implements LockObserver, Iterable<T> {
  readonly name: string;
  readonly appendWhileLocked: AppendPolicy;

  /** Never reassigned: views and cursors hold this array. */
  private readonly slots: T[] = [];
  private readonly traits: ElementTraits<T>;
  private readonly epochCell: EpochCell = { value: INITIAL_EPOCH, tail: INITIAL_EPOCH };
  private readonly log: Logger;
  private lockedView: SequenceView<T> | null = null;

  /**
   * @param traits  Validity predicate, tombstone factory and optional equality
   *                for the element type. Validated by defineTraits().
   * @throws TypeError on invalid traits or options.
   */
  constructor(traits: ElementTraits<T>, options: GuardedSequenceOptions<T> = {}) {
    this.traits = defineTraits(traits);

    const policy = options.appendWhileLocked ?? DEFAULT_APPEND_POLICY;
    if (!APPEND_POLICIES.has(policy)) {
      throw new TypeError(
        `appendWhileLocked must be one of: ${[...APPEND_POLICIES].join(', ')}; ` +
        `got '${String(policy)}'.`,
      );
    }
    this.appendWhileLocked = policy;

    const name = options.name ?? DEFAULT_SEQUENCE_NAME;
    if (typeof name !== 'string' || name.length === 0) {
      throw new TypeError(`GuardedSequence: name must be a non-empty string; got '${String(name)}'.`);
    }
    this.name = name;
    this.log  = createLogger('sequence', name, options.logger);

    if (options.initial !== undefined) {
      for (const item of options.initial) this.slots.push(item);
    }
  }

  // ── State queries ──────────────────────────────────────────────────────────

  get epoch(): number {
    return this.epochCell.value;
  }

  /** Physical slots, tombstones included. */
  get slotCount(): number {
    return this.slots.length;
  }

  /** Slots holding an element that passes the validity predicate. */
  get liveCount(): number {
    let count = 0;
    for (const item of this.slots) {
      if (this.traits.isValid(item)) count++;
    }
    return count;
  }

  isLocked(): boolean {
    return this.lockedView !== null;
  }

  /** The stable view shared by every current lock holder, or null when unlocked. */
  getLockedView(): SequenceView<T> | null {
    return this.lockedView;
  }

  // ── Lock lifecycle ─────────────────────────────────────────────────────────

  /**
   * Capture the stable view over the current slots. Called by the lock
   * primitive on its 0 → 1 transition. Copies nothing. Idempotent: a second
   * call returns the view already captured.
   */
  acquireFirstLock(): SequenceView<T> {
    if (this.lockedView === null) {
      this.lockedView = new SequenceView(
        this.slots,
        0,
        this.slots.length,
        this.traits,
        this.epochCell,
      );
      this.log.debug({ slots: this.slots.length, epoch: this.epochCell.value }, 'stable view captured');
    }
    return this.lockedView;
  }

  /**
   * Remove every slot failing the validity predicate, then discard the
   * stable view. Called by the lock primitive on its 1 → 0 transition; runs
   * to completion before the primitive returns, so the next reader sees
   * compacted storage.
   *
   * The sweep covers all of storage, not only the view, which also drops
   * elements that became invalid without being erased (see weakRefTraits).
   *
   * @throws LockStateError if no stable view exists.
   */
  releaseLastLock(): void {
    if (this.lockedView === null) {
      throw new LockStateError(
        `releaseLastLock() on '${this.name}' without a stable view. ` +
        `The lock primitive must pair every last release with a first acquire.`,
      );
    }

    const before = this.slots.length;
    let kept = 0;
    for (let i = 0; i < before; i++) {
      const item = this.slots[i];
      if (this.traits.isValid(item)) {
        if (kept !== i) this.slots[kept] = item;
        kept++;
      }
    }
    this.slots.length = kept;

    this.lockedView = null;
    this.retireCursors();
    this.log.debug({ removed: before - kept, remaining: kept }, 'compacted on last release');
  }

  onFirstAcquire(): void {
    this.acquireFirstLock();
  }

  onLastRelease(): void {
    this.releaseLastLock();
  }

  // ── Positions ──────────────────────────────────────────────────────────────

  /** Forward cursor on the first live slot of the whole storage. */
  begin(): Cursor<T> {
    return this.cursorFrom(0).seekLive();
  }

  end(): Cursor<T> {
    return this.cursorFrom(this.slots.length);
  }

  /**
   * Forward cursor on slot `index`; `index === slotCount` gives end().
   * The slot may hold a tombstone.
   *
   * @throws RangeError if `index` is not an integer in [0, slotCount].
   */
  cursorAt(index: number): Cursor<T> {
    if (!Number.isInteger(index) || index < 0 || index > this.slots.length) {
      throw new RangeError(
        `cursorAt(${index}): index must be an integer in [0, ${this.slots.length}].`,
      );
    }
    return this.cursorFrom(index);
  }

  // ── Modifiers ──────────────────────────────────────────────────────────────

  /**
   * Locked: tombstone every slot of the view and remove the slots appended
   * after it; readers see an empty view at once, storage shrinks to zero at
   * last release. Unlocked: empty the storage now.
   */
  clear(): void {
    const view = this.lockedView;
    if (view !== null) {
      if (this.slots.length > view.endIndex) {
        this.slots.length = view.endIndex;
        this.retireTail();
      }
      for (let i = view.beginIndex; i < view.endIndex; i++) {
        this.slots[i] = this.traits.empty();
      }
      return;
    }

    this.slots.length = 0;
    this.retireCursors();
  }

  /**
   * Insert `item` before the slot `position` addresses.
   *
   * @returns A forward cursor on the new element, bounded by the current
   *          end of storage; null when the sequence is locked and `position`
   *          lies inside the stable view.
   * @throws RangeError       if `position` belongs to another sequence or is
   *                          outside [0, slotCount].
   * @throws StaleCursorError if `position` is from an older epoch.
   */
  insert(position: ReadonlyCursor<T>, item: T): Cursor<T> | null {
    const index = this.resolve(position, 'insert', this.slots.length);
    const view  = this.lockedView;

    if (view !== null && view.inView(position)) {
      this.log.trace({ index }, 'insert rejected inside stable view');
      return null;
    }

    const shifts = index < this.slots.length;
    this.slots.splice(index, 0, item);
    if (shifts) {
      if (view === null) this.retireCursors();
      else this.retireTail();
    }
    return this.cursorFrom(index);
  }

  /**
   * Erase the element at `position`.
   *
   * @returns Locked, inside the view: a cursor on the same, now tombstoned,
   *          slot; advance() from it reaches the next live element.
   *          Locked, outside the view: null; the slot is gone and no
   *          continuation is promised.
   *          Unlocked: a cursor on the next live element, or end().
   * @throws RangeError       if `position` belongs to another sequence or is
   *                          at its end sentinel.
   * @throws StaleCursorError if `position` is from an older epoch.
   */
  erase(position: ReadonlyCursor<T>): Cursor<T> | null {
    const index = this.resolve(position, 'erase', this.slots.length - 1);
    if (position.atEnd) {
      throw new RangeError(
        `erase(): position is at its end sentinel (slot ${index}), ` +
        `which addresses no element. A find() that missed returns end().`,
      );
    }
    const view  = this.lockedView;

    if (view !== null) {
      if (view.inView(position)) {
        this.slots[index] = this.traits.empty();
        return this.cursorFrom(index);
      }
      this.slots.splice(index, 1);
      this.retireTail();
      return null;
    }

    this.slots.splice(index, 1);
    this.retireCursors();
    return this.cursorFrom(index).seekLive();
  }

  /**
   * Append `item`. While locked the element lands past the view end, where
   * no reader's position can be disturbed, unless appendWhileLocked is
   * 'reject'.
   *
   * @returns A forward cursor on the new element, or null when rejected.
   */
  pushBack(item: T): Cursor<T> | null {
    if (this.lockedView !== null && this.appendWhileLocked === 'reject') {
      this.log.trace({ slots: this.slots.length }, 'append rejected while locked');
      return null;
    }
    this.slots.push(item);
    return this.cursorFrom(this.slots.length - 1);
  }

  // ── Snapshots ──────────────────────────────────────────────────────────────

  /** Copy of the storage, tombstones included. */
  physicalSlots(): T[] {
    return [...this.slots];
  }

  /** Copy of the live elements in slot order. */
  toArray(): T[] {
    return this.slots.filter(item => this.traits.isValid(item));
  }

  /**
   * Yields the live elements of the whole storage. Without a lock, a
   * mutation that moves slots makes the iterator throw StaleCursorError on
   * its next step.
   */
  *[Symbol.iterator](): Iterator<T> {
    for (const cursor = this.begin(); !cursor.atEnd; cursor.advance()) {
      yield cursor.value;
    }
  }

  // ── Private ────────────────────────────────────────────────────────────────

  private cursorFrom(index: number): SlotCursor<T> {
    return new SlotCursor(
      this.slots,
      index,
      0,
      this.slots.length,
      'forward',
      this.traits,
      this.epochCell,
      this.lockedView?.endIndex,
    );
  }

  /**
   * Check that `position` is a current cursor over this storage and return
   * its slot index, which must lie in [0, maxIndex].
   */
  private resolve(position: ReadonlyCursor<T>, op: string, maxIndex: number): number {
    if (!position.isOver(this.slots)) {
      throw new RangeError(`${op}(): position belongs to a different sequence.`);
    }
    if (position.isStale) {
      throw new StaleCursorError(
        `${op}(): position was created at epoch ${position.epoch}; ` +
        `'${this.name}' is at epoch ${this.epochCell.value}. ` +
        `Obtain a fresh cursor before mutating.`,
      );
    }
    const index = position.index;
    if (index < 0 || index > maxIndex) {
      throw new RangeError(
        `${op}(): slot ${index} is outside [0, ${maxIndex}] ` +
        `(slotCount ${this.slots.length}).`,
      );
    }
    return index;
  }

  private retireCursors(): void {
    this.epochCell.value++;
  }

  private retireTail(): void {
    this.epochCell.tail++;
  }
}
