/**
 * @latchkey/core — SequenceView
 *
 * Size, membership, search and iteration over the stable view captured at
 * first lock.
 */

import { describe, it, expect } from 'vitest';
import {
  GuardedSequence,
  StaleCursorError,
  defineTraits,
  nullableTraits,
} from '../src/index';

// ─── Shared helper ────────────────────────────────────────────────────────────

function lockSeq(initial: Array<string | null>) {
  const seq  = new GuardedSequence(nullableTraits<string>(), { initial });
  const view = seq.acquireFirstLock();
  return { seq, view };
}

// ─── Capacity ─────────────────────────────────────────────────────────────────

describe('size', () => {
  it('counts live slots only; slotCount counts every slot in range', () => {
    const { view } = lockSeq(['a', null, 'b']);

    expect(view.size()).toBe(2);
    expect(view.slotCount).toBe(3);
    expect(view.beginIndex).toBe(0);
    expect(view.endIndex).toBe(3);
    expect(view.isEmpty()).toBe(false);
  });

  it('an empty sequence yields an empty view', () => {
    const { view } = lockSeq([]);

    expect(view.size()).toBe(0);
    expect(view.isEmpty()).toBe(true);
    expect(view.begin().equals(view.end())).toBe(true);
  });

  it('drops as elements are erased, while slotCount stays put', () => {
    const { seq, view } = lockSeq(['a', 'b', 'c']);

    seq.erase(view.find('a'));
    seq.erase(view.find('c'));

    expect(view.size()).toBe(1);
    expect(view.slotCount).toBe(3);
  });
});

// ─── Membership ───────────────────────────────────────────────────────────────

describe('inView', () => {
  it('is true for every slot in [begin, end), tombstones included', () => {
    const { seq, view } = lockSeq(['a', null, 'b']);

    expect(view.inView(seq.cursorAt(0))).toBe(true);
    expect(view.inView(seq.cursorAt(1))).toBe(true);
    expect(view.inView(seq.cursorAt(2))).toBe(true);
  });

  it('is false for the end sentinel and for slots appended after the lock', () => {
    const { seq, view } = lockSeq(['a']);
    const appended = seq.pushBack('b');

    expect(view.inView(view.end())).toBe(false);
    expect(appended).not.toBeNull();
    if (appended !== null) expect(view.inView(appended)).toBe(false);
  });

  it('is false for a cursor over another sequence', () => {
    const { view } = lockSeq(['a']);
    const other    = new GuardedSequence(nullableTraits<string>(), { initial: ['a'] });

    expect(view.inView(other.begin())).toBe(false);
  });
});

// ─── Search ───────────────────────────────────────────────────────────────────

describe('find', () => {
  it('returns a cursor on the first equal live element', () => {
    const { view } = lockSeq(['a', 'b', 'b']);
    const hit      = view.find('b');

    expect(hit.index).toBe(1);
    expect(hit.value).toBe('b');
  });

  it('returns end() when nothing matches', () => {
    const { view } = lockSeq(['a', 'b']);
    const miss     = view.find('z');

    expect(miss.atEnd).toBe(true);
    expect(miss.equals(view.end())).toBe(true);
  });

  it('never matches a tombstone, even when searching for the tombstone value', () => {
    const { view } = lockSeq(['a', null]);
    expect(view.find(null).atEnd).toBe(true);
  });

  it('uses the equality from the traits', () => {
    type Row = { id: number; label: string } | null;
    const traits = defineTraits<Row>({
      isValid: row => row !== null,
      empty:   () => null,
      equals:  (a, b) => a?.id === b?.id,
    });
    const seq  = new GuardedSequence(traits, {
      initial: [{ id: 1, label: 'one' }, { id: 2, label: 'two' }],
    });
    const view = seq.acquireFirstLock();

    const hit = view.find({ id: 2, label: 'other' });

    expect(hit.index).toBe(1);
    expect(hit.value).toEqual({ id: 2, label: 'two' });
  });
});

// ─── Iteration ────────────────────────────────────────────────────────────────

describe('iteration', () => {
  it('for..of yields live elements in slot order', () => {
    const { view } = lockSeq([null, 'a', null, 'b']);
    expect([...view]).toEqual(['a', 'b']);
  });

  it('skips an element tombstoned after iteration started', () => {
    const { seq, view } = lockSeq(['a', 'b', 'c']);
    const seen: Array<string | null> = [];

    for (const item of view) {
      seen.push(item);
      if (item === 'a') seq.erase(view.find('b'));
    }

    expect(seen).toEqual(['a', 'c']);
  });

  it('does not reach elements appended after the lock', () => {
    const { seq, view } = lockSeq(['a']);
    seq.pushBack('b');

    expect(view.toArray()).toEqual(['a']);
    expect(seq.toArray()).toEqual(['a', 'b']);
  });
});

// ─── Staleness ────────────────────────────────────────────────────────────────

describe('after last release', () => {
  it('every method throws StaleCursorError', () => {
    const { seq, view } = lockSeq(['a']);

    seq.releaseLastLock();

    expect(view.isStale).toBe(true);
    expect(() => view.size()).toThrow(StaleCursorError);
    expect(() => view.begin()).toThrow(StaleCursorError);
    expect(() => view.toArray()).toThrow(StaleCursorError);
    expect(() => view.inView(seq.begin())).toThrow(StaleCursorError);
  });

  it('a new lock window captures a new view', () => {
    const { seq, view } = lockSeq(['a']);

    seq.releaseLastLock();
    const next = seq.acquireFirstLock();

    expect(next).not.toBe(view);
    expect(next.isStale).toBe(false);
    expect(next.epoch).toBe(view.epoch + 1);
  });
});
