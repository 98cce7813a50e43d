/**
 * @latchkey/core — RefCountLock
 *
 * The transition contract: onFirstAcquire exactly once per 0 → 1,
 * onLastRelease exactly once per 1 → 0, both before the caller regains
 * control, never re-entered.
 */

import { describe, it, expect } from 'vitest';
import {
  GuardedSequence,
  LockStateError,
  RefCountLock,
  nullableTraits,
  type LockObserver,
} from '../src/index';

// ─── Shared helper ────────────────────────────────────────────────────────────

/** Observer that records every hook call in order. */
function makeRecorder() {
  const calls: string[] = [];
  const observer: LockObserver = {
    onFirstAcquire: () => { calls.push('first'); },
    onLastRelease:  () => { calls.push('last'); },
  };
  return { calls, observer };
}

// ─── Transitions ──────────────────────────────────────────────────────────────

describe('transitions', () => {
  it('fires each hook once per 0 → N → 0 cohort', () => {
    const { calls, observer } = makeRecorder();
    const lock = new RefCountLock(observer);

    lock.lock();
    lock.lock();
    lock.lock();
    expect(lock.count).toBe(3);
    expect(calls).toEqual(['first']);

    lock.unlock();
    lock.unlock();
    expect(calls).toEqual(['first']);

    lock.unlock();
    expect(calls).toEqual(['first', 'last']);
    expect(lock.count).toBe(0);
    expect(lock.isLocked).toBe(false);

    lock.lock();
    lock.unlock();
    expect(calls).toEqual(['first', 'last', 'first', 'last']);
  });

  it('runs the first-acquire hook before lock() returns', () => {
    const seq  = new GuardedSequence(nullableTraits<string>(), { initial: ['a'] });
    const lock = new RefCountLock(seq);

    lock.lock();
    expect(seq.getLockedView()?.toArray()).toEqual(['a']);

    seq.erase(seq.cursorAt(0));
    lock.unlock();
    expect(seq.slotCount).toBe(0);
  });

  it('unlock() with no holders throws LockStateError', () => {
    const { observer } = makeRecorder();
    expect(() => new RefCountLock(observer).unlock()).toThrow(LockStateError);
  });

  it('leaves the count at 0 when onFirstAcquire throws', () => {
    const lock = new RefCountLock({
      onFirstAcquire: () => { throw new Error('capture failed'); },
      onLastRelease:  () => undefined,
    });

    expect(() => lock.lock()).toThrow('capture failed');
    expect(lock.count).toBe(0);
  });

  it('leaves the count at 1 when onLastRelease throws', () => {
    let fail = true;
    const lock = new RefCountLock({
      onFirstAcquire: () => undefined,
      onLastRelease:  () => { if (fail) throw new Error('sweep failed'); },
    });

    lock.lock();
    expect(() => lock.unlock()).toThrow('sweep failed');
    expect(lock.count).toBe(1);

    fail = false;
    lock.unlock();
    expect(lock.count).toBe(0);
  });

  it('rejects lock() from inside a transition hook', () => {
    const observer: LockObserver = {
      onFirstAcquire: () => { lock.lock(); },
      onLastRelease:  () => undefined,
    };
    const lock = new RefCountLock(observer);

    expect(() => lock.lock()).toThrow(LockStateError);
    expect(lock.count).toBe(0);
  });

  it('rejects an empty name', () => {
    const { observer } = makeRecorder();
    expect(() => new RefCountLock(observer, { name: '' })).toThrow(TypeError);
  });
});

// ─── Guards ───────────────────────────────────────────────────────────────────

describe('LockGuard', () => {
  it('release() unlocks exactly once', () => {
    const { calls, observer } = makeRecorder();
    const lock  = new RefCountLock(observer);
    const guard = lock.acquire();

    expect(guard.released).toBe(false);
    guard.release();
    guard.release();

    expect(guard.released).toBe(true);
    expect(lock.count).toBe(0);
    expect(calls).toEqual(['first', 'last']);
  });

  it('run() returns the callback result and releases', () => {
    const { observer } = makeRecorder();
    const lock = new RefCountLock(observer);

    const result = lock.run(() => lock.count * 10);

    expect(result).toBe(10);
    expect(lock.count).toBe(0);
  });

  it('run() releases when the callback throws', () => {
    const { calls, observer } = makeRecorder();
    const lock = new RefCountLock(observer);

    expect(() => lock.run(() => { throw new Error('reader failed'); })).toThrow('reader failed');
    expect(lock.count).toBe(0);
    expect(calls).toEqual(['first', 'last']);
  });

  it('runAsync() holds the lock across awaits', async () => {
    const { observer } = makeRecorder();
    const lock   = new RefCountLock(observer);
    const counts: number[] = [];

    const pending = lock.runAsync(async () => {
      counts.push(lock.count);
      await new Promise(resolve => setTimeout(resolve, 1));
      counts.push(lock.count);
      return 'done';
    });

    counts.push(lock.count);
    await expect(pending).resolves.toBe('done');

    expect(counts).toEqual([1, 1, 1]);
    expect(lock.count).toBe(0);
  });

  it('runAsync() releases when the callback rejects', async () => {
    const { calls, observer } = makeRecorder();
    const lock = new RefCountLock(observer);

    await expect(lock.runAsync(async () => {
      await Promise.resolve();
      throw new Error('async reader failed');
    })).rejects.toThrow('async reader failed');

    expect(lock.count).toBe(0);
    expect(calls).toEqual(['first', 'last']);
  });
});
