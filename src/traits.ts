/**
 * @latchkey/core — element traits
 *
 * Ready-made ElementTraits for the common tombstone conventions, and the
 * validation every GuardedSequence applies to the traits it is given.
 */

import type { ElementTraits } from './types';

/**
 * Validate and freeze a traits object.
 *
 * @throws TypeError if a member is not a function, or if the tombstone
 *         produced by empty() passes isValid() — such a tombstone would stay
 *         visible to readers and survive compaction.
 */
export function defineTraits<T>(traits: ElementTraits<T>): ElementTraits<T> {
  if (typeof traits.isValid !== 'function') {
    throw new TypeError('ElementTraits.isValid must be a function.');
  }
  if (typeof traits.empty !== 'function') {
    throw new TypeError('ElementTraits.empty must be a function.');
  }
  if (traits.equals !== undefined && typeof traits.equals !== 'function') {
    throw new TypeError('ElementTraits.equals must be a function when provided.');
  }
  if (traits.isValid(traits.empty())) {
    throw new TypeError(
      'ElementTraits.empty() produced a value that isValid() accepts. ' +
      'The tombstone must fail the validity predicate.',
    );
  }
  return Object.freeze({
    isValid: traits.isValid,
    empty:   traits.empty,
    equals:  traits.equals,
  });
}

/** `undefined` marks an empty slot. */
export function optionalTraits<T>(): ElementTraits<T | undefined> {
  return defineTraits<T | undefined>({
    isValid: item => item !== undefined,
    empty:   () => undefined,
  });
}

/** `null` marks an empty slot. */
export function nullableTraits<T>(): ElementTraits<T | null> {
  return defineTraits<T | null>({
    isValid: item => item !== null,
    empty:   () => null,
  });
}

/** The empty string marks an empty slot. */
export const stringTraits: ElementTraits<string> = defineTraits<string>({
  isValid: item => item.length > 0,
  empty:   () => '',
});

/**
 * Weakly held elements. `null` marks an erased slot; a reference whose
 * target has been garbage-collected is invalid too, so it is skipped by
 * readers and swept at the next last release without anyone erasing it.
 * Equality compares targets, not the WeakRef wrappers.
 */
export function weakRefTraits<T extends object>(): ElementTraits<WeakRef<T> | null> {
  return defineTraits<WeakRef<T> | null>({
    isValid: ref => ref !== null && ref.deref() !== undefined,
    empty:   () => null,
    equals:  (a, b) => a === b || (a?.deref() ?? null) === (b?.deref() ?? null),
  });
}
