// ─── Types ────────────────────────────────────────────────────────────────────
export type {
  ValidityPredicate,
  ElementTraits,
  LockObserver,
  CursorDirection,
  EpochCell,
  AppendPolicy,
  GuardedSequenceOptions,
  RefCountLockOptions,
} from './types';

// ─── Constants ────────────────────────────────────────────────────────────────
export {
  LOGGER_NAME,
  LOG_LEVEL_ENV,
  DEFAULT_LOG_LEVEL,
  DEFAULT_APPEND_POLICY,
  DEFAULT_SEQUENCE_NAME,
  DEFAULT_LOCK_NAME,
  INITIAL_EPOCH,
} from './constants';

// ─── Logging ──────────────────────────────────────────────────────────────────
export { rootLogger, createLogger } from './logger';

// ─── Traits ───────────────────────────────────────────────────────────────────
export {
  defineTraits,
  optionalTraits,
  nullableTraits,
  stringTraits,
  weakRefTraits,
} from './traits';

// ─── Cursor ───────────────────────────────────────────────────────────────────
export { SlotCursor, StaleCursorError } from './cursor';
export type { Cursor, ReadonlyCursor } from './cursor';

// ─── View ─────────────────────────────────────────────────────────────────────
export { SequenceView } from './view';

// ─── Sequence ─────────────────────────────────────────────────────────────────
export { GuardedSequence } from './sequence';

// ─── Lock ─────────────────────────────────────────────────────────────────────
export { RefCountLock, LockGuard, LockStateError } from './lock';
