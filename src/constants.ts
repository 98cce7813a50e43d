/**
 * @latchkey/core — defaults
 *
 * Values used when a caller leaves an option out. Changing any of them
 * changes observable behaviour for existing callers.
 */

import type { AppendPolicy } from './types';

// ─── Logging ──────────────────────────────────────────────────────────────────

/** Name of the package root logger. */
export const LOGGER_NAME = 'latchkey';

/** Environment variable read once, when the root logger is created. */
export const LOG_LEVEL_ENV = 'LATCHKEY_LOG_LEVEL';

/** Libraries stay quiet unless the host application opts in. */
export const DEFAULT_LOG_LEVEL = 'silent';

// ─── Containers ───────────────────────────────────────────────────────────────

export const DEFAULT_APPEND_POLICY: AppendPolicy = 'allow';

export const DEFAULT_SEQUENCE_NAME = 'sequence';

export const DEFAULT_LOCK_NAME = 'lock';

export const APPEND_POLICIES: ReadonlySet<AppendPolicy> = new Set<AppendPolicy>(['allow', 'reject']);

// ─── Epochs ───────────────────────────────────────────────────────────────────

/** Epoch of a freshly constructed sequence. */
export const INITIAL_EPOCH = 0;
