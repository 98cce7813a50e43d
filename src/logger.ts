/**
 * @latchkey/core — logging
 *
 * One pino root logger per process. Components log through child loggers
 * carrying their component kind and instance name.
 */

import pino, { type Logger } from 'pino';

import { DEFAULT_LOG_LEVEL, LOGGER_NAME, LOG_LEVEL_ENV } from './constants';

export const rootLogger: Logger = pino({
  name:  LOGGER_NAME,
  level: process.env[LOG_LEVEL_ENV] ?? DEFAULT_LOG_LEVEL,
});

/**
 * Child logger for one component instance. `parent` defaults to the root
 * logger; pass the host application's logger to route records through it.
 *
 * The instance name is bound as `label`: pino already uses `name` for the
 * logger itself.
 */
export function createLogger(component: string, label: string, parent: Logger = rootLogger): Logger {
  return parent.child({ component, label });
}
