/**
 * @fileoverview `FixtureLogger` backed by the global `loglevel` logger. This is
 * what the default entry point logs through until `setLogger` replaces it.
 */
import log from 'loglevel';

import type { FixtureLogger } from '@/types/dependencies';

export const loglevelAdapter: FixtureLogger = {
  info: (...args: unknown[]) => log.info(...args),
  warn: (...args: unknown[]) => log.warn(...args),
  error: (...args: unknown[]) => log.error(...args),
  debug: (...args: unknown[]) => log.debug(...args),
  getLevel: () => log.getLevel(),
  levels: {
    DEBUG: log.levels.DEBUG,
  },
};
