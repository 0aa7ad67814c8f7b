import { loglevelAdapter } from '@adapter/loglevel';

import type { FixtureLogger } from '@/types/dependencies';

export type Logger = FixtureLogger;

let active: Logger = loglevelAdapter;

const forward =
  (method: 'info' | 'warn' | 'error' | 'debug') =>
  (...args: unknown[]): void =>
    active[method](...args);

/**
 * Writes to whichever logger `setLogger` installed last. The default driver
 * holds this object, never the installed logger itself.
 */
export const loggerInstance: Logger = {
  info: forward('info'),
  warn: forward('warn'),
  error: forward('error'),
  debug: forward('debug'),
  getLevel: () => active.getLevel(),
  get levels() {
    return active.levels;
  },
};

/** Sends the default driver's log lines to `logger` from now on. */
export const setLogger = (logger: Logger): void => {
  active = logger;
};
