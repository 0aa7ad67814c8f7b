import type { FixtureLogger } from '@/types/dependencies';

const discard = (): void => {};

/**
 * Logger for drivers created without one. Its level sits above every real level,
 * so level checks such as the debug listing of declaration order never pass.
 */
export const noopLogger: FixtureLogger = {
  info: discard,
  warn: discard,
  error: discard,
  debug: discard,
  getLevel: () => Number.MAX_SAFE_INTEGER,
  levels: { DEBUG: 1 },
};
