/**
 * @fileoverview Type definitions for dependency injection.
 */

/**
 * Defines the interface for a logger compatible with the library.
 * This allows consumers to inject their own logging implementation.
 */
export interface FixtureLogger {
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
  getLevel: () => number;
  levels: {
    DEBUG: number;
  };
}

/**
 * A collection of dependencies required by the lifecycle driver.
 * This allows for a fully dependency-injected and pure core.
 */
export interface LifecycleDependencies {
  /** The logging implementation. */
  logger: FixtureLogger;
}
