/**
 * @fileoverview The main, convenient entry point.
 * This file provides a pre-configured lifecycle driver that logs through Loglevel.
 */
import { createLifecyclePure } from '@core/index';

import { loggerInstance } from './logger';

// Re-export all functions and types from the pure entry point for a consistent API.
export { type Logger, setLogger } from './logger';
export * from './pure';

/**
 * The driver used by the default entry point and the Vitest adapter. It logs
 * through `loggerInstance`, so `setLogger` applies to it at any time.
 *
 * @example
 * const test = new CheckoutTest();
 * begin(test);
 * try {
 *   test.mail.expectSent('Order confirmed');
 * } finally {
 *   end(test);
 * }
 */
export const defaultDriver = createLifecyclePure({ logger: loggerInstance });

export const { begin, end, run, stateOf } = defaultDriver;
