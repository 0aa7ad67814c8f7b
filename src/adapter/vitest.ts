/**
 * @fileoverview Optional adapter that maps the lifecycle onto Vitest hooks.
 * Vitest reports a failing `afterEach` alongside a failing test body, so a teardown
 * error never hides the test's own failure.
 */
import { afterEach, beforeEach } from 'vitest';

import type { LifecycleDriver } from '@core/lifecycle-driver';
import { LifecycleError } from '@core/lifecycle-errors';

import { defaultDriver } from '../index';

export interface HelperCaseOptions {
  /** The driver running the lifecycle. Defaults to the pre-configured driver. */
  driver?: LifecycleDriver;
}

/**
 * Creates a fresh test-case instance before each test of the enclosing suite,
 * begins its lifecycle, and ends it after the test.
 *
 * @param create Builds the test-case instance. Called once per test.
 * @returns An accessor for the instance of the running test.
 *
 * @example
 * describe('checkout', () => {
 *   const current = useHelperCase(() => new CheckoutTest());
 *
 *   it('sends a confirmation', () => {
 *     current().mail.expectSent('Order confirmed');
 *   });
 * });
 */
export const useHelperCase = <T extends object>(
  create: () => T,
  options: HelperCaseOptions = {},
): (() => T) => {
  const { driver = defaultDriver } = options;
  let current: T | undefined;

  beforeEach(() => {
    const owner = create();
    current = owner;
    driver.begin(owner);
  });

  afterEach(() => {
    const owner = current;
    current = undefined;
    if (owner) driver.end(owner);
  });

  return () => {
    if (!current) {
      throw new LifecycleError(
        'useHelperCase(): the test-case instance is only available while a test runs.',
      );
    }
    return current;
  };
};
