/**
 * @fileoverview This is the internal entry point for the pure, dependency-injected core.
 * It exports the driver factory used by the public-facing entry points.
 */
import { noopLogger } from '@utils/noop-logger';

import type { LifecycleDependencies } from '@/types/dependencies';

import {
  createLifecycleDriver,
  type LifecycleDriver,
  type LifecycleOptions,
} from './lifecycle-driver';

/**
 * Creates a lifecycle driver with application-wide dependencies configured once.
 *
 * @param dependencies The logger implementation. Logging is disabled when omitted.
 * @param options Driver configuration, such as the log prefix.
 * @returns The `begin`/`end` pair a host framework calls around every test.
 */
export const createLifecyclePure = (
  dependencies: Partial<LifecycleDependencies> = {},
  options: LifecycleOptions = {},
): LifecycleDriver =>
  createLifecycleDriver(
    { logger: dependencies.logger ?? noopLogger },
    options,
  );
