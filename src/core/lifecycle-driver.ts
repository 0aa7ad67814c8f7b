/**
 * @fileoverview The two entry points a host framework calls once per test.
 *
 * `begin` binds and sets up every declared helper in declaration order, appending
 * each to the teardown ledger only after its setup returns. `end` walks the ledger
 * backwards so a helper is always torn down before anything it was set up after.
 *
 * NOTE: Invariants to preserve when modifying this file:
 *  - An entry joins the ledger only once its setup has returned; a helper whose setup
 *    threw is released without a teardown call.
 *  - Teardown never short-circuits. Every ledger entry gets exactly one attempt.
 *  - Every entry ends `torn-down` and released once the owner is `done`.
 */
import {
  HelperDeclarationError,
  LifecycleError,
  SetupFailed,
  TeardownFailed,
  type TeardownFailure,
} from '@core/lifecycle-errors';
import {
  declarationsOf,
  entryFor,
  findRecord,
  recordFor,
  type LifecycleRecord,
  type RegistryEntry,
} from '@core/lifecycle-registry';

import type { LifecycleDependencies } from '@/types/dependencies';
import type { LifecycleState } from '@/types/lifecycle';

export interface LifecycleOptions {
  /** A descriptive name used as the prefix of every log line. Defaults to 'Lifecycle'. */
  description?: string;
}

export interface LifecycleDriver {
  /** Binds and sets up every helper declared on `owner`, in declaration order. */
  begin: (owner: object) => void;
  /** Tears down every set-up helper of `owner` in reverse order. Idempotent. */
  end: (owner: object) => void;
  /**
   * Runs `body` between `begin` and `end`. A failing body's error always wins;
   * a teardown failure behind it is logged instead of replacing it.
   */
  run: <TOwner extends object, TResult>(
    owner: TOwner,
    body: (owner: TOwner) => TResult,
  ) => TResult;
  stateOf: (owner: object) => LifecycleState;
}

const hasOwn = (target: object, key: string): boolean =>
  Object.prototype.hasOwnProperty.call(target, key);

/**
 * Creates a lifecycle driver bound to a set of dependencies.
 *
 * @param dependencies The logger implementation.
 * @param options Driver configuration.
 */
export const createLifecycleDriver = (
  { logger }: LifecycleDependencies,
  options: LifecycleOptions = {},
): LifecycleDriver => {
  const { description = 'Lifecycle' } = options;

  const retire = (entry: RegistryEntry): void => {
    entry.descriptor.release(entry);
    entry.state = 'torn-down';
  };

  /**
   * Releases every entry not already torn down. An entry whose setup is still
   * running is left to `begin`, which tears it down once the setup returns.
   */
  const retireAll = (record: LifecycleRecord): void => {
    record.entries.forEach((entry) => {
      if (entry.state !== 'torn-down' && entry.state !== 'setup-in-progress') {
        retire(entry);
      }
    });
  };

  /**
   * Tears down and releases every ledger entry, last set up first. Failures are
   * returned in declaration order.
   */
  const drainLedger = (record: LifecycleRecord): TeardownFailure[] => {
    const failed: Array<{ order: number; failure: TeardownFailure }> = [];
    for (let entry = record.ledger.pop(); entry; entry = record.ledger.pop()) {
      try {
        entry.descriptor.teardown(entry);
      } catch (cause) {
        logger.warn(
          `[${description}] Teardown of helper "${entry.name}" failed; continuing with the remaining helpers.`,
          cause,
        );
        failed.push({
          order: entry.order,
          failure: { helperName: entry.name, cause },
        });
      } finally {
        retire(entry);
      }
    }
    return failed
      .sort((a, b) => a.order - b.order)
      .map(({ failure }) => failure);
  };

  const begin = (owner: object): void => {
    const record = recordFor(owner);
    if (record.state !== 'not-started') {
      throw new LifecycleError(
        `[${description}] begin() called on an owner that is already ${record.state}.`,
      );
    }

    const declarations = declarationsOf(owner);
    const shadowed = declarations.find(({ name }) => hasOwn(owner, name));
    if (shadowed) {
      throw new HelperDeclarationError(
        `[${description}] Helper "${shadowed.name}" is shadowed by an instance field; declare its type with \`declare readonly ${shadowed.name}\`.`,
      );
    }

    record.state = 'setting-up';
    if (logger.getLevel() <= logger.levels.DEBUG) {
      logger.debug(
        `[${description}] Setting up helpers in order: ${declarations.map(({ name }) => name).join(', ')}`,
      );
    }

    for (const { name } of declarations) {
      const entry = entryFor(owner, name);
      try {
        entry.descriptor.bind(entry, logger);
        entry.state = 'setup-in-progress';
        entry.descriptor.setup(entry);
      } catch (cause) {
        retire(entry);
        logger.error(
          `[${description}] Setup of helper "${name}" failed; unwinding ${record.ledger.length} helper(s).`,
          cause,
        );
        const unwindFailures = drainLedger(record);
        retireAll(record);
        record.state = 'done';
        throw new SetupFailed(name, cause, unwindFailures);
      }

      // end() ran from inside this setup: the ledger is already drained.
      if (record.state !== 'setting-up') {
        entry.state = 'ready';
        record.ledger.push(entry);
        drainLedger(record);
        retireAll(record);
        throw new LifecycleError(
          `[${description}] end() was called while helper "${name}" was being set up.`,
        );
      }

      entry.state = 'ready';
      record.ledger.push(entry);
    }

    record.state = 'ready';
    logger.info(
      `[${description}] ${record.ledger.length} helper(s) ready.`,
    );
  };

  const end = (owner: object): void => {
    const record = recordFor(owner);
    if (record.state === 'done' || record.state === 'tearing-down') {
      return;
    }
    if (record.state === 'not-started') {
      retireAll(record);
      record.state = 'done';
      return;
    }

    record.state = 'tearing-down';
    const count = record.ledger.length;
    const failures = drainLedger(record);
    retireAll(record);
    record.state = 'done';

    if (failures.length > 0) {
      throw new TeardownFailed(failures);
    }
    logger.info(`[${description}] ${count} helper(s) torn down.`);
  };

  const endAfterFailedBody = (owner: object): void => {
    try {
      end(owner);
    } catch (teardownError) {
      logger.error(
        `[${description}] Teardown also failed after the test body threw.`,
        teardownError,
      );
    }
  };

  const run = <TOwner extends object, TResult>(
    owner: TOwner,
    body: (owner: TOwner) => TResult,
  ): TResult => {
    begin(owner);
    let bodyFailed = true;
    try {
      const result = body(owner);
      bodyFailed = false;
      return result;
    } finally {
      if (bodyFailed) {
        endAfterFailedBody(owner);
      } else {
        end(owner);
      }
    }
  };

  const stateOf = (owner: object): LifecycleState =>
    findRecord(owner)?.state ?? 'not-started';

  return { begin, end, run, stateOf };
};
