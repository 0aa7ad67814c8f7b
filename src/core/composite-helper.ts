/**
 * @fileoverview Helpers built out of other helpers.
 *
 * A composite owns a private scope and a nested lifecycle driver. Its nested helpers
 * are set up, in declaration order, before its own setup body runs, and torn down,
 * in reverse, after its own teardown body. To the registry of the outer test case a
 * composite is one helper like any other.
 */
import { defineHelper } from '@core/helper-descriptor';
import { createLifecycleDriver, type LifecycleDriver } from '@core/lifecycle-driver';
import { LifecycleError, TeardownFailed } from '@core/lifecycle-errors';
import { createHelperScope, type HelperScope } from '@core/lifecycle-registry';

import type {
  HelperContext,
  HelperDescriptor,
  HelperMap,
} from '@/types/lifecycle';

/** What a composite's `bind` receives in addition to its own context. */
export interface CompositeChildren<M extends HelperMap> {
  /** The nested descriptors, as returned by `helpers(config)`. */
  readonly helpers: M;
  /** The private owner of the nested helpers. */
  readonly scope: HelperScope;
  /** Reads a nested helper. Only valid while the composite is set up. */
  use: <TChild>(descriptor: HelperDescriptor<TChild>) => TChild;
}

export interface CompositeHelperDefinition<
  TBound,
  TConfig,
  M extends HelperMap,
> {
  kind: string;
  /** Builds the nested helpers from the composite's configuration. */
  helpers: (config: TConfig) => M;
  bind: (
    children: CompositeChildren<M>,
    context: HelperContext<TConfig>,
  ) => TBound;
  /** Runs after every nested helper is set up. */
  setup?: (bound: TBound, context: HelperContext<TConfig>) => void;
  /** Runs before any nested helper is torn down. */
  teardown?: (bound: TBound, context: HelperContext<TConfig>) => void;
}

interface NestedLifecycle {
  scope: HelperScope;
  driver: LifecycleDriver;
}

/**
 * Defines a helper whose lifecycle wraps a set of nested helpers.
 *
 * @example
 * const messaging = defineCompositeHelper({
 *   kind: 'messaging',
 *   helpers: (client: Client) => ({
 *     send: propertyOverride({ target: client, key: 'send', value: record }),
 *   }),
 *   bind: ({ helpers, use }) => ({
 *     get override() {
 *       return use(helpers.send);
 *     },
 *   }),
 * });
 */
export const defineCompositeHelper = <
  TBound,
  TConfig = void,
  M extends HelperMap = HelperMap,
>(
  definition: CompositeHelperDefinition<TBound, TConfig, M>,
) => {
  const nested = new WeakMap<HelperContext<TConfig>, NestedLifecycle>();

  const nestedOf = (context: HelperContext<TConfig>): NestedLifecycle => {
    const lifecycle = nested.get(context);
    if (!lifecycle) {
      throw new LifecycleError(
        `Composite helper "${context.name}" has no nested lifecycle; it was never bound.`,
      );
    }
    return lifecycle;
  };

  return defineHelper<TBound, TConfig>({
    kind: definition.kind,

    bind: (context) => {
      const helpers = definition.helpers(context.config);
      const scope = createHelperScope(context.name, helpers);
      const driver = createLifecycleDriver(
        { logger: context.logger },
        { description: `${definition.kind}:${context.name}` },
      );
      nested.set(context, { scope, driver });

      return definition.bind(
        {
          helpers,
          scope,
          use: <TChild>(descriptor: HelperDescriptor<TChild>): TChild =>
            descriptor.of(scope),
        },
        context,
      );
    },

    setup: (bound, context) => {
      const { scope, driver } = nestedOf(context);
      driver.begin(scope);
      try {
        definition.setup?.(bound, context);
      } catch (error) {
        try {
          driver.end(scope);
        } catch (unwindError) {
          context.logger.warn(
            `[${definition.kind}:${context.name}] Unwinding nested helpers after a failed setup also failed.`,
            unwindError,
          );
        }
        throw error;
      }
    },

    teardown: (bound, context) => {
      const { scope, driver } = nestedOf(context);
      let ownFailure: { cause: unknown } | undefined;
      try {
        definition.teardown?.(bound, context);
      } catch (cause) {
        ownFailure = { cause };
      }

      try {
        driver.end(scope);
      } catch (nestedCause) {
        if (!ownFailure) throw nestedCause;
        const nestedFailures =
          nestedCause instanceof TeardownFailed
            ? nestedCause.failures
            : [{ helperName: context.name, cause: nestedCause }];
        throw new TeardownFailed([
          { helperName: context.name, cause: ownFailure.cause },
          ...nestedFailures,
        ]);
      }

      if (ownFailure) throw ownFailure.cause;
    },
  });
};
