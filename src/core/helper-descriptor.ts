/**
 * @fileoverview Turns a helper definition into a declarable descriptor factory.
 *
 * Calling the factory returned by `defineHelper` is pure: it captures the
 * configuration and nothing else, so descriptors can be created while classes are
 * being declared. Bound instances are stored per slot, never on the descriptor's
 * configuration, so one descriptor can serve any number of test instances.
 */
import { entryForDescriptor } from '@core/lifecycle-registry';
import { LifecycleError, OutOfLifecycle } from '@core/lifecycle-errors';

import type { FixtureLogger } from '@/types/dependencies';
import type {
  HelperContext,
  HelperDefinition,
  HelperDescriptor,
  HelperSlot,
} from '@/types/lifecycle';

interface BoundRecord<TBound, TConfig> {
  value: TBound;
  context: HelperContext<TConfig>;
}

/**
 * Defines a helper. The result is called with the helper's configuration to
 * produce a descriptor for `declareHelpers`.
 *
 * @example
 * const counter = defineHelper({
 *   kind: 'counter',
 *   bind: ({ config }: HelperContext<number>) => ({ value: config }),
 *   teardown: (bound) => {
 *     bound.value = 0;
 *   },
 * });
 * declareHelpers(SomeTest, { hits: counter(10) });
 */
export const defineHelper = <TBound, TConfig = void>(
  definition: HelperDefinition<TBound, TConfig>,
) => {
  return (config: TConfig): HelperDescriptor<TBound, TConfig> => {
    const bound = new WeakMap<HelperSlot, BoundRecord<TBound, TConfig>>();

    const recordOf = (slot: HelperSlot): BoundRecord<TBound, TConfig> => {
      const record = bound.get(slot);
      if (!record) throw new OutOfLifecycle(slot.name, slot.state);
      return record;
    };

    const read = (slot: HelperSlot): TBound => {
      if (slot.state !== 'ready') throw new OutOfLifecycle(slot.name, slot.state);
      return recordOf(slot).value;
    };

    const descriptor: HelperDescriptor<TBound, TConfig> = {
      kind: definition.kind,
      config,

      bind(slot: HelperSlot, logger: FixtureLogger): TBound {
        if (bound.has(slot)) {
          throw new LifecycleError(
            `Helper "${slot.name}" is already bound to this owner.`,
          );
        }
        const context: HelperContext<TConfig> = {
          name: slot.name,
          kind: definition.kind,
          owner: slot.owner,
          config,
          logger,
          assertActive: () => {
            if (slot.state !== 'ready') {
              throw new OutOfLifecycle(slot.name, slot.state);
            }
          },
        };
        const value = definition.bind(context);
        bound.set(slot, { value, context });
        return value;
      },

      setup(slot: HelperSlot): void {
        const { value, context } = recordOf(slot);
        definition.setup?.(value, context);
      },

      teardown(slot: HelperSlot): void {
        const record = bound.get(slot);
        // Nothing was bound, so there is nothing to reverse.
        if (!record) return;
        definition.teardown?.(record.value, record.context);
      },

      release(slot: HelperSlot): void {
        bound.delete(slot);
      },

      read,

      of(owner: object): TBound {
        return read(entryForDescriptor(owner, descriptor));
      },
    };

    return descriptor;
  };
};
