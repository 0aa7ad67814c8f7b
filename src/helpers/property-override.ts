/**
 * @fileoverview A scoped override of one property, restored on teardown.
 *
 * Two overrides of the same property unwind correctly when declared in order:
 * the later one is torn down first and restores the earlier one's replacement.
 */
import { defineHelper } from '@core/helper-descriptor';

import type { FixtureLogger } from '@/types/dependencies';
import type { HelperDescriptor } from '@/types/lifecycle';

export interface PropertyOverrideConfig {
  target: object;
  key: PropertyKey;
  value: unknown;
}

export interface PropertyOverride {
  readonly target: object;
  readonly key: PropertyKey;
  readonly replacement: unknown;
  /** The own property descriptor setup replaced, undefined when there was none. */
  readonly original: PropertyDescriptor | undefined;
  /** Whether the replacement is currently installed. */
  readonly installed: boolean;
  /** Reads `target[key]` as the code under test sees it. */
  current: () => unknown;
}

/**
 * The bound override. Every public read checks that the helper is still active,
 * so a reference kept past `end` fails instead of reporting the last state.
 */
class ActiveOverride implements PropertyOverride {
  readonly #config: PropertyOverrideConfig;
  readonly #assertActive: () => void;
  #original: PropertyDescriptor | undefined;
  #installed = false;

  constructor(config: PropertyOverrideConfig, assertActive: () => void) {
    this.#config = config;
    this.#assertActive = assertActive;
  }

  get target(): object {
    this.#assertActive();
    return this.#config.target;
  }

  get key(): PropertyKey {
    this.#assertActive();
    return this.#config.key;
  }

  get replacement(): unknown {
    this.#assertActive();
    return this.#config.value;
  }

  get original(): PropertyDescriptor | undefined {
    this.#assertActive();
    return this.#original;
  }

  get installed(): boolean {
    this.#assertActive();
    return this.#installed;
  }

  current(): unknown {
    this.#assertActive();
    return Reflect.get(this.#config.target, this.#config.key);
  }

  install(): void {
    const { target, key, value } = this.#config;
    const original = Object.getOwnPropertyDescriptor(target, key);
    // Throws for a non-configurable property, before anything is changed.
    Object.defineProperty(target, key, {
      configurable: true,
      enumerable: original?.enumerable ?? true,
      writable: true,
      value,
    });
    this.#original = original;
    this.#installed = true;
  }

  restore(logger: FixtureLogger, name: string): void {
    if (!this.#installed) return;
    const { target, key } = this.#config;
    if (this.#original) {
      Object.defineProperty(target, key, this.#original);
    } else if (!Reflect.deleteProperty(target, key)) {
      logger.warn(`[${name}] Could not remove the override of ${String(key)}.`);
    }
    this.#installed = false;
  }
}

/**
 * Replaces `target[key]` with `value` for the duration of a test.
 */
export const propertyOverride: (
  config: PropertyOverrideConfig,
) => HelperDescriptor<PropertyOverride, PropertyOverrideConfig> = defineHelper<
  ActiveOverride,
  PropertyOverrideConfig
>({
  kind: 'property-override',

  bind: ({ config, assertActive }) => new ActiveOverride(config, assertActive),

  setup: (override) => override.install(),

  teardown: (override, { logger, name }) => override.restore(logger, name),
});
