/**
 * @fileoverview Type definitions for helper declarations and lifecycle state.
 */
import type { FixtureLogger } from './dependencies';

/** Where a single registry entry is in its own lifecycle. */
export type BindingState =
  | 'unbound'
  | 'setup-in-progress'
  | 'ready'
  | 'torn-down';

/** Where an owner (a test-case instance or a composite scope) is in its lifecycle. */
export type LifecycleState =
  | 'not-started'
  | 'setting-up'
  | 'ready'
  | 'tearing-down'
  | 'done';

/**
 * The descriptor-facing view of a registry entry. One slot exists per
 * (owner, declared name) pair.
 */
export interface HelperSlot {
  readonly name: string;
  readonly owner: object;
  /** Position in the owner's declaration order. */
  readonly order: number;
  readonly state: BindingState;
}

/**
 * Passed to every hook of a helper definition. Stable for the lifetime of a slot.
 */
export interface HelperContext<TConfig> {
  /** The attribute name the helper is declared under. */
  readonly name: string;
  readonly kind: string;
  readonly owner: object;
  readonly config: TConfig;
  readonly logger: FixtureLogger;
  /** Throws `OutOfLifecycle` unless the helper is set up and not yet torn down. */
  assertActive: () => void;
}

/**
 * What a helper author writes. `bind` allocates per-test state and must not
 * touch shared resources; side effects belong in `setup`.
 */
export interface HelperDefinition<TBound, TConfig> {
  /** A descriptive label used in logs and error messages. */
  kind: string;
  bind: (context: HelperContext<TConfig>) => TBound;
  setup?: (bound: TBound, context: HelperContext<TConfig>) => void;
  teardown?: (bound: TBound, context: HelperContext<TConfig>) => void;
}

/**
 * A declared, configured helper. Stateless until bound to a slot; the driver
 * is the only caller of `bind`, `setup`, `teardown` and `release`.
 */
export interface HelperDescriptor<TBound = unknown, TConfig = unknown> {
  readonly kind: string;
  readonly config: TConfig;
  bind: (slot: HelperSlot, logger: FixtureLogger) => TBound;
  setup: (slot: HelperSlot) => void;
  teardown: (slot: HelperSlot) => void;
  release: (slot: HelperSlot) => void;
  read: (slot: HelperSlot) => TBound;
  /** Reads the bound instance of this descriptor on `owner`. */
  of: (owner: object) => TBound;
}

export type AnyHelperDescriptor = HelperDescriptor<unknown, unknown>;

/** A named set of helper declarations, in declaration order. */
export type HelperMap = Readonly<Record<string, AnyHelperDescriptor>>;

export interface HelperDeclaration {
  readonly name: string;
  readonly descriptor: AnyHelperDescriptor;
}
