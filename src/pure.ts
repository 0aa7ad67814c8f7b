/**
 * @fileoverview The PURE public entry point.
 * Use this if you want to provide your own dependencies instead of the defaults.
 */
export { defineCompositeHelper } from '@core/composite-helper';
export { defineHelper } from '@core/helper-descriptor';
export { createLifecyclePure } from '@core/index';
export {
  HelperDeclarationError,
  LifecycleError,
  OutOfLifecycle,
  SetupFailed,
  TeardownFailed,
} from '@core/lifecycle-errors';
export {
  collect,
  createHelperScope,
  declareHelpers,
  HelperScope,
} from '@core/lifecycle-registry';
export { propertyOverride } from '@helpers/property-override';

// Export all public types
export type {
  FixtureLogger,
  LifecycleDependencies,
} from '@/types/dependencies';
export type {
  AnyHelperDescriptor,
  BindingState,
  HelperContext,
  HelperDeclaration,
  HelperDefinition,
  HelperDescriptor,
  HelperMap,
  HelperSlot,
  LifecycleState,
} from '@/types/lifecycle';
export type {
  CompositeChildren,
  CompositeHelperDefinition,
} from '@core/composite-helper';
export type {
  LifecycleDriver,
  LifecycleOptions,
} from '@core/lifecycle-driver';
export type { TeardownFailure } from '@core/lifecycle-errors';
export type { HelperCaseClass } from '@core/lifecycle-registry';
export type {
  PropertyOverride,
  PropertyOverrideConfig,
} from '@helpers/property-override';
