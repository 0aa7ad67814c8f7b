/**
 * @fileoverview The error taxonomy of the lifecycle core.
 * Helper-level errors (a failed assertion inside a helper's query method) are not part
 * of it and always propagate unmodified.
 */
import type { BindingState } from '@/types/lifecycle';

/** Base class of every error raised by the lifecycle core. */
export class LifecycleError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'LifecycleError';
  }
}

/** A helper was read outside the window between its setup and its teardown. */
export class OutOfLifecycle extends LifecycleError {
  readonly helperName: string;
  readonly state: BindingState;

  constructor(helperName: string, state: BindingState) {
    const reason =
      state === 'torn-down'
        ? 'it has already been torn down'
        : state === 'setup-in-progress'
          ? 'its setup has not completed'
          : 'begin() has not run for this test';
    super(`Helper "${helperName}" was accessed outside its lifecycle: ${reason}.`);
    this.name = 'OutOfLifecycle';
    this.helperName = helperName;
    this.state = state;
  }
}

/** A failure recorded while tearing a helper down. */
export interface TeardownFailure {
  helperName: string;
  cause: unknown;
}

const describeCause = (cause: unknown): string => {
  if (cause instanceof Error) return cause.message;
  try {
    return String(cause);
  } catch {
    // Objects without a prototype have no toString.
    return Object.prototype.toString.call(cause);
  }
};

/**
 * Raised by `begin` when a helper's bind or setup throws. Every helper set up
 * before it has already been torn down when this is thrown.
 */
export class SetupFailed extends LifecycleError {
  readonly helperName: string;
  /** Teardown failures hit while unwinding the helpers set up before the failing one. */
  readonly unwindFailures: ReadonlyArray<TeardownFailure>;

  constructor(
    helperName: string,
    cause: unknown,
    unwindFailures: ReadonlyArray<TeardownFailure> = [],
  ) {
    super(`Setup of helper "${helperName}" failed: ${describeCause(cause)}`, {
      cause,
    });
    this.name = 'SetupFailed';
    this.helperName = helperName;
    this.unwindFailures = unwindFailures;
  }
}

/** Raised by `end` once every teardown has been attempted and at least one threw. */
export class TeardownFailed extends LifecycleError {
  readonly failures: ReadonlyArray<TeardownFailure>;

  constructor(failures: ReadonlyArray<TeardownFailure>) {
    const names = failures.map((failure) => failure.helperName).join(', ');
    super(`Teardown failed for ${failures.length} helper(s): ${names}`);
    this.name = 'TeardownFailed';
    this.failures = failures;
  }
}

/** A helper declaration that cannot be resolved unambiguously. */
export class HelperDeclarationError extends LifecycleError {
  constructor(message: string) {
    super(message);
    this.name = 'HelperDeclarationError';
  }
}
