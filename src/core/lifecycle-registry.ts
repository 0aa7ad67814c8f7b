/**
 * @fileoverview Per-owner bookkeeping of declared helpers.
 *
 * Declarations live on classes: `declareHelpers` records a class's own helpers and
 * installs one prototype accessor per name. The full, ordered set for a class is
 * resolved by walking its constructor chain base-first, so a subclass redeclaring a
 * name replaces the descriptor without moving it.
 *
 * Records live on owners (test-case instances, or the private scope of a composite
 * helper). They are kept in a WeakMap so that parallel owners never share state and
 * a finished test releases everything it bound.
 */
import { HelperDeclarationError } from '@core/lifecycle-errors';

import type {
  AnyHelperDescriptor,
  BindingState,
  HelperDeclaration,
  HelperMap,
  HelperSlot,
  LifecycleState,
} from '@/types/lifecycle';

/** Any class a helper can be declared on, abstract classes included. */
export type HelperCaseClass = abstract new (...args: never[]) => object;

export interface RegistryEntry extends HelperSlot {
  readonly descriptor: AnyHelperDescriptor;
  state: BindingState;
}

export interface LifecycleRecord {
  state: LifecycleState;
  readonly entries: Map<string, RegistryEntry>;
  /** Entries whose setup completed, in setup order. */
  readonly ledger: RegistryEntry[];
}

// Own declarations per class, in declaration order.
const classDeclarations = new WeakMap<Function, Map<string, AnyHelperDescriptor>>();
// Explicit declarations of private owners (composite scopes).
const scopeDeclarations = new WeakMap<object, ReadonlyArray<HelperDeclaration>>();
const records = new WeakMap<object, LifecycleRecord>();

/**
 * Returns the constructor chain of `target`, base class first.
 */
const constructorChain = (target: Function): Function[] => {
  const chain: Function[] = [];
  let current: unknown = target;
  while (typeof current === 'function' && current !== Function.prototype) {
    chain.unshift(current);
    current = Object.getPrototypeOf(current);
  }
  return chain;
};

/**
 * Resolves every helper reachable from `target` in declaration order.
 */
export const collect = (target: Function): ReadonlyArray<HelperDeclaration> => {
  const resolved = new Map<string, AnyHelperDescriptor>();
  for (const ctor of constructorChain(target)) {
    classDeclarations.get(ctor)?.forEach((descriptor, name) => {
      // Map.set on an existing key keeps its insertion position.
      resolved.set(name, descriptor);
    });
  }
  return Array.from(resolved, ([name, descriptor]) => ({ name, descriptor }));
};

/**
 * Returns the declarations that apply to an owner.
 */
export const declarationsOf = (
  owner: object,
): ReadonlyArray<HelperDeclaration> =>
  scopeDeclarations.get(owner) ?? collect(owner.constructor);

/**
 * Returns the lifecycle record of an owner, if it has one.
 */
export const findRecord = (owner: object): LifecycleRecord | undefined =>
  records.get(owner);

/**
 * Creates or returns the lifecycle record of an owner.
 */
export const recordFor = (owner: object): LifecycleRecord => {
  let record = records.get(owner);
  if (!record) {
    record = { state: 'not-started', entries: new Map(), ledger: [] };
    records.set(owner, record);
  }
  return record;
};

/**
 * Returns the single entry for (owner, name), creating it on first use.
 */
export const entryFor = (owner: object, name: string): RegistryEntry => {
  const record = recordFor(owner);
  const existing = record.entries.get(name);
  if (existing) return existing;

  const declarations = declarationsOf(owner);
  const order = declarations.findIndex((declaration) => declaration.name === name);
  if (order < 0) {
    throw new HelperDeclarationError(`No helper named "${name}" is declared here.`);
  }
  const entry: RegistryEntry = {
    name,
    owner,
    order,
    descriptor: declarations[order].descriptor,
    state: 'unbound',
  };
  record.entries.set(name, entry);
  return entry;
};

/**
 * Returns the entry of the one name `descriptor` is declared under on `owner`.
 */
export const entryForDescriptor = (
  owner: object,
  descriptor: AnyHelperDescriptor,
): RegistryEntry => {
  const names = declarationsOf(owner)
    .filter((declaration) => declaration.descriptor === descriptor)
    .map((declaration) => declaration.name);
  if (names.length === 0) {
    throw new HelperDeclarationError(
      `A "${descriptor.kind}" helper was read from an owner it is not declared on.`,
    );
  }
  if (names.length > 1) {
    throw new HelperDeclarationError(
      `The same "${descriptor.kind}" helper is declared as ${names.join(', ')}; read it by name instead.`,
    );
  }
  return entryFor(owner, names[0]);
};

/**
 * Reads the bound helper declared under `name` on `owner`.
 */
export const readHelper = (owner: object, name: string): unknown => {
  const entry = entryFor(owner, name);
  return entry.descriptor.read(entry);
};

const INTEGER_LIKE = /^(?:0|[1-9]\d*)$/;

/**
 * Object keys that look like array indices are enumerated before all others,
 * so such a name would not keep its place in declaration order.
 */
const assertValidName = (name: string): void => {
  if (name === '') {
    throw new HelperDeclarationError('Helper names must not be empty.');
  }
  if (INTEGER_LIKE.test(name)) {
    throw new HelperDeclarationError(
      `Helper "${name}" has an integer-like name, which would not keep its declaration order.`,
    );
  }
};

/**
 * Attaches helpers to a test-case class. Each name becomes an accessor on the
 * prototype; declare its type on the class with `declare readonly name: Bound;`
 * (a plain field would shadow the accessor).
 *
 * @example
 * class CheckoutTest {
 *   declare readonly mail: Mailbox;
 * }
 * declareHelpers(CheckoutTest, { mail: mailbox({ from: 'shop@example.test' }) });
 */
export const declareHelpers = (
  target: HelperCaseClass,
  helpers: HelperMap,
): void => {
  const inherited = new Set(
    collect(target).map((declaration) => declaration.name),
  );
  let own = classDeclarations.get(target);

  for (const [name, descriptor] of Object.entries(helpers)) {
    assertValidName(name);
    if (own?.has(name)) {
      throw new HelperDeclarationError(
        `Helper "${name}" is already declared on ${target.name}.`,
      );
    }
    if (name in target.prototype && !inherited.has(name)) {
      throw new HelperDeclarationError(
        `Helper "${name}" collides with an existing member of ${target.name}.`,
      );
    }

    if (!own) {
      own = new Map();
      classDeclarations.set(target, own);
    }
    own.set(name, descriptor);
    Object.defineProperty(target.prototype, name, {
      configurable: true,
      enumerable: false,
      get(this: object) {
        return readHelper(this, name);
      },
    });
  }
};

/**
 * The owner of a composite helper's nested helpers. It carries no own
 * properties, so no nested helper name can be shadowed on it.
 */
export class HelperScope {
  readonly #label: string;

  constructor(label: string) {
    this.#label = label;
  }

  toString(): string {
    return `HelperScope(${this.#label})`;
  }
}

/**
 * Creates a private owner whose helpers are given explicitly instead of
 * through a class. Composite helpers run their nested helpers against one.
 */
export const createHelperScope = (
  label: string,
  helpers: HelperMap,
): HelperScope => {
  const declarations = Object.entries(helpers).map(([name, descriptor]) => {
    assertValidName(name);
    return { name, descriptor };
  });
  const scope = new HelperScope(label);
  scopeDeclarations.set(scope, declarations);
  return scope;
};

// --- Test-only helpers ---
// eslint-disable-next-line no-underscore-dangle
export const _test_only_lifecycleRegistry =
  process.env.NODE_ENV === 'production'
    ? undefined
    : {
        hasRecord: (owner: object): boolean => records.has(owner),
        getState: (owner: object): LifecycleState | undefined =>
          records.get(owner)?.state,
        getLedgerNames: (owner: object): string[] =>
          records.get(owner)?.ledger.map((entry) => entry.name) ?? [],
      };
