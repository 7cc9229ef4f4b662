/*
 * Definitions
 * -----------
 * Declarative descriptions of how to produce the value of an entry. A
 * definition is a tree: class constructions and arrays hold nested
 * definitions.
 *
 * Every node is frozen and carries a module-private brand, so user data that
 * happens to have a `kind` property is never mistaken for a definition.
 */
import { idOf, type EntryKey } from '../core/token.js';
import type { Constructor, ResolutionContext } from '../types/types.js';

const DEFINITION: unique symbol = Symbol.for('kiln.definition');

interface Branded {
  readonly [DEFINITION]: true;
}

export interface ValueDefinition extends Branded {
  readonly kind: 'value';
  readonly value: unknown;
}

/** Entry-level alias, or a reference to another entry when nested. */
export interface AliasDefinition extends Branded {
  readonly kind: 'alias';
  readonly target: string;
}

export type FactoryFunction<T = unknown> = (container: ResolutionContext) => T;

export interface FactoryDefinition extends Branded {
  readonly kind: 'factory';
  readonly factory: FactoryFunction;
}

export interface PropertyInjection {
  readonly name: string;
  readonly value: Definition;
}

export interface MethodCall {
  readonly name: string;
  readonly args: readonly Definition[];
}

export interface ClassDefinition extends Branded {
  readonly kind: 'class';
  /** Constructor, or the name a class is registered under. */
  readonly target: Constructor | string;
  /** Missing constructor arguments are taken from the introspector. */
  readonly autowired: boolean;
  /** Explicit constructor arguments; holes are left to autowiring. */
  readonly constructorArgs: readonly (Definition | undefined)[];
  readonly properties: readonly PropertyInjection[];
  readonly methods: readonly MethodCall[];

  /** Explicit constructor arguments, in order. */
  args(...args: unknown[]): ClassDefinition;
  /** Explicit argument for one constructor parameter. */
  arg(index: number, value: unknown): ClassDefinition;
  property(name: string, value: unknown): ClassDefinition;
  method(name: string, ...args: unknown[]): ClassDefinition;
}

export interface ArrayItem {
  readonly key: string | number;
  readonly definition: Definition;
}

/** A list (integer keys) or a record (string keys) of nested definitions. */
export interface ArrayDefinition extends Branded {
  readonly kind: 'array';
  readonly list: boolean;
  readonly items: readonly ArrayItem[];
}

export type Definition =
  | ValueDefinition
  | AliasDefinition
  | FactoryDefinition
  | ClassDefinition
  | ArrayDefinition;

export type DefinitionMap = ReadonlyMap<string, Definition>;

/** Definitions as handed to the builder: a record or a map of raw values. */
export type DefinitionSource = Readonly<Record<string, unknown>> | ReadonlyMap<string, unknown>;

export function isDefinition(x: unknown): x is Definition {
  return typeof x === 'object' && x !== null && DEFINITION in x;
}

/**
 * Plain record: created by an object literal or `Object.create(null)`.
 * Class instances, functions and built-ins such as Map or Date are not.
 */
export function isPlainObject(x: unknown): x is Record<string, unknown> {
  if (typeof x !== 'object' || x === null || Array.isArray(x)) return false;
  const proto: unknown = Object.getPrototypeOf(x);
  return proto === Object.prototype || proto === null;
}

export function value(raw: unknown): ValueDefinition {
  return Object.freeze({ [DEFINITION]: true as const, kind: 'value' as const, value: raw });
}

export function alias(target: EntryKey): AliasDefinition {
  return Object.freeze({
    [DEFINITION]: true as const,
    kind: 'alias' as const,
    target: idOf(target),
  });
}

/**
 * Entry produced by calling `fn` with the container. Factories are never
 * compiled: they are always served by the interpreted path.
 */
export function factory<T>(fn: FactoryFunction<T>): FactoryDefinition {
  return Object.freeze({ [DEFINITION]: true as const, kind: 'factory' as const, factory: fn });
}

type ClassState = Pick<
  ClassDefinition,
  'target' | 'autowired' | 'constructorArgs' | 'properties' | 'methods'
>;

function classDefinition(state: ClassState): ClassDefinition {
  return Object.freeze({
    [DEFINITION]: true as const,
    kind: 'class' as const,
    ...state,
    args: (...args: unknown[]) =>
      classDefinition({ ...state, constructorArgs: Object.freeze(args.map(toDefinition)) }),
    arg: (index: number, raw: unknown) => {
      const next = [...state.constructorArgs];
      next[index] = toDefinition(raw);
      return classDefinition({ ...state, constructorArgs: Object.freeze(next) });
    },
    property: (name: string, raw: unknown) =>
      classDefinition({
        ...state,
        properties: Object.freeze([...state.properties, { name, value: toDefinition(raw) }]),
      }),
    method: (name: string, ...args: unknown[]) =>
      classDefinition({
        ...state,
        methods: Object.freeze([
          ...state.methods,
          { name, args: Object.freeze(args.map(toDefinition)) },
        ]),
      }),
  });
}

/**
 * Construct `target` with explicit arguments only.
 *
 * @example
 * ```typescript
 * create(SmtpMailer)
 *   .args(alias('transport'), 'noreply@example.test')
 *   .property('retries', 3)
 *   .method('setLogger', alias('logger'));
 * ```
 */
export function create(target: Constructor | string): ClassDefinition {
  return classDefinition({
    target,
    autowired: false,
    constructorArgs: [],
    properties: [],
    methods: [],
  });
}

/**
 * Construct `target`, filling every constructor parameter not given
 * explicitly from its `@Inject()` declaration.
 */
export function autowire(target: Constructor | string): ClassDefinition {
  return classDefinition({
    target,
    autowired: true,
    constructorArgs: [],
    properties: [],
    methods: [],
  });
}

/**
 * Normalize a raw value into a definition.
 *
 * Arrays and plain records become array definitions (recursively), so that
 * definitions nested inside them are resolved; anything else that is not
 * already a definition is wrapped as a value.
 */
export function toDefinition(raw: unknown): Definition {
  if (isDefinition(raw)) return raw;
  if (Array.isArray(raw)) {
    const items: ArrayItem[] = raw.map((el: unknown, i) => ({
      key: i,
      definition: toDefinition(el),
    }));
    return Object.freeze({
      [DEFINITION]: true as const,
      kind: 'array' as const,
      list: true,
      items: Object.freeze(items),
    });
  }
  if (isPlainObject(raw)) {
    const items: ArrayItem[] = Object.keys(raw).map((key) => ({
      key,
      definition: toDefinition(raw[key]),
    }));
    return Object.freeze({
      [DEFINITION]: true as const,
      kind: 'array' as const,
      list: false,
      items: Object.freeze(items),
    });
  }
  return value(raw);
}

/**
 * Constructor arguments of a class definition, in parameter order.
 *
 * Explicit arguments win; autowired definitions fill the remaining
 * parameters with references to their declared dependencies. A hole left in
 * the result is a parameter nothing could be found for.
 */
export function constructorArguments(
  definition: ClassDefinition,
  dependencies: readonly (string | undefined)[]
): (Definition | undefined)[] {
  if (!definition.autowired) {
    return Array.from(definition.constructorArgs, (arg) => arg ?? value(undefined));
  }
  const length = Math.max(dependencies.length, definition.constructorArgs.length);
  const args: (Definition | undefined)[] = [];
  for (let i = 0; i < length; i++) {
    const dep = dependencies[i];
    args.push(definition.constructorArgs[i] ?? (dep === undefined ? undefined : alias(dep)));
  }
  return args;
}

/**
 * Normalize a definition source into an ordered map. Insertion order is
 * kept; it decides the order of the generated routines.
 */
export function toDefinitionMap(source: DefinitionSource): Map<string, Definition> {
  const entries: Iterable<[string, unknown]> =
    source instanceof Map ? source.entries() : Object.entries(source);
  const map = new Map<string, Definition>();
  for (const [id, raw] of entries) map.set(id, toDefinition(raw));
  return map;
}
