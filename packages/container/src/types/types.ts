import type { EntryKey } from '../core/token.js';

/**
 * Generic constructor signature used throughout the container.
 *
 * @template T - Type produced by the constructor
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Constructor<T extends object = object> = new (...args: any[]) => T;

/**
 * What factories and compiled routines receive to reach other entries.
 */
export interface ResolutionContext {
  get<T = unknown>(key: EntryKey<T>): T;
  has(key: EntryKey): boolean;
}

/**
 * Instrumentation hook called after an entry is freshly resolved.
 * Duration is reported in nanoseconds.
 */
export type InstantiateHook = (entryId: string, durationNs: number) => void;

/**
 * Policy for class names handed to known-classes discovery that the
 * introspector cannot resolve.
 * - 'error' (default): throw `UnknownClassError`
 * - 'warn': log the name with `console.warn` and skip it
 * - 'ignore': skip it silently
 */
export type UnknownClassPolicy = 'error' | 'warn' | 'ignore';

/**
 * Static description of classes, used by autowiring and by the compiler to
 * reference classes from generated code.
 *
 * Only needed at compile time by the compiled path; the interpreted path
 * uses it at resolution time.
 */
export interface TypeIntrospector {
  /** Stable, addressable name of a class, if it has one. */
  nameOf(ctor: Constructor): string | undefined;
  /** Class registered under `name`. */
  classOf(name: string): Constructor | undefined;
  /**
   * Entry ids injected into each constructor parameter, in parameter order.
   * Holes (`undefined`) are parameters without a declared dependency.
   */
  dependenciesOf(ctor: Constructor): readonly (string | undefined)[];
  /** Every class name the introspector can resolve. */
  knownNames(): IterableIterator<string>;
}

export interface InjectableOptions {
  /**
   * Name the class is registered under. Defaults to the class name; use a
   * qualified name (`billing.InvoiceMailer`) when short names may collide.
   */
  name?: string;
}
