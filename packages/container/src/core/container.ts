/*
 * Container: interpreted dependency-resolution container.
 *
 * Resolves entries on demand from a definition map. Every entry is a
 * singleton: it is resolved once, then served from the resolved-entries
 * cache. Classes registered in the introspector can be requested by name
 * without an explicit definition; they are autowired.
 *
 * CompiledContainer extends this class and only overrides `resolveEntry`,
 * so caching, cycle detection and instrumentation are shared by both modes.
 */
import { CircularDependencyError, EntryNotFoundError } from '../errors/errors.js';
import {
  autowire,
  isDefinition,
  toDefinitionMap,
  type Definition,
  type DefinitionSource,
} from '../definitions/definitions.js';
import { registryIntrospector } from '../registry/class-registry.js';
import type { InstantiateHook, ResolutionContext, TypeIntrospector } from '../types/types.js';
import { DefinitionResolver } from './definition-resolver.js';
import { idOf, type EntryKey } from './token.js';

/**
 * High-resolution timer function.
 * Prefers performance.now() when available, falls back to Date.now().
 */
const nowMs = (() => {
  const maybePerf = typeof globalThis !== 'undefined' ? globalThis.performance : undefined;
  return maybePerf && typeof maybePerf.now === 'function'
    ? () => maybePerf.now()
    : () => Date.now();
})();

/** Convert milliseconds to nanoseconds for instrumentation hook */
const toNs = (ms: number) => Math.round(ms * 1_000_000);

/**
 * Everything a container is constructed from. Compiled containers take the
 * same object, so a custom parent class keeps this constructor signature.
 */
export interface ContainerInit {
  /** Entry definitions; raw values are normalized. */
  definitions?: DefinitionSource;
  /** Defaults to the global {@link ClassRegistry}. */
  introspector?: TypeIntrospector;
  /** Called after each fresh resolution with its duration in nanoseconds. */
  onInstantiate?: InstantiateHook;
}

export class Container implements ResolutionContext {
  protected readonly definitions: Map<string, Definition>;
  protected readonly introspector: TypeIntrospector;
  private readonly resolver: DefinitionResolver;
  private readonly instantiateHook?: InstantiateHook;

  /** Entries already resolved (or set as raw values). */
  private readonly resolved = new Map<string, unknown>();
  /** Ids being resolved, outermost first; guards against cycles. */
  private readonly resolving: string[] = [];

  constructor(init: ContainerInit = {}) {
    this.definitions = toDefinitionMap(init.definitions ?? {});
    this.introspector = init.introspector ?? registryIntrospector;
    this.resolver = new DefinitionResolver(this.introspector);
    this.instantiateHook = init.onInstantiate;
  }

  /**
   * Resolve an entry.
   *
   * @throws EntryNotFoundError if nothing defines the entry
   * @throws CircularDependencyError if the entry depends on itself
   *
   * @example
   * ```typescript
   * const MailerT = token<Mailer>('mailer');
   * const mailer = container.get(MailerT);
   * ```
   */
  get<T = unknown>(key: EntryKey<T>): T {
    const id = idOf(key);
    if (this.resolved.has(id)) return this.resolved.get(id) as T;

    if (this.resolving.includes(id)) {
      throw new CircularDependencyError([...this.resolving.slice(this.resolving.indexOf(id)), id]);
    }

    this.resolving.push(id);
    try {
      const value = this.instrument(id, () => this.resolveEntry(id));
      this.resolved.set(id, value);
      return value as T;
    } finally {
      this.resolving.pop();
    }
  }

  /**
   * Check whether an entry can be resolved, without resolving it.
   */
  has(key: EntryKey): boolean {
    const id = idOf(key);
    return (
      this.resolved.has(id) ||
      this.definitions.has(id) ||
      this.introspector.classOf(id) !== undefined
    );
  }

  /**
   * Define an entry at runtime.
   *
   * A definition replaces the entry's definition; any other value is stored
   * as the resolved value directly. Either way a previously resolved value is
   * dropped.
   */
  set(key: EntryKey, value: unknown): void {
    const id = idOf(key);
    this.resolved.delete(id);
    if (isDefinition(value)) {
      this.definitions.set(id, value);
      return;
    }
    this.definitions.delete(id);
    this.resolved.set(id, value);
  }

  /**
   * Ids of all entries defined or set on this container, sorted.
   * Classes only reachable through autowiring are not listed.
   */
  getKnownEntryNames(): string[] {
    return Array.from(new Set([...this.definitions.keys(), ...this.resolved.keys()])).sort();
  }

  /**
   * Produce the value of an entry that is not cached yet.
   *
   * @internal Overridden by compiled containers to try generated code first.
   */
  protected resolveEntry(id: string): unknown {
    const definition = this.definitions.get(id) ?? this.autowireByName(id);
    if (!definition) {
      throw new EntryNotFoundError(id, this.getKnownEntryNames(), this.resolving.slice(0, -1));
    }
    return this.resolver.resolve(definition, id, this);
  }

  private autowireByName(id: string): Definition | undefined {
    return this.introspector.classOf(id) ? autowire(id) : undefined;
  }

  private instrument<T>(id: string, execute: () => T): T {
    const hook = this.instantiateHook;
    if (!hook) return execute();

    const start = nowMs();
    try {
      return execute();
    } finally {
      hook(id, toNs(nowMs() - start));
    }
  }
}
