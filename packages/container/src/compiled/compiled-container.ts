/*
 * CompiledContainer
 * -----------------
 * Base class of every generated container. The artifact defines
 * `class <Name> extends <Parent>` with a static `compiledEntries` table of
 * routines; this class turns that table into its dispatch map.
 *
 * Resolution tries the dispatch map first and falls back to the interpreted
 * path for everything the artifact does not contain (factories, entries added
 * after compilation, autowired classes that were not discovered).
 */
import { Container, type ContainerInit } from '../core/container.js';
import { idOf, type EntryKey } from '../core/token.js';
import { CompiledContainerImmutableError } from '../errors/errors.js';
import type { ResolutionContext } from '../types/types.js';

/** Generated code for one entry. */
export type CompiledRoutine = (di: ResolutionContext) => unknown;

export class CompiledContainer extends Container {
  /** Overridden by generated subclasses. */
  static readonly compiledEntries: Readonly<Record<string, CompiledRoutine>> = Object.freeze({});

  private readonly dispatch: ReadonlyMap<string, CompiledRoutine>;

  constructor(init: ContainerInit = {}) {
    super(init);
    this.dispatch = new Map(Object.entries(new.target.compiledEntries));
  }

  /**
   * Whether `key` is served by generated code. Entries resolved through the
   * interpreted fallback report false even once they are resolved.
   */
  isEntryCompiled(key: EntryKey): boolean {
    return this.dispatch.has(idOf(key));
  }

  /** Ids of compiled entries, in artifact order. */
  getCompiledEntries(): string[] {
    return Array.from(this.dispatch.keys());
  }

  override has(key: EntryKey): boolean {
    return this.dispatch.has(idOf(key)) || super.has(key);
  }

  /**
   * @throws CompiledContainerImmutableError always
   */
  override set(key: EntryKey, _value: unknown): never {
    throw new CompiledContainerImmutableError(idOf(key));
  }

  override getKnownEntryNames(): string[] {
    return Array.from(new Set([...this.dispatch.keys(), ...super.getKnownEntryNames()])).sort();
  }

  protected override resolveEntry(id: string): unknown {
    const routine = this.dispatch.get(id);
    return routine ? routine(this) : super.resolveEntry(id);
  }
}
