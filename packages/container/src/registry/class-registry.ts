import { ClassNameCollisionError, InvalidContainerConfigError } from '../errors/errors.js';
import type { Constructor, TypeIntrospector } from '../types/types.js';

/**
 * Sentinel for classes with zero declared constructor dependencies.
 * Avoids allocating empty arrays for every dependency-free class.
 */
const EMPTY_LINKS: readonly (string | undefined)[] = Object.freeze([]);

/**
 * Mutable record storing decorator metadata for a single class.
 *
 * Fields:
 * - name: registered name, absent for classes only seen by @Inject()
 * - links: Parameter index → entry id mapping from @Inject()
 * - deps: Computed array of dependencies (built lazily from links)
 */
type MutableClassRecord = {
  name?: string;
  links: Map<number, string>;
  deps?: readonly (string | undefined)[];
};

type RegistryStore = {
  classes: WeakMap<Constructor, MutableClassRecord>;
  names: Map<string, Constructor>;
};

/**
 * Global symbol for storing the class registry on globalThis.
 *
 * This ensures a single registry instance per process, even if the module
 * is bundled multiple times. Generated artifacts look classes up by name in
 * it, so every copy of the library has to see the same names.
 */
const GLOBAL_SYMBOL = Symbol.for('kiln.classRegistry');

function createStore(): RegistryStore {
  return { classes: new WeakMap(), names: new Map() };
}

function isRegistryStore(value: unknown): value is RegistryStore {
  return (
    typeof value === 'object' &&
    value !== null &&
    'classes' in value &&
    'names' in value &&
    value.classes instanceof WeakMap &&
    value.names instanceof Map
  );
}

function ensureStore(): RegistryStore {
  const existing: unknown = Reflect.get(globalThis, GLOBAL_SYMBOL);
  if (isRegistryStore(existing)) return existing;
  const fresh = createStore();
  Reflect.set(globalThis, GLOBAL_SYMBOL, fresh);
  return fresh;
}

/**
 * Global registry of injectable classes.
 *
 * This registry stores the metadata collected by the @Injectable() and
 * @Inject() decorators:
 * - Decorators call register() / registerInject() at module load time
 * - The interpreted container asks it how to autowire a class
 * - The compiler asks it for the stable name of every class it references,
 *   and the compiled container looks the class up again by that name
 */
export class ClassRegistry {
  /**
   * Register a class under a name.
   *
   * Re-registering the same class (e.g. after hot module reloading) replaces
   * its name. Registering a different class under a taken name throws.
   *
   * @param target - Class constructor
   * @param name - Registered name, defaults to `target.name`
   * @throws ClassNameCollisionError if another class owns the name
   * @throws InvalidContainerConfigError for an anonymous class without a name
   */
  static register(target: Constructor, name?: string): void {
    const resolvedName = name ?? target.name;
    if (!resolvedName) {
      throw new InvalidContainerConfigError(
        'anonymous classes can only be registered with an explicit name'
      );
    }

    const store = ensureStore();
    const owner = store.names.get(resolvedName);
    if (owner && owner !== target) {
      throw new ClassNameCollisionError(
        resolvedName,
        owner.name || '<anonymous>',
        target.name || '<anonymous>'
      );
    }

    const rec = this.recordFor(store, target);
    if (rec.name !== undefined && rec.name !== resolvedName) store.names.delete(rec.name);
    rec.name = resolvedName;
    store.names.set(resolvedName, target);
  }

  /**
   * Record the entry injected into one constructor parameter.
   *
   * Classes only seen here are not given a name: they can be autowired when
   * passed as a constructor but not referenced from generated code.
   */
  static registerInject(target: Constructor, parameterIndex: number, entryId: string): void {
    const rec = this.recordFor(ensureStore(), target);
    rec.links.set(parameterIndex, entryId);
    rec.deps = undefined;
  }

  static nameOf(ctor: Constructor): string | undefined {
    return ensureStore().classes.get(ctor)?.name;
  }

  static classOf(name: string): Constructor | undefined {
    return ensureStore().names.get(name);
  }

  /**
   * Compute the dependency array from parameter index → entry id mappings.
   *
   * The array is constructed with:
   * - Length: highest parameter index + 1
   * - Undefined entries: parameters without @Inject() decorators
   *
   * Example:
   *   constructor(
   *     @Inject('a') a: A,        // index 0 → 'a'
   *     b: B,                     // index 1 → undefined
   *     @Inject('c') c: C         // index 2 → 'c'
   *   )
   *   Result: ['a', undefined, 'c']
   */
  static dependenciesOf(ctor: Constructor): readonly (string | undefined)[] {
    const rec = ensureStore().classes.get(ctor);
    if (!rec) return EMPTY_LINKS;
    if (rec.deps) return rec.deps;
    if (rec.links.size === 0) return (rec.deps = EMPTY_LINKS);
    let max = -1;
    for (const i of rec.links.keys()) if (i > max) max = i;
    const deps = new Array<string | undefined>(max + 1).fill(undefined);
    for (const [i, id] of rec.links) deps[i] = id;
    return (rec.deps = Object.freeze(deps));
  }

  static *knownNames(): IterableIterator<string> {
    yield* ensureStore().names.keys();
  }

  /**
   * Test helper to reset the registry.
   *
   * ⚠️ For test environments only: classes decorated by modules that are
   * already imported are forgotten.
   */
  static resetForTests(): void {
    Reflect.set(globalThis, GLOBAL_SYMBOL, createStore());
  }

  private static recordFor(store: RegistryStore, target: Constructor): MutableClassRecord {
    let rec = store.classes.get(target);
    if (!rec) {
      rec = { links: new Map() };
      store.classes.set(target, rec);
    }
    return rec;
  }
}

/**
 * The registry seen through the {@link TypeIntrospector} interface; the
 * default introspector of every container.
 */
export const registryIntrospector: TypeIntrospector = {
  nameOf: (ctor) => ClassRegistry.nameOf(ctor),
  classOf: (name) => ClassRegistry.classOf(name),
  dependenciesOf: (ctor) => ClassRegistry.dependenciesOf(ctor),
  knownNames: () => ClassRegistry.knownNames(),
};
