/*
 * KnownClasses
 * ------------
 * Class names to compile even though no entry defines them. Each one is added
 * to the compiled definitions as `autowire(name)`, so the artifact serves it
 * without interpreted autowiring.
 *
 * Discovery only runs when an artifact is actually generated; an iterable
 * source is consumed at that point and not before.
 *
 * `constructedClasses` goes the other way: unregistered classes the
 * definitions construct, which generated code reaches by class name.
 */
import { autowire, type Definition, type DefinitionMap } from '../definitions/definitions.js';
import { ClassNameCollisionError, UnknownClassError } from '../errors/errors.js';
import { registryIntrospector } from '../registry/class-registry.js';
import type { Constructor, TypeIntrospector, UnknownClassPolicy } from '../types/types.js';

export class KnownClasses implements Iterable<string> {
  private constructor(private readonly source: () => Iterable<string>) {}

  /**
   * @example
   * ```typescript
   * builder.compileAllClasses(KnownClasses.fromArray(['Mailer', 'billing.InvoiceMailer']));
   * ```
   */
  static fromArray(names: readonly string[]): KnownClasses {
    const copy = Object.freeze([...names]);
    return new KnownClasses(() => copy);
  }

  /**
   * Names from any iterable, read lazily when the artifact is generated.
   * Generators can only be consumed once.
   */
  static fromIterable(names: Iterable<string>): KnownClasses {
    return new KnownClasses(() => names);
  }

  /** Every class name the introspector knows when discovery runs. */
  static fromRegistry(introspector: TypeIntrospector = registryIntrospector): KnownClasses {
    return new KnownClasses(() => introspector.knownNames());
  }

  [Symbol.iterator](): Iterator<string> {
    return this.source()[Symbol.iterator]();
  }
}

export interface DiscoveryOptions {
  introspector: TypeIntrospector;
  unknownClassPolicy: UnknownClassPolicy;
}

/**
 * Definitions extended with an autowired entry for every known class without
 * one. Explicit entries win and duplicate names are added once; discovered
 * entries follow the explicit ones in discovery order.
 *
 * @throws UnknownClassError for a name the introspector cannot resolve, under
 *         the 'error' policy
 */
export function discoverClasses(
  definitions: DefinitionMap,
  known: Iterable<Iterable<string>>,
  options: DiscoveryOptions
): Map<string, Definition> {
  const result = new Map(definitions);
  const unknown: string[] = [];

  for (const source of known) {
    for (const name of source) {
      if (result.has(name)) continue;
      if (options.introspector.classOf(name) === undefined) {
        if (options.unknownClassPolicy === 'error') throw new UnknownClassError(name);
        if (!unknown.includes(name)) unknown.push(name);
        continue;
      }
      result.set(name, autowire(name));
    }
  }

  if (unknown.length > 0 && options.unknownClassPolicy === 'warn') {
    console.warn(`[Kiln] Skipped ${unknown.length} unknown class name(s) during compilation:`);
    for (const name of unknown) console.warn(`  - '${name}' is not registered`);
  }

  return result;
}

function collectClasses(
  definition: Definition,
  introspector: TypeIntrospector,
  found: Map<string, Constructor>
): void {
  switch (definition.kind) {
    case 'array':
      for (const item of definition.items) collectClasses(item.definition, introspector, found);
      return;
    case 'class': {
      const { target } = definition;
      if (typeof target !== 'string' && target.name && introspector.nameOf(target) === undefined) {
        const seen = found.get(target.name);
        if (seen !== undefined && seen !== target) {
          throw new ClassNameCollisionError(target.name, 'another unregistered class', target.name);
        }
        found.set(target.name, target);
      }
      for (const arg of definition.constructorArgs) {
        if (arg) collectClasses(arg, introspector, found);
      }
      for (const property of definition.properties) {
        collectClasses(property.value, introspector, found);
      }
      for (const call of definition.methods) {
        for (const arg of call.args) collectClasses(arg, introspector, found);
      }
      return;
    }
    default:
      return;
  }
}

/**
 * Named classes the definitions construct that the introspector does not
 * know, by class name.
 *
 * @throws ClassNameCollisionError when two of them share a name
 */
export function constructedClasses(
  definitions: DefinitionMap,
  introspector: TypeIntrospector
): Map<string, Constructor> {
  const found = new Map<string, Constructor>();
  for (const definition of definitions.values()) collectClasses(definition, introspector, found);
  return found;
}
