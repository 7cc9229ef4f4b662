/* DefinitionResolver
 *
 * Interpreted resolution: turns a definition into a runtime value, walking
 * nested definitions on every call. This is the path used by uncompiled
 * containers, and by compiled containers for every entry the artifact does
 * not contain.
 *
 *  - value: returned as is (live objects included, unlike the compiler)
 *  - alias: resolved through the container, so caching and cycle detection
 *    apply to the target entry
 *  - factory: called with the container; errors are wrapped with the entry id
 *  - class: constructor arguments, then `new`, then properties, then method
 *    calls (the order generated code follows as well)
 *  - array: each item resolved in order into a new array or record
 */

import { FactoryExecutionError, MissingInjectError, UnknownClassError } from '../errors/errors.js';
import {
  constructorArguments,
  type ArrayDefinition,
  type ClassDefinition,
  type Definition,
} from '../definitions/definitions.js';
import type { Constructor, ResolutionContext, TypeIntrospector } from '../types/types.js';
import { callMethod, injectProperty } from './members.js';

export class DefinitionResolver {
  constructor(private readonly introspector: TypeIntrospector) {}

  /**
   * Resolve a definition belonging to `entryId`.
   *
   * @param context - Container used for references to other entries
   */
  resolve(definition: Definition, entryId: string, context: ResolutionContext): unknown {
    switch (definition.kind) {
      case 'value':
        return definition.value;
      case 'alias':
        return context.get(definition.target);
      case 'factory':
        try {
          return definition.factory(context);
        } catch (e) {
          // Preserve explicit FactoryExecutionError rethrows from nested factories
          if (e instanceof FactoryExecutionError) throw e;
          throw new FactoryExecutionError(entryId, e);
        }
      case 'array':
        return this.resolveArray(definition, entryId, context);
      case 'class':
        return this.construct(definition, entryId, context);
    }
  }

  /**
   * Constructor behind a class definition target.
   *
   * @throws UnknownClassError when a class name is not registered
   */
  classFor(target: Constructor | string): Constructor {
    if (typeof target !== 'string') return target;
    const ctor = this.introspector.classOf(target);
    if (!ctor) throw new UnknownClassError(target);
    return ctor;
  }

  private resolveArray(
    definition: ArrayDefinition,
    entryId: string,
    context: ResolutionContext
  ): unknown[] | Record<string, unknown> {
    if (definition.list) {
      return definition.items.map((item) => this.resolve(item.definition, entryId, context));
    }
    // fromEntries defines own properties, so a "__proto__" key stays a key
    return Object.fromEntries(
      definition.items.map((item) => [
        String(item.key),
        this.resolve(item.definition, entryId, context),
      ])
    );
  }

  private construct(
    definition: ClassDefinition,
    entryId: string,
    context: ResolutionContext
  ): object {
    const ctor = this.classFor(definition.target);
    const className =
      typeof definition.target === 'string'
        ? definition.target
        : (this.introspector.nameOf(ctor) ?? ctor.name);

    const planned = constructorArguments(definition, this.introspector.dependenciesOf(ctor));
    const args = planned.map((arg, idx) => {
      if (!arg) throw new MissingInjectError(className, idx);
      return this.resolve(arg, entryId, context);
    });

    const instance = new ctor(...args);

    for (const property of definition.properties) {
      const resolved = this.resolve(property.value, entryId, context);
      injectProperty(instance, entryId, className, property.name, resolved);
    }

    for (const call of definition.methods) {
      const callArgs = call.args.map((arg) => this.resolve(arg, entryId, context));
      callMethod(instance, entryId, className, call.name, callArgs);
    }

    return instance;
  }
}
