import { createRequire } from 'node:module';

import { callMethod, injectProperty } from '../core/members.js';
import { ArtifactLoadError, UnknownClassError } from '../errors/errors.js';
import type { Constructor, TypeIntrospector } from '../types/types.js';
import type { CompiledContainer } from './compiled-container.js';

const loadModule = createRequire(import.meta.url);

/** Class lookup handed to generated code. */
export type ClassLookup = (name: string) => Constructor;

export type CompiledContainerClass = typeof CompiledContainer;

/** Helpers generated routines call into. */
export interface ArtifactRuntime {
  readonly classes: ClassLookup;
  readonly inject: typeof injectProperty;
  readonly invoke: typeof callMethod;
}

/** Shape of the module written by the code generator. */
interface ArtifactModule {
  name: string;
  parent: string;
  define(Parent: CompiledContainerClass, runtime: ArtifactRuntime): unknown;
}

function isArtifactModule(value: unknown): value is ArtifactModule {
  return (
    typeof value === 'object' &&
    value !== null &&
    'name' in value &&
    typeof value.name === 'string' &&
    'parent' in value &&
    typeof value.parent === 'string' &&
    'define' in value &&
    typeof value.define === 'function'
  );
}

function extendsParent(
  value: unknown,
  Parent: CompiledContainerClass
): value is CompiledContainerClass {
  return typeof value === 'function' && value.prototype instanceof Parent;
}

/**
 * Registered classes first, then `local`: unregistered classes the current
 * definitions construct, by class name.
 */
export function classLookup(
  introspector: TypeIntrospector,
  local: ReadonlyMap<string, Constructor> = new Map()
): ClassLookup {
  return (name) => {
    const ctor = introspector.classOf(name) ?? local.get(name);
    if (!ctor) throw new UnknownClassError(name);
    return ctor;
  };
}

/**
 * Load an artifact file and define its container class on top of `Parent`.
 *
 * The module is always read from disk again, so a file replaced since the
 * last load is picked up.
 *
 * @throws ArtifactLoadError when the file is not an artifact for `name`
 *         extending `Parent`
 */
export function loadArtifact(
  file: string,
  name: string,
  Parent: CompiledContainerClass,
  introspector: TypeIntrospector,
  local?: ReadonlyMap<string, Constructor>
): CompiledContainerClass {
  Reflect.deleteProperty(loadModule.cache, loadModule.resolve(file));
  const loaded: unknown = loadModule(file);

  if (!isArtifactModule(loaded)) {
    throw new ArtifactLoadError(file, 'the file is not a compiled container module');
  }
  if (loaded.name !== name) {
    throw new ArtifactLoadError(file, `it defines '${loaded.name}', expected '${name}'`);
  }
  if (loaded.parent !== Parent.name) {
    throw new ArtifactLoadError(
      file,
      `it was compiled for parent '${loaded.parent}', not '${Parent.name}'`
    );
  }

  const defined = loaded.define(Parent, {
    classes: classLookup(introspector, local),
    inject: injectProperty,
    invoke: callMethod,
  });
  if (!extendsParent(defined, Parent)) {
    throw new ArtifactLoadError(file, `the container class does not extend ${Parent.name}`);
  }
  return defined;
}
