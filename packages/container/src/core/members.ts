/*
 * Property injection and method calls on a freshly constructed instance.
 * Interpreted resolution and generated routines both go through these, so a
 * failing member reports the same error in either mode.
 */
import { InvalidDefinitionError } from '../errors/errors.js';

/**
 * @throws InvalidDefinitionError when the property cannot be assigned
 *         (getter without setter, read-only or frozen)
 */
export function injectProperty(
  instance: object,
  entryId: string,
  className: string,
  name: string,
  value: unknown
): void {
  if (!Reflect.set(instance, name, value)) {
    throw new InvalidDefinitionError(entryId, `${className}.${name} cannot be assigned`);
  }
}

/**
 * @throws InvalidDefinitionError when `name` is not a method of the instance
 */
export function callMethod(
  instance: object,
  entryId: string,
  className: string,
  name: string,
  args: readonly unknown[]
): void {
  const method: unknown = Reflect.get(instance, name);
  if (typeof method !== 'function') {
    throw new InvalidDefinitionError(entryId, `${className}.${name} is not a method`);
  }
  Reflect.apply(method, instance, args);
}
