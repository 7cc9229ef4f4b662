import { describe, expect, it } from 'vitest';

import {
  alias,
  autowire,
  constructorArguments,
  create,
  factory,
  isDefinition,
  isPlainObject,
  toDefinition,
  toDefinitionMap,
  value,
} from '../src/definitions/definitions.js';
import { token } from '../src/core/token.js';

class Mailer {}

describe('definitions', () => {
  it('wraps scalars and objects as values', () => {
    const date = new Date(0);

    expect(toDefinition('bar')).toEqual(value('bar'));
    expect(toDefinition(42)).toEqual(value(42));
    expect(toDefinition(date)).toEqual(value(date));
  });

  it('turns arrays into list definitions and plain records into record definitions', () => {
    const list = toDefinition(['a', alias('b')]);
    expect(list.kind).toBe('array');
    if (list.kind !== 'array') return;
    expect(list.list).toBe(true);
    expect(list.items.map((i) => i.key)).toEqual([0, 1]);
    expect(list.items[1].definition).toEqual(alias('b'));

    const record = toDefinition({ host: 'localhost', port: 25 });
    if (record.kind !== 'array') throw new Error('expected an array definition');
    expect(record.list).toBe(false);
    expect(record.items.map((i) => i.key)).toEqual(['host', 'port']);
  });

  it('keeps definitions as they are', () => {
    const definition = autowire(Mailer);
    expect(toDefinition(definition)).toBe(definition);
  });

  it('brands definitions so look-alike data is not one', () => {
    expect(isDefinition(value(1))).toBe(true);
    expect(isDefinition({ kind: 'value', value: 1 })).toBe(false);
    expect(Object.isFrozen(factory(() => 1))).toBe(true);
  });

  it('accepts tokens as alias targets', () => {
    expect(alias(token('logger')).target).toBe('logger');
  });

  it('builds class definitions immutably', () => {
    const base = create(Mailer);
    const configured = base.args('smtp').property('retries', 3).method('setLogger', alias('log'));

    expect(base.constructorArgs).toEqual([]);
    expect(configured.constructorArgs).toEqual([value('smtp')]);
    expect(configured.properties).toEqual([{ name: 'retries', value: value(3) }]);
    expect(configured.methods).toEqual([{ name: 'setLogger', args: [alias('log')] }]);
    expect(configured.autowired).toBe(false);
  });

  it('arg() sets a single constructor parameter', () => {
    const definition = autowire(Mailer).arg(1, 'noreply@example.test');

    expect(definition.constructorArgs[0]).toBeUndefined();
    expect(definition.constructorArgs[1]).toEqual(value('noreply@example.test'));
  });

  it('detects plain objects', () => {
    expect(isPlainObject({})).toBe(true);
    expect(isPlainObject(Object.create(null))).toBe(true);
    expect(isPlainObject([])).toBe(false);
    expect(isPlainObject(new Mailer())).toBe(false);
    expect(isPlainObject(new Map())).toBe(false);
  });

  describe('constructorArguments()', () => {
    it('fills autowired holes from declared dependencies', () => {
      const args = constructorArguments(autowire(Mailer).arg(1, 'x'), ['transport', 'from', undefined]);
      expect(args).toEqual([alias('transport'), value('x'), undefined]);
    });

    it('passes undefined for holes of explicit definitions', () => {
      const args = constructorArguments(create(Mailer).arg(1, 'x'), ['transport']);
      expect(args).toEqual([value(undefined), value('x')]);
    });
  });

  it('toDefinitionMap() keeps insertion order of records and maps', () => {
    expect([...toDefinitionMap({ b: 1, a: 2 }).keys()]).toEqual(['b', 'a']);
    expect([...toDefinitionMap(new Map([['z', 1], ['y', 2]])).keys()]).toEqual(['z', 'y']);
  });
});
