import { beforeEach, describe, expect, it } from 'vitest';

import { CompilabilityAnalyzer, toCompilationError } from '../src/compiler/analyzer.js';
import { Inject, Injectable } from '../src/decorators/index.js';
import {
  alias,
  autowire,
  create,
  factory,
  toDefinition,
  value,
} from '../src/definitions/definitions.js';
import {
  AnonymousTypeNotCompilableError,
  DefinitionNotCompilableError,
  NestedCompilationError,
  ObjectNotCompilableError,
} from '../src/errors/errors.js';
import { ClassRegistry, registryIntrospector } from '../src/registry/class-registry.js';

describe('CompilabilityAnalyzer', () => {
  let analyzer: CompilabilityAnalyzer;

  beforeEach(() => {
    ClassRegistry.resetForTests();
    analyzer = new CompilabilityAnalyzer(registryIntrospector);
  });

  it('plans scalars as literals', () => {
    expect(analyzer.analyze(value('bar'))).toEqual({
      status: 'compilable',
      plan: { op: 'literal', value: 'bar' },
    });
    expect(analyzer.analyze(value(10n))).toEqual({
      status: 'compilable',
      plan: { op: 'literal', value: 10n },
    });
  });

  it('plans raw arrays and records held by a value', () => {
    const analysis = analyzer.analyze(value({ hosts: ['a', 'b'], port: 25 }));

    expect(analysis).toEqual({
      status: 'compilable',
      plan: {
        op: 'record',
        entries: [
          ['hosts', { op: 'list', items: [{ op: 'literal', value: 'a' }, { op: 'literal', value: 'b' }] }],
          ['port', { op: 'literal', value: 25 }],
        ],
      },
    });
  });

  it('plans aliases as lookups', () => {
    expect(analyzer.analyze(alias('logger'))).toEqual({
      status: 'compilable',
      plan: { op: 'lookup', id: 'logger' },
    });
  });

  it('defers factories, also when nested', () => {
    expect(analyzer.analyze(factory(() => 1))).toMatchObject({ status: 'deferred', path: [] });

    const nested = analyzer.analyze(toDefinition({ handlers: [factory(() => 1)] }));
    expect(nested).toMatchObject({
      status: 'deferred',
      path: [
        { kind: 'key', key: 'handlers' },
        { kind: 'index', index: 0 },
      ],
    });
  });

  it('rejects object instances with their exact path', () => {
    const analysis = analyzer.analyze(toDefinition({ bar: { baz: [new Date(0)] } }));

    expect(analysis).toEqual({
      status: 'failed',
      failure: {
        kind: 'ObjectNotCompilable',
        detail: 'Date instance',
        path: [
          { kind: 'key', key: 'bar' },
          { kind: 'key', key: 'baz' },
          { kind: 'index', index: 0 },
        ],
        frames: 3,
      },
    });
  });

  it('rejects objects hidden inside a raw value', () => {
    const analysis = analyzer.analyze(value({ list: [1, { when: new Map() }] }));

    expect(analysis).toMatchObject({
      status: 'failed',
      failure: {
        kind: 'ObjectNotCompilable',
        detail: 'Map instance',
        path: [
          { kind: 'key', key: 'list' },
          { kind: 'index', index: 1 },
          { kind: 'key', key: 'when' },
        ],
      },
    });
  });

  it('rejects functions and symbols held by values', () => {
    function helper() {}
    expect(analyzer.analyze(value(helper))).toMatchObject({
      status: 'failed',
      failure: { kind: 'ObjectNotCompilable', detail: 'function helper' },
    });
    expect(analyzer.analyze(value(Symbol('s')))).toMatchObject({
      status: 'failed',
      failure: { kind: 'ObjectNotCompilable', detail: 'symbol' },
    });
  });

  it('plans constructions with arguments, properties and calls', () => {
    @Injectable()
    class Mailer {
      constructor(@Inject('transport') readonly transport: unknown) {}
      setLogger(_logger: unknown) {}
    }

    const analysis = analyzer.analyze(
      autowire(Mailer).property('retries', 3).method('setLogger', alias('logger'))
    );

    expect(analysis).toEqual({
      status: 'compilable',
      plan: {
        op: 'construct',
        className: 'Mailer',
        args: [{ op: 'lookup', id: 'transport' }],
        properties: [['retries', { op: 'literal', value: 3 }]],
        calls: [['setLogger', [{ op: 'lookup', id: 'logger' }]]],
      },
    });
  });

  it('references classes by registered name', () => {
    @Injectable({ name: 'billing.Invoice' })
    class Invoice {}

    expect(analyzer.analyze(create(Invoice))).toMatchObject({
      status: 'compilable',
      plan: { op: 'construct', className: 'billing.Invoice' },
    });
    expect(analyzer.analyze(autowire('billing.Invoice'))).toMatchObject({
      status: 'compilable',
      plan: { op: 'construct', className: 'billing.Invoice' },
    });
  });

  it('rejects anonymous classes, registered or not', () => {
    const anonymous = (() => class {})();
    ClassRegistry.register(anonymous, 'Anon');

    expect(analyzer.analyze(autowire(anonymous))).toEqual({
      status: 'failed',
      failure: {
        kind: 'AnonymousTypeNotCompilable',
        path: [],
        detail: 'anonymous class',
        frames: 0,
      },
    });
  });

  it('references unregistered classes by their own name', () => {
    class Plain {}

    expect(analyzer.analyze(create(Plain).property('flag', true))).toMatchObject({
      status: 'compilable',
      plan: { op: 'construct', className: 'Plain' },
    });
  });

  it('rejects class names that resolve to nothing or to another class', () => {
    ClassRegistry.register(class Registered {}, 'Shadowed');
    const shadow = (() => {
      class Shadowed {}
      return Shadowed;
    })();

    expect(analyzer.analyze(create('Nowhere'))).toMatchObject({
      status: 'failed',
      failure: { kind: 'DefinitionNotCompilable', detail: "class 'Nowhere' is not registered" },
    });
    expect(analyzer.analyze(create(shadow))).toMatchObject({
      status: 'failed',
      failure: {
        kind: 'DefinitionNotCompilable',
        detail: 'class Shadowed is not registered and another class is registered under its name',
      },
    });
  });

  it('reports nested objects before an unknown class name', () => {
    expect(analyzer.analyze(create('Nowhere').property('foo', new Date(0)))).toMatchObject({
      status: 'failed',
      failure: { kind: 'ObjectNotCompilable', path: [{ kind: 'property', name: 'foo' }] },
    });
  });

  it('rejects autowired parameters without a dependency', () => {
    @Injectable()
    class Pair {
      constructor(
        readonly left: unknown,
        @Inject('right') readonly right: unknown
      ) {}
    }

    expect(analyzer.analyze(autowire(Pair))).toMatchObject({
      status: 'failed',
      failure: {
        kind: 'DefinitionNotCompilable',
        detail: 'parameter 0 of Pair has no value defined or injectable',
      },
    });
    expect(analyzer.analyze(autowire(Pair).arg(0, 'L'))).toMatchObject({ status: 'compilable' });
  });

  it('reports failures in properties and method calls with their path', () => {
    @Injectable()
    class Holder {
      use(_a: unknown, _b: unknown) {}
    }

    expect(analyzer.analyze(create(Holder).property('foo', new Date(0)))).toMatchObject({
      status: 'failed',
      failure: { path: [{ kind: 'property', name: 'foo' }], frames: 0 },
    });
    expect(analyzer.analyze(create(Holder).method('use', 1, new Date(0)))).toMatchObject({
      status: 'failed',
      failure: { path: [{ kind: 'method', name: 'use', index: 1 }], frames: 0 },
    });
  });

  it('counts a frame for a construction nested in an argument', () => {
    @Injectable()
    class Inner {}
    @Injectable()
    class Outer {}

    const analysis = analyzer.analyze(create(Outer).args(create(Inner).property('x', new Date(0))));

    expect(analysis).toMatchObject({
      status: 'failed',
      failure: {
        kind: 'ObjectNotCompilable',
        path: [
          { kind: 'argument', index: 0 },
          { kind: 'property', name: 'x' },
        ],
        frames: 1,
      },
    });
  });

  it('stops at the first node that is not compilable', () => {
    const analysis = analyzer.analyze(toDefinition([factory(() => 1), new Date(0)]));
    expect(analysis.status).toBe('deferred');
  });
});

describe('toCompilationError()', () => {
  it('returns the concrete error for failures at the root', () => {
    const error = toCompilationError('foo', {
      kind: 'ObjectNotCompilable',
      path: [],
      detail: 'Date instance',
      frames: 0,
    });

    expect(error).toBeInstanceOf(ObjectNotCompilableError);
    expect(error.message.split('\n')[0]).toBe(
      'Entry "foo" cannot be compiled: An object was found but objects cannot be compiled'
    );
  });

  it('maps each failure kind to its error class', () => {
    expect(
      toCompilationError('a', {
        kind: 'AnonymousTypeNotCompilable',
        path: [],
        detail: '',
        frames: 0,
      })
    ).toBeInstanceOf(AnonymousTypeNotCompilableError);
    expect(
      toCompilationError('a', {
        kind: 'DefinitionNotCompilable',
        path: [],
        detail: 'nope',
        frames: 0,
      })
    ).toBeInstanceOf(DefinitionNotCompilableError);
  });

  it('keeps the concrete error for a property with no frames', () => {
    const error = toCompilationError('stdObjectType', {
      kind: 'ObjectNotCompilable',
      path: [{ kind: 'property', name: 'foo' }],
      detail: 'Opaque instance',
      frames: 0,
    });

    expect(error).toBeInstanceOf(ObjectNotCompilableError);
    expect(error.path).toEqual([{ kind: 'property', name: 'foo' }]);
    expect(error.message.split('\n')[0]).toBe(
      'Entry "stdObjectType" cannot be compiled: An object was found but objects cannot be compiled'
    );
  });

  it('wraps nested failures in one frame per nested definition', () => {
    const error = toCompilationError('foo', {
      kind: 'ObjectNotCompilable',
      path: [
        { kind: 'key', key: 'bar' },
        { kind: 'key', key: 'baz' },
        { kind: 'index', index: 0 },
      ],
      detail: 'Date instance',
      frames: 3,
    });

    expect(error).toBeInstanceOf(NestedCompilationError);
    if (!(error instanceof NestedCompilationError)) return;

    expect(error.chain).toBe(
      'Error while compiling foo. Error while compiling <nested definition>. ' +
        'Error while compiling <nested definition>. An object was found but objects cannot be compiled'
    );
    expect(error.label).toBe('foo');
    expect(error.cause).toBeInstanceOf(NestedCompilationError);
    expect(error.innermost).toBeInstanceOf(ObjectNotCompilableError);
    expect(error.innermost.path).toEqual(error.path);
  });
});
