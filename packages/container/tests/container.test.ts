import { beforeEach, describe, expect, it, vi } from 'vitest';

import { Container } from '../src/core/container.js';
import { token } from '../src/core/token.js';
import { Inject, Injectable } from '../src/decorators/index.js';
import { alias, autowire, create, factory, value } from '../src/definitions/definitions.js';
import {
  CircularDependencyError,
  EntryNotFoundError,
  FactoryExecutionError,
  InvalidDefinitionError,
  MissingInjectError,
  UnknownClassError,
} from '../src/errors/errors.js';
import { ClassRegistry } from '../src/registry/class-registry.js';

describe('Container', () => {
  beforeEach(() => {
    ClassRegistry.resetForTests();
  });

  it('resolves values, aliases and nested arrays', () => {
    const container = new Container({
      definitions: {
        host: 'localhost',
        server: alias('host'),
        settings: { hosts: [alias('host'), 'backup'], port: 25 },
      },
    });

    expect(container.get('host')).toBe('localhost');
    expect(container.get('server')).toBe('localhost');
    expect(container.get('settings')).toEqual({ hosts: ['localhost', 'backup'], port: 25 });
  });

  it('resolves typed tokens', () => {
    const PortT = token<number>('port');
    const container = new Container({ definitions: { port: 8080 } });

    const port: number = container.get(PortT);
    expect(port).toBe(8080);
  });

  it('returns live objects held by values unchanged', () => {
    const date = new Date(0);
    const container = new Container({ definitions: { epoch: date } });

    expect(container.get('epoch')).toBe(date);
  });

  it('resolves every entry once', () => {
    const make = vi.fn(() => ({ id: 1 }));
    const container = new Container({ definitions: { thing: factory(make) } });

    expect(container.get('thing')).toBe(container.get('thing'));
    expect(make).toHaveBeenCalledTimes(1);
  });

  it('passes itself to factories', () => {
    const container = new Container({
      definitions: {
        name: 'kiln',
        greeting: factory((c) => `hello ${String(c.get('name'))}`),
      },
    });

    expect(container.get('greeting')).toBe('hello kiln');
  });

  it('wraps factory errors', () => {
    const boom = new Error('boom');
    const container = new Container({
      definitions: {
        broken: factory(() => {
          throw boom;
        }),
      },
    });

    expect(() => container.get('broken')).toThrow(FactoryExecutionError);
    try {
      container.get('broken');
    } catch (e) {
      expect(e).toBeInstanceOf(FactoryExecutionError);
      if (e instanceof FactoryExecutionError) {
        expect(e.entryId).toBe('broken');
        expect(e.cause).toBe(boom);
      }
    }
  });

  it('constructs classes: arguments, then properties, then method calls', () => {
    const steps: string[] = [];

    class Mailer {
      retries = 0;
      constructor(readonly transport: string) {
        steps.push(`new ${transport}`);
      }
      setRetries(n: number) {
        steps.push(`retries before call: ${this.retries}`);
        this.retries = n;
      }
    }

    const container = new Container({
      definitions: {
        transport: 'smtp',
        mailer: create(Mailer).args(alias('transport')).property('retries', 1).method('setRetries', 3),
      },
    });

    const mailer = container.get<Mailer>('mailer');
    expect(mailer.transport).toBe('smtp');
    expect(mailer.retries).toBe(3);
    expect(steps).toEqual(['new smtp', 'retries before call: 1']);
  });

  it('rejects method calls on properties that are not methods', () => {
    class Plain {
      flag = true;
    }
    const container = new Container({ definitions: { plain: create(Plain).method('flag') } });

    expect(() => container.get('plain')).toThrow(InvalidDefinitionError);
  });

  it('autowires registered classes from @Inject declarations', () => {
    @Injectable()
    class Logger {}

    @Injectable()
    class Service {
      constructor(
        @Inject('Logger') readonly logger: Logger,
        @Inject('env') readonly env: string
      ) {}
    }

    const container = new Container({ definitions: { env: 'test', service: autowire(Service) } });
    const service = container.get<Service>('service');

    expect(service.env).toBe('test');
    expect(service.logger).toBeInstanceOf(Logger);
    expect(container.get('Logger')).toBe(service.logger);
  });

  it('autowires registered class names without a definition', () => {
    @Injectable({ name: 'app.Clock' })
    class Clock {}

    const container = new Container();

    expect(container.has('app.Clock')).toBe(true);
    expect(container.get('app.Clock')).toBeInstanceOf(Clock);
  });

  it('rejects autowired parameters without @Inject', () => {
    @Injectable()
    class NeedsArgs {
      constructor(
        @Inject('a') readonly a: string,
        readonly b: string,
        @Inject('c') readonly c: string
      ) {}
    }

    const container = new Container({ definitions: { a: 'a', c: 'c', needs: autowire(NeedsArgs) } });

    expect(() => container.get('needs')).toThrow(
      'Missing @Inject decorator at parameter 1 of NeedsArgs.'
    );
    expect(() => container.get('needs')).toThrow(MissingInjectError);
  });

  it('explicit arguments fill parameters without @Inject', () => {
    @Injectable()
    class Pair {
      constructor(
        @Inject('left') readonly left: string,
        readonly right: string
      ) {}
    }

    const container = new Container({
      definitions: { left: 'L', pair: autowire(Pair).arg(1, 'R') },
    });

    expect(container.get<Pair>('pair')).toEqual(new Pair('L', 'R'));
  });

  it('rejects class names nobody registered', () => {
    const container = new Container({ definitions: { ghost: autowire('Ghost') } });

    expect(() => container.get('ghost')).toThrow(UnknownClassError);
  });

  it('reports missing entries with the dependency chain', () => {
    const container = new Container({
      definitions: { a: alias('b'), b: alias('missing') },
    });

    try {
      container.get('a');
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(EntryNotFoundError);
      if (e instanceof EntryNotFoundError) {
        expect(e.entryId).toBe('missing');
        expect(e.dependencyChain).toEqual(['a', 'b']);
        expect(e.availableEntries).toEqual(['a', 'b']);
      }
    }
  });

  it('detects circular dependencies', () => {
    const container = new Container({
      definitions: { a: alias('b'), b: alias('c'), c: alias('a') },
    });

    try {
      container.get('a');
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(CircularDependencyError);
      if (e instanceof CircularDependencyError) {
        expect(e.cycle).toEqual(['a', 'b', 'c', 'a']);
      }
    }
  });

  it('recovers after a failed resolution', () => {
    const container = new Container({ definitions: { a: alias('missing'), ok: 1 } });

    expect(() => container.get('a')).toThrow(EntryNotFoundError);
    expect(container.get('ok')).toBe(1);
  });

  it('set() replaces definitions and drops resolved values', () => {
    const container = new Container({ definitions: { foo: 'bar' } });
    expect(container.get('foo')).toBe('bar');

    container.set('foo', value('baz'));
    expect(container.get('foo')).toBe('baz');

    const instance = { live: true };
    container.set('foo', instance);
    expect(container.get('foo')).toBe(instance);
    expect(container.getKnownEntryNames()).toEqual(['foo']);
  });

  it('has() does not resolve', () => {
    const make = vi.fn(() => 1);
    const container = new Container({ definitions: { lazy: factory(make) } });

    expect(container.has('lazy')).toBe(true);
    expect(container.has('nothing')).toBe(false);
    expect(make).not.toHaveBeenCalled();
  });

  it('reports fresh resolutions to onInstantiate', () => {
    const onInstantiate = vi.fn();
    const container = new Container({ definitions: { foo: 'bar', ref: alias('foo') }, onInstantiate });

    container.get('ref');
    container.get('ref');

    expect(onInstantiate.mock.calls.map(([id]) => id)).toEqual(['foo', 'ref']);
    for (const [, duration] of onInstantiate.mock.calls) {
      expect(typeof duration).toBe('number');
      expect(duration).toBeGreaterThanOrEqual(0);
    }
  });
});
