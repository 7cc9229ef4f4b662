/*
 * CompilabilityAnalyzer
 * ---------------------
 * Decides, definition by definition, whether an entry can be reduced to
 * generated code, and produces the plan the code generator emits.
 *
 * Outcomes:
 *  - compilable: every node of the subtree has a plan
 *  - deferred: the subtree holds a factory; the entry is left to the
 *    interpreted path and simply not compiled
 *  - failed: the subtree holds something that can never be generated (a live
 *    object, an anonymous class, a class name that resolves to nothing, a
 *    parameter with no known dependency); the whole build is aborted
 *
 * The first node that is not compilable decides the outcome; within a class
 * construction, its nested definitions are checked before the class itself.
 * Failures count one frame for every array, and every nested construction,
 * they are found in. Analysis only
 * looks at the definition and the introspector: no clock, no file system and
 * no result of other entries.
 */
import {
  constructorArguments,
  isDefinition,
  isPlainObject,
  type ClassDefinition,
  type Definition,
} from '../definitions/definitions.js';
import {
  AnonymousTypeNotCompilableError,
  DefinitionNotCompilableError,
  NestedCompilationError,
  ObjectNotCompilableError,
  type NotCompilableError,
} from '../errors/errors.js';
import type { Constructor, TypeIntrospector } from '../types/types.js';
import { keySegment, type PathSegment } from './path.js';

export type Literal = string | number | boolean | bigint | null | undefined;

/**
 * Generation steps for one definition. Other entries are only reached
 * through `lookup`, never embedded, so plans never form cycles.
 */
export type PlanNode =
  | { readonly op: 'literal'; readonly value: Literal }
  | { readonly op: 'lookup'; readonly id: string }
  | { readonly op: 'list'; readonly items: readonly PlanNode[] }
  | { readonly op: 'record'; readonly entries: readonly (readonly [string, PlanNode])[] }
  | {
      readonly op: 'construct';
      readonly className: string;
      readonly args: readonly PlanNode[];
      readonly properties: readonly (readonly [string, PlanNode])[];
      readonly calls: readonly (readonly [string, readonly PlanNode[]])[];
    };

export type FailureKind =
  | 'ObjectNotCompilable'
  | 'AnonymousTypeNotCompilable'
  | 'DefinitionNotCompilable';

export interface AnalysisFailure {
  readonly kind: FailureKind;
  /** Trail from the entry root to the failing node. */
  readonly path: readonly PathSegment[];
  /** Short description of what was found, e.g. "Date instance". */
  readonly detail: string;
  /** Nested definitions between the entry and the failing node. */
  readonly frames: number;
}

export type Analysis =
  | { readonly status: 'compilable'; readonly plan: PlanNode }
  | { readonly status: 'deferred'; readonly reason: string; readonly path: readonly PathSegment[] }
  | { readonly status: 'failed'; readonly failure: AnalysisFailure };

type Step<T> =
  | { readonly ok: true; readonly value: T }
  | Exclude<Analysis, { status: 'compilable' }>;

const compilable = (plan: PlanNode): Analysis => ({ status: 'compilable', plan });

const failed = (kind: FailureKind, path: readonly PathSegment[], detail: string): Analysis => ({
  status: 'failed',
  failure: { kind, path, detail, frames: 0 },
});

/** A failure seen from the definition enclosing it. */
function framed(analysis: Analysis): Analysis {
  if (analysis.status !== 'failed') return analysis;
  const { failure } = analysis;
  return { status: 'failed', failure: { ...failure, frames: failure.frames + 1 } };
}

function describeValue(raw: unknown): string {
  if (typeof raw === 'function') return raw.name ? `function ${raw.name}` : 'anonymous function';
  if (typeof raw === 'symbol') return 'symbol';
  if (isDefinition(raw)) return `${raw.kind} definition`;
  if (typeof raw === 'object' && raw !== null) {
    const ctor: unknown = Object.getPrototypeOf(raw)?.constructor;
    if (typeof ctor === 'function' && ctor.name) return `${ctor.name} instance`;
  }
  return 'object';
}

export class CompilabilityAnalyzer {
  constructor(private readonly introspector: TypeIntrospector) {}

  /**
   * Analyze one definition.
   *
   * @param path - Trail of nested-definition segments leading to `definition`,
   *               only used to report where a failure happened
   */
  analyze(definition: Definition, path: readonly PathSegment[] = []): Analysis {
    switch (definition.kind) {
      case 'value':
        return this.analyzeLiteral(definition.value, path);
      case 'alias':
        return compilable({ op: 'lookup', id: definition.target });
      case 'factory':
        return { status: 'deferred', reason: 'factories are resolved at runtime', path };
      case 'array': {
        const items = this.analyzeAll(
          definition.items.map((item) => [keySegment(item.key), item.definition] as const),
          path
        );
        if ('status' in items) return framed(items);
        if (definition.list) return compilable({ op: 'list', items: items.value });
        return compilable({
          op: 'record',
          entries: definition.items.map((item, i) => [String(item.key), items.value[i]] as const),
        });
      }
      case 'class': {
        const analysis = this.analyzeClass(definition, path);
        return path.length === 0 ? analysis : framed(analysis);
      }
    }
  }

  private analyzeClass(definition: ClassDefinition, path: readonly PathSegment[]): Analysis {
    const { target } = definition;
    if (typeof target !== 'string' && !target.name) {
      return failed('AnonymousTypeNotCompilable', path, 'anonymous class');
    }

    const ctor = typeof target === 'string' ? this.introspector.classOf(target) : target;
    const planned = constructorArguments(
      definition,
      ctor ? this.introspector.dependenciesOf(ctor) : []
    );

    const args = this.analyzeAll(
      planned.flatMap((arg, index) => (arg ? [[{ kind: 'argument', index }, arg] as const] : [])),
      path
    );
    if ('status' in args) return args;

    const properties = this.analyzeAll(
      definition.properties.map((p) => [{ kind: 'property', name: p.name }, p.value] as const),
      path
    );
    if ('status' in properties) return properties;

    const calls: (readonly [string, readonly PlanNode[]])[] = [];
    for (const call of definition.methods) {
      const callArgs = this.analyzeAll(
        call.args.map((arg, index) => [{ kind: 'method', name: call.name, index }, arg] as const),
        path
      );
      if ('status' in callArgs) return callArgs;
      calls.push([call.name, callArgs.value]);
    }

    const address = this.addressOf(target);
    if (!address.ok) return failed('DefinitionNotCompilable', path, address.error);
    const className = address.name;

    const missing = planned.findIndex((arg) => arg === undefined);
    if (missing >= 0) {
      return failed(
        'DefinitionNotCompilable',
        path,
        `parameter ${missing} of ${className} has no value defined or injectable`
      );
    }

    return compilable({
      op: 'construct',
      className,
      args: args.value,
      properties: definition.properties.map((p, i) => [p.name, properties.value[i]] as const),
      calls,
    });
  }

  /**
   * Name generated code looks the class up by: the registered name, or the
   * class's own name when it is not registered. The loader resolves the
   * latter from the classes the definitions construct.
   */
  private addressOf(
    target: Constructor | string
  ): { readonly ok: true; readonly name: string } | { readonly ok: false; readonly error: string } {
    if (typeof target === 'string') {
      if (this.introspector.classOf(target) === undefined) {
        return { ok: false, error: `class '${target}' is not registered` };
      }
      return { ok: true, name: target };
    }

    const registered = this.introspector.nameOf(target);
    if (registered !== undefined) return { ok: true, name: registered };
    if (this.introspector.classOf(target.name) !== undefined) {
      return {
        ok: false,
        error: `class ${target.name} is not registered and another class is registered under its name`,
      };
    }
    return { ok: true, name: target.name };
  }

  /** Analyze nested definitions in order, stopping at the first that is not compilable. */
  private analyzeAll(
    nested: readonly (readonly [PathSegment, Definition])[],
    path: readonly PathSegment[]
  ): Step<PlanNode[]> {
    const plans: PlanNode[] = [];
    for (const [segment, definition] of nested) {
      const analysis = this.analyze(definition, [...path, segment]);
      if (analysis.status !== 'compilable') return analysis;
      plans.push(analysis.plan);
    }
    return { ok: true, value: plans };
  }

  /**
   * Plan for a raw value: scalars, and arrays or plain records of them.
   */
  private analyzeLiteral(raw: unknown, path: readonly PathSegment[]): Analysis {
    switch (typeof raw) {
      case 'string':
      case 'number':
      case 'boolean':
      case 'bigint':
      case 'undefined':
        return compilable({ op: 'literal', value: raw });
      case 'function':
      case 'symbol':
        return failed('ObjectNotCompilable', path, describeValue(raw));
    }
    if (raw === null) return compilable({ op: 'literal', value: null });

    if (Array.isArray(raw)) {
      const items: PlanNode[] = [];
      for (const [index, el] of raw.entries()) {
        const analysis = this.analyzeLiteral(el, [...path, { kind: 'index', index }]);
        if (analysis.status !== 'compilable') return framed(analysis);
        items.push(analysis.plan);
      }
      return compilable({ op: 'list', items });
    }

    if (isPlainObject(raw) && !isDefinition(raw)) {
      const entries: (readonly [string, PlanNode])[] = [];
      for (const key of Object.keys(raw)) {
        const analysis = this.analyzeLiteral(raw[key], [...path, { kind: 'key', key }]);
        if (analysis.status !== 'compilable') return framed(analysis);
        entries.push([key, analysis.plan]);
      }
      return compilable({ op: 'record', entries });
    }

    return failed('ObjectNotCompilable', path, describeValue(raw));
  }
}

function concreteError(entryId: string, failure: AnalysisFailure): NotCompilableError {
  switch (failure.kind) {
    case 'ObjectNotCompilable':
      return new ObjectNotCompilableError(entryId, failure.path, failure.detail);
    case 'AnonymousTypeNotCompilable':
      return new AnonymousTypeNotCompilableError(entryId, failure.path);
    case 'DefinitionNotCompilable':
      return new DefinitionNotCompilableError(entryId, failure.path, failure.detail);
  }
}

/**
 * Turn a failure of entry `entryId` into the error thrown by the build.
 *
 * A failure with no frames is the concrete error itself, whatever its path:
 * a live object injected straight into a property is reported as such. A
 * failure `n` frames deep is wrapped in `n` nested frames: the outermost
 * names the entry, the others are `<nested definition>`.
 */
export function toCompilationError(
  entryId: string,
  failure: AnalysisFailure
): NestedCompilationError | NotCompilableError {
  let error: NestedCompilationError | NotCompilableError = concreteError(entryId, failure);
  for (let depth = failure.frames - 1; depth >= 0; depth--) {
    const label = depth === 0 ? entryId : '<nested definition>';
    error = new NestedCompilationError(entryId, failure.path, label, error);
  }
  return error;
}
