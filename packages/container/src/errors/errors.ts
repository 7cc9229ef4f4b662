import { renderPath, type PathSegment } from '../compiler/path.js';

const IS_PROD = typeof process !== 'undefined' && process.env?.NODE_ENV === 'production';

const join = (lines: string[]): string => lines.join('\n');
const format = (prod: string, devLines: string[]): string => (IS_PROD ? prod : join(devLines));

/**
 * Kinds of failures that can abort a compilation or a resolution.
 */
export type ErrorKind =
  | 'ObjectNotCompilable'
  | 'AnonymousTypeNotCompilable'
  | 'DefinitionNotCompilable'
  | 'NestedCompilationFailure'
  | 'InvalidArtifactName'
  | 'CompiledContainerImmutable'
  | 'NotFound';

/**
 * Base class of the errors raised when a definition cannot be compiled.
 *
 * `reason` is the bare cause ("An object was found but objects cannot be
 * compiled"), reused as the innermost frame of {@link NestedCompilationError}.
 */
export abstract class NotCompilableError extends Error {
  abstract readonly kind: ErrorKind;

  protected constructor(
    public entryId: string,
    public path: readonly PathSegment[],
    public reason: string,
    hints: string[]
  ) {
    const short = `Entry "${entryId}" cannot be compiled: ${reason}`;
    super(
      format(short, [
        short,
        '',
        `  at ${renderPath(entryId, path)}`,
        ...(hints.length > 0
          ? ['', 'To fix this:', ...hints.map((h, i) => `  ${i + 1}. ${h}`)]
          : []),
      ])
    );
  }
}

export class ObjectNotCompilableError extends NotCompilableError {
  readonly kind = 'ObjectNotCompilable';

  constructor(
    entryId: string,
    path: readonly PathSegment[],
    public found: string
  ) {
    super(entryId, path, 'An object was found but objects cannot be compiled', [
      `Replace the ${found} with a factory() definition, which is resolved at runtime`,
      'Or describe it with create() / autowire() so it can be generated',
    ]);
    this.name = 'ObjectNotCompilableError';
  }
}

export class AnonymousTypeNotCompilableError extends NotCompilableError {
  readonly kind = 'AnonymousTypeNotCompilable';

  constructor(entryId: string, path: readonly PathSegment[]) {
    super(entryId, path, 'anonymous classes cannot be compiled', [
      'Declare the class with a name and register it with @Injectable()',
      'Or build the instance with a factory() definition',
    ]);
    this.name = 'AnonymousTypeNotCompilableError';
  }
}

export class DefinitionNotCompilableError extends NotCompilableError {
  readonly kind = 'DefinitionNotCompilable';

  constructor(entryId: string, path: readonly PathSegment[], reason: string) {
    super(entryId, path, reason, []);
    this.name = 'DefinitionNotCompilableError';
  }
}

/**
 * One frame of a compilation failure found inside a nested definition.
 *
 * The outermost frame names the entry, inner frames are generic
 * `<nested definition>` markers and the innermost `cause` is the concrete
 * {@link NotCompilableError}.
 */
export class NestedCompilationError extends Error {
  readonly kind = 'NestedCompilationFailure';

  /** Frames of this error and all nested ones, without the path trailer. */
  readonly chain: string;

  constructor(
    public entryId: string,
    public path: readonly PathSegment[],
    public label: string,
    cause: NestedCompilationError | NotCompilableError
  ) {
    const frame = `Error while compiling ${label}.`;
    const rest = cause instanceof NestedCompilationError ? cause.chain : cause.reason;
    const chain = `${frame} ${rest}`;
    super(format(chain, [chain, '', `  at ${renderPath(entryId, path)}`]), { cause });
    this.chain = chain;
    this.name = 'NestedCompilationError';
  }

  /** The concrete error at the bottom of the chain. */
  get innermost(): NotCompilableError {
    let current: unknown = this.cause;
    while (current instanceof NestedCompilationError) current = current.cause;
    if (current instanceof NotCompilableError) return current;
    throw new TypeError('Nested compilation error without a concrete cause');
  }
}

export class InvalidArtifactNameError extends Error {
  readonly kind = 'InvalidArtifactName';

  constructor(public artifactName: string) {
    const short = `The container cannot be compiled: \`${artifactName}\` is not a valid class name`;
    const dev = [
      short,
      '',
      'The name becomes the generated class name, so it must be a JavaScript identifier:',
      '  - start with a letter, `_` or `$`',
      '  - contain only letters, digits, `_` or `$`',
      '  - not be a reserved word',
    ];
    super(format(short, dev));
    this.name = 'InvalidArtifactNameError';
  }
}

export class CompiledContainerImmutableError extends Error {
  readonly kind = 'CompiledContainerImmutable';

  constructor(public entryId: string) {
    const short = `You cannot set entry '${entryId}' at runtime on a compiled container.`;
    const dev = [
      short,
      '',
      'The compiled fast path is fixed when the artifact is generated. To fix this:',
      '  1. Add the definition to the builder before compiling',
      '  2. Or disable compilation for this container',
      '  3. Or set raw values (objects, strings, numbers) on an uncompiled container',
    ];
    super(format(short, dev));
    this.name = 'CompiledContainerImmutableError';
  }
}

/**
 * Entry not found error with helpful suggestions
 */
export class EntryNotFoundError extends Error {
  readonly kind = 'NotFound';

  constructor(
    public entryId: string,
    public availableEntries: string[],
    public dependencyChain?: string[]
  ) {
    const parts: string[] = [`Cannot resolve entry '${entryId}'.`, ''];

    if (dependencyChain && dependencyChain.length > 0) {
      const chain = dependencyChain.join(' → ');
      parts.push('Dependency chain:', `  ${chain} → ${entryId}`, '');
    }

    if (availableEntries.length > 0 && availableEntries.length <= 10) {
      parts.push('Available entries:');
      availableEntries.forEach((e) => parts.push(`  - ${e}`));
      parts.push('');
    } else if (availableEntries.length > 10) {
      parts.push(`${availableEntries.length} entries are registered.`, '');
    }

    parts.push('To fix this:');
    parts.push(`  1. Add a definition for '${entryId}' to the builder`);
    parts.push(`  2. Or register a class named '${entryId}' with @Injectable()`);

    super(format(`Cannot resolve entry '${entryId}'.`, parts));
    this.name = 'EntryNotFoundError';
  }
}

/**
 * Circular dependency detected error
 */
export class CircularDependencyError extends Error {
  constructor(public cycle: string[]) {
    const cycleStr = cycle.join(' → ');
    const message = format(`Circular dependency detected: ${cycleStr}`, [
      `Circular dependency detected: ${cycleStr}`,
      '',
      `This means ${cycle[cycle.length - 1]} depends on itself through other entries.`,
      '',
      'Solutions:',
      `  1. Extract shared logic into a separate entry`,
      `  2. Inject a factory() that resolves the dependency lazily`,
    ]);
    super(message);
    this.name = 'CircularDependencyError';
  }
}

export class FactoryExecutionError extends Error {
  constructor(
    public entryId: string,
    cause: unknown
  ) {
    const dev = [
      `Factory for '${entryId}' failed during creation.`,
      '',
      `Factory for '${entryId}' threw during creation. See 'cause' for details.`,
    ];
    super(format(`Factory for '${entryId}' failed during creation.`, dev), { cause });
    this.name = 'FactoryExecutionError';
  }
}

export class MissingInjectError extends Error {
  constructor(
    public className: string,
    public parameterIndex: number
  ) {
    const short = `Missing @Inject decorator at parameter ${parameterIndex} of ${className}.`;
    const dev = [
      short,
      '',
      'Fix:',
      `  - Add @Inject('someEntry') to the constructor parameter at index ${parameterIndex}`,
      `  - Or pass the argument explicitly: autowire(${className}).args(...)`,
    ];
    super(format(short, dev));
    this.name = 'MissingInjectError';
  }
}

export class UnknownClassError extends Error {
  constructor(public className: string) {
    const short = `Class '${className}' is not registered.`;
    const dev = [
      short,
      '',
      `No class named '${className}' is known to the class registry.`,
      `Decorate it with @Injectable() and make sure its module is imported before the container is built.`,
    ];
    super(format(short, dev));
    this.name = 'UnknownClassError';
  }
}

export class ClassNameCollisionError extends Error {
  constructor(
    public className: string,
    public existing: string,
    public attempted: string
  ) {
    const short = `Class name '${className}' is already registered by ${existing}.`;
    const dev = [
      short,
      '',
      `Cannot register ${attempted} under '${className}'. Pass an explicit name: @Injectable({ name: 'module.${attempted}' })`,
    ];
    super(format(short, dev));
    this.name = 'ClassNameCollisionError';
  }
}

export class InvalidContainerConfigError extends Error {
  constructor(public reason: string) {
    const dev = [`Invalid container configuration: ${reason}`];
    super(format(`Invalid container configuration: ${reason}`, dev));
    this.name = 'InvalidContainerConfigError';
  }
}

export class InvalidDefinitionError extends Error {
  constructor(
    public entryId: string,
    public reason: string
  ) {
    const short = `Invalid definition for '${entryId}': ${reason}`;
    super(format(short, [short]));
    this.name = 'InvalidDefinitionError';
  }
}

export class ArtifactLoadError extends Error {
  constructor(
    public file: string,
    public reason: string
  ) {
    const short = `Compiled container '${file}' cannot be loaded: ${reason}`;
    const dev = [
      short,
      '',
      'The artifact is never regenerated while it exists. Delete the file to compile it again.',
    ];
    super(format(short, dev));
    this.name = 'ArtifactLoadError';
  }
}
