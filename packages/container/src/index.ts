export { ContainerBuilder } from './api/container-builder.js';
export type { ContainerBuilderOptions } from './api/container-builder.js';

export { Container } from './core/container.js';
export type { ContainerInit } from './core/container.js';
export * from './core/token.js';

export { CompiledContainer } from './compiled/compiled-container.js';
export type { CompiledRoutine } from './compiled/compiled-container.js';
export { classLookup, loadArtifact } from './compiled/artifact-loader.js';
export type {
  ArtifactRuntime,
  ClassLookup,
  CompiledContainerClass,
} from './compiled/artifact-loader.js';

export {
  ArtifactCache,
  artifactPath,
  isValidArtifactName,
} from './compiler/artifact-cache.js';
export type { Artifact, ArtifactLocation } from './compiler/artifact-cache.js';
export { CompilabilityAnalyzer, toCompilationError } from './compiler/analyzer.js';
export type { Analysis, AnalysisFailure, PlanNode } from './compiler/analyzer.js';
export { CodeGenerator } from './compiler/code-generator.js';
export type { ArtifactIdentity } from './compiler/code-generator.js';
export { Compiler } from './compiler/compiler.js';
export type { CompileResult, SkippedEntry } from './compiler/compiler.js';
export { renderPath } from './compiler/path.js';
export type { PathSegment } from './compiler/path.js';

export {
  alias,
  autowire,
  create,
  factory,
  isDefinition,
  toDefinition,
  value,
} from './definitions/definitions.js';
export type {
  ArrayDefinition,
  AliasDefinition,
  ClassDefinition,
  Definition,
  DefinitionMap,
  DefinitionSource,
  FactoryDefinition,
  FactoryFunction,
  ValueDefinition,
} from './definitions/definitions.js';

export { KnownClasses } from './discovery/known-classes.js';

export { Inject, Injectable } from './decorators/index.js';
export { ClassRegistry, registryIntrospector } from './registry/class-registry.js';

export type {
  Constructor,
  InjectableOptions,
  InstantiateHook,
  ResolutionContext,
  TypeIntrospector,
  UnknownClassPolicy,
} from './types/types.js';

// Errors
export {
  AnonymousTypeNotCompilableError,
  ArtifactLoadError,
  CircularDependencyError,
  ClassNameCollisionError,
  CompiledContainerImmutableError,
  DefinitionNotCompilableError,
  EntryNotFoundError,
  FactoryExecutionError,
  InvalidArtifactNameError,
  InvalidContainerConfigError,
  InvalidDefinitionError,
  MissingInjectError,
  NestedCompilationError,
  NotCompilableError,
  ObjectNotCompilableError,
  UnknownClassError,
} from './errors/errors.js';
export type { ErrorKind } from './errors/errors.js';
