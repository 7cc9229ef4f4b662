import { CompiledContainer } from '../compiled/compiled-container.js';
import { loadArtifact, type CompiledContainerClass } from '../compiled/artifact-loader.js';
import { ArtifactCache } from '../compiler/artifact-cache.js';
import { Compiler } from '../compiler/compiler.js';
import { Container } from '../core/container.js';
import {
  toDefinitionMap,
  type Definition,
  type DefinitionSource,
} from '../definitions/definitions.js';
import {
  constructedClasses,
  discoverClasses,
  type KnownClasses,
} from '../discovery/known-classes.js';
import { InvalidContainerConfigError } from '../errors/errors.js';
import { registryIntrospector } from '../registry/class-registry.js';
import type { InstantiateHook, TypeIntrospector, UnknownClassPolicy } from '../types/types.js';

export interface ContainerBuilderOptions {
  /** Defaults to the global ClassRegistry. */
  introspector?: TypeIntrospector;
  /** Artifact cache used by compiled builds. */
  cache?: ArtifactCache;
  /** What discovery does with class names it cannot resolve. Default 'error'. */
  unknownClassPolicy?: UnknownClassPolicy;
  /** Instrumentation hook passed to every built container. */
  onInstantiate?: InstantiateHook;
}

interface CompilationSettings {
  readonly directory: string;
  readonly name: string;
  readonly parent: CompiledContainerClass;
}

/**
 * The `ContainerBuilder` collects definitions and builds interpreted or
 * compiled containers from them.
 *
 * @remarks
 * - Later `addDefinitions()` calls override earlier entries with the same id
 * - `enableCompilation()` switches `build()` to the compiled path
 * - An existing artifact is reused as is: definitions changed since it was
 *   written are only served by the interpreted fallback if the artifact does
 *   not contain them
 *
 * @example
 * ```typescript
 * const container = new ContainerBuilder()
 *   .addDefinitions({ 'mailer.from': 'noreply@example.test', mailer: autowire(Mailer) })
 *   .enableCompilation('var/cache', 'AppContainer')
 *   .compileAllClasses(KnownClasses.fromRegistry())
 *   .build();
 * ```
 */
export class ContainerBuilder {
  private readonly definitions = new Map<string, Definition>();
  private readonly knownClasses: KnownClasses[] = [];
  private compilation?: CompilationSettings;

  private readonly introspector: TypeIntrospector;
  private readonly cache: ArtifactCache;
  private readonly unknownClassPolicy: UnknownClassPolicy;
  private readonly onInstantiate?: InstantiateHook;

  constructor(options: ContainerBuilderOptions = {}) {
    this.introspector = options.introspector ?? registryIntrospector;
    this.cache = options.cache ?? new ArtifactCache();
    this.unknownClassPolicy = options.unknownClassPolicy ?? 'error';
    this.onInstantiate = options.onInstantiate;
  }

  addDefinitions(source: DefinitionSource): this {
    for (const [id, definition] of toDefinitionMap(source)) {
      this.definitions.set(id, definition);
    }
    return this;
  }

  /**
   * Build compiled containers from the artifact `<directory>/<name>.cjs`.
   *
   * @param name - Class name of the generated container
   * @param parent - Class the generated container extends
   * @throws InvalidContainerConfigError for an empty directory or a parent
   *         that is not a CompiledContainer
   */
  enableCompilation(
    directory: string,
    name = 'CompiledContainer',
    parent: CompiledContainerClass = CompiledContainer
  ): this {
    if (!directory) {
      throw new InvalidContainerConfigError('the compilation directory must not be empty');
    }
    if (parent !== CompiledContainer && !(parent.prototype instanceof CompiledContainer)) {
      throw new InvalidContainerConfigError(
        `the parent class of a compiled container must extend CompiledContainer, got ${parent.name}`
      );
    }
    this.compilation = { directory, name, parent };
    return this;
  }

  /**
   * Compile an autowired entry for every class in `known` that has no entry
   * of its own. Can be called several times; sources are read in order.
   */
  compileAllClasses(known: KnownClasses): this {
    this.knownClasses.push(known);
    return this;
  }

  /**
   * Build a container: compiled when compilation is enabled, interpreted
   * otherwise.
   */
  build(): Container {
    if (this.compilation) return this.buildCompiled();
    return new Container({
      definitions: new Map(this.definitions),
      introspector: this.introspector,
      onInstantiate: this.onInstantiate,
    });
  }

  /**
   * Build a compiled container, generating its artifact if the file does not
   * exist yet.
   *
   * @throws InvalidContainerConfigError if compilation is not enabled
   * @throws InvalidArtifactNameError if the name is not a valid class name
   * @throws ClassNameCollisionError if two unregistered classes the
   *         definitions construct share a name
   * @throws NestedCompilationError or a NotCompilableError subclass when an
   *         entry cannot be compiled; nothing is written then
   */
  buildCompiled(): CompiledContainer {
    const settings = this.compilation;
    if (!settings) {
      throw new InvalidContainerConfigError(
        'call enableCompilation() before building a compiled container'
      );
    }

    const definitions = new Map(this.definitions);
    const local = constructedClasses(definitions, this.introspector);
    const artifact = this.cache.obtain(settings, () => this.compile(definitions, settings));
    const ContainerClass = loadArtifact(
      artifact.path,
      settings.name,
      settings.parent,
      this.introspector,
      local
    );

    return new ContainerClass({
      definitions,
      introspector: this.introspector,
      onInstantiate: this.onInstantiate,
    });
  }

  private compile(definitions: Map<string, Definition>, settings: CompilationSettings): string {
    const withClasses = discoverClasses(definitions, this.knownClasses, {
      introspector: this.introspector,
      unknownClassPolicy: this.unknownClassPolicy,
    });
    const compiler = new Compiler(this.introspector);
    return compiler.compile(withClasses, { name: settings.name, parentName: settings.parent.name })
      .source;
  }
}
