import type { DefinitionMap } from '../definitions/definitions.js';
import type { TypeIntrospector } from '../types/types.js';
import { CompilabilityAnalyzer, toCompilationError } from './analyzer.js';
import { CodeGenerator, type ArtifactIdentity } from './code-generator.js';
import { renderPath } from './path.js';

export interface SkippedEntry {
  readonly id: string;
  /** Why the entry is left to the interpreted path, with where it was decided. */
  readonly reason: string;
}

export interface CompileResult {
  /** Artifact module source. */
  readonly source: string;
  /** Ids of compiled entries, in routine order. */
  readonly compiledEntries: readonly string[];
  readonly skippedEntries: readonly SkippedEntry[];
}

/**
 * Runs the analyzer over a whole definition map and generates the artifact.
 *
 * Entries are visited in map order. The first entry that cannot be compiled
 * aborts the build with its compilation error; deferred entries are skipped.
 */
export class Compiler {
  private readonly analyzer: CompilabilityAnalyzer;
  private readonly generator = new CodeGenerator();

  constructor(introspector: TypeIntrospector) {
    this.analyzer = new CompilabilityAnalyzer(introspector);
  }

  compile(definitions: DefinitionMap, identity: ArtifactIdentity): CompileResult {
    const fragments: string[] = [];
    const compiledEntries: string[] = [];
    const skippedEntries: SkippedEntry[] = [];

    for (const [id, definition] of definitions) {
      const analysis = this.analyzer.analyze(definition);
      switch (analysis.status) {
        case 'failed':
          throw toCompilationError(id, analysis.failure);
        case 'deferred':
          skippedEntries.push({
            id,
            reason: `${analysis.reason} (at ${renderPath(id, analysis.path)})`,
          });
          break;
        case 'compilable':
          fragments.push(this.generator.generate(analysis.plan, id));
          compiledEntries.push(id);
          break;
      }
    }

    return {
      source: this.generator.assemble(fragments, identity),
      compiledEntries,
      skippedEntries,
    };
  }
}
