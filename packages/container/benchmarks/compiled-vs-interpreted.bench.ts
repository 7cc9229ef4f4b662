import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import { Bench } from 'tinybench';

import {
  ClassRegistry,
  CompiledContainer,
  Container,
  ContainerBuilder,
  KnownClasses,
  alias,
  artifactPath,
  loadArtifact,
  registryIntrospector,
} from '../src/index.js';

/**
 * Compiled vs Interpreted Resolution Benchmark
 *
 * A chain of autowired services (Service0 → Service1 → ... → ServiceN) sharing
 * one config entry. Cold runs build a fresh container and resolve the head of
 * the chain, so every service is constructed once per iteration.
 */

const CHAIN_LENGTH = 50;
const NAME = 'BenchContainer';

function registerChain(length: number): void {
  for (let i = 0; i < length; i++) {
    const name = `Service${i}`;
    // computed key gives the class its name
    const ctor = {
      [name]: class {
        constructor(
          readonly next?: unknown,
          readonly config?: unknown
        ) {}
      },
    }[name];
    ClassRegistry.register(ctor);
    if (i + 1 < length) ClassRegistry.registerInject(ctor, 0, `Service${i + 1}`);
    ClassRegistry.registerInject(ctor, 1, 'config');
  }
}

async function runBenchmark() {
  console.log('=== Compiled vs Interpreted Resolution Benchmark ===\n');

  registerChain(CHAIN_LENGTH);
  const directory = fs.mkdtempSync(path.join(os.tmpdir(), 'kiln-bench-'));
  const definitions = {
    config: { level: 'info', retries: 3, hosts: ['a', 'b'] },
    root: alias('Service0'),
  };

  const builder = () =>
    new ContainerBuilder()
      .addDefinitions(definitions)
      .enableCompilation(directory, NAME)
      .compileAllClasses(KnownClasses.fromRegistry());

  const first = builder().buildCompiled();
  console.log(`[phase] artifact written with ${first.getCompiledEntries().length} routines\n`);

  const Compiled = loadArtifact(
    artifactPath({ directory, name: NAME }),
    NAME,
    CompiledContainer,
    registryIntrospector
  );

  const warmInterpreted = new Container({ definitions });
  const warmCompiled = new Compiled({ definitions });
  warmInterpreted.get('root');
  warmCompiled.get('root');

  const bench = new Bench({ time: 1000 });

  bench
    // C1: Fresh interpreted container, whole chain constructed
    .add('C1: Interpreted: Cold Resolve', () => {
      new Container({ definitions }).get('root');
    })

    // C2: Fresh compiled container from the loaded class
    .add('C2: Compiled: Cold Resolve', () => {
      new Compiled({ definitions }).get('root');
    })

    // C3: Builder path with an existing artifact (stat + load + construct)
    .add('C3: Compiled: Build From Cached Artifact', () => {
      builder().buildCompiled();
    })

    .add('W1: Interpreted: Warm Resolve', () => {
      warmInterpreted.get('root');
    })

    .add('W2: Compiled: Warm Resolve', () => {
      warmCompiled.get('root');
    });

  console.log(`[phase] running ${bench.tasks.length} tasks...`);
  await bench.run();
  console.table(bench.table());

  const getMs = (name: string) => {
    const task = bench.tasks.find((t) => t.name === name);
    return (task?.result?.period || 0) * 1000;
  };

  const interpreted = getMs('C1: Interpreted: Cold Resolve');
  const compiled = getMs('C2: Compiled: Cold Resolve');

  console.log('\n=== Cold Resolve ===\n');
  console.log(`  Interpreted: ${interpreted.toFixed(4)} ms`);
  console.log(`  Compiled:    ${compiled.toFixed(4)} ms`);
  if (compiled > 0) console.log(`  Speedup:     ${(interpreted / compiled).toFixed(2)}x`);

  fs.rmSync(directory, { recursive: true, force: true });
}

runBenchmark().catch(console.error);
