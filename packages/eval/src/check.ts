/**
 * Eval targets: where the harness gets its schema, engine and generator.
 */

import {
  OpenAIProvider,
  createCatalog,
  createEngine,
  loadConfig,
  runEvals,
  synthesize,
  type EvalCase,
  type EvalRun,
  type QueryEngine,
  type QueryGenerator,
  type SchemaSource,
} from '@cfgsql/core';
import { createOfflineFixture } from './offline.js';

export interface EvalTarget {
  label: string;
  catalog: SchemaSource;
  engine: QueryEngine;
  generator: QueryGenerator;
  cleanup(): void;
}

export function isOffline(env: NodeJS.ProcessEnv): boolean {
  return env.CFGSQL_EVAL_OFFLINE === '1' || !env.OPENAI_API_KEY?.trim();
}

export function createTarget(env: NodeJS.ProcessEnv): EvalTarget {
  if (isOffline(env)) {
    const fixture = createOfflineFixture();
    return {
      label: 'offline (seeded SQLite, recorded outcomes)',
      catalog: fixture.engine,
      engine: fixture.engine,
      generator: fixture.generator,
      cleanup: fixture.cleanup,
    };
  }

  const config = loadConfig(env);
  return {
    label: `online (${config.engine}, ${config.model})`,
    catalog: createCatalog(config),
    engine: createEngine(config),
    generator: new OpenAIProvider({ apiKey: config.openaiApiKey, model: config.model }),
    cleanup: () => undefined,
  };
}

export async function runEvalCheck(cases: EvalCase[], target: EvalTarget): Promise<EvalRun> {
  const schema = await target.catalog.fetchSchema();
  const grammar = synthesize(schema);
  return runEvals(cases, { generator: target.generator, engine: target.engine, grammar });
}
