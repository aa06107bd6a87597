/**
 * High-level "ask" orchestration.
 * Ties together schema discovery, grammar synthesis, constrained
 * generation and execution. Every step depends on the previous one, so
 * nothing runs concurrently and the schema is fetched fresh per question.
 */

import type { QueryEngine, QueryResult } from './db/types.js';
import { synthesize } from './grammar/synthesize.js';
import type { QueryGenerator } from './llm/types.js';
import { describeAvailableData } from './schema/hint.js';
import type { SchemaSource } from './schema/types.js';
import { inspectSql, unknownTables } from './sql/inspect.js';

export interface AskDeps {
  catalog: SchemaSource;
  generator: QueryGenerator;
  engine: QueryEngine;
}

export interface AskOpts {
  /** Instant relative time phrases resolve against. Default: now */
  referenceTime?: Date;
}

export type AskResult =
  | {
      status: 'ok';
      sql: string;
      result: QueryResult;
      /** Local inspection findings; never block execution */
      warnings: string[];
    }
  | {
      status: 'unsupported';
      reason: string;
      /** What the schema can answer instead */
      hint: string;
    };

export async function askQuestion(question: string, deps: AskDeps, opts: AskOpts = {}): Promise<AskResult> {
  // 1. Discover the schema and derive the grammar from it
  const schema = await deps.catalog.fetchSchema();
  const grammar = synthesize(schema);

  // 2. Constrained generation
  const outcome = await deps.generator.generate({
    question,
    grammar: grammar.grammar,
    capabilities: grammar.capabilities,
    referenceTime: opts.referenceTime ?? new Date(),
  });

  if (outcome.kind === 'unsupported') {
    return { status: 'unsupported', reason: outcome.reason, hint: describeAvailableData(schema) };
  }

  // 3. Local soundness check
  const warnings: string[] = [];
  const inspected = inspectSql(outcome.sql);
  if (!inspected.ok) {
    warnings.push(`Could not inspect generated SQL: ${inspected.error}`);
  } else {
    const unknown = unknownTables(
      inspected.shape,
      schema.tables.map((t) => t.name),
    );
    if (unknown.length > 0) {
      warnings.push(`Generated SQL references unknown tables: ${unknown.join(', ')}`);
    }
  }

  // 4. Execute
  const result = await deps.engine.execute(outcome.sql);
  return { status: 'ok', sql: outcome.sql, result, warnings };
}
