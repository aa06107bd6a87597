/**
 * Verification harness: runs eval cases concurrently against a generator
 * and an engine, comparing generated results with reference results.
 *
 * A failing case never affects its siblings. Every case runs; the first
 * failure in input order becomes the run's error.
 */

import type { QueryEngine, QueryResult } from '../db/types.js';
import { errorMessage } from '../errors.js';
import type { SynthesizedGrammar } from '../grammar/synthesize.js';
import type { GenerationOutcome, QueryGenerator } from '../llm/types.js';
import { inspectSql, sameShape } from '../sql/inspect.js';
import { dataEqual } from './compare.js';
import type { EvalCase, EvalResult, EvalRun, EvalSummary, RowOrder } from './types.js';

export const UNSUPPORTED_REFERENCE = '(expected to be unsupported)';

export interface HarnessDeps {
  generator: QueryGenerator;
  engine: QueryEngine;
  grammar: SynthesizedGrammar;
  /** Clock read once per run for cases without a reference time */
  now?: () => Date;
}

class CaseFailure extends Error {}

function refused(reason: string): string {
  return `(refused: ${reason})`;
}

function resolveReferenceTime(tc: EvalCase, runStart: Date): Date {
  if (tc.referenceTime === undefined) return runStart;
  const parsed = new Date(tc.referenceTime);
  if (Number.isNaN(parsed.getTime())) {
    throw new CaseFailure(`invalid reference time: ${tc.referenceTime}`);
  }
  return parsed;
}

function rowOrderFor(tc: EvalCase, referenceSql: string): RowOrder {
  if (tc.rowOrder) return tc.rowOrder;
  const inspected = inspectSql(referenceSql);
  const ordered = inspected.ok ? inspected.shape.hasOrderBy : /\border\s+by\b/i.test(referenceSql);
  return ordered ? 'positional' : 'unordered';
}

function shapeMatches(referenceSql: string, generatedSql: string): boolean | undefined {
  const reference = inspectSql(referenceSql);
  const generated = inspectSql(generatedSql);
  if (!reference.ok || !generated.ok) return undefined;
  return sameShape(reference.shape, generated.shape);
}

async function attempt<T>(prefix: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err: unknown) {
    throw new CaseFailure(`${prefix}: ${errorMessage(err)}`, { cause: err });
  }
}

async function runUnsupportedCase(tc: EvalCase, deps: HarnessDeps, referenceTime: Date): Promise<EvalResult> {
  const result: EvalResult = {
    name: tc.name,
    passed: false,
    question: tc.question,
    referenceSql: UNSUPPORTED_REFERENCE,
    generatedSql: '',
  };

  let outcome: GenerationOutcome;
  try {
    outcome = await deps.generator.generate({
      question: tc.question,
      grammar: deps.grammar.grammar,
      capabilities: deps.grammar.capabilities,
      referenceTime,
    });
  } catch (err: unknown) {
    return { ...result, error: `expected a refusal but got: ${errorMessage(err)}` };
  }

  if (outcome.kind === 'sql') {
    return { ...result, generatedSql: outcome.sql, error: `expected a refusal but got SQL: ${outcome.sql}` };
  }
  return { ...result, passed: true, generatedSql: refused(outcome.reason) };
}

async function runQueryCase(
  tc: EvalCase,
  referenceSql: string,
  deps: HarnessDeps,
  referenceTime: Date,
): Promise<EvalResult> {
  const result: EvalResult = {
    name: tc.name,
    passed: false,
    question: tc.question,
    referenceSql,
    generatedSql: '',
  };

  try {
    const expected = await attempt('reference SQL failed', () => deps.engine.execute(referenceSql));

    const outcome = await attempt('generation failed', () =>
      deps.generator.generate({
        question: tc.question,
        grammar: deps.grammar.grammar,
        capabilities: deps.grammar.capabilities,
        referenceTime,
      }),
    );
    if (outcome.kind === 'unsupported') {
      result.generatedSql = refused(outcome.reason);
      throw new CaseFailure(`generation failed: model refused: ${outcome.reason}`);
    }
    result.generatedSql = outcome.sql;
    result.shapeMatches = shapeMatches(referenceSql, outcome.sql);

    const generated: QueryResult = await attempt('generated SQL failed', () => deps.engine.execute(outcome.sql));

    if (expected.rowCount !== generated.rowCount) {
      throw new CaseFailure(`row count: expected ${expected.rowCount}, got ${generated.rowCount}`);
    }
    if (!dataEqual(expected.rows, generated.rows, rowOrderFor(tc, referenceSql))) {
      throw new CaseFailure('data mismatch');
    }
    result.passed = true;
  } catch (err: unknown) {
    if (!(err instanceof CaseFailure)) throw err;
    result.error = err.message;
  }

  if (result.shapeMatches === undefined) delete result.shapeMatches;
  return result;
}

async function runCase(tc: EvalCase, deps: HarnessDeps, runStart: Date): Promise<EvalResult> {
  try {
    const referenceTime = resolveReferenceTime(tc, runStart);
    if (tc.expectUnsupported) {
      return await runUnsupportedCase(tc, deps, referenceTime);
    }
    if (!tc.referenceSql) {
      throw new CaseFailure('case has no reference SQL');
    }
    return await runQueryCase(tc, tc.referenceSql, deps, referenceTime);
  } catch (err: unknown) {
    return {
      name: tc.name,
      passed: false,
      question: tc.question,
      referenceSql: tc.referenceSql ?? '',
      generatedSql: '',
      error: errorMessage(err),
    };
  }
}

export async function runEvals(cases: readonly EvalCase[], deps: HarnessDeps): Promise<EvalRun> {
  const runStart = (deps.now ?? (() => new Date()))();

  // One task per case; Promise.all keeps results index-aligned with cases.
  const results = await Promise.all(cases.map((tc) => runCase(tc, deps, runStart)));

  const firstFailure = results.find((r) => !r.passed);
  return {
    results,
    error: firstFailure ? `eval ${firstFailure.name} failed: ${firstFailure.error ?? 'unknown error'}` : null,
  };
}

export function summarize(results: readonly EvalResult[]): EvalSummary {
  const total = results.length;
  const passed = results.filter((r) => r.passed).length;
  return {
    total,
    passed,
    failed: total - passed,
    passRate: total > 0 ? (passed / total) * 100 : 0,
  };
}

export function formatEvalReport(results: readonly EvalResult[]): string {
  const lines: string[] = [];
  for (const r of results) {
    if (r.passed) {
      lines.push(`[PASS] ${r.name}  ${r.generatedSql}`);
      continue;
    }
    lines.push(`[FAIL] ${r.name}`);
    lines.push(`  - ${r.error ?? 'unknown error'}`);
    lines.push(`  - expected: ${r.referenceSql}`);
    if (r.generatedSql) lines.push(`  - got: ${r.generatedSql}`);
  }

  const summary = summarize(results);
  lines.push('');
  lines.push('Summary');
  lines.push(`  passed:    ${summary.passed}/${summary.total} (${summary.passRate.toFixed(1)}%)`);
  lines.push(`  failed:    ${summary.failed}`);
  return lines.join('\n');
}
