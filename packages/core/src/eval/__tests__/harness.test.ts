import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { formatEvalReport, runEvals, summarize } from '../harness.js';
import { defaultEvalCases } from '../cases.js';
import type { EvalCase, EvalResult } from '../types.js';
import { ExecutionError } from '../../errors.js';
import { FixtureGenerator } from '../../llm/fixture.js';
import type { GenerateInput, GenerationOutcome, QueryGenerator } from '../../llm/types.js';
import type { QueryEngine, QueryResult, Row } from '../../db/types.js';
import type { SynthesizedGrammar } from '../../grammar/synthesize.js';

const GRAMMAR: SynthesizedGrammar = { grammar: 'start: "x"', capabilities: 'none', tables: [], columns: [] };

function result(rows: Row[]): QueryResult {
  return { columns: Object.keys(rows[0] ?? {}), rows, rowCount: rows.length, execMs: 1 };
}

function fakeEngine(results: Record<string, QueryResult | Error>): QueryEngine {
  return {
    type: 'sqlite',
    async execute(sql: string): Promise<QueryResult> {
      const found = results[sql];
      if (found === undefined) throw new ExecutionError(sql, 400, `unknown statement ${sql}`);
      if (found instanceof Error) throw found;
      return found;
    },
  };
}

const COUNT_REF = 'SELECT COUNT(*) FROM order_items;';
const COUNT_GEN = 'SELECT COUNT(*) AS n FROM order_items;';

describe('runEvals', () => {
  it('passes a case whose generated result matches the reference', async () => {
    const run = await runEvals([{ name: 'count_all', question: 'Count all items', referenceSql: COUNT_REF }], {
      generator: new FixtureGenerator({ 'Count all items': { kind: 'sql', sql: COUNT_GEN } }),
      engine: fakeEngine({ [COUNT_REF]: result([{ 'COUNT(*)': 3 }]), [COUNT_GEN]: result([{ n: '3' }]) }),
      grammar: GRAMMAR,
    });

    assert.equal(run.error, null);
    assert.deepEqual(run.results, [
      {
        name: 'count_all',
        passed: true,
        question: 'Count all items',
        referenceSql: COUNT_REF,
        generatedSql: COUNT_GEN,
        shapeMatches: true,
      },
    ]);
  });

  it('passes a refusal case only through the refusal channel', async () => {
    const cases: EvalCase[] = [
      { name: 'weather', question: 'Weather?', expectUnsupported: true },
      { name: 'sneaky', question: 'Customers?', expectUnsupported: true },
      { name: 'broken', question: 'Unknown?', expectUnsupported: true },
    ];
    const run = await runEvals(cases, {
      generator: new FixtureGenerator({
        'Weather?': { kind: 'unsupported', reason: 'no weather data' },
        'Customers?': { kind: 'sql', sql: COUNT_GEN },
      }),
      engine: fakeEngine({}),
      grammar: GRAMMAR,
    });

    assert.equal(run.results[0]?.passed, true);
    assert.equal(run.results[0]?.generatedSql, '(refused: no weather data)');
    assert.equal(run.results[0]?.referenceSql, '(expected to be unsupported)');
    assert.equal(run.results[1]?.error, `expected a refusal but got SQL: ${COUNT_GEN}`);
    assert.equal(run.results[2]?.error, 'expected a refusal but got: No recorded outcome for question: Unknown?');
    assert.equal(run.error, `eval sneaky failed: expected a refusal but got SQL: ${COUNT_GEN}`);
  });

  it('records a named error for each failure mode without affecting siblings', async () => {
    const cases: EvalCase[] = [
      { name: 'ok', question: 'q-ok', referenceSql: COUNT_REF },
      { name: 'bad_ref', question: 'q-ok', referenceSql: 'SELECT nope FROM order_items;' },
      { name: 'no_gen', question: 'q-missing', referenceSql: COUNT_REF },
      { name: 'bad_gen', question: 'q-bad', referenceSql: COUNT_REF },
      { name: 'rows', question: 'q-rows', referenceSql: COUNT_REF },
      { name: 'data', question: 'q-data', referenceSql: COUNT_REF },
      { name: 'refused', question: 'q-refused', referenceSql: COUNT_REF },
      { name: 'no_ref', question: 'q-ok' },
    ];
    const run = await runEvals(cases, {
      generator: new FixtureGenerator({
        'q-ok': { kind: 'sql', sql: COUNT_GEN },
        'q-bad': { kind: 'sql', sql: 'SELECT broken;' },
        'q-rows': { kind: 'sql', sql: 'SELECT price FROM order_items;' },
        'q-data': { kind: 'sql', sql: 'SELECT SUM(price) FROM order_items;' },
        'q-refused': { kind: 'unsupported', reason: 'out of scope' },
      }),
      engine: fakeEngine({
        [COUNT_REF]: result([{ 'COUNT(*)': 3 }]),
        [COUNT_GEN]: result([{ n: 3 }]),
        'SELECT broken;': new ExecutionError('SELECT broken;', 400, 'syntax error'),
        'SELECT price FROM order_items;': result([{ price: 1 }, { price: 2 }, { price: 3 }]),
        'SELECT SUM(price) FROM order_items;': result([{ s: 6 }]),
      }),
      grammar: GRAMMAR,
    });

    assert.deepEqual(
      run.results.map((r) => [r.name, r.passed, r.error]),
      [
        ['ok', true, undefined],
        ['bad_ref', false, 'reference SQL failed: Query engine error (400): unknown statement SELECT nope FROM order_items;'],
        ['no_gen', false, 'generation failed: No recorded outcome for question: q-missing'],
        ['bad_gen', false, 'generated SQL failed: Query engine error (400): syntax error'],
        ['rows', false, 'row count: expected 1, got 3'],
        ['data', false, 'data mismatch'],
        ['refused', false, 'generation failed: model refused: out of scope'],
        ['no_ref', false, 'case has no reference SQL'],
      ],
    );
    assert.equal(run.results[6]?.generatedSql, '(refused: out of scope)');
    assert.equal(
      run.error,
      'eval bad_ref failed: reference SQL failed: Query engine error (400): unknown statement SELECT nope FROM order_items;',
    );
  });

  it('keeps results in input order when cases finish out of order', async () => {
    const slowFirst: QueryGenerator = {
      model: 'slow',
      async generate(input: GenerateInput): Promise<GenerationOutcome> {
        const delay = input.question === 'first' ? 30 : 0;
        await new Promise((resolve) => setTimeout(resolve, delay));
        return { kind: 'unsupported', reason: input.question };
      },
    };
    const run = await runEvals(
      [
        { name: 'a', question: 'first', expectUnsupported: true },
        { name: 'b', question: 'second', expectUnsupported: true },
      ],
      { generator: slowFirst, engine: fakeEngine({}), grammar: GRAMMAR },
    );
    assert.deepEqual(
      run.results.map((r) => r.generatedSql),
      ['(refused: first)', '(refused: second)'],
    );
  });

  it('threads the case reference time, or the run clock, into generation', async () => {
    const seen: Array<[string, string]> = [];
    const recorder: QueryGenerator = {
      model: 'recorder',
      async generate(input: GenerateInput): Promise<GenerationOutcome> {
        seen.push([input.question, input.referenceTime.toISOString()]);
        return { kind: 'unsupported', reason: 'n/a' };
      },
    };
    await runEvals(
      [
        { name: 'fixed', question: 'fixed', expectUnsupported: true, referenceTime: '2024-06-15T12:00:00Z' },
        { name: 'clock', question: 'clock', expectUnsupported: true },
      ],
      { generator: recorder, engine: fakeEngine({}), grammar: GRAMMAR, now: () => new Date('2025-01-02T03:04:05Z') },
    );
    assert.deepEqual(
      seen.sort((a, b) => a[0].localeCompare(b[0])),
      [
        ['clock', '2025-01-02T03:04:05.000Z'],
        ['fixed', '2024-06-15T12:00:00.000Z'],
      ],
    );
  });

  it('fails a case with an unparseable reference time', async () => {
    const run = await runEvals(
      [{ name: 'bad_time', question: 'q', expectUnsupported: true, referenceTime: 'yesterday' }],
      { generator: new FixtureGenerator({}), engine: fakeEngine({}), grammar: GRAMMAR },
    );
    assert.equal(run.results[0]?.error, 'invalid reference time: yesterday');
  });

  it('ignores row order unless the reference query orders its rows', async () => {
    const unorderedRef = 'SELECT seller_id, COUNT(*) AS n FROM order_items GROUP BY seller_id;';
    const orderedRef = 'SELECT seller_id, COUNT(*) AS n FROM order_items GROUP BY seller_id ORDER BY seller_id;';
    const generated = 'SELECT seller_id, COUNT(*) AS n FROM order_items GROUP BY seller_id ORDER BY n;';
    const rows = [{ seller_id: 's1', n: 2 }, { seller_id: 's2', n: 1 }];
    const engine = fakeEngine({
      [unorderedRef]: result(rows),
      [orderedRef]: result(rows),
      [generated]: result([...rows].reverse()),
    });
    const generator = new FixtureGenerator({ q: { kind: 'sql', sql: generated } });

    const run = await runEvals(
      [
        { name: 'unordered', question: 'q', referenceSql: unorderedRef },
        { name: 'ordered', question: 'q', referenceSql: orderedRef },
        { name: 'forced', question: 'q', referenceSql: orderedRef, rowOrder: 'unordered' },
      ],
      { generator, engine, grammar: GRAMMAR },
    );
    assert.deepEqual(
      run.results.map((r) => r.error),
      [undefined, 'data mismatch', undefined],
    );
  });
});

describe('summarize', () => {
  const make = (passed: boolean): EvalResult => ({
    name: 'x',
    passed,
    question: 'q',
    referenceSql: 'r',
    generatedSql: 'g',
  });

  it('counts passes and failures with a percentage pass rate', () => {
    assert.deepEqual(summarize([make(true), make(true), make(false), make(true)]), {
      total: 4,
      passed: 3,
      failed: 1,
      passRate: 75,
    });
  });

  it('reports a zero pass rate for no results', () => {
    assert.deepEqual(summarize([]), { total: 0, passed: 0, failed: 0, passRate: 0 });
  });
});

describe('formatEvalReport', () => {
  it('renders pass and fail lines followed by the summary', () => {
    const report = formatEvalReport([
      { name: 'a', passed: true, question: 'q', referenceSql: 'R1', generatedSql: 'G1' },
      { name: 'b', passed: false, question: 'q', referenceSql: 'R2', generatedSql: '', error: 'data mismatch' },
    ]);
    assert.equal(
      report,
      [
        '[PASS] a  G1',
        '[FAIL] b',
        '  - data mismatch',
        '  - expected: R2',
        '',
        'Summary',
        '  passed:    1/2 (50.0%)',
        '  failed:    1',
      ].join('\n'),
    );
  });
});

describe('defaultEvalCases', () => {
  it('ships seven cases with two refusals and one fixed reference time', () => {
    const cases = defaultEvalCases();
    assert.equal(cases.length, 7);
    assert.deepEqual(
      cases.filter((c) => c.expectUnsupported).map((c) => c.name),
      ['unsupported_weather', 'unsupported_nonexistent_table'],
    );
    assert.deepEqual(
      cases.filter((c) => c.referenceTime).map((c) => [c.name, c.referenceTime]),
      [['revenue_last_7_days', '2024-06-15T12:00:00Z']],
    );
  });
});
