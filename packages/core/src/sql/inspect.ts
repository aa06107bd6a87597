/**
 * Structural inspection of generated SQL.
 * Uses node-sql-parser with the PostgreSQL dialect; the grammar only
 * produces a plain ANSI subset, so dialect differences do not matter here.
 *
 * Inspection never blocks execution: the grammar already constrains what
 * can be generated, and the engine is the final judge.
 */

import pkg from 'node-sql-parser';
import { prepareStatement } from '../db/statement.js';
import { errorMessage } from '../errors.js';
const { Parser } = pkg;

const parser = new Parser();
const PG_OPT = { database: 'PostgresQL' } as const;

export interface SqlShape {
  /** Referenced table names, deduplicated and sorted */
  tables: string[];
  /** Aggregate function names (uppercase), deduplicated and sorted */
  aggregates: string[];
  hasWhere: boolean;
  hasGroupBy: boolean;
  hasOrderBy: boolean;
  hasLimit: boolean;
}

export type InspectOutcome = { ok: true; shape: SqlShape } | { ok: false; error: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Clause nodes come back as null, an empty list or a wrapper with an empty list when absent. */
function present(node: unknown): boolean {
  if (node === null || node === undefined) return false;
  if (Array.isArray(node)) return node.length > 0;
  if (isRecord(node)) {
    if (Array.isArray(node.value)) return node.value.length > 0;
    if ('columns' in node) return present(node.columns);
  }
  return true;
}

function collectAggregates(node: unknown, into: Set<string>): void {
  if (Array.isArray(node)) {
    for (const child of node) collectAggregates(child, into);
    return;
  }
  if (!isRecord(node)) return;
  if (node.type === 'aggr_func' && typeof node.name === 'string') {
    into.add(node.name.toUpperCase());
  }
  for (const child of Object.values(node)) collectAggregates(child, into);
}

function tableNames(sql: string): string[] {
  // Entries look like "select::<schema>::<table>"
  const names = parser.tableList(sql, PG_OPT).map((entry) => entry.split('::').pop() ?? entry);
  return [...new Set(names)].sort();
}

export function inspectSql(sql: string): InspectOutcome {
  const statement = prepareStatement(sql);
  if (!statement) {
    return { ok: false, error: 'Empty SQL statement' };
  }

  try {
    const astResult = parser.astify(statement, PG_OPT);
    const statements: unknown[] = Array.isArray(astResult) ? astResult : [astResult];
    if (statements.length !== 1) {
      return { ok: false, error: `Expected one statement, found ${statements.length}` };
    }
    const first = statements[0];
    if (!isRecord(first) || first.type !== 'select') {
      return { ok: false, error: 'Only SELECT statements can be inspected' };
    }

    const aggregates = new Set<string>();
    collectAggregates(first.columns, aggregates);
    collectAggregates(first.having, aggregates);
    collectAggregates(first.orderby, aggregates);

    return {
      ok: true,
      shape: {
        tables: tableNames(statement),
        aggregates: [...aggregates].sort(),
        hasWhere: present(first.where),
        hasGroupBy: present(first.groupby),
        hasOrderBy: present(first.orderby),
        hasLimit: present(first.limit),
      },
    };
  } catch (err: unknown) {
    return { ok: false, error: `SQL parse error: ${errorMessage(err)}` };
  }
}

/** Tables the statement reads that the schema does not define. */
export function unknownTables(shape: SqlShape, known: Iterable<string>): string[] {
  const knownSet = new Set(known);
  return shape.tables.filter((name) => !knownSet.has(name));
}

/** Same tables and same aggregate functions. */
export function sameShape(a: SqlShape, b: SqlShape): boolean {
  return (
    a.tables.length === b.tables.length &&
    a.tables.every((t, i) => t === b.tables[i]) &&
    a.aggregates.length === b.aggregates.length &&
    a.aggregates.every((f, i) => f === b.aggregates[i])
  );
}
