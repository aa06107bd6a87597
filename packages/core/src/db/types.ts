/**
 * Query engine abstraction. Tinybird (HTTP, ClickHouse SQL) is the
 * production engine; SQLite backs offline evals and local demos.
 */

export type Scalar = number | string | boolean | null;

export type Row = Record<string, Scalar>;

export interface QueryResult {
  /** Column names in result order */
  columns: string[];
  rows: Row[];
  /** Row count as reported by the engine */
  rowCount: number;
  execMs: number;
}

export interface QueryEngine {
  readonly type: 'tinybird' | 'sqlite';
  execute(sql: string): Promise<QueryResult>;
}
