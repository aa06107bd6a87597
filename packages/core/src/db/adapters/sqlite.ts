/**
 * SQLite adapter used for offline evals and local demos.
 * Uses better-sqlite3 for local file execution; doubles as a schema source
 * so the grammar can be synthesized from the same file.
 */

import Database from 'better-sqlite3';
import { ExecutionError, SchemaFetchError, errorMessage } from '../../errors.js';
import type { Column, Schema, SchemaSource, Table } from '../../schema/types.js';
import { prepareStatement } from '../statement.js';
import type { QueryEngine, QueryResult, Row, Scalar } from '../types.js';

export interface SqliteConnectionConfig {
  database: string;
}

function openDatabase(cfg: SqliteConnectionConfig, readonly = true): Database.Database {
  if (!cfg.database?.trim()) {
    throw new Error('SQLite database path is required.');
  }
  return new Database(cfg.database, { readonly, fileMustExist: readonly });
}

function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toScalar(value: unknown): Scalar {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number' || typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'bigint') return Number(value);
  if (Buffer.isBuffer(value)) return value.toString('base64');
  return String(value);
}

function toRow(raw: unknown): Row {
  const row: Row = {};
  if (!isRecord(raw)) return row;
  for (const [key, value] of Object.entries(raw)) {
    row[key] = toScalar(value);
  }
  return row;
}

function stringField(raw: unknown, key: string): string {
  if (!isRecord(raw)) return '';
  const value = raw[key];
  return typeof value === 'string' ? value : '';
}

/**
 * Creates (or extends) a SQLite file and runs the given script against it.
 * Used to materialize eval fixtures.
 */
export function seedDatabase(path: string, script: string): void {
  const db = openDatabase({ database: path }, false);
  try {
    db.exec(script);
  } finally {
    db.close();
  }
}

export class SqliteEngine implements QueryEngine, SchemaSource {
  readonly type = 'sqlite' as const;

  constructor(private readonly cfg: SqliteConnectionConfig) {}

  async execute(sql: string): Promise<QueryResult> {
    const statement = prepareStatement(sql);
    let db: Database.Database;
    try {
      db = openDatabase(this.cfg, true);
    } catch (err: unknown) {
      throw new ExecutionError(sql, 0, errorMessage(err), { cause: err });
    }

    try {
      const start = performance.now();
      const stmt = db.prepare(statement);
      if (!stmt.reader) {
        throw new ExecutionError(sql, 0, 'statement does not return rows');
      }
      const rows = stmt.all().map(toRow);
      const execMs = Math.round(performance.now() - start);
      return {
        columns: stmt.columns().map((column) => column.name),
        rows,
        rowCount: rows.length,
        execMs,
      };
    } catch (err: unknown) {
      if (err instanceof ExecutionError) throw err;
      throw new ExecutionError(sql, 0, errorMessage(err), { cause: err });
    } finally {
      db.close();
    }
  }

  async fetchSchema(): Promise<Schema> {
    let db: Database.Database;
    try {
      db = openDatabase(this.cfg, true);
    } catch (err: unknown) {
      throw new SchemaFetchError(`Failed to open SQLite database: ${errorMessage(err)}`, { cause: err });
    }

    try {
      const tableNames = db
        .prepare(`
          SELECT name
          FROM sqlite_master
          WHERE type = 'table'
            AND name NOT LIKE 'sqlite_%'
          ORDER BY name
        `)
        .all()
        .map((row) => stringField(row, 'name'))
        .filter((name) => name.length > 0);

      const tables: Table[] = tableNames.map((tableName) => {
        const columns: Column[] = db
          .prepare(`PRAGMA table_info(${quoteIdent(tableName)})`)
          .all()
          .map((row) => ({
            name: stringField(row, 'name'),
            type: stringField(row, 'type') || 'TEXT',
          }));
        return { name: tableName, columns };
      });

      return { tables };
    } catch (err: unknown) {
      throw new SchemaFetchError(`Failed to read SQLite schema: ${errorMessage(err)}`, { cause: err });
    } finally {
      db.close();
    }
  }
}
