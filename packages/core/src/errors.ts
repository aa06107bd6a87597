/**
 * Error taxonomy for the query pipeline.
 *
 * A refusal from the generation service is not an error: it is the
 * `unsupported` variant of GenerationOutcome (see llm/types.ts).
 */

export type CfgSqlErrorCode =
  | 'CONFIG_MISSING'
  | 'CONFIG_INVALID'
  | 'SCHEMA_FETCH_FAILED'
  | 'EMPTY_SCHEMA'
  | 'GRAMMAR_COLLISION'
  | 'GENERATION_FAILED'
  | 'EXECUTION_FAILED';

export class CfgSqlError extends Error {
  readonly code: CfgSqlErrorCode;

  constructor(code: CfgSqlErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigError extends CfgSqlError {
  readonly missing: string[];

  constructor(missing: string[]) {
    super('CONFIG_MISSING', `Missing required environment variables: ${missing.join(', ')}`);
    this.missing = missing;
  }
}

/** A variable is set but its value cannot be used. */
export class InvalidConfigError extends CfgSqlError {
  readonly variable: string;
  readonly value: string;

  constructor(variable: string, value: string, expected: string) {
    super('CONFIG_INVALID', `Invalid value for ${variable}: "${value}" (expected ${expected})`);
    this.variable = variable;
    this.value = value;
  }
}

/** Catalog unreachable or its response malformed. */
export class SchemaFetchError extends CfgSqlError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SCHEMA_FETCH_FAILED', message, options);
  }
}

export class GrammarError extends CfgSqlError {}

/** Two distinct raw names sanitize to the same grammar terminal. */
export class GrammarCollisionError extends GrammarError {
  readonly terminal: string;
  readonly names: [string, string];

  constructor(terminal: string, first: string, second: string) {
    super(
      'GRAMMAR_COLLISION',
      `Grammar terminal ${terminal} is shared by "${first}" and "${second}"`,
    );
    this.terminal = terminal;
    this.names = [first, second];
  }
}

/** Transport, status or response-shape failure of the generation call itself. */
export class GenerationServiceError extends CfgSqlError {
  readonly status?: number;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super('GENERATION_FAILED', message, { cause: options?.cause });
    this.status = options?.status;
  }
}

/** The query engine rejected or failed to run a statement. Status 0 means no response. */
export class ExecutionError extends CfgSqlError {
  readonly status: number;
  readonly body: string;
  readonly sql: string;

  constructor(sql: string, status: number, body: string, options?: { cause?: unknown }) {
    super(
      'EXECUTION_FAILED',
      status > 0 ? `Query engine error (${status}): ${body}` : `Query engine error: ${body}`,
      options,
    );
    this.status = status;
    this.body = body;
    this.sql = sql;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
