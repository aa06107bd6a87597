/**
 * @cfgsql/core — barrel export
 *
 * Core logic shared by the CLI, the HTTP server and the eval runner.
 */

// Errors
export {
  CfgSqlError,
  ConfigError,
  InvalidConfigError,
  SchemaFetchError,
  GrammarError,
  GrammarCollisionError,
  GenerationServiceError,
  ExecutionError,
  errorMessage,
} from './errors.js';
export type { CfgSqlErrorCode } from './errors.js';

// Configuration
export { loadConfig, DEFAULT_MODEL, DEFAULT_PORT } from './config/index.js';
export type { AppConfig, EngineType, LoadConfigOpts } from './config/index.js';
export { loadEnvFile, DEFAULT_ENV_FILE_PATHS } from './config/env-file.js';

export type { FetchLike, HttpServiceConfig } from './http.js';

// JSON validation
export { compileValidator, formatValidationErrors } from './ajv.js';

// Schema model
export type { Column, Table, Schema, SchemaSource } from './schema/types.js';
export { TinybirdCatalog } from './schema/catalog.js';
export { describeAvailableData } from './schema/hint.js';

// Grammar synthesis
export { synthesize, buildCapabilities } from './grammar/synthesize.js';
export type { SynthesizedGrammar, GrammarTerminal } from './grammar/synthesize.js';
export { terminalFor } from './grammar/sanitize.js';

// Constrained generation
export * from './llm/index.js';

// Execution layer
export type { Scalar, Row, QueryResult, QueryEngine } from './db/types.js';
export { prepareStatement, withJsonFormat } from './db/statement.js';
export { TinybirdEngine } from './db/adapters/tinybird.js';
export { SqliteEngine, seedDatabase } from './db/adapters/sqlite.js';
export type { SqliteConnectionConfig } from './db/adapters/sqlite.js';
export { createEngine, createCatalog } from './db/execute.js';

// SQL inspection
export { inspectSql, unknownTables, sameShape } from './sql/inspect.js';
export type { SqlShape, InspectOutcome } from './sql/inspect.js';

// Verification harness
export type { EvalCase, EvalResult, EvalSummary, EvalRun, RowOrder } from './eval/types.js';
export { runEvals, summarize, formatEvalReport, UNSUPPORTED_REFERENCE } from './eval/harness.js';
export type { HarnessDeps } from './eval/harness.js';
export { valuesEqual, rowsEqual, dataEqual } from './eval/compare.js';
export { defaultEvalCases } from './eval/cases.js';
export { loadEvalSuite, parseEvalSuite, EvalSuiteError } from './eval/suite.js';

// Ask orchestration
export { askQuestion } from './ask.js';
export type { AskDeps, AskOpts, AskResult } from './ask.js';
