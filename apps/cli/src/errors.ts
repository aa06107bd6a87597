import { CfgSqlError, ConfigError, EvalSuiteError, InvalidConfigError } from '@cfgsql/core';

export const EXIT_CODE_SUCCESS = 0;
export const EXIT_CODE_USAGE = 1;
export const EXIT_CODE_RUNTIME = 2;
export const EXIT_CODE_REFUSAL = 3;
/** Evals ran but at least one case failed */
export const EXIT_CODE_EVAL_FAILED = 1;

export type CliErrorCode =
  | 'INVALID_ARGS'
  | 'CONFIG_MISSING'
  | 'CONFIG_INVALID'
  | 'SCHEMA_FETCH_FAILED'
  | 'EMPTY_SCHEMA'
  | 'GRAMMAR_COLLISION'
  | 'GENERATION_FAILED'
  | 'EXECUTION_FAILED'
  | 'UNSUPPORTED_QUESTION'
  | 'INTERNAL_ERROR';

export type CliErrorKind = 'usage' | 'runtime' | 'refusal';

export class CliError extends Error {
  readonly kind: CliErrorKind;
  readonly code: CliErrorCode;
  readonly details?: unknown;
  /** Shown below the message; set for refusals */
  readonly hint?: string;

  constructor(kind: CliErrorKind, code: CliErrorCode, message: string, details?: unknown, hint?: string) {
    super(message);
    this.kind = kind;
    this.code = code;
    this.details = details;
    this.hint = hint;
  }
}

export function usageError(message: string, code: CliErrorCode = 'INVALID_ARGS', details?: unknown): CliError {
  return new CliError('usage', code, message, details);
}

export function runtimeError(message: string, code: CliErrorCode = 'INTERNAL_ERROR', details?: unknown): CliError {
  return new CliError('runtime', code, message, details);
}

export function refusalError(reason: string, hint: string): CliError {
  return new CliError('refusal', 'UNSUPPORTED_QUESTION', `Cannot answer: ${reason}`, undefined, hint);
}

/** Lift core failures into CLI errors so exit codes and JSON codes stay stable. */
export function toCliError(error: unknown): CliError | null {
  if (error instanceof CliError) return error;
  if (error instanceof ConfigError) {
    return usageError(error.message, 'CONFIG_MISSING', { missing: error.missing });
  }
  if (error instanceof InvalidConfigError) {
    return usageError(error.message, 'CONFIG_INVALID', { variable: error.variable, value: error.value });
  }
  if (error instanceof EvalSuiteError) {
    return usageError(error.message);
  }
  if (error instanceof CfgSqlError) {
    return runtimeError(error.message, error.code, { name: error.name });
  }
  return null;
}

export function toExitCode(error: unknown): number {
  const cliError = toCliError(error);
  if (!cliError) return EXIT_CODE_RUNTIME;
  if (cliError.kind === 'usage') return EXIT_CODE_USAGE;
  if (cliError.kind === 'refusal') return EXIT_CODE_REFUSAL;
  return EXIT_CODE_RUNTIME;
}
