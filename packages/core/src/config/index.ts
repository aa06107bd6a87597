/**
 * Environment-driven configuration.
 * Every missing variable is collected so one error names them all.
 */

import { ConfigError, InvalidConfigError } from '../errors.js';

export type EngineType = 'tinybird' | 'sqlite';

export const DEFAULT_MODEL = 'gpt-5';
export const DEFAULT_PORT = 8080;

export interface AppConfig {
  /** Empty when generation is not required (offline eval, schema commands) */
  openaiApiKey: string;
  model: string;
  engine: EngineType;
  tinybirdHost: string;
  tinybirdToken: string;
  sqlitePath: string;
  port: number;
}

export interface LoadConfigOpts {
  /** Require OPENAI_API_KEY. Default: true */
  requireGenerator?: boolean;
}

function read(env: NodeJS.ProcessEnv, key: string): string {
  return env[key]?.trim() ?? '';
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, opts: LoadConfigOpts = {}): AppConfig {
  const requireGenerator = opts.requireGenerator ?? true;
  const missing: string[] = [];

  const openaiApiKey = read(env, 'OPENAI_API_KEY');
  if (requireGenerator && !openaiApiKey) missing.push('OPENAI_API_KEY');

  const engineRaw = read(env, 'CFGSQL_ENGINE') || 'tinybird';
  if (engineRaw !== 'tinybird' && engineRaw !== 'sqlite') {
    throw new InvalidConfigError('CFGSQL_ENGINE', engineRaw, 'tinybird or sqlite');
  }
  const engine: EngineType = engineRaw;

  const tinybirdHost = read(env, 'TINYBIRD_HOST').replace(/\/+$/, '');
  const tinybirdToken = read(env, 'TINYBIRD_TOKEN');
  const sqlitePath = read(env, 'CFGSQL_SQLITE_PATH');

  if (engine === 'tinybird') {
    if (!tinybirdHost) missing.push('TINYBIRD_HOST');
    if (!tinybirdToken) missing.push('TINYBIRD_TOKEN');
  } else if (!sqlitePath) {
    missing.push('CFGSQL_SQLITE_PATH');
  }

  if (missing.length > 0) {
    throw new ConfigError(missing);
  }

  const portRaw = read(env, 'PORT');
  const port = portRaw ? Number(portRaw) : DEFAULT_PORT;
  if (!Number.isInteger(port) || port <= 0 || port > 65_535) {
    throw new InvalidConfigError('PORT', portRaw, 'an integer between 1 and 65535');
  }

  return {
    openaiApiKey,
    model: read(env, 'CFGSQL_MODEL') || DEFAULT_MODEL,
    engine,
    tinybirdHost,
    tinybirdToken,
    sqlitePath,
    port,
  };
}
