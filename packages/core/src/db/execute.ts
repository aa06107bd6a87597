/**
 * Engine and catalog dispatcher.
 * Selects the adapter from the configured engine type.
 */

import type { AppConfig } from '../config/index.js';
import type { FetchLike } from '../http.js';
import { TinybirdCatalog } from '../schema/catalog.js';
import type { SchemaSource } from '../schema/types.js';
import { SqliteEngine } from './adapters/sqlite.js';
import { TinybirdEngine } from './adapters/tinybird.js';
import type { QueryEngine } from './types.js';

type EngineConfig = Pick<AppConfig, 'engine' | 'tinybirdHost' | 'tinybirdToken' | 'sqlitePath'>;

export function createEngine(config: EngineConfig, fetchImpl?: FetchLike): QueryEngine {
  switch (config.engine) {
    case 'tinybird':
      return new TinybirdEngine({ host: config.tinybirdHost, token: config.tinybirdToken, fetch: fetchImpl });
    case 'sqlite':
      return new SqliteEngine({ database: config.sqlitePath });
  }
}

export function createCatalog(config: EngineConfig, fetchImpl?: FetchLike): SchemaSource {
  switch (config.engine) {
    case 'tinybird':
      return new TinybirdCatalog({ host: config.tinybirdHost, token: config.tinybirdToken, fetch: fetchImpl });
    case 'sqlite':
      return new SqliteEngine({ database: config.sqlitePath });
  }
}
