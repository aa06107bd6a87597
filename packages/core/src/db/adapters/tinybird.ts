/**
 * Tinybird adapter: runs SQL through the /v0/sql endpoint and reads the
 * engine's self-describing JSON output.
 */

import { compileValidator, formatValidationErrors } from '../../ajv.js';
import { ExecutionError, errorMessage } from '../../errors.js';
import type { FetchLike, HttpServiceConfig } from '../../http.js';
import { ENGINE_DEFAULTS } from '../defaults.js';
import { withJsonFormat } from '../statement.js';
import type { QueryEngine, QueryResult, Row } from '../types.js';

interface JsonFormatBody {
  meta: Array<{ name: string; type: string }>;
  data: Row[];
  rows: number;
}

const scalarSchema = {
  anyOf: [
    { type: 'string' as const },
    { type: 'number' as const },
    { type: 'boolean' as const },
    { type: 'null' as const },
  ],
};

const jsonFormatBodySchema = {
  type: 'object' as const,
  properties: {
    meta: {
      type: 'array' as const,
      items: {
        type: 'object' as const,
        properties: { name: { type: 'string' as const }, type: { type: 'string' as const } },
        required: ['name', 'type'] as const,
      },
    },
    data: {
      type: 'array' as const,
      items: { type: 'object' as const, additionalProperties: scalarSchema },
    },
    rows: { type: 'integer' as const, minimum: 0 },
  },
  required: ['meta', 'data', 'rows'] as const,
};

const validateBody = compileValidator<JsonFormatBody>(jsonFormatBodySchema);

function excerpt(body: string): string {
  return body.length > ENGINE_DEFAULTS.maxErrorBodyChars
    ? body.slice(0, ENGINE_DEFAULTS.maxErrorBodyChars) + '...'
    : body;
}

export class TinybirdEngine implements QueryEngine {
  readonly type = 'tinybird' as const;
  private readonly host: string;
  private readonly token: string;
  private readonly fetchImpl: FetchLike;

  constructor(cfg: HttpServiceConfig) {
    this.host = cfg.host.replace(/\/+$/, '');
    this.token = cfg.token;
    this.fetchImpl = cfg.fetch ?? fetch;
  }

  buildUrl(sql: string): string {
    return `${this.host}/v0/sql?q=${encodeURIComponent(withJsonFormat(sql))}`;
  }

  async execute(sql: string): Promise<QueryResult> {
    const start = performance.now();
    let status: number;
    let ok: boolean;
    let body: string;
    try {
      const res = await this.fetchImpl(this.buildUrl(sql), {
        method: 'GET',
        headers: { Authorization: `Bearer ${this.token}` },
      });
      status = res.status;
      ok = res.ok;
      body = await res.text();
    } catch (err: unknown) {
      throw new ExecutionError(sql, 0, errorMessage(err), { cause: err });
    }
    const execMs = Math.round(performance.now() - start);

    if (!ok) {
      throw new ExecutionError(sql, status, excerpt(body));
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch (err: unknown) {
      throw new ExecutionError(sql, status, `invalid JSON in response: ${excerpt(body)}`, { cause: err });
    }

    if (!validateBody(parsed)) {
      throw new ExecutionError(
        sql,
        status,
        `unexpected response shape: ${formatValidationErrors(validateBody.errors)}`,
      );
    }

    return {
      columns: parsed.meta.map((m) => m.name),
      rows: parsed.data,
      rowCount: parsed.rows,
      execMs,
    };
  }
}
