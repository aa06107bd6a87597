/**
 * Catalog client: lists datasources and their columns from the
 * Tinybird-compatible HTTP API.
 */

import { compileValidator, formatValidationErrors } from '../ajv.js';
import { SchemaFetchError, errorMessage } from '../errors.js';
import type { FetchLike, HttpServiceConfig } from '../http.js';
import { datasourceListingSchema, type DatasourceListing } from './catalog_json.js';
import type { Schema, SchemaSource } from './types.js';

const validateListing = compileValidator<DatasourceListing>(datasourceListingSchema);

export class TinybirdCatalog implements SchemaSource {
  private readonly host: string;
  private readonly token: string;
  private readonly fetchImpl: FetchLike;

  constructor(cfg: HttpServiceConfig) {
    this.host = cfg.host.replace(/\/+$/, '');
    this.token = cfg.token;
    this.fetchImpl = cfg.fetch ?? fetch;
  }

  async fetchSchema(): Promise<Schema> {
    let status: number;
    let ok: boolean;
    let body: string;
    try {
      const res = await this.fetchImpl(`${this.host}/v0/datasources`, {
        method: 'GET',
        headers: { Authorization: `Bearer ${this.token}` },
      });
      status = res.status;
      ok = res.ok;
      body = await res.text();
    } catch (err: unknown) {
      throw new SchemaFetchError(`Failed to fetch datasources: ${errorMessage(err)}`, { cause: err });
    }

    if (!ok) {
      throw new SchemaFetchError(`Catalog error (${status}): ${body}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch (err: unknown) {
      throw new SchemaFetchError(`Catalog returned invalid JSON: ${body.slice(0, 100)}`, { cause: err });
    }

    if (!validateListing(parsed)) {
      throw new SchemaFetchError(
        `Catalog response failed validation: ${formatValidationErrors(validateListing.errors)}`,
      );
    }

    return {
      tables: parsed.datasources.map((ds) => ({
        name: ds.name,
        columns: ds.columns.map((col) => ({ name: col.name, type: col.type })),
      })),
    };
  }
}
