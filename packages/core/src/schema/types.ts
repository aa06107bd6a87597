/**
 * Schema model discovered from the catalog.
 * Column order is the catalog's order and is kept as-is.
 */

export interface Column {
  readonly name: string;
  /** Declared engine type, e.g. Float64 or DateTime */
  readonly type: string;
}

export interface Table {
  readonly name: string;
  readonly columns: readonly Column[];
}

export interface Schema {
  readonly tables: readonly Table[];
}

export interface SchemaSource {
  fetchSchema(): Promise<Schema>;
}
