import type { Schema } from './types.js';

/**
 * One-line summary of the queryable data, shown next to a refusal.
 */
export function describeAvailableData(schema: Schema): string {
  if (schema.tables.length === 0) {
    return 'No data available.';
  }

  const parts = schema.tables
    .map((table) => {
      const columns = [...new Set(table.columns.map((col) => col.name))].sort();
      return `${table.name} (${columns.join(', ')})`;
    })
    .sort();

  return `Available data: ${parts.join('; ')}`;
}
