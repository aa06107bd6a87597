/**
 * AJV JSON Schema for the catalog's datasource listing.
 * Extra fields from the catalog are ignored.
 */

export interface DatasourceListing {
  datasources: Array<{
    name: string;
    columns: Array<{ name: string; type: string }>;
  }>;
}

export const datasourceListingSchema = {
  type: 'object' as const,
  properties: {
    datasources: {
      type: 'array' as const,
      items: {
        type: 'object' as const,
        properties: {
          name: { type: 'string' as const, minLength: 1 },
          columns: {
            type: 'array' as const,
            items: {
              type: 'object' as const,
              properties: {
                name: { type: 'string' as const, minLength: 1 },
                type: { type: 'string' as const },
              },
              required: ['name', 'type'] as const,
            },
          },
        },
        required: ['name', 'columns'] as const,
      },
    },
  },
  required: ['datasources'] as const,
};
