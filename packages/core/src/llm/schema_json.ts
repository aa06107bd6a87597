/**
 * JSON Schemas for the generation call: the refusal tool's parameters
 * (sent to the service) and the parts of its response we read.
 */

export const refusalParametersSchema = {
  type: 'object' as const,
  properties: {
    reason: {
      type: 'string' as const,
      description: 'Brief explanation of why this query cannot be answered',
    },
  },
  required: ['reason'] as const,
  additionalProperties: false,
};

export interface RefusalArguments {
  reason: string;
}

/** Local check is stricter than what the service is told: the reason must be non-empty. */
export const refusalArgumentsSchema = {
  type: 'object' as const,
  properties: {
    reason: { type: 'string' as const, minLength: 1 },
  },
  required: ['reason'] as const,
};

export interface ResponseOutputItem {
  type: string;
  [key: string]: unknown;
}

export interface ResponsesOutput {
  output: ResponseOutputItem[];
}

export const responsesOutputSchema = {
  type: 'object' as const,
  properties: {
    output: {
      type: 'array' as const,
      items: {
        type: 'object' as const,
        properties: {
          type: { type: 'string' as const },
        },
        required: ['type'] as const,
      },
    },
  },
  required: ['output'] as const,
};
