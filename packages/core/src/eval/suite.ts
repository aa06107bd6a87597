/**
 * JSON eval suite loader.
 */

import { readFile } from 'node:fs/promises';
import { compileValidator, formatValidationErrors } from '../ajv.js';
import { errorMessage } from '../errors.js';
import type { EvalCase } from './types.js';

const evalSuiteSchema = {
  type: 'array' as const,
  items: {
    type: 'object' as const,
    properties: {
      name: { type: 'string' as const, minLength: 1 },
      question: { type: 'string' as const, minLength: 1 },
      referenceSql: { type: 'string' as const, minLength: 1 },
      referenceTime: { type: 'string' as const, minLength: 1 },
      expectUnsupported: { type: 'boolean' as const },
      rowOrder: { type: 'string' as const, enum: ['positional', 'unordered'] },
    },
    required: ['name', 'question'] as const,
    additionalProperties: false,
  },
};

const validateSuite = compileValidator<EvalCase[]>(evalSuiteSchema);

export class EvalSuiteError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EvalSuiteError';
  }
}

export function parseEvalSuite(text: string, source = 'suite'): EvalCase[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err: unknown) {
    throw new EvalSuiteError(`${source} is not valid JSON: ${errorMessage(err)}`, { cause: err });
  }
  if (!validateSuite(parsed)) {
    throw new EvalSuiteError(`${source} failed validation: ${formatValidationErrors(validateSuite.errors)}`);
  }

  const seen = new Set<string>();
  for (const tc of parsed) {
    if (seen.has(tc.name)) {
      throw new EvalSuiteError(`${source} has duplicate case name: ${tc.name}`);
    }
    seen.add(tc.name);
    if (!tc.expectUnsupported && !tc.referenceSql) {
      throw new EvalSuiteError(`${source} case ${tc.name} needs referenceSql or expectUnsupported`);
    }
    if (tc.referenceTime !== undefined && Number.isNaN(Date.parse(tc.referenceTime))) {
      throw new EvalSuiteError(`${source} case ${tc.name} has an invalid referenceTime: ${tc.referenceTime}`);
    }
  }
  return parsed;
}

export async function loadEvalSuite(path: string): Promise<EvalCase[]> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (err: unknown) {
    throw new EvalSuiteError(`Cannot read eval suite ${path}: ${errorMessage(err)}`, { cause: err });
  }
  return parseEvalSuite(text, path);
}
