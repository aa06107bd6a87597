/**
 * Offline eval fixtures: a seeded SQLite database and recorded generation
 * outcomes, so the harness runs without network access or an API key.
 */

import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  FixtureGenerator,
  SqliteEngine,
  compileValidator,
  formatValidationErrors,
  seedDatabase,
  type GenerationOutcome,
} from '@cfgsql/core';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
export const FIXTURE_DIR = resolve(__dirname, '../fixtures');

const outcomesSchema = {
  type: 'object' as const,
  additionalProperties: {
    oneOf: [
      {
        type: 'object' as const,
        properties: { kind: { const: 'sql' }, sql: { type: 'string' as const, minLength: 1 } },
        required: ['kind', 'sql'] as const,
        additionalProperties: false,
      },
      {
        type: 'object' as const,
        properties: { kind: { const: 'unsupported' }, reason: { type: 'string' as const, minLength: 1 } },
        required: ['kind', 'reason'] as const,
        additionalProperties: false,
      },
    ],
  },
};

const validateOutcomes = compileValidator<Record<string, GenerationOutcome>>(outcomesSchema);

export function loadOfflineOutcomes(file = join(FIXTURE_DIR, 'offline-outcomes.json')): Record<string, GenerationOutcome> {
  const parsed: unknown = JSON.parse(readFileSync(file, 'utf-8'));
  if (!validateOutcomes(parsed)) {
    throw new Error(`Invalid offline outcomes in ${file}: ${formatValidationErrors(validateOutcomes.errors)}`);
  }
  return parsed;
}

export interface OfflineFixture {
  engine: SqliteEngine;
  generator: FixtureGenerator;
  databasePath: string;
  cleanup(): void;
}

export function createOfflineFixture(seedFile = join(FIXTURE_DIR, 'seed.sql')): OfflineFixture {
  const generator = new FixtureGenerator(loadOfflineOutcomes());
  const dir = mkdtempSync(join(tmpdir(), 'cfgsql-eval-'));
  const databasePath = join(dir, 'eval.sqlite');
  try {
    seedDatabase(databasePath, readFileSync(seedFile, 'utf-8'));
  } catch (err: unknown) {
    rmSync(dir, { recursive: true, force: true });
    throw err;
  }

  return {
    engine: new SqliteEngine({ database: databasePath }),
    generator,
    databasePath,
    cleanup: () => rmSync(dir, { recursive: true, force: true }),
  };
}
