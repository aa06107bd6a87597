/**
 * Offline generator that replays recorded outcomes keyed by question.
 */

import { GenerationServiceError } from '../errors.js';
import type { GenerateInput, GenerationOutcome, QueryGenerator } from './types.js';

export class FixtureGenerator implements QueryGenerator {
  readonly model = 'fixture';
  private readonly outcomes: ReadonlyMap<string, GenerationOutcome>;

  constructor(outcomes: Record<string, GenerationOutcome>) {
    this.outcomes = new Map(Object.entries(outcomes));
  }

  async generate(input: GenerateInput): Promise<GenerationOutcome> {
    const outcome = this.outcomes.get(input.question);
    if (!outcome) {
      throw new GenerationServiceError(`No recorded outcome for question: ${input.question}`);
    }
    return outcome;
  }
}
