import {
  OpenAIProvider,
  createCatalog,
  createEngine,
  type AppConfig,
  type GenerateInput,
  type GenerationOutcome,
  type QueryGenerator,
} from '@cfgsql/core';
import type { ServerDeps } from './server.js';

/**
 * Builds the OpenAI provider on first use, so commands that only read the
 * schema run without an API key.
 */
class DeferredGenerator implements QueryGenerator {
  readonly model: string;
  private provider: OpenAIProvider | null = null;

  constructor(private readonly config: AppConfig) {
    this.model = config.model;
  }

  async generate(input: GenerateInput): Promise<GenerationOutcome> {
    this.provider ??= new OpenAIProvider({ apiKey: this.config.openaiApiKey, model: this.config.model });
    return this.provider.generate(input);
  }
}

/** Fresh catalog, engine and generator for one question or eval run. */
export function createDeps(config: AppConfig): ServerDeps {
  return {
    catalog: createCatalog(config),
    engine: createEngine(config),
    generator: new DeferredGenerator(config),
  };
}
