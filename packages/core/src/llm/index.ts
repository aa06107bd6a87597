/**
 * LLM module barrel export.
 */

export type { GenerationOutcome, GenerateInput, QueryGenerator } from './types.js';
export {
  OpenAIProvider,
  SQL_TOOL_NAME,
  REFUSAL_TOOL_NAME,
  DEFAULT_REFUSAL_REASON,
} from './openai.js';
export type { OpenAIProviderOpts, ResponsesClient, ResponsesRequest } from './openai.js';
export { FixtureGenerator } from './fixture.js';
export { buildInstruction, formatReferenceTime } from './prompt.js';
