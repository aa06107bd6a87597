/**
 * OpenAI provider for grammar-constrained SQL generation.
 *
 * Offers the Responses API two tools: `sql_generator`, a custom tool whose
 * input is constrained by the synthesized Lark grammar, and
 * `cannot_answer`, a plain function tool for refusals. Which tool the
 * model called decides the GenerationOutcome variant.
 */

import OpenAI from 'openai';
import { compileValidator, formatValidationErrors } from '../ajv.js';
import { ConfigError, GenerationServiceError, errorMessage } from '../errors.js';
import { DEFAULT_MODEL } from '../config/index.js';
import { buildInstruction } from './prompt.js';
import {
  refusalArgumentsSchema,
  refusalParametersSchema,
  responsesOutputSchema,
  type RefusalArguments,
  type ResponseOutputItem,
  type ResponsesOutput,
} from './schema_json.js';
import type { GenerateInput, GenerationOutcome, QueryGenerator } from './types.js';

export const SQL_TOOL_NAME = 'sql_generator';
export const REFUSAL_TOOL_NAME = 'cannot_answer';
export const DEFAULT_REFUSAL_REASON = 'Query cannot be answered with available data';

const REFUSAL_TOOL_DESCRIPTION =
  'Call this when the query cannot be answered with the available database schema. ' +
  "Use this for questions about data that doesn't exist in the tables, or for completely unrelated questions.";

export type ResponsesRequest = OpenAI.Responses.ResponseCreateParamsNonStreaming;

/** The slice of the OpenAI client this provider uses. */
export interface ResponsesClient {
  create(body: ResponsesRequest): Promise<unknown>;
}

export interface OpenAIProviderOpts {
  apiKey?: string;
  model?: string;
  /** Injected client; built from apiKey when absent */
  client?: ResponsesClient;
}

const validateOutput = compileValidator<ResponsesOutput>(responsesOutputSchema);
const validateRefusal = compileValidator<RefusalArguments>(refusalArgumentsSchema);

function openAiResponsesClient(apiKey: string): ResponsesClient {
  const client = new OpenAI({ apiKey });
  return {
    create: (body) => client.responses.create(body),
  };
}

/**
 * Refusal payloads that fail to parse still mean the model declined,
 * so they fall back to a fixed reason rather than failing the call.
 */
function parseRefusalReason(raw: unknown): string {
  if (typeof raw !== 'string') return DEFAULT_REFUSAL_REASON;
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return DEFAULT_REFUSAL_REASON;
  }
  if (!validateRefusal(parsed)) return DEFAULT_REFUSAL_REASON;
  const reason = parsed.reason.trim();
  return reason || DEFAULT_REFUSAL_REASON;
}

function toOutcome(item: ResponseOutputItem): GenerationOutcome | null {
  if (item.type === 'custom_tool_call' && item.name === SQL_TOOL_NAME) {
    const sql = item.input;
    if (typeof sql !== 'string' || !sql.trim()) {
      throw new GenerationServiceError(`${SQL_TOOL_NAME} was called without SQL input`);
    }
    return { kind: 'sql', sql };
  }
  if (item.type === 'function_call' && item.name === REFUSAL_TOOL_NAME) {
    return { kind: 'unsupported', reason: parseRefusalReason(item.arguments) };
  }
  return null;
}

export class OpenAIProvider implements QueryGenerator {
  readonly model: string;
  private readonly client: ResponsesClient;

  constructor(opts: OpenAIProviderOpts = {}) {
    this.model = opts.model || DEFAULT_MODEL;
    if (opts.client) {
      this.client = opts.client;
    } else {
      if (!opts.apiKey) {
        throw new ConfigError(['OPENAI_API_KEY']);
      }
      this.client = openAiResponsesClient(opts.apiKey);
    }
  }

  buildRequest(input: GenerateInput): ResponsesRequest {
    return {
      model: this.model,
      input: buildInstruction(input.question, input.referenceTime),
      tools: [
        {
          type: 'custom',
          name: SQL_TOOL_NAME,
          description: input.capabilities,
          format: {
            type: 'grammar',
            syntax: 'lark',
            definition: input.grammar,
          },
        },
        {
          type: 'function',
          name: REFUSAL_TOOL_NAME,
          description: REFUSAL_TOOL_DESCRIPTION,
          parameters: refusalParametersSchema,
          strict: true,
        },
      ],
      parallel_tool_calls: false,
    };
  }

  async generate(input: GenerateInput): Promise<GenerationOutcome> {
    const request = this.buildRequest(input);

    let response: unknown;
    try {
      response = await this.client.create(request);
    } catch (err: unknown) {
      const status = err instanceof OpenAI.APIError ? err.status : undefined;
      throw new GenerationServiceError(`OpenAI request failed: ${errorMessage(err)}`, {
        status,
        cause: err,
      });
    }

    if (!validateOutput(response)) {
      throw new GenerationServiceError(
        `OpenAI response failed validation: ${formatValidationErrors(validateOutput.errors)}`,
      );
    }

    for (const item of response.output) {
      const outcome = toOutcome(item);
      if (outcome) return outcome;
    }

    throw new GenerationServiceError('No output produced: the model called neither tool');
  }
}
