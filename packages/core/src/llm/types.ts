/**
 * Generation types.
 */

/** Exactly one variant per generation call. A refusal is not a failure. */
export type GenerationOutcome =
  | { kind: 'sql'; sql: string }
  | { kind: 'unsupported'; reason: string };

export interface GenerateInput {
  question: string;
  /** Lark grammar the SQL channel is constrained by */
  grammar: string;
  /** Advisory description of tables, columns and operations */
  capabilities: string;
  /** Instant that relative time phrases resolve against */
  referenceTime: Date;
}

export interface QueryGenerator {
  readonly model: string;
  generate(input: GenerateInput): Promise<GenerationOutcome>;
}
