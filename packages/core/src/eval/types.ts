/**
 * Verification harness data model.
 */

/** How result rows are matched against the reference result. */
export type RowOrder = 'positional' | 'unordered';

export interface EvalCase {
  name: string;
  question: string;
  /** Known-correct SQL; required unless the case expects a refusal */
  referenceSql?: string;
  /** ISO-8601 instant substituted for "now" during generation */
  referenceTime?: string;
  expectUnsupported?: boolean;
  /** Defaults to positional when the reference SQL orders its rows */
  rowOrder?: RowOrder;
}

export interface EvalResult {
  name: string;
  passed: boolean;
  question: string;
  referenceSql: string;
  generatedSql: string;
  error?: string;
  /** Whether generated and reference SQL read the same tables with the same aggregates */
  shapeMatches?: boolean;
}

export interface EvalSummary {
  total: number;
  passed: number;
  failed: number;
  /** Percentage, 0 when there are no results */
  passRate: number;
}

export interface EvalRun {
  results: EvalResult[];
  /** `eval <name> failed: <message>` for the first failed case in input order */
  error: string | null;
}
