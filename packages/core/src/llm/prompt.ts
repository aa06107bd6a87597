/**
 * Instruction text for constrained SQL generation.
 */

/** 'YYYY-MM-DD HH:MM:SS' in UTC, the format of the grammar's DATETIME literal. */
export function formatReferenceTime(referenceTime: Date): string {
  if (Number.isNaN(referenceTime.getTime())) {
    throw new RangeError('Invalid reference time');
  }
  return referenceTime.toISOString().slice(0, 19).replace('T', ' ');
}

export function buildInstruction(question: string, referenceTime: Date): string {
  const now = formatReferenceTime(referenceTime);
  return `Convert this natural language query to a valid SQL query.

If the query CAN be answered with the available schema, call the sql_generator tool.
If the query CANNOT be answered (asks for data not in the schema, or is unrelated to the database), call the cannot_answer tool with a brief explanation.

Current UTC time: ${now}
Use this timestamp for any relative time calculations (e.g., 'last 30 hours' means since ${now} minus 30 hours).

Query: ${question}`;
}
