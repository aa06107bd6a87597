/**
 * Statement finalization before dispatch.
 */

/** Trim, then drop one trailing terminator and the whitespace before it. */
export function prepareStatement(sql: string): string {
  const trimmed = sql.trim();
  if (!trimmed.endsWith(';')) return trimmed;
  return trimmed.slice(0, -1).trimEnd();
}

/** The HTTP engine rejects a terminator combined with a FORMAT clause. */
export function withJsonFormat(sql: string): string {
  return `${prepareStatement(sql)} FORMAT JSON`;
}
