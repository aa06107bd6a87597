/**
 * Raw schema names -> Lark terminal identifiers.
 *
 * Terminals must match [A-Z_][A-Z0-9_]*. The prefix keeps generated
 * terminals apart from the fixed ones (SP, COMMA, NUMBER, ...).
 */

export type TerminalKind = 'table' | 'column';

const PREFIX: Record<TerminalKind, string> = {
  table: 'TBL_',
  column: 'COL_',
};

export function terminalFor(kind: TerminalKind, rawName: string): string {
  return PREFIX[kind] + rawName.replace(/[^A-Za-z0-9_]/g, '_').toUpperCase();
}

/** Quote a raw name as a Lark string literal. */
export function larkLiteral(rawName: string): string {
  return `"${rawName.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}
