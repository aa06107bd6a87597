/**
 * Grammar synthesis: Schema -> Lark grammar + capability description.
 *
 * Pure and deterministic. Tables and columns are enumerated in sorted
 * order so the same schema always yields byte-identical text. The
 * grammar is the only thing that constrains generation; the capability
 * text is advisory context for the model.
 */

import { GrammarCollisionError, GrammarError } from '../errors.js';
import type { Schema } from '../schema/types.js';
import { GRAMMAR_HEAD, GRAMMAR_TAIL, SUPPORTED_OPERATIONS } from './productions.js';
import { larkLiteral, terminalFor, type TerminalKind } from './sanitize.js';

export interface GrammarTerminal {
  /** Raw schema name */
  name: string;
  /** Lark terminal identifier */
  terminal: string;
}

export interface SynthesizedGrammar {
  grammar: string;
  capabilities: string;
  tables: GrammarTerminal[];
  columns: GrammarTerminal[];
}

function byName(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * De-duplicate raw names, sort them and assign terminals.
 * Distinct raw names that share a terminal are a synthesis error.
 */
function assignTerminals(kind: TerminalKind, rawNames: Iterable<string>): GrammarTerminal[] {
  const distinct = [...new Set(rawNames)].sort(byName);
  const owners = new Map<string, string>();
  const out: GrammarTerminal[] = [];

  for (const name of distinct) {
    const terminal = terminalFor(kind, name);
    const owner = owners.get(terminal);
    if (owner !== undefined) {
      throw new GrammarCollisionError(terminal, owner, name);
    }
    owners.set(terminal, name);
    out.push({ name, terminal });
  }

  return out;
}

function renderAlternation(title: string, rule: string, terminals: GrammarTerminal[]): string {
  const lines = [`// ---------- ${title} ----------`];
  for (const t of terminals) {
    lines.push(`${t.terminal}: ${larkLiteral(t.name)}`);
  }
  lines.push(`${rule}: ${terminals.map((t) => t.terminal).join(' | ')}`);
  return lines.join('\n') + '\n';
}

export function buildCapabilities(schema: Schema): string {
  const lines = ['Generates SQL queries for the tables below.', '', 'Available tables and columns:'];

  const tables = [...schema.tables].sort((a, b) => byName(a.name, b.name));
  for (const table of tables) {
    lines.push('', `## ${table.name}`);
    const columns = [...table.columns].sort((a, b) => byName(a.name, b.name));
    for (const col of columns) {
      lines.push(`- ${col.name} (${col.type})`);
    }
  }

  lines.push('', SUPPORTED_OPERATIONS);
  return lines.join('\n');
}

export function synthesize(schema: Schema): SynthesizedGrammar {
  if (schema.tables.length === 0) {
    throw new GrammarError('EMPTY_SCHEMA', 'Cannot build a grammar: the schema has no tables');
  }

  const tables = assignTerminals(
    'table',
    schema.tables.map((t) => t.name),
  );
  const columns = assignTerminals(
    'column',
    schema.tables.flatMap((t) => t.columns.map((c) => c.name)),
  );

  if (columns.length === 0) {
    throw new GrammarError('EMPTY_SCHEMA', 'Cannot build a grammar: the schema has no columns');
  }

  const grammar = [
    GRAMMAR_HEAD,
    renderAlternation('Tables', 'table', tables),
    renderAlternation('Columns', 'column', columns),
    GRAMMAR_TAIL,
  ].join('\n');

  return {
    grammar,
    capabilities: buildCapabilities(schema),
    tables,
    columns,
  };
}
