/**
 * Minimal table formatter for CLI output.
 * Prints a simple ASCII table with column headers and rows.
 */

const MAX_COLUMN_WIDTH = 60;

export function formatTable(columns: string[], rows: Record<string, unknown>[]): string {
  if (columns.length === 0) return '(no columns)';
  if (rows.length === 0) return '(0 rows)';

  const cells = rows.map((row) => columns.map((col) => formatValue(row[col])));
  const widths = columns.map((col, i) =>
    Math.min(Math.max(col.length, ...cells.map((line) => (line[i] ?? '').length)), MAX_COLUMN_WIDTH),
  );
  const widthAt = (i: number): number => widths[i] ?? MAX_COLUMN_WIDTH;

  const lines: string[] = [];
  lines.push(columns.map((col, i) => col.padEnd(widthAt(i))).join(' | '));
  lines.push(widths.map((w) => '-'.repeat(w)).join('-+-'));

  for (const line of cells) {
    lines.push(
      line
        .map((val, i) => (val.length > widthAt(i) ? val.slice(0, widthAt(i) - 1) + '…' : val.padEnd(widthAt(i))))
        .join(' | '),
    );
  }

  return lines.join('\n');
}

function formatValue(val: unknown): string {
  if (val === null || val === undefined) return 'NULL';
  if (typeof val === 'number') return Number.isInteger(val) ? String(val) : String(Number(val.toFixed(6)));
  if (typeof val === 'object') return JSON.stringify(val);
  return String(val);
}
