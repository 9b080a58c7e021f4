/**
 * Plain-text table for `totp list`.
 */

const MAX_WIDTH = 48;

export function formatTable(columns: string[], rows: Record<string, unknown>[]): string {
  if (rows.length === 0) return '(none)';

  const cells = rows.map((row) => columns.map((col) => clip(formatValue(row[col]))));
  const widths = columns.map((col, i) => Math.max(col.length, ...cells.map((r) => r[i].length)));

  const render = (values: string[]): string =>
    values
      .map((v, i) => v.padEnd(widths[i]))
      .join('  ')
      .trimEnd();

  return [render(columns), render(widths.map((w) => '-'.repeat(w))), ...cells.map(render)].join('\n');
}

function clip(value: string): string {
  return value.length > MAX_WIDTH ? `${value.slice(0, MAX_WIDTH - 1)}…` : value;
}

function formatValue(val: unknown): string {
  if (val === null || val === undefined) return '';
  return String(val);
}
