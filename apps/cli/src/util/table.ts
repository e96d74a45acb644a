/**
 * Plain-text grid for query results and schema listings.
 * Numeric cells are right-aligned; everything else is left-aligned.
 */

export interface TableOptions {
  /** Widest a column may grow before cells are cut with an ellipsis */
  maxColumnWidth?: number;
}

const DEFAULT_MAX_COLUMN_WIDTH = 60;

export function formatTable(columns: string[], rows: Record<string, unknown>[], options: TableOptions = {}): string {
  if (columns.length === 0) return '(no columns)';
  if (rows.length === 0) return '(0 rows)';

  const cap = Math.max(options.maxColumnWidth ?? DEFAULT_MAX_COLUMN_WIDTH, 2);
  const cells = rows.map((row) => columns.map((col) => renderCell(row[col])));

  const widths = columns.map((col, i) =>
    Math.min(cells.reduce((w, line) => Math.max(w, line[i].text.length), col.length), cap),
  );

  const header = columns.map((col, i) => fit(col, widths[i], false)).join(' | ');
  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');
  const body = cells.map((line) => line.map((cell, i) => fit(cell.text, widths[i], cell.numeric)).join(' | '));

  return [header, separator, ...body].join('\n');
}

interface Cell {
  text: string;
  numeric: boolean;
}

function renderCell(value: unknown): Cell {
  if (value === null || value === undefined) return { text: 'NULL', numeric: false };
  if (typeof value === 'number' || typeof value === 'bigint') return { text: String(value), numeric: true };
  if (value instanceof Date) return { text: value.toISOString(), numeric: false };
  if (typeof value === 'object') {
    return { text: JSON.stringify(value, (_k, v: unknown) => (typeof v === 'bigint' ? v.toString() : v)), numeric: false };
  }
  return { text: String(value).replace(/\r?\n/g, ' '), numeric: false };
}

function fit(text: string, width: number, alignRight: boolean): string {
  if (text.length > width) return text.slice(0, width - 1) + '…';
  return alignRight ? text.padStart(width) : text.padEnd(width);
}
