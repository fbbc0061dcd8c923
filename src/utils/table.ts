/**
 * Table Formatting Utility
 *
 * Box-drawn tables for score reports. Numeric cells are rounded to a fixed
 * number of decimals and right-aligned unless the column says otherwise.
 */

import chalk from 'chalk';

export type Alignment = 'left' | 'right';

/**
 * Column definition for table
 */
export interface Column {
  /** Header text */
  header: string;
  /** Data key to look up in rows */
  key: string;
  /** Alignment (default: right for numbers, left otherwise) */
  align?: Alignment;
}

export type Cell = string | number | boolean | null | undefined;

/**
 * Table row data - key-value pairs
 */
export type Row = Record<string, Cell>;

export interface TableOptions {
  /** Decimal places for non-integer numbers (default: 4) */
  precision?: number;
}

// eslint-disable-next-line no-control-regex
const ANSI_PATTERN = /\x1B\[[0-9;]*m/g;

function visibleLength(text: string): number {
  return text.replace(ANSI_PATTERN, '').length;
}

/**
 * Render one cell. Integers print as-is, other numbers at `precision` decimals.
 */
export function formatCell(value: Cell, precision = 4): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'number') {
    return Number.isInteger(value) ? String(value) : value.toFixed(precision);
  }
  return String(value);
}

function pad(text: string, width: number, align: Alignment): string {
  const fill = ' '.repeat(Math.max(0, width - visibleLength(text)));
  return align === 'right' ? fill + text : text + fill;
}

/**
 * Format rows as a box-drawn table.
 *
 * @example
 * formatTable(
 *   [{ header: 'Target', key: 'target' }, { header: 'Score', key: 'score' }],
 *   [{ target: 'a', score: 0.5 }],
 *   { precision: 2 }
 * )
 * // ┌────────┬───────┐
 * // │ Target │ Score │
 * // ├────────┼───────┤
 * // │ a      │  0.50 │
 * // └────────┴───────┘
 */
export function formatTable(columns: Column[], rows: Row[], options: TableOptions = {}): string {
  if (columns.length === 0) return '';

  const precision = options.precision ?? 4;
  const body = rows.map((row) => columns.map((col) => formatCell(row[col.key], precision)));
  const alignments: Alignment[] = columns.map(
    (col) => col.align ?? (rows.some((row) => typeof row[col.key] === 'number') ? 'right' : 'left')
  );
  const widths = columns.map((col, i) =>
    Math.max(visibleLength(col.header), ...body.map((cells) => visibleLength(cells[i] ?? '')))
  );

  const rule = (left: string, middle: string, right: string): string =>
    left + widths.map((w) => '─'.repeat(w + 2)).join(middle) + right;

  const line = (cells: string[]): string =>
    '│' + cells.map((cell, i) => ` ${pad(cell, widths[i] ?? 0, alignments[i] ?? 'left')} `).join('│') + '│';

  return [
    rule('┌', '┬', '┐'),
    line(columns.map((col) => chalk.bold(col.header))),
    rule('├', '┼', '┤'),
    ...body.map(line),
    rule('└', '┴', '┘'),
  ].join('\n');
}
