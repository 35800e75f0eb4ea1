/**
 * Table Formatting Utility
 *
 * Renders rows as a box-drawn table for CLI output (model catalog,
 * diagnostics rows, retrieved passages). Long cells are cut to the
 * column's `maxWidth` with a trailing ellipsis.
 */

import chalk from 'chalk';

export type Alignment = 'left' | 'right' | 'center';

export interface Column {
  /** Header text */
  header: string;
  /** Data key to look up in rows */
  key: string;
  /** Alignment (default: left) */
  align?: Alignment;
  /** Minimum width */
  minWidth?: number;
  /** Maximum width; longer values are truncated with "…" */
  maxWidth?: number;
}

export type Row = Record<string, string | number | boolean | null | undefined>;

const BOX = {
  topLeft: '┌',
  topRight: '┐',
  bottomLeft: '└',
  bottomRight: '┘',
  horizontal: '─',
  vertical: '│',
  teeDown: '┬',
  teeUp: '┴',
  teeRight: '├',
  teeLeft: '┤',
  cross: '┼',
} as const;

// eslint-disable-next-line no-control-regex
const ANSI_PATTERN = /\x1B\[[0-9;]*m/g;

function visibleLength(text: string): number {
  return text.replace(ANSI_PATTERN, '').length;
}

/**
 * Collapse whitespace and apply the column's maxWidth.
 */
function cellText(value: Row[string], column: Column): string {
  if (value === null || value === undefined) return '';
  const text = String(value).replace(/\s+/g, ' ');
  if (column.maxWidth !== undefined && column.maxWidth > 1 && visibleLength(text) > column.maxWidth) {
    return text.slice(0, column.maxWidth - 1) + '…';
  }
  return text;
}

function pad(text: string, width: number, align: Alignment): string {
  const padding = width - visibleLength(text);
  if (padding <= 0) return text;

  switch (align) {
    case 'right':
      return ' '.repeat(padding) + text;
    case 'center': {
      const left = Math.floor(padding / 2);
      return ' '.repeat(left) + text + ' '.repeat(padding - left);
    }
    case 'left':
      return text + ' '.repeat(padding);
  }
}

/**
 * Format data as a table.
 *
 * @example
 * ```ts
 * formatTable(
 *   [{ header: 'Model', key: 'id' }, { header: 'Provider', key: 'provider' }],
 *   [{ id: 'amazon.titan-text-express-v1', provider: 'amazon' }]
 * );
 * ```
 */
export function formatTable(columns: Column[], rows: Row[]): string {
  if (columns.length === 0) return '';

  const body = rows.map((row) => columns.map((column) => cellText(row[column.key], column)));

  const widths = columns.map((column, i) => {
    const cells = body.map((cells) => visibleLength(cells[i] ?? ''));
    return Math.max(column.header.length, column.minWidth ?? 0, ...cells);
  });

  const rule = (left: string, middle: string, right: string) =>
    left + widths.map((w) => BOX.horizontal.repeat(w + 2)).join(middle) + right;

  const line = (cells: string[], header = false) =>
    BOX.vertical +
    columns
      .map((column, i) => {
        const padded = pad(cells[i] ?? '', widths[i] ?? 0, column.align ?? 'left');
        return ` ${header ? chalk.bold(padded) : padded} `;
      })
      .join(BOX.vertical) +
    BOX.vertical;

  return [
    rule(BOX.topLeft, BOX.teeDown, BOX.topRight),
    line(columns.map((c) => c.header), true),
    rule(BOX.teeRight, BOX.cross, BOX.teeLeft),
    ...body.map((cells) => line(cells)),
    rule(BOX.bottomLeft, BOX.teeUp, BOX.bottomRight),
  ].join('\n');
}
