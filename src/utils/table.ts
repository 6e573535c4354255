/**
 * Box tables for CLI reports (per-run accuracy, most-missed questions).
 */

import chalk from 'chalk';

export type Alignment = 'left' | 'right' | 'center';

export interface Column {
  header: string;
  /** Row field shown in this column */
  key: string;
  /** Default left */
  align?: Alignment;
  minWidth?: number;
}

export type Row = Record<string, string | number | null | undefined>;

// eslint-disable-next-line no-control-regex
const ANSI_ESCAPE = /\x1B\[[0-9;]*m/g;

/** Top, separator and bottom rules as [left, junction, right] */
const RULES = {
  top: ['┌', '┬', '┐'],
  middle: ['├', '┼', '┤'],
  bottom: ['└', '┴', '┘'],
} as const;

/** Width as seen in the terminal, ignoring colour codes */
function visibleWidth(text: string): number {
  return text.replace(ANSI_ESCAPE, '').length;
}

function align(text: string, width: number, alignment: Alignment): string {
  const gap = Math.max(0, width - visibleWidth(text));
  if (alignment === 'right') return ' '.repeat(gap) + text;
  if (alignment === 'center') {
    const before = Math.floor(gap / 2);
    return ' '.repeat(before) + text + ' '.repeat(gap - before);
  }
  return text + ' '.repeat(gap);
}

function cellText(value: Row[string]): string {
  return value === null || value === undefined ? '' : String(value);
}

/**
 * Render rows under a bold header, each column as wide as its widest cell.
 *
 * @example
 * ```ts
 * formatTable(
 *   [{ header: 'Run', key: 'run' }, { header: 'Accuracy', key: 'accuracy', align: 'right' }],
 *   [{ run: 1, accuracy: '75.0%' }]
 * );
 * // ┌─────┬──────────┐
 * // │ Run │ Accuracy │
 * // ├─────┼──────────┤
 * // │ 1   │    75.0% │
 * // └─────┴──────────┘
 * ```
 */
export function formatTable(columns: Column[], rows: Row[]): string {
  if (columns.length === 0) return '';

  const body = rows.map((row) => columns.map((col) => cellText(row[col.key])));
  const widths = columns.map((col, i) =>
    Math.max(col.minWidth ?? 0, visibleWidth(col.header), ...body.map((cells) => visibleWidth(cells[i] ?? '')))
  );

  const rule = ([left, junction, right]: readonly [string, string, string]): string =>
    left + widths.map((w) => '─'.repeat(w + 2)).join(junction) + right;

  const line = (cells: string[], style: (text: string) => string = (text) => text): string =>
    '│' +
    columns
      .map((col, i) => ` ${style(align(cells[i] ?? '', widths[i] ?? 0, col.align ?? 'left'))} `)
      .join('│') +
    '│';

  return [
    rule(RULES.top),
    line(
      columns.map((col) => col.header),
      (text) => chalk.bold(text)
    ),
    rule(RULES.middle),
    ...body.map((cells) => line(cells)),
    rule(RULES.bottom),
  ].join('\n');
}
