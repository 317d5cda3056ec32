/**
 * Bordered tables built from box characters
 */

import { boxChars, type BoxStyle } from './Box.js';
import { alignText, widestLine, type Align } from '../../utils/width.js';

export interface TableColumn {
  header: string;
  align?: Align;
}

/**
 * Build a table as newline-separated text. Rows shorter than the column
 * list are padded with empty cells; extra cells are dropped.
 */
export function createTable(
  columns: readonly TableColumn[],
  rows: readonly (readonly string[])[],
  boxStyle: BoxStyle = 'single'
): string {
  const chars = boxChars[boxStyle];
  const cells = rows.map(row => columns.map((_, i) => row[i] ?? ''));

  const widths = columns.map((column, i) => widestLine([column.header, ...cells.map(row => row[i])]));

  const rule = (left: string, join: string, right: string) =>
    left + widths.map(w => chars.horizontal.repeat(w + 2)).join(join) + right;

  const line = (values: readonly string[], aligns: readonly Align[]) =>
    chars.vertical +
    values.map((value, i) => ` ${alignText(value, widths[i], aligns[i])} `).join(chars.vertical) +
    chars.vertical;

  const headerAligns = columns.map((): Align => 'center');
  const bodyAligns = columns.map(column => column.align ?? 'left');

  const lines = [
    rule(chars.topLeft, chars.teeDown, chars.topRight),
    line(columns.map(column => column.header), headerAligns),
    rule(chars.teeRight, chars.cross, chars.teeLeft),
    ...cells.map(row => line(row, bodyAligns)),
    rule(chars.bottomLeft, chars.teeUp, chars.bottomRight),
  ];

  return lines.join('\n');
}
