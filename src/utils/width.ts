/**
 * Display width measurement in terminal cells (and pixels, for a known cell size)
 */

import stringWidth from 'string-width';

export type Align = 'left' | 'center' | 'right';

/**
 * Width of text in cells. ANSI sequences count as zero, wide characters as two.
 */
export function textWidth(text: string): number {
  return stringWidth(text);
}

/**
 * Width of the widest line
 */
export function widestLine(lines: readonly string[]): number {
  let widest = 0;
  for (const line of lines) {
    widest = Math.max(widest, textWidth(line));
  }
  return widest;
}

/**
 * Longest prefix of text that fits in `width` cells. A wide character that
 * would straddle the edge is left out.
 */
export function cutToWidth(text: string, width: number): string {
  let result = '';
  let used = 0;
  for (const char of text) {
    const cells = textWidth(char);
    if (used + cells > width) break;
    result += char;
    used += cells;
  }
  return result;
}

/**
 * Convert a cell count to pixels
 */
export function toPixels(cells: number, cellWidthPx: number): number {
  if (!(cellWidthPx > 0)) {
    throw new RangeError(`Cell width must be positive, got ${cellWidthPx}`);
  }
  return cells * cellWidthPx;
}

/**
 * Pad text with spaces to `width` cells. Text that is already as wide or
 * wider comes back unchanged.
 */
export function alignText(text: string, width: number, align: Align = 'left'): string {
  const gap = width - textWidth(text);
  if (gap <= 0) return text;

  switch (align) {
    case 'left':
      return text + ' '.repeat(gap);
    case 'right':
      return ' '.repeat(gap) + text;
    case 'center': {
      const left = Math.floor(gap / 2);
      return ' '.repeat(left) + text + ' '.repeat(gap - left);
    }
  }
}
