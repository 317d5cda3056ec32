/**
 * ANSI escape codes for terminal control
 */

import { textWidth } from '../utils/width.js';

// Cursor control
export const cursor = {
  hide: '\x1b[?25l',
  show: '\x1b[?25h',
  home: '\x1b[H',

  // Move cursor to position (1-indexed)
  to: (row: number, col: number) => `\x1b[${row};${col}H`,
};

// Cursor shapes (DECSCUSR)
export const cursorShapes = {
  default: 0,
  blinkingBlock: 1,
  steadyBlock: 2,
  blinkingUnderline: 3,
  steadyUnderline: 4,
  blinkingBar: 5,
  steadyBar: 6,
} as const;

export type CursorShape = keyof typeof cursorShapes;

export function cursorShape(shape: CursorShape): string {
  return `\x1b[${cursorShapes[shape]} q`;
}

// Screen control
export const screen = {
  clear: '\x1b[2J',

  // Alternative screen buffer
  enterAltBuffer: '\x1b[?1049h',
  exitAltBuffer: '\x1b[?1049l',
};

// Colors
export const fg = {
  cyan: '\x1b[36m',
  gray: '\x1b[90m',

  // RGB
  rgb: (r: number, g: number, b: number) => `\x1b[38;2;${r};${g};${b}m`,
};

export const bg = {
  // RGB
  rgb: (r: number, g: number, b: number) => `\x1b[48;2;${r};${g};${b}m`,
};

// Text styles
export const style = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  inverse: '\x1b[7m',
};

/**
 * Wrap text to fit width, measured in cells
 */
export function wordWrap(str: string, width: number): string[] {
  const lines: string[] = [];
  let currentLine = '';
  let currentLength = 0;

  for (const word of str.split(' ')) {
    const wordLength = textWidth(word);

    if (currentLine && currentLength + 1 + wordLength > width) {
      lines.push(currentLine);
      currentLine = word;
      currentLength = wordLength;
    } else if (currentLine) {
      currentLine += ' ' + word;
      currentLength += 1 + wordLength;
    } else {
      currentLine = word;
      currentLength = wordLength;
    }
  }

  if (currentLine) {
    lines.push(currentLine);
  }

  return lines;
}
