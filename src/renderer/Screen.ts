/**
 * Screen buffer with diff-based rendering
 * Only writes changes to terminal - minimizes flickering
 */

import { cursor, screen, style } from './ansi.js';
import { RenderError, ProbeUnavailableError } from '../errors.js';
import type { CapabilityQuery } from '../glyphs/capability.js';
import { textWidth } from '../utils/width.js';

export interface Cell {
  char: string;
  style: string;
}

/**
 * Minimal writable the screen renders to. process.stdout satisfies it.
 */
export interface ScreenOutput {
  write(chunk: string): unknown;
  columns?: number;
  rows?: number;
  isTTY?: boolean;
  on?(event: 'resize', listener: () => void): unknown;
}

export interface ScreenOptions {
  width?: number;
  height?: number;
  output?: ScreenOutput;
  /** Capability query for glyphs; without one, canDisplay() cannot answer */
  canDisplay?: CapabilityQuery;
  /** Throw RenderError instead of drawing glyphs the query rejects */
  strictGlyphs?: boolean;
}

/**
 * Anything a table can be drawn onto
 */
export interface RenderSurface {
  canDisplay(char: string): boolean;
  write(x: number, y: number, text: string, textStyle?: string): void;
  transaction<T>(fn: () => T): T;
}

// Right half of a wide character
const CONTINUATION = '';

export class Screen implements RenderSurface {
  private width: number;
  private height: number;
  private buffer: Cell[][];
  private rendered: Cell[][];
  private cursorX = 0;
  private cursorY = 0;
  // Set by resize(); the terminal may still show cells the diff cannot see
  private needsFullRender = false;
  private readonly output: ScreenOutput;
  private readonly query: CapabilityQuery | undefined;
  private readonly strictGlyphs: boolean;

  constructor(options: ScreenOptions = {}) {
    this.output = options.output ?? process.stdout;
    this.width = options.width ?? (this.output.columns || 80);
    this.height = options.height ?? (this.output.rows || 24);
    this.query = options.canDisplay;
    this.strictGlyphs = options.strictGlyphs ?? false;
    this.buffer = this.createEmptyBuffer();
    this.rendered = this.createEmptyBuffer();
  }

  private createEmptyBuffer(): Cell[][] {
    const buffer: Cell[][] = [];
    for (let y = 0; y < this.height; y++) {
      const row: Cell[] = [];
      for (let x = 0; x < this.width; x++) {
        row.push({ char: ' ', style: '' });
      }
      buffer.push(row);
    }
    return buffer;
  }

  private cloneBuffer(source: Cell[][]): Cell[][] {
    return source.map(row => row.map(cell => ({ ...cell })));
  }

  /**
   * Get screen dimensions
   */
  getSize(): { width: number; height: number } {
    return { width: this.width, height: this.height };
  }

  /**
   * Resize, keeping whatever still fits
   */
  resize(width: number, height: number): void {
    const previous = this.buffer;
    this.width = width;
    this.height = height;
    this.buffer = this.createEmptyBuffer();
    this.rendered = this.createEmptyBuffer();
    this.needsFullRender = true;
    for (let y = 0; y < Math.min(height, previous.length); y++) {
      for (let x = 0; x < Math.min(width, previous[y].length); x++) {
        this.buffer[y][x] = { ...previous[y][x] };
      }
    }
  }

  /**
   * Follow terminal resizes; onResize runs after the buffer has been resized
   */
  followResize(onResize: (width: number, height: number) => void): void {
    this.output.on?.('resize', () => {
      const width = this.output.columns || this.width;
      const height = this.output.rows || this.height;
      this.resize(width, height);
      onResize(width, height);
    });
  }

  /**
   * Whether the glyph can be displayed. Throws when no query is configured.
   */
  canDisplay(char: string): boolean {
    if (!this.query) {
      throw new ProbeUnavailableError('Screen has no glyph capability query');
    }
    return this.query(char);
  }

  /**
   * Clear the buffer
   */
  clear(): void {
    this.buffer = this.createEmptyBuffer();
  }

  /**
   * Run fn against the buffer; if it throws, every cell is restored.
   */
  transaction<T>(fn: () => T): T {
    const snapshot = this.cloneBuffer(this.buffer);
    try {
      return fn();
    } catch (err) {
      this.buffer = snapshot;
      throw err;
    }
  }

  /**
   * Write text at position
   */
  write(x: number, y: number, text: string, textStyle = ''): void {
    if (y < 0 || y >= this.height) return;

    let col = x;
    let escape = '';
    let currentStyle = textStyle;

    for (const char of text) {
      if (char === '\x1b') {
        escape = char;
      } else if (escape) {
        escape += char;
        if (/[a-zA-Z]/.test(char)) {
          currentStyle = escape === style.reset ? '' : currentStyle + escape;
          escape = '';
        }
      } else if (char === '\n') {
        break;
      } else {
        if (this.strictGlyphs && this.query && !this.query(char)) {
          throw new RenderError(`Cannot display ${JSON.stringify(char)} at ${col},${y}`, char, col, y);
        }
        const cells = textWidth(char);
        if (cells === 0) {
          // Combining marks and joiners belong to the cell before them
          if (!/\p{Cc}/u.test(char)) this.attach(col, y, char);
          continue;
        }
        if (col >= 0 && col + cells <= this.width) {
          this.buffer[y][col] = { char, style: currentStyle };
          if (cells === 2) {
            this.buffer[y][col + 1] = { char: CONTINUATION, style: currentStyle };
          }
        }
        col += cells;
      }
    }
  }

  private attach(col: number, y: number, mark: string): void {
    let target = col - 1;
    if (this.buffer[y][target]?.char === CONTINUATION) target--;
    const cell = this.buffer[y][target];
    if (cell) cell.char += mark;
  }

  /**
   * Write a line, clearing rest of line
   */
  writeLine(y: number, text: string, textStyle = ''): void {
    if (y < 0 || y >= this.height) return;
    for (let x = 0; x < this.width; x++) {
      this.buffer[y][x] = { char: ' ', style: '' };
    }
    this.write(0, y, text, textStyle);
  }

  /**
   * Write multiple lines starting at y
   */
  writeLines(startY: number, lines: readonly string[], textStyle = ''): number {
    let y = startY;
    for (const line of lines) {
      if (y >= this.height) break;
      this.writeLine(y, line, textStyle);
      y++;
    }
    return y; // Next available line
  }

  /**
   * Draw a horizontal line
   */
  horizontalLine(y: number, char = '─', textStyle = ''): void {
    this.writeLine(y, char.repeat(this.width), textStyle);
  }

  /**
   * Set cursor position
   */
  setCursor(x: number, y: number): void {
    this.cursorX = Math.max(0, Math.min(x, this.width - 1));
    this.cursorY = Math.max(0, Math.min(y, this.height - 1));
  }

  /**
   * Get a copy of the cell at position
   */
  cellAt(x: number, y: number): Cell | undefined {
    const cell = this.buffer[y]?.[x];
    return cell ? { ...cell } : undefined;
  }

  /**
   * Row contents as text. Styled rows carry their escape codes; trailing
   * blanks are trimmed.
   */
  toLines(styled = false): string[] {
    return this.buffer.map(row => {
      let line = '';
      let lastStyle = '';
      for (const cell of row) {
        if (styled && cell.style !== lastStyle) {
          line += style.reset + cell.style;
          lastStyle = cell.style;
        }
        line += cell.char;
      }
      if (styled && lastStyle) line += style.reset;
      return styled ? line.replace(/ +(\x1b\[0m)?$/, '$1') : line.trimEnd();
    });
  }

  /**
   * Render only changed cells (diff render)
   */
  render(): void {
    if (this.needsFullRender) {
      this.fullRender();
      return;
    }

    let output = '';
    let lastStyle = '';

    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        const cell = this.buffer[y][x];
        const renderedCell = this.rendered[y][x];

        if (cell.char === renderedCell.char && cell.style === renderedCell.style) {
          continue;
        }
        this.rendered[y][x] = { ...cell };
        if (cell.char === CONTINUATION) continue;

        output += cursor.to(y + 1, x + 1);
        if (cell.style !== lastStyle) {
          output += style.reset + cell.style;
          lastStyle = cell.style;
        }
        output += cell.char;
      }
    }

    output += style.reset;
    output += cursor.to(this.cursorY + 1, this.cursorX + 1);
    output += cursor.show;

    this.output.write(output);
  }

  /**
   * Full render (no diff, redraw everything)
   */
  fullRender(): void {
    this.needsFullRender = false;
    let output = cursor.hide + cursor.home;
    let lastStyle = '';

    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        const cell = this.buffer[y][x];
        this.rendered[y][x] = { ...cell };

        if (cell.style !== lastStyle) {
          output += style.reset + cell.style;
          lastStyle = cell.style;
        }
        output += cell.char;
      }

      // Don't add newline after last row
      if (y < this.height - 1) {
        output += '\r\n';
      }
    }

    output += style.reset;
    output += cursor.to(this.cursorY + 1, this.cursorX + 1);
    output += cursor.show;

    this.output.write(output);
  }

  /**
   * Enter the alternate buffer, hide cursor, clear
   */
  init(): void {
    this.output.write(screen.enterAltBuffer + cursor.hide + screen.clear + cursor.home);
  }

  /**
   * Restore the terminal
   */
  cleanup(): void {
    this.output.write(style.reset + screen.clear + cursor.home + cursor.show + screen.exitAltBuffer);
  }
}
