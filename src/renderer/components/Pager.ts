/**
 * Read-only, scrollable view over document lines
 */

import type { Screen } from '../Screen.js';
import type { KeyEvent } from '../Keys.js';
import { cursorShape, style } from '../ansi.js';
import { alignText, cutToWidth } from '../../utils/width.js';
import { CURSOR_SHAPE_NAMES } from '../../showcase/sections/cursorShapes.js';
import type { ShowcaseDocument } from '../../showcase/document.js';

export type PagerAction = 'quit' | 'redraw' | 'none';

const WHEEL_STEP = 3;

export class Pager {
  private offset = 0;

  constructor(
    private readonly screen: Screen,
    private document: ShowcaseDocument,
    private readonly output: { write(chunk: string): unknown } = process.stdout
  ) {}

  /** Rows available for document lines (the last row is the status line) */
  private get pageHeight(): number {
    return Math.max(1, this.screen.getSize().height - 1);
  }

  private get maxOffset(): number {
    return Math.max(0, this.document.lines.length - this.pageHeight);
  }

  getOffset(): number {
    return this.offset;
  }

  /**
   * Swap in a rebuilt document (after a resize), keeping the position
   */
  setDocument(document: ShowcaseDocument): void {
    this.document = document;
    this.offset = Math.min(this.offset, this.maxOffset);
  }

  scrollTo(line: number): boolean {
    const next = Math.max(0, Math.min(line, this.maxOffset));
    if (next === this.offset) return false;
    this.offset = next;
    return true;
  }

  /**
   * Title of the section at the top of the page
   */
  currentSection(): string {
    let title = '';
    for (const anchor of this.document.anchors) {
      if (anchor.line > this.offset) break;
      title = anchor.title;
    }
    return title;
  }

  handleKey(event: KeyEvent): PagerAction {
    if (event.key === 'q' || event.key === 'escape' || (event.ctrl && event.key === 'c')) {
      return 'quit';
    }

    const shapeIndex = /^[0-9]$/.test(event.key) ? Number(event.key) : -1;
    if (shapeIndex >= 0 && shapeIndex < CURSOR_SHAPE_NAMES.length) {
      this.output.write(cursorShape(CURSOR_SHAPE_NAMES[shapeIndex]));
      return 'none';
    }

    const moved = this.move(event.key);
    return moved ? 'redraw' : 'none';
  }

  private move(key: string): boolean {
    switch (key) {
      case 'up':
      case 'k':
        return this.scrollTo(this.offset - 1);
      case 'down':
      case 'j':
      case 'enter':
        return this.scrollTo(this.offset + 1);
      case 'scrollup':
        return this.scrollTo(this.offset - WHEEL_STEP);
      case 'scrolldown':
        return this.scrollTo(this.offset + WHEEL_STEP);
      case 'pageup':
      case 'b':
        return this.scrollTo(this.offset - this.pageHeight);
      case 'pagedown':
      case 'space':
        return this.scrollTo(this.offset + this.pageHeight);
      case 'home':
      case 'g':
        return this.scrollTo(0);
      case 'end':
      case 'G':
        return this.scrollTo(this.maxOffset);
      case 'n': {
        const next = this.document.anchors.find(anchor => anchor.line > this.offset);
        return next ? this.scrollTo(next.line) : false;
      }
      case 'p': {
        const previous = [...this.document.anchors].reverse().find(anchor => anchor.line < this.offset);
        return previous ? this.scrollTo(previous.line) : false;
      }
      default:
        return false;
    }
  }

  statusLine(): string {
    const total = this.document.lines.length;
    const last = Math.min(total, this.offset + this.pageHeight);
    const section = this.currentSection();
    const text = ` ${section}  ${this.offset + 1}-${last}/${total}  j/k scroll  n/p section  0-6 cursor  q quit`;
    const { width } = this.screen.getSize();
    return alignText(cutToWidth(text, width), width);
  }

  /**
   * Write the visible page and status line into the screen buffer
   */
  draw(): void {
    const { height } = this.screen.getSize();
    this.screen.clear();
    this.screen.writeLines(0, this.document.lines.slice(this.offset, this.offset + this.pageHeight));
    this.screen.writeLine(height - 1, this.statusLine(), style.inverse);
    // Park the cursor on the status line so shape changes stay visible
    this.screen.setCursor(0, height - 1);
  }
}
