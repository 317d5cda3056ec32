/**
 * Render sections, in order, into one read-only document
 */

import { Screen } from '../renderer/Screen.js';
import { style, fg, wordWrap } from '../renderer/ansi.js';
import { drawTable } from '../glyphs/fallback.js';
import { classify } from '../glyphs/transliterate.js';
import { logger } from '../utils/logger.js';
import type { Block, Section, SectionContext } from './types.js';

export interface SectionAnchor {
  id: string;
  title: string;
  /** First document line of the section */
  line: number;
}

export interface ShowcaseDocument {
  /** Lines with ANSI styling (when colour is on) */
  lines: string[];
  /** Same lines without styling */
  plain: string[];
  anchors: SectionAnchor[];
  /** Table blocks that fell back to ASCII */
  fallbacks: number;
}

const discard = { write: () => true };

function blockHeight(block: Block): number {
  return block.kind === 'table' ? block.text.split('\n').length : 1;
}

export function buildDocument(sections: readonly Section[], ctx: SectionContext): ShowcaseDocument {
  const descriptionWidth = Math.max(10, ctx.width - 2);
  const rendered = sections.map(section => ({
    section,
    description: wordWrap(section.description, descriptionWidth),
    blocks: section.render(ctx),
  }));

  // heading + rule + description + blank + blocks + blank
  const height = rendered.reduce(
    (total, { description, blocks }) =>
      total + 2 + description.length + 1 + blocks.reduce((sum, block) => sum + blockHeight(block), 0) + 1,
    0
  );

  const screen = new Screen({ width: ctx.width, height, output: discard, canDisplay: ctx.canDisplay });
  const ruleChar = ctx.canDisplay('─') ? '─' : classify('─');
  const anchors: SectionAnchor[] = [];
  let fallbacks = 0;
  let y = 0;

  for (const { section, description, blocks } of rendered) {
    anchors.push({ id: section.id, title: section.title, line: y });

    screen.write(0, y++, section.title, ctx.color ? style.bold : '');
    screen.horizontalLine(y++, ruleChar, ctx.color ? fg.gray : '');
    for (const text of description) {
      screen.write(2, y++, text, ctx.color ? style.dim : '');
    }
    y++;

    for (const block of blocks) {
      if (block.kind === 'table') {
        const result = drawTable(screen, block.indent ?? 0, y, block.text, block.style ?? '');
        if (result.mode === 'fallback') fallbacks++;
        y = result.nextY;
      } else {
        screen.write(0, y++, block.text, block.style ?? '');
      }
    }
    y++;
  }

  logger.debug('Document built', { sections: sections.length, lines: height, fallbacks });

  return {
    lines: screen.toLines(ctx.color),
    plain: screen.toLines(false),
    anchors,
    fallbacks,
  };
}
