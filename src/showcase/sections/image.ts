import { fg, bg, style } from '../../renderer/ansi.js';
import type { Rgb } from '../viewports.js';
import { line, type Block, type Section, type SectionContext } from '../types.js';

// Two pixel rows per text row; '.' is transparent
const BITMAP = [
  '..rr....rr..',
  '.rwrr..rrrr.',
  'rwrrrrrrrrrr',
  'rrrrrrrrrrrr',
  '.rrrrrrrrrr.',
  '..rrrrrrrr..',
  '...rrrrrr...',
  '....rrrr....',
];

const PALETTE: Record<string, Rgb> = {
  r: { r: 240, g: 42, b: 48 },
  w: { r: 255, g: 255, b: 255 },
};

function pixel(x: number, y: number): Rgb | undefined {
  return PALETTE[BITMAP[y]?.[x] ?? '.'];
}

function cell(top: Rgb | undefined, bottom: Rgb | undefined, ctx: SectionContext): string {
  if (!top && !bottom) return ' ';

  const halfBlocks = ctx.canDisplay('▀') && ctx.canDisplay('▄') && ctx.canDisplay('█');
  if (!halfBlocks) return '#';

  if (!ctx.color) {
    if (top && bottom) return '█';
    return top ? '▀' : '▄';
  }

  if (top && bottom) return fg.rgb(top.r, top.g, top.b) + bg.rgb(bottom.r, bottom.g, bottom.b) + '▀' + style.reset;
  if (top) return fg.rgb(top.r, top.g, top.b) + '▀' + style.reset;
  if (bottom) return fg.rgb(bottom.r, bottom.g, bottom.b) + '▄' + style.reset;
  return ' ';
}

/**
 * Rows of text cells for the bitmap, two pixel rows per text row
 */
export function renderBitmap(ctx: SectionContext): string[] {
  const width = Math.max(...BITMAP.map(row => row.length));
  const rows: string[] = [];
  for (let y = 0; y < BITMAP.length; y += 2) {
    let text = '';
    for (let x = 0; x < width; x++) {
      text += cell(pixel(x, y), pixel(x, y + 1), ctx);
    }
    rows.push(text);
  }
  return rows;
}

export const imageSection: Section = {
  id: 'image',
  title: 'Image',
  description: 'A small bitmap drawn with half-block characters, one colour for each half of a cell.',
  render(ctx) {
    const blocks: Block[] = renderBitmap(ctx).map(row => line(`    ${row}`));
    blocks.push(line(`    ${BITMAP[0].length}x${BITMAP.length} pixels in ${Math.ceil(BITMAP.length / 2)} rows`));
    return blocks;
  },
};
