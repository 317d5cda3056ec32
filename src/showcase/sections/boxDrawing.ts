import { boxChars, type BoxStyle } from '../../renderer/components/Box.js';
import { createTable } from '../../renderer/components/Table.js';
import { fg } from '../../renderer/ansi.js';
import { line, table, type Block, type Section } from '../types.js';

const STYLES: readonly BoxStyle[] = ['single', 'double', 'rounded', 'heavy', 'dashed'];

export const boxDrawingSection: Section = {
  id: 'box-drawing',
  title: 'Box drawing',
  description:
    'One table per border style. Where the terminal cannot draw a glyph, the whole table falls back to ASCII so the columns stay aligned.',
  render(ctx) {
    const blocks: Block[] = [];
    for (const boxStyle of STYLES) {
      const chars = boxChars[boxStyle];
      const marker = boxStyle === ctx.boxStyle ? ' (configured)' : '';
      blocks.push(line(`  ${boxStyle}${marker}`, ctx.color ? fg.gray : undefined));
      blocks.push(
        table(
          createTable(
            [{ header: 'Piece' }, { header: 'Glyph', align: 'center' }],
            [
              ['corners', chars.topLeft + chars.topRight + chars.bottomLeft + chars.bottomRight],
              ['lines', chars.horizontal + chars.vertical],
              ['junctions', chars.teeDown + chars.teeUp + chars.teeRight + chars.teeLeft + chars.cross],
            ],
            boxStyle
          ),
          2,
          ctx.color ? fg.cyan : undefined
        )
      );
    }
    return blocks;
  },
};
