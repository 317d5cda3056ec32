import { alignText, textWidth, toPixels, type Align } from '../../utils/width.js';
import { blank, line, type Block, type Section } from '../types.js';

const COLUMN = 28;

const SAMPLES: readonly { text: string; align: Align }[] = [
  { text: 'left aligned', align: 'left' },
  { text: 'centered', align: 'center' },
  { text: 'right aligned', align: 'right' },
  { text: '日本語 wide', align: 'right' },
  { text: 'mixed 漢字 and ascii', align: 'center' },
];

export const alignmentSection: Section = {
  id: 'alignment',
  title: 'Alignment',
  description:
    'Text padded to a fixed column. Widths are measured in terminal cells, so wide characters count twice.',
  render(ctx) {
    const blocks: Block[] = [];
    // Wide samples are skipped where the terminal cannot draw them
    const samples = SAMPLES.filter(sample => [...sample.text].every(char => ctx.canDisplay(char)));
    for (const sample of samples) {
      const cells = textWidth(sample.text);
      const px = toPixels(cells, ctx.cellWidthPx);
      blocks.push(
        line(`  |${alignText(sample.text, COLUMN, sample.align)}|  ${sample.align.padEnd(6)} ${cells} cells, ${px}px`)
      );
    }
    blocks.push(blank);
    blocks.push(line(`  column: ${COLUMN} cells = ${toPixels(COLUMN, ctx.cellWidthPx)}px at ${ctx.cellWidthPx}px per cell`));
    return blocks;
  },
};
