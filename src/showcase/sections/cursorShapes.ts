import { cursorShapes, type CursorShape } from '../../renderer/ansi.js';
import { line, type Block, type Section } from '../types.js';

export const CURSOR_SHAPE_NAMES: readonly CursorShape[] = [
  'default',
  'blinkingBlock',
  'steadyBlock',
  'blinkingUnderline',
  'steadyUnderline',
  'blinkingBar',
  'steadyBar',
];

export const cursorShapesSection: Section = {
  id: 'cursor-shapes',
  title: 'Cursor shapes',
  description: 'Terminal cursor shapes set with DECSCUSR. In the pager, press 0 to 6 to try each one.',
  render() {
    const blocks: Block[] = CURSOR_SHAPE_NAMES.map(name => {
      const code = cursorShapes[name];
      return line(`  ${code}  ${name.padEnd(18)} ESC [ ${code} SP q`);
    });
    return blocks;
  },
};
