import { transliterate } from '../../glyphs/transliterate.js';
import { line, table, type Block, type Section } from '../types.js';

const BLOCK_START = 0x2500;
const BLOCK_END = 0x2580;
const PER_ROW = 16;

export const transliterationSection: Section = {
  id: 'transliteration',
  title: 'Transliteration',
  description: 'The Box Drawing block, U+2500 to U+257F, next to the ASCII each glyph falls back to.',
  render() {
    const blocks: Block[] = [line('  code    glyphs            ascii')];
    for (let start = BLOCK_START; start < BLOCK_END; start += PER_ROW) {
      let glyphs = '';
      for (let cp = start; cp < start + PER_ROW; cp++) {
        glyphs += String.fromCodePoint(cp);
      }
      const code = `U+${start.toString(16).toUpperCase()}`;
      blocks.push(table(`${code}  ${glyphs}  ${transliterate(glyphs)}`));
    }
    return blocks;
  },
};
