import { fg, style } from '../../renderer/ansi.js';
import { line, type Section, type SectionContext } from '../types.js';

interface GutterMarker {
  name: string;
  glyph: string;
  ascii: string;
}

export const GUTTER_MARKERS = {
  continuation: { name: 'continuation', glyph: '↪', ascii: '\\' },
  overflow: { name: 'overflow', glyph: '→', ascii: '>' },
  empty: { name: 'empty line', glyph: '∼', ascii: '~' },
  bookmark: { name: 'bookmark', glyph: '●', ascii: '*' },
} satisfies Record<string, GutterMarker>;

const SAMPLE: readonly { marker?: GutterMarker; text: string }[] = [
  { marker: GUTTER_MARKERS.bookmark, text: 'A bookmarked line' },
  { text: 'A long line that the window wraps onto' },
  { marker: GUTTER_MARKERS.continuation, text: 'a second visual line' },
  { marker: GUTTER_MARKERS.overflow, text: 'A line cut off at the right edge of the window that keeps go' },
  { marker: GUTTER_MARKERS.empty, text: '' },
  { marker: GUTTER_MARKERS.empty, text: '' },
];

export function markerGlyph(marker: GutterMarker, ctx: SectionContext): string {
  return ctx.canDisplay(marker.glyph) ? marker.glyph : marker.ascii;
}

export const gutterSection: Section = {
  id: 'gutter',
  title: 'Gutter indicators',
  description: 'Markers in a left gutter, the way editors flag wrapped, truncated and empty lines.',
  render(ctx) {
    const gutterStyle = ctx.color ? fg.gray : '';
    const reset = ctx.color ? style.reset : '';
    const rows = SAMPLE.map(({ marker, text }) => {
      const glyph = marker ? markerGlyph(marker, ctx) : ' ';
      return line(`  ${gutterStyle}${glyph}${reset} ${text}`);
    });
    const legend = Object.values(GUTTER_MARKERS)
      .map(marker => `${markerGlyph(marker, ctx)} ${marker.name}`)
      .join('   ');
    return [...rows, line(''), line(`  ${legend}`)];
  },
};
