import { fg, style } from '../../renderer/ansi.js';
import { line, type Section } from '../types.js';

export const viewportsSection: Section = {
  id: 'viewports',
  title: 'Viewports',
  description: 'One decoration per active viewport. Resizing the terminal updates the decoration of the main viewport.',
  render(ctx) {
    if (ctx.viewports.length === 0) {
      return [line('  (no active viewports)')];
    }
    return ctx.viewports.map(decoration => {
      const swatch = ctx.canDisplay('█') ? '████' : '####';
      const { r, g, b } = decoration.color;
      const painted = ctx.color ? `${fg.rgb(r, g, b)}${swatch}${style.reset}` : swatch;
      return line(`  ${painted} ${decoration.label}`);
    });
  },
};
