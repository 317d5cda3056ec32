import Conf from 'conf';
import { isGlyphMode, type GlyphMode } from '../glyphs/capability.js';
import { isBoxStyle, type BoxStyle } from '../renderer/components/Box.js';
import { logger } from '../utils/logger.js';

interface ConfigSchema {
  glyphMode: GlyphMode;
  boxStyle: BoxStyle;
  sections: string[]; // Enabled section ids, empty = all
  color: boolean;
  cellWidthPx: number; // Used to report pixel widths
}

export type { ConfigSchema };

export const GLYPHS_ENV = 'BOXFALL_GLYPHS';

export const config = new Conf<ConfigSchema>({
  projectName: 'boxfall',
  defaults: {
    glyphMode: 'auto',
    boxStyle: 'rounded',
    sections: [],
    color: true,
    cellWidthPx: 8,
  },
});

/**
 * Glyph mode: BOXFALL_GLYPHS wins over the stored setting
 */
export function getGlyphMode(): GlyphMode {
  const fromEnv = process.env[GLYPHS_ENV];
  if (fromEnv) {
    if (isGlyphMode(fromEnv)) return fromEnv;
    logger.warn('Ignoring invalid glyph mode from environment', { [GLYPHS_ENV]: fromEnv });
  }

  const stored = config.get('glyphMode');
  return isGlyphMode(stored) ? stored : 'auto';
}

export function setGlyphMode(mode: GlyphMode): void {
  config.set('glyphMode', mode);
}

export function getBoxStyle(): BoxStyle {
  const stored = config.get('boxStyle');
  return isBoxStyle(stored) ? stored : 'rounded';
}

/**
 * Enabled section ids; an empty list means every section
 */
export function getEnabledSections(): string[] {
  return config.get('sections').filter(id => id.trim().length > 0);
}

export function isColorEnabled(): boolean {
  // https://no-color.org
  if (process.env.NO_COLOR) return false;
  return config.get('color');
}

export function getCellWidthPx(): number {
  const value = config.get('cellWidthPx');
  return Number.isFinite(value) && value > 0 ? value : 8;
}
