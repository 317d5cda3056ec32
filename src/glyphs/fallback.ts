/**
 * Table rendering with ASCII fallback
 */

import { transliterate } from './transliterate.js';
import type { CapabilityQuery } from './capability.js';
import type { RenderSurface } from '../renderer/Screen.js';
import { RenderError, ProbeUnavailableError } from '../errors.js';
import { logger } from '../utils/logger.js';

export type TableRender =
  | { mode: 'kept'; text: string }
  | { mode: 'fallback'; text: string };

export interface DrawTableResult {
  mode: TableRender['mode'];
  /** Row below the last line drawn */
  nextY: number;
}

/**
 * Keep the text when every character displays, otherwise transliterate it
 */
export function renderTable(text: string, canDisplay: CapabilityQuery): TableRender {
  for (const char of text) {
    if (!canDisplay(char)) {
      return { mode: 'fallback', text: transliterate(text) };
    }
  }
  return { mode: 'kept', text };
}

function writeBlock(surface: RenderSurface, x: number, y: number, text: string, textStyle: string): number {
  const lines = text.split('\n');
  lines.forEach((line, i) => surface.write(x, y + i, line, textStyle));
  return y + lines.length;
}

/**
 * Draw a table onto a surface.
 *
 * The surface is probed before anything is written. Only when it cannot
 * answer is the table written optimistically; a RenderError then rolls the
 * attempt back and the ASCII version is written instead.
 */
export function drawTable(
  surface: RenderSurface,
  x: number,
  y: number,
  text: string,
  textStyle = ''
): DrawTableResult {
  let decided: TableRender;
  try {
    decided = renderTable(text, char => surface.canDisplay(char));
  } catch (err) {
    if (!(err instanceof ProbeUnavailableError)) throw err;
    return drawOptimistic(surface, x, y, text, textStyle);
  }

  if (decided.mode === 'fallback') {
    logger.debug('Table drawn with ASCII fallback', { x, y });
  }
  return { mode: decided.mode, nextY: writeBlock(surface, x, y, decided.text, textStyle) };
}

function drawOptimistic(
  surface: RenderSurface,
  x: number,
  y: number,
  text: string,
  textStyle: string
): DrawTableResult {
  try {
    const nextY = surface.transaction(() => writeBlock(surface, x, y, text, textStyle));
    return { mode: 'kept', nextY };
  } catch (err) {
    if (!(err instanceof RenderError)) throw err;
    logger.debug('Table rejected by surface, drawing ASCII fallback', { char: err.char, x: err.x, y: err.y });
    return { mode: 'fallback', nextY: writeBlock(surface, x, y, transliterate(text), textStyle) };
  }
}
