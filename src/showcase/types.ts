import type { CapabilityQuery } from '../glyphs/capability.js';
import type { BoxStyle } from '../renderer/components/Box.js';
import type { ViewportDecoration } from './viewports.js';

/**
 * One unit of section output. Table blocks go through the ASCII fallback.
 */
export type Block =
  | { kind: 'line'; text: string; style?: string }
  | { kind: 'table'; text: string; style?: string; indent?: number };

export interface SectionContext {
  /** Document width in cells */
  width: number;
  canDisplay: CapabilityQuery;
  color: boolean;
  boxStyle: BoxStyle;
  cellWidthPx: number;
  viewports: readonly ViewportDecoration[];
}

export interface Section {
  readonly id: string;
  readonly title: string;
  readonly description: string;
  render(ctx: SectionContext): Block[];
}

export const line = (text: string, style?: string): Block => ({ kind: 'line', text, style });

export const table = (text: string, indent = 2, style?: string): Block => ({ kind: 'table', text, indent, style });

export const blank: Block = { kind: 'line', text: '' };
