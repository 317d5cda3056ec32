/**
 * Glyph capability queries for terminals
 */

export type GlyphMode = 'auto' | 'unicode' | 'ascii';

export const GLYPH_MODES: readonly GlyphMode[] = ['auto', 'unicode', 'ascii'];

export type CapabilityQuery = (char: string) => boolean;

export function isGlyphMode(value: string): value is GlyphMode {
  return GLYPH_MODES.some(mode => mode === value);
}

// Box and block glyphs present in the VGA console font (code page 437)
const CP437_GLYPHS = new Set(
  '─│┌┐└┘├┤┬┴┼═║╒╓╔╕╖╗╘╙╚╛╜╝╞╟╠╡╢╣╤╥╦╧╨╩╪╫╬░▒▓█▄▌▐▀■'
);

export function isAsciiDisplayable(char: string): boolean {
  if (char === '\n' || char === '\t') return true;
  const code = char.codePointAt(0);
  return code !== undefined && code >= 0x20 && code < 0x7f;
}

export const unicodeQuery: CapabilityQuery = () => true;

export const asciiQuery: CapabilityQuery = isAsciiDisplayable;

export const consoleFontQuery: CapabilityQuery = (char) =>
  isAsciiDisplayable(char) || CP437_GLYPHS.has(char);

/**
 * Whether the locale advertises UTF-8. LC_ALL beats LC_CTYPE beats LANG.
 */
export function hasUtf8Locale(env: NodeJS.ProcessEnv = process.env): boolean {
  const locale = env.LC_ALL || env.LC_CTYPE || env.LANG || '';
  return /utf-?8/i.test(locale);
}

/**
 * Pick the capability query for a glyph mode. `auto` looks at the locale
 * and the terminal type.
 */
export function createCapabilityQuery(
  mode: GlyphMode,
  env: NodeJS.ProcessEnv = process.env
): CapabilityQuery {
  if (mode === 'unicode') return unicodeQuery;
  if (mode === 'ascii') return asciiQuery;

  if (!hasUtf8Locale(env)) return asciiQuery;
  if (env.TERM === 'linux') return consoleFontQuery;
  return unicodeQuery;
}
