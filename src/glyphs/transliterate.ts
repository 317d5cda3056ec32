/**
 * Box-drawing to ASCII transliteration
 *
 * Some fonts draw box-drawing glyphs at inconsistent cell widths, which
 * breaks table alignment. Mapping every glyph to a single ASCII character
 * keeps the layout intact at the cost of looks.
 */

export type GlyphRule =
  | { kind: 'range'; from: number; to: number; replacement: string }
  | { kind: 'set'; chars: ReadonlySet<string>; replacement: string }
  | { kind: 'parity'; from: number; to: number; even: string; odd: string };

const range = (from: number, to: number, replacement: string): GlyphRule => ({
  kind: 'range',
  from,
  to,
  replacement,
});

const set = (chars: string, replacement: string): GlyphRule => ({
  kind: 'set',
  chars: new Set(chars),
  replacement,
});

/**
 * Ordered rule table. The first matching rule wins; ranges are half-open.
 */
export const GLYPH_RULES: readonly GlyphRule[] = Object.freeze([
  range(0x2500, 0x2502, '-'), // light/heavy horizontal
  range(0x2502, 0x2504, '|'), // light/heavy vertical
  range(0x2504, 0x2506, '-'), // triple dash horizontal
  range(0x2506, 0x2508, '|'), // triple dash vertical
  range(0x2508, 0x250a, '-'), // quadruple dash horizontal
  range(0x250a, 0x250c, '|'), // quadruple dash vertical
  range(0x250c, 0x251c, '-'), // corners
  range(0x251c, 0x2524, '|'), // left tees
  range(0x2524, 0x252c, '|'), // right tees
  range(0x252c, 0x2534, '-'), // top tees
  range(0x2534, 0x253c, '-'), // bottom tees
  range(0x253c, 0x254c, '+'), // crosses
  range(0x254c, 0x254e, '-'), // double dash horizontal
  range(0x254e, 0x2550, '|'), // double dash vertical
  set('═╒╔╕╗╘╚╛╝', '='),
  // Vertical double lines come out as '-'. Kept as-is until someone
  // confirms against a real rendering that '|' was intended.
  set('║╓╖╙╜', '-'),
  set('╞╠╡╣╤╦╧╩╪╬', '='),
  set('╟╢╥╨╫', '-'),
  set('╭╯╱', '/'),
  set('╮╰╲', '\\'),
  set('╳', 'X'),
  // Half lines alternate horizontal/vertical by code point
  { kind: 'parity', from: 0x2574, to: 0x2580, even: '-', odd: '|' },
]);

function matches(rule: GlyphRule, char: string, codePoint: number): string | undefined {
  switch (rule.kind) {
    case 'range':
      return codePoint >= rule.from && codePoint < rule.to ? rule.replacement : undefined;
    case 'set':
      return rule.chars.has(char) ? rule.replacement : undefined;
    case 'parity':
      if (codePoint < rule.from || codePoint >= rule.to) return undefined;
      return codePoint % 2 === 0 ? rule.even : rule.odd;
  }
}

/**
 * Map a single character to its ASCII stand-in, or return it unchanged
 */
export function classify(char: string): string {
  const codePoint = char.codePointAt(0);
  if (codePoint === undefined) return char;

  for (const rule of GLYPH_RULES) {
    const replacement = matches(rule, char, codePoint);
    if (replacement !== undefined) return replacement;
  }
  return char;
}

/**
 * Transliterate every character of `text`. Output has the same length and
 * the same character positions as the input.
 */
export function transliterate(text: string): string {
  let result = '';
  for (const char of text) {
    result += classify(char);
  }
  return result;
}
