/**
 * CostLayouter - Cost string to right-aligned symbol glyphs
 *
 * "{2}{R}" is parsed into brace-delimited tokens. Known tokens map to one
 * glyph of the symbol font; anything else (unknown tokens, text outside
 * braces) is drawn literally in the fallback font.
 */

import type { FontSpec, TextMeasurer } from './TextMeasurer';
import { type SizeRange, sizeSteps } from './TextLayouter';

function buildGlyphTable(): Readonly<Record<string, string>> {
  const table: Record<string, string> = {};
  for (const letter of ['W', 'U', 'B', 'R', 'G', 'C', 'X', 'Y', 'Z', 'S', 'T', 'Q', 'E']) {
    table[letter] = letter;
  }
  // Numerals use the font's plain digit glyphs; "12" is two of them
  for (let n = 0; n <= 20; n++) {
    table[String(n)] = String(n);
  }
  return Object.freeze(table);
}

/** Token (upper-cased, without braces) to symbol-font glyph */
export const SYMBOL_GLYPHS = buildGlyphTable();

export interface CostToken {
  /** Token text without braces, as written */
  raw: string;
  /** Text to draw */
  glyph: string;
  /** Drawn with the symbol font when true */
  symbol: boolean;
}

export interface PlacedToken extends CostToken {
  x: number;
  width: number;
}

export interface CostLayout {
  tokens: PlacedToken[];
  fontSize: number;
  /** Vertical center of the row */
  centerY: number;
  truncated: boolean;
}

export function parseCostTokens(cost: string): CostToken[] {
  const tokens: CostToken[] = [];
  const pattern = /\{([^{}]*)\}/g;
  let cursor = 0;

  const pushLiteral = (text: string) => {
    const trimmed = text.trim();
    if (trimmed) tokens.push({ raw: trimmed, glyph: trimmed, symbol: false });
  };

  for (const match of cost.matchAll(pattern)) {
    const index = match.index ?? 0;
    pushLiteral(cost.slice(cursor, index));
    cursor = index + match[0].length;

    const raw = match[1].trim();
    if (!raw) continue;
    const glyph = SYMBOL_GLYPHS[raw.toUpperCase()];
    tokens.push(glyph === undefined ? { raw, glyph: raw, symbol: false } : { raw, glyph, symbol: true });
  }
  pushLiteral(cost.slice(cursor));

  return tokens;
}

export interface CostFonts {
  symbol: FontSpec;
  literal: FontSpec;
}

/**
 * Right-align tokens inside the cost box, shrinking until the row fits.
 * At the floor size the leftmost tokens are dropped until it does.
 */
export function layoutCost(
  tokens: CostToken[],
  box: { x: number; y: number; width: number; height: number },
  fonts: CostFonts,
  sizes: SizeRange,
  gap: number,
  measurer: TextMeasurer,
): CostLayout {
  const centerY = box.y + box.height / 2;
  const measureAll = (size: number) =>
    tokens.map((token) => measurer.measure(token.glyph, token.symbol ? fonts.symbol : fonts.literal, size));
  const rowWidth = (widths: number[]) =>
    widths.reduce((sum, width) => sum + width, 0) + gap * Math.max(0, widths.length - 1);

  const place = (kept: CostToken[], widths: number[], size: number, truncated: boolean): CostLayout => {
    let x = box.x + box.width - rowWidth(widths);
    const placed = kept.map((token, i) => {
      const item = { ...token, x, width: widths[i] };
      x += widths[i] + gap;
      return item;
    });
    return { tokens: placed, fontSize: size, centerY, truncated };
  };

  for (const size of sizeSteps(sizes)) {
    const widths = measureAll(size);
    if (rowWidth(widths) <= box.width) {
      return place(tokens, widths, size, false);
    }
  }

  const widths = measureAll(sizes.floor);
  let first = 0;
  while (first < tokens.length && rowWidth(widths.slice(first)) > box.width) {
    first++;
  }
  return place(tokens.slice(first), widths.slice(first), sizes.floor, true);
}
