import { describe, expect, it } from 'vitest';
import { FixedAdvanceMeasurer, TEST_FONT } from '../testing/fixtures';
import { SYMBOL_GLYPHS, layoutCost, parseCostTokens } from './CostLayouter';

const measurer = new FixedAdvanceMeasurer();
const fonts = { symbol: { family: 'symbols' }, literal: TEST_FONT };
const box = { x: 520, y: 98, width: 132, height: 64 };
const sizes = { start: 44, step: 2, floor: 24 };

describe('parseCostTokens', () => {
  it('maps known tokens to symbol glyphs', () => {
    expect(parseCostTokens('{2}{R}')).toEqual([
      { raw: '2', glyph: '2', symbol: true },
      { raw: 'R', glyph: 'R', symbol: true },
    ]);
  });

  it('looks tokens up case-insensitively', () => {
    expect(parseCostTokens('{g}')).toEqual([{ raw: 'g', glyph: 'G', symbol: true }]);
  });

  it('draws two-digit costs as digits in the symbol font', () => {
    expect(parseCostTokens('{12}')).toEqual([{ raw: '12', glyph: '12', symbol: true }]);
    expect(SYMBOL_GLYPHS['20']).toBe('20');
    expect(SYMBOL_GLYPHS['21']).toBeUndefined();
  });

  it('keeps unknown tokens and stray text as literals', () => {
    expect(parseCostTokens('X{1}{P}')).toEqual([
      { raw: 'X', glyph: 'X', symbol: false },
      { raw: '1', glyph: '1', symbol: true },
      { raw: 'P', glyph: 'P', symbol: false },
    ]);
  });

  it('skips empty braces and blank input', () => {
    expect(parseCostTokens('{}{ }')).toEqual([]);
    expect(parseCostTokens('')).toEqual([]);
  });
});

describe('layoutCost', () => {
  it('right-aligns the row at the starting size', () => {
    const layout = layoutCost(parseCostTokens('{1}{G}'), box, fonts, sizes, 4, measurer);

    expect(layout.fontSize).toBe(44);
    expect(layout.truncated).toBe(false);
    expect(layout.centerY).toBe(130);
    expect(layout.tokens.map(({ glyph, x, width }) => ({ glyph, x, width }))).toEqual([
      { glyph: '1', x: 604, width: 22 },
      { glyph: 'G', x: 630, width: 22 },
    ]);
  });

  it('drops leftmost tokens at the floor when the row still overflows', () => {
    const layout = layoutCost(parseCostTokens('{1}{2}{3}{4}{5}{6}{7}{8}{9}{W}{U}'), box, fonts, sizes, 4, measurer);

    expect(layout.fontSize).toBe(24);
    expect(layout.truncated).toBe(true);
    expect(layout.tokens.map((token) => token.glyph)).toEqual(['4', '5', '6', '7', '8', '9', 'W', 'U']);
    expect(layout.tokens[0].x).toBe(528);

    const last = layout.tokens[layout.tokens.length - 1];
    expect(last.x + last.width).toBe(box.x + box.width);
  });

  it('lays out an empty cost as an empty row', () => {
    const layout = layoutCost([], box, fonts, sizes, 4, measurer);
    expect(layout.tokens).toEqual([]);
    expect(layout.truncated).toBe(false);
  });
});
