import { describe, expect, it } from 'vitest';
import { DEFAULT_TYPOGRAPHY } from '../render/cards/CardConfig';
import { parseCardRecord } from '../records/cardRecord';
import { FixedAdvanceMeasurer, testBearRow } from '../testing/fixtures';
import { createCardLayout } from './CardLayout';
import { layoutCardText, strengthLabel } from './CardTextLayouter';

const measurer = new FixedAdvanceMeasurer();
const layout = createCardLayout();
const fonts = {
  title: { family: 'title', weight: 'bold' },
  body: { family: 'body' },
  symbol: { family: 'symbols' },
};

describe('layoutCardText', () => {
  it('lays out the Test Bear', () => {
    const record = parseCardRecord(testBearRow(), 1);
    const text = layoutCardText(record, layout, fonts, DEFAULT_TYPOGRAPHY, measurer);

    expect(text.title).toEqual({ text: 'TEST BEAR', fontSize: 60, width: 270, truncated: false });
    expect(text.typeLine).toEqual({ text: 'Creature — Bear', fontSize: 36, width: 270, truncated: false });
    expect(text.cost.tokens.map((token) => token.x)).toEqual([604, 630]);
    expect(text.body.fontSize).toBe(34);
    expect(text.body.truncated).toBe(false);
    expect(text.strength).toEqual({ text: '2/2', fontSize: 40, width: 60, truncated: false });
  });

  it('keeps the title case when uppercasing is off', () => {
    const record = parseCardRecord(testBearRow(), 1);
    const text = layoutCardText(record, layout, fonts, { ...DEFAULT_TYPOGRAPHY, titleUppercase: false }, measurer);
    expect(text.title.text).toBe('Test Bear');
  });

  it('has no strength line for spells', () => {
    const record = parseCardRecord(testBearRow({ type: 'Spell', subtype: '', strength: '' }), 1);
    const text = layoutCardText(record, layout, fonts, DEFAULT_TYPOGRAPHY, measurer);

    expect(text.strength).toBeNull();
    expect(text.typeLine.text).toBe('Spell');
  });

  it('shrinks a long title and never goes below its floor', () => {
    const record = parseCardRecord(testBearRow({ name: 'Grizzled Elder Bear of the Northern Wood' }), 1);
    const text = layoutCardText(record, layout, fonts, DEFAULT_TYPOGRAPHY, measurer);

    expect(text.title.fontSize).toBe(DEFAULT_TYPOGRAPHY.titleSizes.floor);
    expect(text.title.width).toBeLessThanOrEqual(layout.title.width - DEFAULT_TYPOGRAPHY.textInset * 2);
  });
});

describe('strengthLabel', () => {
  it('falls back to strength when toughness is absent', () => {
    expect(strengthLabel(parseCardRecord(testBearRow({ strength: '3' }), 1))).toBe('3/3');
  });

  it('uses toughness when given', () => {
    expect(strengthLabel(parseCardRecord(testBearRow({ strength: '1', toughness: '4' }), 1))).toBe('1/4');
  });
});
