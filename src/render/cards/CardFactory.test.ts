import { describe, expect, it } from 'vitest';
import { parseCardRecord } from '../../records/cardRecord';
import { testBearRow } from '../../testing/fixtures';
import { CardFactory } from './CardFactory';
import { CreatureCanvasCard } from './CreatureCanvasCard';
import { SpellCanvasCard } from './SpellCanvasCard';

const creature = parseCardRecord(testBearRow(), 1);
const spell = parseCardRecord(testBearRow({ name: 'Quick Shock', type: 'Spell', subtype: '', strength: '' }), 2);

describe('CardFactory', () => {
  const factory = new CardFactory();

  it('picks the renderer from the card type', () => {
    expect(factory.createCard(creature)).toBeInstanceOf(CreatureCanvasCard);
    expect(factory.createCard(spell)).toBeInstanceOf(SpellCanvasCard);
  });

  it('honors a type override', () => {
    expect(factory.createCard(creature, 'Spell')).toBeInstanceOf(SpellCanvasCard);
  });

  it('keeps the record on the card', () => {
    expect(factory.createCard(spell).getRecord()).toBe(spell);
  });

  it('returns a new factory from withConfig', () => {
    const styled = factory.withConfig({ frameStyle: { artBorderWidth: 0 } });
    expect(styled).not.toBe(factory);
    expect(styled.createCard(creature)).toBeInstanceOf(CreatureCanvasCard);
  });
});
