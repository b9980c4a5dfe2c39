/**
 * CardFactory - Factory for creating card renderer instances
 *
 * Picks the card class from the record's type and hands it the shared
 * typography and frame styling.
 *
 * Usage:
 * ```typescript
 * const factory = new CardFactory({ typography: { titleUppercase: false } });
 * const card = factory.createCard(record);
 * card.render(context);
 * ```
 */

import type { CardRecord, CardType } from '../../types/card';
import type { BaseCanvasCard } from './BaseCanvasCard';
import type { FrameStyleConfig, TypographyConfig } from './CardConfig';
import { CreatureCanvasCard } from './CreatureCanvasCard';
import { SpellCanvasCard } from './SpellCanvasCard';

/**
 * Factory configuration
 */
export interface CardFactoryConfig {
  /** Typography overrides */
  typography?: Partial<TypographyConfig>;

  /** Frame styling overrides */
  frameStyle?: Partial<FrameStyleConfig>;
}

export class CardFactory {
  private readonly config: CardFactoryConfig;

  constructor(config: CardFactoryConfig = {}) {
    this.config = { ...config };
  }

  /**
   * Create a card instance for the given record
   *
   * @param typeOverride - Render as another card type
   */
  createCard(record: CardRecord, typeOverride?: CardType): BaseCanvasCard {
    const cardType = typeOverride ?? record.type;

    switch (cardType) {
      case 'Creature':
        return new CreatureCanvasCard(record, this.config.typography, this.config.frameStyle);

      case 'Spell':
        return new SpellCanvasCard(record, this.config.typography, this.config.frameStyle);
    }
  }

  /**
   * Create a new factory with updated configuration
   */
  withConfig(config: CardFactoryConfig): CardFactory {
    return new CardFactory({ ...this.config, ...config });
  }
}
