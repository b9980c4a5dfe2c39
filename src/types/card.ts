export const CARD_TYPES = ['Creature', 'Spell'] as const;
export type CardType = (typeof CARD_TYPES)[number];

export const CARD_COLORS = ['White', 'Blue', 'Black', 'Red', 'Green'] as const;
export type CardColor = (typeof CARD_COLORS)[number];

/** One parsed row of card data. Frozen once built. */
export interface CardRecord {
  readonly name: string;
  readonly cost: string;
  readonly type: CardType;
  readonly subtype?: string;
  readonly color: CardColor;
  readonly artFile?: string;
  /** Present iff type is Creature */
  readonly strength?: number;
  /** Creatures only; rendered as strength when absent */
  readonly toughness?: number;
  readonly description: string;
}

/** Raw header-keyed cells as they come from the data source */
export type CardRow = Record<string, string | undefined>;

export interface SourceRow {
  /** 1-based data row number (header excluded) */
  rowIndex: number;
  cells: CardRow;
}
