/**
 * Lays out every text region of one card. The compositor draws exactly
 * what this returns.
 */

import type { CardRecord } from '../types/card';
import type { TypographyConfig } from '../render/cards/CardConfig';
import type { CardLayout } from './CardLayout';
import { type CostLayout, layoutCost, parseCostTokens } from './CostLayouter';
import {
  type FittedLine,
  type FittedParagraph,
  composeTypeLine,
  fitParagraph,
  fitSingleLine,
} from './TextLayouter';
import type { FontSpec, TextMeasurer } from './TextMeasurer';

export interface CardFonts {
  title: FontSpec;
  body: FontSpec;
  symbol: FontSpec;
}

export interface CardTextLayout {
  title: FittedLine;
  typeLine: FittedLine;
  cost: CostLayout;
  body: FittedParagraph;
  /** Creatures only */
  strength: FittedLine | null;
}

export function strengthLabel(record: CardRecord): string | null {
  if (record.strength === undefined) return null;
  return `${record.strength}/${record.toughness ?? record.strength}`;
}

export function layoutCardText(
  record: CardRecord,
  layout: CardLayout,
  fonts: CardFonts,
  typography: TypographyConfig,
  measurer: TextMeasurer,
): CardTextLayout {
  const inset = typography.textInset;
  const titleText = typography.titleUppercase ? record.name.toUpperCase() : record.name;

  const title = fitSingleLine(titleText, layout.title.width - inset * 2, fonts.title, typography.titleSizes, measurer);

  const typeLine = fitSingleLine(
    composeTypeLine(record.type, record.subtype),
    layout.typeLine.width - inset * 2,
    fonts.title,
    typography.typeLineSizes,
    measurer,
  );

  const cost = layoutCost(
    parseCostTokens(record.cost),
    layout.cost,
    { symbol: fonts.symbol, literal: fonts.title },
    typography.costSizes,
    typography.costGap,
    measurer,
  );

  const body = fitParagraph(
    record.description,
    { width: layout.body.width - inset * 2, height: layout.body.height - inset * 2 },
    fonts.body,
    typography.bodySizes,
    measurer,
    typography.bodyLineSpacing,
  );

  const label = strengthLabel(record);
  const strength =
    label === null
      ? null
      : fitSingleLine(label, layout.strength.width - inset * 2, fonts.title, typography.strengthSizes, measurer);

  return { title, typeLine, cost, body, strength };
}
