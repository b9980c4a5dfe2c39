/**
 * Card Configuration Types
 *
 * Typography, size ranges and frame styling for rendered cards.
 */

import type { SizeRange } from '../../layouts/TextLayouter';
import type { CardColor } from '../../types/card';

/**
 * Typography configuration
 */
export interface TypographyConfig {
  /** Title shrink-to-fit range */
  titleSizes: SizeRange;

  /** Type line shrink-to-fit range */
  typeLineSizes: SizeRange;

  /** Body shrink-to-fit range */
  bodySizes: SizeRange;

  /** Cost symbol range */
  costSizes: SizeRange;

  /** Strength box range */
  strengthSizes: SizeRange;

  /** Body line advance as a multiple of font size */
  bodyLineSpacing: number;

  /** Horizontal space between cost symbols */
  costGap: number;

  /** Inner padding of every text box */
  textInset: number;

  /** Render the title in capitals */
  titleUppercase: boolean;

  /** Title fill */
  titleColor: string;

  /** Title outline */
  titleStrokeColor: string;

  /** Title outline width */
  titleStrokeWidth: number;

  /** Type line, body and strength text */
  textColor: string;
}

/**
 * Frame and artwork styling
 */
export interface FrameStyleConfig {
  /** Border drawn around the art window */
  artBorderWidth: number;
  artBorderColor: string;

  /** Fill behind missing artwork */
  placeholderColor: string;

  /** Cross drawn over missing artwork */
  placeholderMarkColor: string;

  /** Outline of the strength box */
  strengthOutlineWidth: number;
  strengthOutlineColor: string;

  /** Corner radius of the strength box (0 = square) */
  strengthCornerRadius: number;
}

export const DEFAULT_TYPOGRAPHY: TypographyConfig = {
  titleSizes: { start: 60, step: 2, floor: 28 },
  typeLineSizes: { start: 36, step: 2, floor: 20 },
  bodySizes: { start: 34, step: 2, floor: 18 },
  costSizes: { start: 44, step: 2, floor: 24 },
  strengthSizes: { start: 40, step: 2, floor: 20 },
  bodyLineSpacing: 1.2,
  costGap: 4,
  textInset: 8,
  titleUppercase: true,
  titleColor: '#ffffff',
  titleStrokeColor: '#000000',
  titleStrokeWidth: 2,
  textColor: '#000000',
};

export const DEFAULT_FRAME_STYLE: FrameStyleConfig = {
  artBorderWidth: 4,
  artBorderColor: '#000000',
  placeholderColor: '#d8d8d8',
  placeholderMarkColor: '#a0a0a0',
  strengthOutlineWidth: 2,
  strengthOutlineColor: '#000000',
  strengthCornerRadius: 6,
};

/** Flat background fill per color when no pattern image exists */
export const COLOR_FILLS: Readonly<Record<CardColor, string>> = {
  White: '#f4efdc',
  Blue: '#c6dcef',
  Black: '#3b3533',
  Red: '#e8b49a',
  Green: '#b7d2b0',
};
