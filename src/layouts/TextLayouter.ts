/**
 * TextLayouter - Shrink-to-fit and word wrapping for fixed card regions
 *
 * Every function here is a pure function of (text, box, font, sizes) plus
 * the measurer: same inputs, same line breaks, same final size.
 *
 * Overflow policy: sizes never go below the floor. Text that still does not
 * fit at the floor is truncated and ends in an ellipsis; it is never drawn
 * outside its box. Results report this as `truncated: true`.
 */

import { LayoutError } from '../errors';
import type { FontSpec, TextMeasurer } from './TextMeasurer';

export const ELLIPSIS = '…';
export const TYPE_LINE_SEPARATOR = ' — ';

/** Starting size, decrement and minimum size, in px */
export interface SizeRange {
  start: number;
  step: number;
  floor: number;
}

export interface FittedLine {
  text: string;
  fontSize: number;
  width: number;
  truncated: boolean;
}

export interface FittedParagraph {
  lines: string[];
  fontSize: number;
  lineHeight: number;
  truncated: boolean;
}

/**
 * Descending candidate sizes: start, start - step, ... and finally floor.
 */
export function sizeSteps({ start, step, floor }: SizeRange): number[] {
  if (floor <= 0 || step <= 0 || start < floor) {
    throw new LayoutError(`invalid size range ${start}/${step}/${floor}`);
  }
  const count = Math.ceil((start - floor) / step) + 1;
  const sizes: number[] = [];
  for (let i = 0; i < count; i++) {
    sizes.push(Math.max(floor, start - i * step));
  }
  return sizes;
}

/**
 * Longest prefix of `text` that still fits with a trailing ellipsis.
 * Falls back to the bare ellipsis.
 */
export function ellipsize(
  text: string,
  maxWidth: number,
  font: FontSpec,
  size: number,
  measurer: TextMeasurer,
): string {
  const chars = Array.from(text);
  for (let keep = chars.length; keep > 0; keep--) {
    const candidate = `${chars.slice(0, keep).join('').trimEnd()}${ELLIPSIS}`;
    if (measurer.measure(candidate, font, size) <= maxWidth) {
      return candidate;
    }
  }
  return ELLIPSIS;
}

/**
 * Single line, shrinking in fixed steps until it fits `maxWidth`.
 */
export function fitSingleLine(
  text: string,
  maxWidth: number,
  font: FontSpec,
  sizes: SizeRange,
  measurer: TextMeasurer,
): FittedLine {
  for (const size of sizeSteps(sizes)) {
    const width = measurer.measure(text, font, size);
    if (width <= maxWidth) {
      return { text, fontSize: size, width, truncated: false };
    }
  }

  const clipped = ellipsize(text, maxWidth, font, sizes.floor, measurer);
  return {
    text: clipped,
    fontSize: sizes.floor,
    width: measurer.measure(clipped, font, sizes.floor),
    truncated: true,
  };
}

/** Type plus optional subtype, e.g. "Creature — Bear" */
export function composeTypeLine(type: string, subtype?: string): string {
  return subtype ? `${type}${TYPE_LINE_SEPARATOR}${subtype}` : type;
}

function breakWord(
  word: string,
  maxWidth: number,
  font: FontSpec,
  size: number,
  measurer: TextMeasurer,
): string[] {
  const pieces: string[] = [];
  let piece = '';
  for (const char of Array.from(word)) {
    const candidate = piece + char;
    if (piece && measurer.measure(candidate, font, size) > maxWidth) {
      pieces.push(piece);
      piece = char;
    } else {
      piece = candidate;
    }
  }
  if (piece) pieces.push(piece);
  return pieces;
}

/**
 * Greedy word wrap. `\n` is a hard break; an empty paragraph yields an
 * empty line. Words wider than the box are broken between characters.
 */
export function wrapText(
  text: string,
  maxWidth: number,
  font: FontSpec,
  size: number,
  measurer: TextMeasurer,
): string[] {
  if (text.trim() === '') return [];

  const lines: string[] = [];
  for (const paragraph of text.split('\n')) {
    const words = paragraph.split(/\s+/).filter((word) => word.length > 0);
    let current = '';

    for (const word of words) {
      const candidate = current ? `${current} ${word}` : word;
      if (measurer.measure(candidate, font, size) <= maxWidth) {
        current = candidate;
        continue;
      }

      if (current) {
        lines.push(current);
        current = '';
      }

      if (measurer.measure(word, font, size) <= maxWidth) {
        current = word;
      } else {
        const pieces = breakWord(word, maxWidth, font, size, measurer);
        lines.push(...pieces.slice(0, -1));
        current = pieces[pieces.length - 1] ?? '';
      }
    }

    lines.push(current);
  }
  return lines;
}

/** Line advance for a font size (integer px) */
export function lineHeightFor(size: number, lineSpacing: number): number {
  return Math.round(size * lineSpacing);
}

/**
 * Wrap into a box, re-wrapping from scratch at each smaller size until the
 * block height fits. At the floor, keeps the lines that fit and ellipsizes
 * the last one.
 */
export function fitParagraph(
  text: string,
  box: { width: number; height: number },
  font: FontSpec,
  sizes: SizeRange,
  measurer: TextMeasurer,
  lineSpacing = 1.2,
): FittedParagraph {
  for (const size of sizeSteps(sizes)) {
    const lines = wrapText(text, box.width, font, size, measurer);
    const lineHeight = lineHeightFor(size, lineSpacing);
    if (lines.length * lineHeight <= box.height) {
      return { lines, fontSize: size, lineHeight, truncated: false };
    }
  }

  const size = sizes.floor;
  const lineHeight = lineHeightFor(size, lineSpacing);
  const maxLines = Math.max(0, Math.floor(box.height / lineHeight));
  const lines = wrapText(text, box.width, font, size, measurer).slice(0, maxLines);
  if (lines.length > 0) {
    const last = lines.length - 1;
    lines[last] = ellipsize(lines[last], box.width, font, size, measurer);
  }
  return { lines, fontSize: size, lineHeight, truncated: true };
}
