import { createCanvas, type SKRSContext2D } from '@napi-rs/canvas';

export interface FontSpec {
  family: string;
  /** CSS font weight, e.g. 'bold' */
  weight?: string;
}

/**
 * Measures rendered text width. Layout functions only see this interface,
 * so they stay pure and testable with a fixed-advance stub.
 */
export interface TextMeasurer {
  measure(text: string, font: FontSpec, size: number): number;
}

/** CSS font shorthand for a canvas context */
export function cssFont(font: FontSpec, size: number): string {
  const weight = font.weight ? `${font.weight} ` : '';
  return `${weight}${size}px "${font.family}"`;
}

/**
 * Measurer backed by a 1×1 canvas context, so measurements match exactly
 * what the compositor draws.
 */
export class CanvasTextMeasurer implements TextMeasurer {
  private readonly ctx: SKRSContext2D;

  constructor() {
    this.ctx = createCanvas(1, 1).getContext('2d');
  }

  measure(text: string, font: FontSpec, size: number): number {
    this.ctx.font = cssFont(font, size);
    return this.ctx.measureText(text).width;
  }
}
