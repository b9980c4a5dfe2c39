/**
 * BaseCanvasCard - Abstract base class for all card renderers
 *
 * Provides common functionality for:
 * - Image drawing with cover mode and placeholder fallback
 * - Rounded/plain box fills and outlines
 * - Single-line and multi-line text drawing from a precomputed layout
 *
 * All concrete card implementations must extend this class.
 */

import type { Image, SKRSContext2D } from '@napi-rs/canvas';
import type { CardRecord } from '../../types/card';
import type { CardLayout } from '../../layouts/CardLayout';
import type { CardTextLayout } from '../../layouts/CardTextLayouter';
import { type FontSpec, cssFont } from '../../layouts/TextMeasurer';
import type { ResolvedAssets } from '../../services/AssetResolver';
import {
  type FrameStyleConfig,
  type TypographyConfig,
  DEFAULT_FRAME_STYLE,
  DEFAULT_TYPOGRAPHY,
} from './CardConfig';

/**
 * Render context passed to card render method
 */
export interface CardRenderContext {
  /** Canvas 2D rendering context (working resolution) */
  ctx: SKRSContext2D;

  /** Canvas width */
  width: number;

  /** Canvas height */
  height: number;

  /** Resolved frame, art and textures for this card */
  assets: ResolvedAssets;

  /** Region table */
  layout: CardLayout;

  /** Fitted text for every region */
  text: CardTextLayout;
}

export type TextAlign = 'left' | 'center' | 'right';

/**
 * Abstract base class for canvas cards
 */
export abstract class BaseCanvasCard {
  /** Card data to render */
  protected readonly record: CardRecord;

  /** Typography configuration */
  protected readonly typography: TypographyConfig;

  /** Frame styling */
  protected readonly frameStyle: FrameStyleConfig;

  constructor(
    record: CardRecord,
    typography: Partial<TypographyConfig> = {},
    frameStyle: Partial<FrameStyleConfig> = {},
  ) {
    this.record = record;
    this.typography = { ...DEFAULT_TYPOGRAPHY, ...typography };
    this.frameStyle = { ...DEFAULT_FRAME_STYLE, ...frameStyle };
  }

  /**
   * Render the card - must be implemented by subclasses
   */
  abstract render(context: CardRenderContext): void;

  getRecord(): CardRecord {
    return this.record;
  }

  /**
   * Create a rounded rectangle path
   */
  protected createRoundedRectPath(
    ctx: SKRSContext2D,
    x: number,
    y: number,
    width: number,
    height: number,
    radius: number,
  ): void {
    // Clamp radius to half the smallest dimension
    const r = Math.min(radius, width / 2, height / 2);

    ctx.beginPath();
    ctx.roundRect(x, y, width, height, r);
    ctx.closePath();
  }

  /**
   * Cover geometry: scale to fill the target, center-crop the overflow
   */
  protected coverRect(
    img: { width: number; height: number },
    width: number,
    height: number,
  ): { offsetX: number; offsetY: number; drawWidth: number; drawHeight: number } {
    const imgAspect = img.width / img.height;
    const targetAspect = width / height;

    let drawWidth = width;
    let drawHeight = height;
    let offsetX = 0;
    let offsetY = 0;

    if (imgAspect > targetAspect) {
      // Image wider than container
      drawHeight = height;
      drawWidth = height * imgAspect;
      offsetX = -(drawWidth - width) / 2;
    } else {
      // Image taller than container
      drawWidth = width;
      drawHeight = width / imgAspect;
      offsetY = -(drawHeight - height) / 2;
    }

    return { offsetX, offsetY, drawWidth, drawHeight };
  }

  /**
   * Draw image with cover mode (fills area, crops overflow), clipped to the area
   */
  protected drawImageCover(
    ctx: SKRSContext2D,
    img: Image,
    x: number,
    y: number,
    width: number,
    height: number,
  ): void {
    const { offsetX, offsetY, drawWidth, drawHeight } = this.coverRect(img, width, height);

    ctx.save();
    ctx.beginPath();
    ctx.rect(x, y, width, height);
    ctx.clip();
    ctx.drawImage(img, x + offsetX, y + offsetY, drawWidth, drawHeight);
    ctx.restore();
  }

  /**
   * Draw placeholder where artwork is missing: flat fill and a diagonal cross
   */
  protected drawImagePlaceholder(
    ctx: SKRSContext2D,
    x: number,
    y: number,
    width: number,
    height: number,
  ): void {
    ctx.save();
    ctx.fillStyle = this.frameStyle.placeholderColor;
    ctx.fillRect(x, y, width, height);

    ctx.strokeStyle = this.frameStyle.placeholderMarkColor;
    ctx.lineWidth = 2;
    ctx.beginPath();
    ctx.moveTo(x, y);
    ctx.lineTo(x + width, y + height);
    ctx.moveTo(x + width, y);
    ctx.lineTo(x, y + height);
    ctx.stroke();
    ctx.restore();
  }

  /**
   * Stroke a rectangle outline centered on its edges
   */
  protected drawOutline(
    ctx: SKRSContext2D,
    x: number,
    y: number,
    width: number,
    height: number,
    lineWidth: number,
    color: string,
  ): void {
    ctx.save();
    ctx.strokeStyle = color;
    ctx.lineWidth = lineWidth;
    ctx.strokeRect(x, y, width, height);
    ctx.restore();
  }

  /**
   * Draw one line, vertically centered on `centerY`
   */
  protected drawLine(
    ctx: SKRSContext2D,
    text: string,
    x: number,
    centerY: number,
    font: FontSpec,
    fontSize: number,
    options: { color: string; align?: TextAlign; strokeColor?: string; strokeWidth?: number },
  ): void {
    if (!text) return;

    ctx.save();
    ctx.font = cssFont(font, fontSize);
    ctx.textAlign = options.align ?? 'left';
    ctx.textBaseline = 'middle';

    if (options.strokeColor && options.strokeWidth) {
      ctx.strokeStyle = options.strokeColor;
      ctx.lineWidth = options.strokeWidth * 2;
      ctx.lineJoin = 'round';
      ctx.strokeText(text, x, centerY);
    }
    ctx.fillStyle = options.color;
    ctx.fillText(text, x, centerY);
    ctx.restore();
  }

  /**
   * Draw wrapped lines top-down from `startY`
   *
   * @returns Y position after the last line
   */
  protected drawLines(
    ctx: SKRSContext2D,
    lines: string[],
    x: number,
    startY: number,
    font: FontSpec,
    fontSize: number,
    lineHeight: number,
    color: string,
  ): number {
    ctx.save();
    ctx.font = cssFont(font, fontSize);
    ctx.textAlign = 'left';
    ctx.textBaseline = 'top';
    ctx.fillStyle = color;

    lines.forEach((line, i) => {
      if (line) ctx.fillText(line, x, startY + i * lineHeight);
    });
    ctx.restore();

    return startY + lines.length * lineHeight;
  }
}
