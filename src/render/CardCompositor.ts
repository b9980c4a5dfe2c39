/**
 * CardCompositor - Lays out and draws one card onto a fresh canvas
 *
 * Responsibilities:
 * - Text layout for every region (via the layout engine)
 * - Choosing the card renderer (via CardFactory)
 * - Allocating the working-resolution canvas
 *
 * Shared assets are only read. Each call returns a new canvas owned by the
 * caller.
 */

import { type Canvas, createCanvas } from '@napi-rs/canvas';
import { type CardLayout, WORKING_HEIGHT, WORKING_WIDTH, createCardLayout } from '../layouts/CardLayout';
import { type CardTextLayout, layoutCardText } from '../layouts/CardTextLayouter';
import { CanvasTextMeasurer, type TextMeasurer } from '../layouts/TextMeasurer';
import type { ResolvedAssets } from '../services/AssetResolver';
import type { CardRecord } from '../types/card';
import { CardFactory, type CardFactoryConfig, DEFAULT_TYPOGRAPHY, type TypographyConfig } from './cards';

export interface CardCompositorOptions {
  /** Canvas size in px (default: 744x1039) */
  width?: number;
  height?: number;

  /** Card factory configuration */
  cardFactoryConfig?: CardFactoryConfig;

  /** Text measurer (default: canvas-backed) */
  measurer?: TextMeasurer;
}

export interface ComposedCard {
  canvas: Canvas;
  text: CardTextLayout;
}

export class CardCompositor {
  readonly layout: CardLayout;
  private readonly width: number;
  private readonly height: number;
  private readonly typography: TypographyConfig;
  private readonly measurer: TextMeasurer;
  private readonly cardFactory: CardFactory;

  constructor(options: CardCompositorOptions = {}) {
    this.width = options.width ?? WORKING_WIDTH;
    this.height = options.height ?? WORKING_HEIGHT;
    this.layout = createCardLayout({ canvasWidth: this.width, canvasHeight: this.height });
    this.typography = { ...DEFAULT_TYPOGRAPHY, ...options.cardFactoryConfig?.typography };
    this.measurer = options.measurer ?? new CanvasTextMeasurer();
    this.cardFactory = new CardFactory(options.cardFactoryConfig);
  }

  /**
   * Fit every text region of the card
   */
  layoutText(record: CardRecord, assets: ResolvedAssets): CardTextLayout {
    return layoutCardText(record, this.layout, assets.fonts, this.typography, this.measurer);
  }

  /**
   * Draw the card using a precomputed text layout
   */
  compose(record: CardRecord, assets: ResolvedAssets, text: CardTextLayout): Canvas {
    const canvas = createCanvas(this.width, this.height);
    const ctx = canvas.getContext('2d');
    ctx.clearRect(0, 0, this.width, this.height);

    const card = this.cardFactory.createCard(record);
    card.render({ ctx, width: this.width, height: this.height, assets, layout: this.layout, text });

    return canvas;
  }

  /**
   * Layout and draw in one step
   */
  render(record: CardRecord, assets: ResolvedAssets): ComposedCard {
    const text = this.layoutText(record, assets);
    return { canvas: this.compose(record, assets, text), text };
  }
}
