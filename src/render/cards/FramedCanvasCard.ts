/**
 * FramedCanvasCard - Abstract base for cards drawn inside a color frame
 *
 * Layer order, bottom to top:
 *   background (pattern or flat fill), artwork (or placeholder) + border,
 *   frame overlay, parchment panel, title, type line, cost, body,
 *   then whatever the subclass adds in `renderExtras`.
 *
 * Concrete implementations:
 * - CreatureCanvasCard: adds the strength box
 * - SpellCanvasCard: frame and text only
 */

import { COLOR_FILLS } from './CardConfig';
import { BaseCanvasCard, type CardRenderContext } from './BaseCanvasCard';

export abstract class FramedCanvasCard extends BaseCanvasCard {
  render(context: CardRenderContext): void {
    this.renderBackground(context);
    this.renderArtwork(context);
    this.renderFrame(context);
    this.renderParchment(context);
    this.renderTitle(context);
    this.renderTypeLine(context);
    this.renderCost(context);
    this.renderBody(context);
    this.renderExtras(context);
  }

  /**
   * Layers drawn above the body text
   */
  protected abstract renderExtras(context: CardRenderContext): void;

  protected renderBackground({ ctx, width, height, assets }: CardRenderContext): void {
    if (assets.pattern) {
      this.drawImageCover(ctx, assets.pattern, 0, 0, width, height);
    } else {
      ctx.fillStyle = COLOR_FILLS[this.record.color];
      ctx.fillRect(0, 0, width, height);
    }
  }

  /**
   * Artwork cover-fit into the art window, placeholder when missing
   */
  protected renderArtwork({ ctx, assets, layout }: CardRenderContext): void {
    const { x, y, width, height } = layout.art;

    if (assets.artwork) {
      this.drawImageCover(ctx, assets.artwork, x, y, width, height);
    } else {
      this.drawImagePlaceholder(ctx, x, y, width, height);
    }

    const { artBorderWidth, artBorderColor } = this.frameStyle;
    if (artBorderWidth > 0) {
      this.drawOutline(ctx, x, y, width, height, artBorderWidth, artBorderColor);
    }
  }

  protected renderFrame({ ctx, width, height, assets }: CardRenderContext): void {
    ctx.drawImage(assets.frame, 0, 0, width, height);
  }

  protected renderParchment({ ctx, assets, layout }: CardRenderContext): void {
    if (!assets.parchment) return;
    const { x, y, width, height } = layout.body;
    this.drawImageCover(ctx, assets.parchment, x, y, width, height);
  }

  protected renderTitle({ ctx, assets, layout, text }: CardRenderContext): void {
    const box = layout.title;
    this.drawLine(
      ctx,
      text.title.text,
      box.x + this.typography.textInset,
      box.y + box.height / 2,
      assets.fonts.title,
      text.title.fontSize,
      {
        color: this.typography.titleColor,
        strokeColor: this.typography.titleStrokeColor,
        strokeWidth: this.typography.titleStrokeWidth,
      },
    );
  }

  protected renderTypeLine({ ctx, assets, layout, text }: CardRenderContext): void {
    const box = layout.typeLine;
    this.drawLine(
      ctx,
      text.typeLine.text,
      box.x + this.typography.textInset,
      box.y + box.height / 2,
      assets.fonts.title,
      text.typeLine.fontSize,
      { color: this.typography.textColor },
    );
  }

  /**
   * Cost tokens at their laid-out positions (already right-aligned)
   */
  protected renderCost({ ctx, assets, text }: CardRenderContext): void {
    const { cost } = text;
    for (const token of cost.tokens) {
      const font = token.symbol ? assets.fonts.symbol : assets.fonts.title;
      this.drawLine(ctx, token.glyph, token.x, cost.centerY, font, cost.fontSize, {
        color: this.typography.titleColor,
        strokeColor: this.typography.titleStrokeColor,
        strokeWidth: 1,
      });
    }
  }

  protected renderBody({ ctx, assets, layout, text }: CardRenderContext): void {
    const box = layout.body;
    const inset = this.typography.textInset;
    this.drawLines(
      ctx,
      text.body.lines,
      box.x + inset,
      box.y + inset,
      assets.fonts.body,
      text.body.fontSize,
      text.body.lineHeight,
      this.typography.textColor,
    );
  }
}
