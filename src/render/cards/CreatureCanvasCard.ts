/**
 * CreatureCanvasCard - Framed card with a strength box
 *
 * ┌──────────────────────┐
 * │ TITLE         {1}{G} │
 * │ ┌──────────────────┐ │
 * │ │       ART        │ │
 * │ └──────────────────┘ │
 * │ Creature — Bear      │
 * │ Body text ...        │
 * │              [ 2/2 ] │
 * └──────────────────────┘
 */

import type { CardRenderContext } from './BaseCanvasCard';
import { COLOR_FILLS } from './CardConfig';
import { FramedCanvasCard } from './FramedCanvasCard';

export class CreatureCanvasCard extends FramedCanvasCard {
  /**
   * Strength box: pattern (or flat) fill, outline and centered "S/T"
   */
  protected renderExtras({ ctx, assets, layout, text }: CardRenderContext): void {
    if (!text.strength) return;

    const { x, y, width, height } = layout.strength;
    const { strengthCornerRadius, strengthOutlineWidth, strengthOutlineColor } = this.frameStyle;

    ctx.save();
    this.createRoundedRectPath(ctx, x, y, width, height, strengthCornerRadius);
    ctx.clip();
    if (assets.pattern) {
      this.drawImageCover(ctx, assets.pattern, x, y, width, height);
    } else {
      ctx.fillStyle = COLOR_FILLS[this.record.color];
      ctx.fillRect(x, y, width, height);
    }
    ctx.restore();

    ctx.save();
    this.createRoundedRectPath(ctx, x, y, width, height, strengthCornerRadius);
    ctx.strokeStyle = strengthOutlineColor;
    ctx.lineWidth = strengthOutlineWidth;
    ctx.stroke();
    ctx.restore();

    const { text: label, fontSize } = text.strength;
    this.drawLine(ctx, label, x + width / 2, y + height / 2, assets.fonts.title, fontSize, {
      color: this.typography.textColor,
      align: 'center',
    });
  }
}
