/**
 * SpellCanvasCard - Framed card without a strength box
 */

import type { CardRenderContext } from './BaseCanvasCard';
import { FramedCanvasCard } from './FramedCanvasCard';

export class SpellCanvasCard extends FramedCanvasCard {
  protected renderExtras(_context: CardRenderContext): void {
    // Spells carry nothing below the body text
  }
}
