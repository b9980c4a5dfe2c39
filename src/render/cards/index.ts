/**
 * Canvas Cards Module
 *
 * Class Hierarchy:
 * ```
 * BaseCanvasCard (abstract)
 * └── FramedCanvasCard (abstract, frame + text layers)
 *     ├── CreatureCanvasCard  - adds the strength box
 *     └── SpellCanvasCard     - frame and text only
 * ```
 */

// Configuration types
export {
  type TypographyConfig,
  type FrameStyleConfig,
  DEFAULT_TYPOGRAPHY,
  DEFAULT_FRAME_STYLE,
  COLOR_FILLS,
} from './CardConfig';

// Base classes
export { BaseCanvasCard, type CardRenderContext, type TextAlign } from './BaseCanvasCard';
export { FramedCanvasCard } from './FramedCanvasCard';

// Concrete card implementations
export { CreatureCanvasCard } from './CreatureCanvasCard';
export { SpellCanvasCard } from './SpellCanvasCard';

// Factory
export { CardFactory, type CardFactoryConfig } from './CardFactory';
