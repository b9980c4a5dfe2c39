/**
 * Card geometry
 *
 * Named regions on the working canvas. The working canvas is 744×1039 px,
 * i.e. a 63×88 mm card at 300 DPI; the exporter rescales from here to
 * whatever physical size and DPI the run asks for.
 *
 * ┌──────────────────────────┐
 * │  TITLE            [COST] │
 * │ ┌──────────────────────┐ │
 * │ │         ART          │ │
 * │ └──────────────────────┘ │
 * │  TYPE LINE               │
 * │  BODY TEXT ...           │
 * │                 [ S/T ]  │
 * └──────────────────────────┘
 */

import { LayoutError } from '../errors';

export const WORKING_WIDTH = 744;
export const WORKING_HEIGHT = 1039;

export type RegionName = 'title' | 'cost' | 'art' | 'typeLine' | 'body' | 'strength';

export interface LayoutBox {
  name: RegionName;
  x: number;
  y: number;
  width: number;
  height: number;
}

export type CardLayout = Readonly<Record<RegionName, LayoutBox>>;

/** Regions that carry text and must never overlap each other */
export const TEXT_REGIONS: readonly RegionName[] = ['title', 'cost', 'typeLine', 'body', 'strength'];

export interface CardLayoutOptions {
  canvasWidth: number;
  canvasHeight: number;
  /** Space kept free under the body box for the strength box */
  bodyBottomMargin: number;
}

export const DEFAULT_LAYOUT_OPTIONS: CardLayoutOptions = {
  canvasWidth: WORKING_WIDTH,
  canvasHeight: WORKING_HEIGHT,
  bodyBottomMargin: 109,
};

export function boxesOverlap(a: LayoutBox, b: LayoutBox): boolean {
  return (
    a.x < b.x + b.width &&
    b.x < a.x + a.width &&
    a.y < b.y + b.height &&
    b.y < a.y + a.height
  );
}

/**
 * Build the region table.
 *
 * @throws LayoutError if a box leaves the canvas or two text regions overlap
 */
export function createCardLayout(options: Partial<CardLayoutOptions> = {}): CardLayout {
  const { canvasWidth, canvasHeight, bodyBottomMargin } = { ...DEFAULT_LAYOUT_OPTIONS, ...options };

  const bodyY = 700;
  const layout: CardLayout = {
    title: { name: 'title', x: 92, y: 98, width: 420, height: 64 },
    cost: { name: 'cost', x: 520, y: 98, width: 132, height: 64 },
    art: { name: 'art', x: 64, y: 164, width: 616, height: 486 },
    typeLine: { name: 'typeLine', x: 92, y: 654, width: 560, height: 42 },
    body: { name: 'body', x: 92, y: bodyY, width: 560, height: canvasHeight - bodyY - bodyBottomMargin },
    strength: { name: 'strength', x: 542, y: 936, width: 110, height: 58 },
  };

  for (const box of Object.values(layout)) {
    if (box.width <= 0 || box.height <= 0) {
      throw new LayoutError(`${box.name} box has no area`);
    }
    if (box.x < 0 || box.y < 0 || box.x + box.width > canvasWidth || box.y + box.height > canvasHeight) {
      throw new LayoutError(`${box.name} box leaves the ${canvasWidth}x${canvasHeight} canvas`);
    }
  }

  for (let i = 0; i < TEXT_REGIONS.length; i++) {
    for (let j = i + 1; j < TEXT_REGIONS.length; j++) {
      const a = layout[TEXT_REGIONS[i]];
      const b = layout[TEXT_REGIONS[j]];
      if (boxesOverlap(a, b)) {
        throw new LayoutError(`${a.name} box overlaps ${b.name} box`);
      }
    }
  }

  return Object.freeze(layout);
}
