/**
 * Test helpers shared by the suites. Not exported from the package.
 */

import { mkdir } from 'node:fs/promises';
import path from 'node:path';
import sharp from 'sharp';
import { loadConfig, type RenderConfig } from '../config';
import type { FontSpec, TextMeasurer } from '../layouts/TextMeasurer';
import { FRAME_FILES } from '../services/AssetResolver';
import { FontSet } from '../services/FontSet';
import { CARD_COLORS, type CardRow } from '../types/card';

/** Every character advances by half the font size */
export class FixedAdvanceMeasurer implements TextMeasurer {
  measure(text: string, _font: FontSpec, size: number): number {
    return Array.from(text).length * size * 0.5;
  }
}

export const TEST_FONT: FontSpec = { family: 'sans-serif' };

export const testFonts = (): FontSet =>
  FontSet.fromFamilies({ title: 'sans-serif', body: 'sans-serif', symbol: 'sans-serif' });

export function testBearRow(overrides: CardRow = {}): CardRow {
  return {
    name: 'Test Bear',
    cost: '{1}{G}',
    type: 'Creature',
    subtype: 'Bear',
    color: 'Green',
    art_file: '',
    strength: '2',
    description: 'Whenever Test Bear attacks, it gets +1/+0.',
    ...overrides,
  };
}

/** Small solid PNG written with sharp */
export async function writePng(
  file: string,
  color: { r: number; g: number; b: number; alpha: number },
  size = 16,
): Promise<void> {
  await mkdir(path.dirname(file), { recursive: true });
  await sharp({ create: { width: size, height: size, channels: 4, background: color } })
    .png()
    .toFile(file);
}

/** The five frame overlays, fully transparent */
export async function writeFrames(assetsDir: string): Promise<void> {
  for (const color of CARD_COLORS) {
    await writePng(path.join(assetsDir, FRAME_FILES[color]), { r: 0, g: 0, b: 0, alpha: 0 });
  }
}

/** Config rooted in a temp directory, ignoring the process environment */
export function testConfig(root: string, overrides: Partial<Record<keyof RenderConfig, unknown>> = {}): RenderConfig {
  return loadConfig(
    {
      assetsDir: path.join(root, 'assets'),
      artDir: path.join(root, 'art'),
      workDir: root,
      logLevel: 'silent',
      ...overrides,
    },
    {},
  );
}
