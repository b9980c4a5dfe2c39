/**
 * FontSet - The three card fonts, loaded once per process
 *
 * Font files are registered with the canvas font manager under stable
 * aliases and then only ever referenced by family name. The set is
 * constructed explicitly and injected into the resolver; tests build one
 * from installed families with `fromFamilies` and never touch the disk.
 */

import { existsSync } from 'node:fs';
import { GlobalFonts } from '@napi-rs/canvas';
import { type RenderConfig, assetPath } from '../config';
import { AssetNotFoundError } from '../errors';

export const FONT_ROLES = ['title', 'body', 'symbol'] as const;
export type FontRole = (typeof FONT_ROLES)[number];

export interface FontFamilies {
  title: string;
  body: string;
  symbol: string;
}

const FONT_ALIASES: FontFamilies = {
  title: 'CardPress Title',
  body: 'CardPress Body',
  symbol: 'CardPress Symbols',
};

export class FontSet {
  private constructor(private readonly families: Readonly<FontFamilies>) {}

  /**
   * Register the configured font files.
   *
   * @throws AssetNotFoundError when a file is missing or cannot be registered
   */
  static load(config: RenderConfig): FontSet {
    const files: FontFamilies = {
      title: assetPath(config, config.titleFont),
      body: assetPath(config, config.bodyFont),
      symbol: assetPath(config, config.symbolFont),
    };

    for (const role of FONT_ROLES) {
      const file = files[role];
      if (!existsSync(file)) {
        throw new AssetNotFoundError('font', file);
      }
      const registered = GlobalFonts.registerFromPath(file, FONT_ALIASES[role]);
      if (!registered) {
        throw new AssetNotFoundError('font', file);
      }
    }

    return new FontSet(Object.freeze({ ...FONT_ALIASES }));
  }

  /** Use already-available families (system fonts, test stubs) */
  static fromFamilies(families: FontFamilies): FontSet {
    return new FontSet(Object.freeze({ ...families }));
  }

  family(role: FontRole): string {
    return this.families[role];
  }
}
