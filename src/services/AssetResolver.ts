/**
 * AssetResolver - Finds and loads everything one card needs
 *
 * Frames are a hard requirement (checked up front by `preflight`, and again
 * per record). Artwork is not: a card without art renders with a
 * placeholder and a MissingArtworkWarning. Pattern and parchment textures
 * are optional decorations.
 *
 * Nothing is cached here except the injected FontSet; every call returns a
 * fresh bundle owned by the caller.
 */

import { existsSync } from 'node:fs';
import path from 'node:path';
import { type Image, loadImage } from '@napi-rs/canvas';
import type { RenderConfig } from '../config';
import { AssetNotFoundError, type MissingArtworkWarning, describeError } from '../errors';
import type { CardFonts } from '../layouts/CardTextLayouter';
import type { Logger } from '../observability/logging';
import { CARD_COLORS, type CardColor, type CardRecord } from '../types/card';
import { slugify } from '../utils/slug';
import type { FontSet } from './FontSet';

export const FRAME_FILES: Readonly<Record<CardColor, string>> = {
  White: 'frame_white.png',
  Blue: 'frame_blue.png',
  Black: 'frame_black.png',
  Red: 'frame_red.png',
  Green: 'frame_green.png',
};

export const ARTWORK_EXTENSIONS = ['.png', '.jpg', '.jpeg'] as const;
export const PARCHMENT_FILE = 'parchment_box.png';

export function patternFile(color: CardColor): string {
  return `pattern_${color.toLowerCase()}.png`;
}

export type ImageLoader = (source: string) => Promise<Image>;

/**
 * Per-record asset bundle, discarded after compositing
 */
export interface ResolvedAssets {
  frame: Image;
  fonts: CardFonts;
  /** null renders the placeholder */
  artwork: Image | null;
  artworkPath: string | null;
  pattern: Image | null;
  parchment: Image | null;
  warnings: MissingArtworkWarning[];
}

export interface AssetResolverOptions {
  config: RenderConfig;
  fonts: FontSet;
  logger: Logger;
  /** Image decoder (default: @napi-rs/canvas loadImage) */
  loadImage?: ImageLoader;
}

export class AssetResolver {
  private readonly config: RenderConfig;
  private readonly fonts: FontSet;
  private readonly logger: Logger;
  private readonly load: ImageLoader;

  constructor(options: AssetResolverOptions) {
    this.config = options.config;
    this.fonts = options.fonts;
    this.logger = options.logger;
    this.load = options.loadImage ?? ((source) => loadImage(source));
  }

  framePath(color: CardColor): string {
    return path.resolve(this.config.assetsDir, FRAME_FILES[color]);
  }

  /**
   * Check every frame file exists before the first card renders.
   *
   * @throws AssetNotFoundError
   */
  preflight(): void {
    for (const color of CARD_COLORS) {
      const framePath = this.framePath(color);
      if (!existsSync(framePath)) {
        throw new AssetNotFoundError('frame', framePath);
      }
    }
  }

  /**
   * Paths tried for a card's art, in order: the explicit art_file (if set),
   * then `<artDir>/<slug>.png|.jpg|.jpeg`.
   */
  artworkCandidates(record: CardRecord): string[] {
    const candidates: string[] = [];
    if (record.artFile) {
      candidates.push(path.resolve(this.config.workDir, record.artFile));
    }
    const slug = slugify(record.name);
    for (const ext of ARTWORK_EXTENSIONS) {
      candidates.push(path.resolve(this.config.artDir, `${slug}${ext}`));
    }
    return candidates;
  }

  async resolve(record: CardRecord, logger: Logger = this.logger): Promise<ResolvedAssets> {
    const frame = await this.loadFrame(record.color);
    const warnings: MissingArtworkWarning[] = [];

    const candidates = this.artworkCandidates(record);
    const art = await this.loadArtwork(candidates, logger);
    if (!art) {
      const warning: MissingArtworkWarning = {
        code: 'MISSING_ARTWORK',
        name: record.name,
        searchedPaths: candidates,
      };
      warnings.push(warning);
      logger.warn({ searchedPaths: candidates }, 'artwork not found, using placeholder');
    }

    const pattern = await this.loadOptional(path.resolve(this.config.assetsDir, patternFile(record.color)), logger);
    const parchment = await this.loadOptional(path.resolve(this.config.assetsDir, PARCHMENT_FILE), logger);

    return {
      frame,
      fonts: {
        title: { family: this.fonts.family('title'), weight: 'bold' },
        body: { family: this.fonts.family('body') },
        symbol: { family: this.fonts.family('symbol') },
      },
      artwork: art?.image ?? null,
      artworkPath: art?.path ?? null,
      pattern,
      parchment,
      warnings,
    };
  }

  private async loadFrame(color: CardColor): Promise<Image> {
    const framePath = this.framePath(color);
    if (!existsSync(framePath)) {
      throw new AssetNotFoundError('frame', framePath);
    }
    try {
      return await this.load(framePath);
    } catch (error) {
      throw new AssetNotFoundError('frame', framePath, { cause: error });
    }
  }

  private async loadArtwork(
    candidates: string[],
    logger: Logger,
  ): Promise<{ image: Image; path: string } | null> {
    for (const candidate of candidates) {
      if (!existsSync(candidate)) continue;
      try {
        const image = await this.load(candidate);
        logger.debug({ artwork: candidate }, 'artwork loaded');
        return { image, path: candidate };
      } catch (error) {
        logger.warn({ artwork: candidate, err: describeError(error) }, 'artwork could not be decoded');
      }
    }
    return null;
  }

  private async loadOptional(file: string, logger: Logger): Promise<Image | null> {
    if (!existsSync(file)) return null;
    try {
      return await this.load(file);
    } catch (error) {
      logger.warn({ file, err: describeError(error) }, 'optional texture could not be decoded');
      return null;
    }
  }
}
