/**
 * CardPipeline - Record to file, one card at a time
 *
 *   parse -> resolve assets -> layout + compose -> export
 *
 * Shared prerequisites (fonts, the five frames) are checked when the
 * pipeline is created; a missing one aborts the run before any card is
 * drawn. Everything that goes wrong for a single record is caught at the
 * record boundary, logged, and reported as skipped.
 */

import path from 'node:path';
import { type RenderConfig, outputExtension } from '../config';
import { type ColorConverter, IccProfileConverter } from '../export/ColorConverter';
import { type ExportResult, PrintExporter } from '../export/PrintExporter';
import {
  AssetNotFoundError,
  ExportError,
  type MissingArtworkWarning,
  ValidationError,
} from '../errors';
import type { RegionName } from '../layouts/CardLayout';
import type { CardTextLayout } from '../layouts/CardTextLayouter';
import type { TextMeasurer } from '../layouts/TextMeasurer';
import type { Logger } from '../observability/logging';
import { normalizeRow, parseCardRecord } from '../records/cardRecord';
import { CardCompositor } from '../render/CardCompositor';
import type { CardFactoryConfig } from '../render/cards';
import { AssetResolver, type ImageLoader } from '../services/AssetResolver';
import { FontSet } from '../services/FontSet';
import type { CardRecord, SourceRow } from '../types/card';
import { slugify } from '../utils/slug';

export interface RenderedCard {
  rowIndex: number;
  name: string;
  output: ExportResult;
  artworkPath: string | null;
  warnings: MissingArtworkWarning[];
  /** Regions cut at their minimum font size */
  truncated: RegionName[];
}

export interface SkippedCard {
  rowIndex: number;
  /** null when the row had no usable name */
  name: string | null;
  code: string;
  reason: string;
}

export interface RunSummary {
  rendered: RenderedCard[];
  skipped: SkippedCard[];
}

export interface CardPipelineDeps {
  logger: Logger;
  /** Pre-built font set (default: load the configured font files) */
  fonts?: FontSet;
  measurer?: TextMeasurer;
  converter?: ColorConverter;
  loadImage?: ImageLoader;
  cardFactoryConfig?: CardFactoryConfig;
}

const DUPLICATE_OUTPUT = 'DUPLICATE_OUTPUT';

function truncatedRegions(text: CardTextLayout): RegionName[] {
  const regions: RegionName[] = [];
  if (text.title.truncated) regions.push('title');
  if (text.typeLine.truncated) regions.push('typeLine');
  if (text.cost.truncated) regions.push('cost');
  if (text.body.truncated) regions.push('body');
  if (text.strength?.truncated) regions.push('strength');
  return regions;
}

/** Errors that cost one record, not the run */
function isRecordError(error: unknown): error is ValidationError | AssetNotFoundError | ExportError {
  return error instanceof ValidationError || error instanceof AssetNotFoundError || error instanceof ExportError;
}

export class CardPipeline {
  private constructor(
    private readonly config: RenderConfig,
    private readonly resolver: AssetResolver,
    private readonly compositor: CardCompositor,
    private readonly exporter: PrintExporter,
    private readonly logger: Logger,
  ) {}

  /**
   * Load fonts and check frames.
   *
   * @throws AssetNotFoundError when a shared asset is missing
   */
  static create(config: RenderConfig, deps: CardPipelineDeps): CardPipeline {
    const fonts = deps.fonts ?? FontSet.load(config);
    const resolver = new AssetResolver({
      config,
      fonts,
      logger: deps.logger,
      ...(deps.loadImage && { loadImage: deps.loadImage }),
    });
    resolver.preflight();

    const compositor = new CardCompositor({
      ...(deps.measurer && { measurer: deps.measurer }),
      ...(deps.cardFactoryConfig && { cardFactoryConfig: deps.cardFactoryConfig }),
    });
    const exporter = new PrintExporter({
      size: {
        widthMm: config.widthMm,
        heightMm: config.heightMm,
        bleedMm: config.bleedMm,
        dpi: config.dpi,
      },
      format: config.format,
      jpegQuality: config.jpegQuality,
      converter: deps.converter ?? new IccProfileConverter(config.iccProfile),
      logger: deps.logger,
    });

    deps.logger.debug({ dimensions: exporter.dimensions, format: config.format }, 'pipeline ready');
    return new CardPipeline(config, resolver, compositor, exporter, deps.logger);
  }

  outputPath(record: CardRecord, outputDir: string): string {
    return path.join(outputDir, `${slugify(record.name)}.${outputExtension(this.config.format)}`);
  }

  /**
   * Render one validated record to `<outputDir>/<slug>.<ext>`.
   */
  async renderCard(record: CardRecord, outputDir: string, rowIndex = 0): Promise<RenderedCard> {
    const logger = this.logger.child({ card: slugify(record.name), row: rowIndex });

    const assets = await this.resolver.resolve(record, logger);
    const { canvas, text } = this.compositor.render(record, assets);

    const truncated = truncatedRegions(text);
    if (truncated.length > 0) {
      logger.warn({ regions: truncated }, 'text truncated at minimum size');
    }

    const output = await this.exporter.export(canvas, this.outputPath(record, outputDir), logger);
    logger.info({ output: output.path }, 'card rendered');

    return {
      rowIndex,
      name: record.name,
      output,
      artworkPath: assets.artworkPath,
      warnings: assets.warnings,
      truncated,
    };
  }

  /**
   * Render every row in order. Per-record failures are collected into the
   * summary; anything else propagates.
   */
  async run(rows: SourceRow[], outputDir: string): Promise<RunSummary> {
    const summary: RunSummary = { rendered: [], skipped: [] };
    const written = new Set<string>();

    for (const { rowIndex, cells } of rows) {
      let record: CardRecord | null = null;
      try {
        record = parseCardRecord(cells, rowIndex);

        const destination = this.outputPath(record, outputDir);
        if (written.has(destination)) {
          summary.skipped.push({
            rowIndex,
            name: record.name,
            code: DUPLICATE_OUTPUT,
            reason: `duplicate output name ${path.basename(destination)}`,
          });
          this.logger.error({ row: rowIndex, destination }, 'duplicate output name, card skipped');
          continue;
        }

        summary.rendered.push(await this.renderCard(record, outputDir, rowIndex));
        written.add(destination);
      } catch (error) {
        if (!isRecordError(error)) throw error;

        const name = record?.name ?? normalizeRow(cells).name?.trim();
        summary.skipped.push({
          rowIndex,
          name: name || null,
          code: error.code,
          reason: error.message,
        });
        this.logger.error({ row: rowIndex, code: error.code, err: error.message }, 'card skipped');
      }
    }

    this.logger.info(
      { rendered: summary.rendered.length, skipped: summary.skipped.length },
      'run complete',
    );
    return summary;
  }
}
