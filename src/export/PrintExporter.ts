/**
 * PrintExporter - Working canvas to print-ready raster file
 *
 * 1. Resize to the trim size at the configured DPI
 * 2. Add bleed by replicating edge pixels outward
 * 3. Convert to the print color model (ColorConverter)
 * 4. Encode with the DPI embedded and write
 *
 * A failure here is reported as ExportError for that card only; there are
 * no retries.
 */

import type { Canvas } from '@napi-rs/canvas';
import sharp, { type Sharp } from 'sharp';
import type { OutputFormat } from '../config';
import { ExportError, describeError } from '../errors';
import type { Logger } from '../observability/logging';
import { type ColorConverter, IccProfileConverter, type PrintColorModel } from './ColorConverter';

const MM_PER_INCH = 25.4;

export interface PrintSize {
  widthMm: number;
  heightMm: number;
  /** Extra margin on every edge, trimmed after printing */
  bleedMm: number;
  dpi: number;
}

/** Bleed per edge, px. Opposite edges differ by at most 1. */
export interface BleedEdges {
  top: number;
  right: number;
  bottom: number;
  left: number;
}

export interface PrintDimensions {
  trimWidth: number;
  trimHeight: number;
  bleed: BleedEdges;
  /** Final file size, px */
  width: number;
  height: number;
}

export interface ExportResult {
  path: string;
  width: number;
  height: number;
  channels: number;
  colorModel: PrintColorModel;
  dpi: number;
  format: OutputFormat;
}

export interface PrintExporterOptions {
  size: PrintSize;
  format: OutputFormat;
  /** JPEG only (default: 95) */
  jpegQuality?: number;
  /** Default: built-in CMYK profile */
  converter?: ColorConverter;
  logger: Logger;
}

export function mmToPx(mm: number, dpi: number): number {
  return Math.round((mm / MM_PER_INCH) * dpi);
}

/**
 * Trim and final sizes are each rounded once from millimetres, so both stay
 * within half a pixel of their exact value. The bleed is what is left over,
 * with any odd pixel going to the right/bottom edge.
 */
export function printDimensions({ widthMm, heightMm, bleedMm, dpi }: PrintSize): PrintDimensions {
  const trimWidth = mmToPx(widthMm, dpi);
  const trimHeight = mmToPx(heightMm, dpi);
  const width = mmToPx(widthMm + bleedMm * 2, dpi);
  const height = mmToPx(heightMm + bleedMm * 2, dpi);

  const left = Math.floor((width - trimWidth) / 2);
  const top = Math.floor((height - trimHeight) / 2);
  return {
    trimWidth,
    trimHeight,
    bleed: { top, right: width - trimWidth - left, bottom: height - trimHeight - top, left },
    width,
    height,
  };
}

function hasBleed({ top, right, bottom, left }: BleedEdges): boolean {
  return top + right + bottom + left > 0;
}

export class PrintExporter {
  private readonly size: PrintSize;
  private readonly format: OutputFormat;
  private readonly jpegQuality: number;
  private readonly converter: ColorConverter;
  private readonly logger: Logger;

  constructor(options: PrintExporterOptions) {
    this.size = options.size;
    this.format = options.format;
    this.jpegQuality = options.jpegQuality ?? 95;
    this.converter = options.converter ?? new IccProfileConverter();
    this.logger = options.logger;
  }

  get dimensions(): PrintDimensions {
    return printDimensions(this.size);
  }

  /**
   * @throws ExportError
   */
  async export(canvas: Canvas, destination: string, logger: Logger = this.logger): Promise<ExportResult> {
    const dims = this.dimensions;

    let png: Buffer;
    try {
      png = await canvas.encode('png');
    } catch (error) {
      throw new ExportError(destination, `canvas encode: ${describeError(error)}`, { cause: error });
    }

    let pipeline = sharp(png).resize(dims.trimWidth, dims.trimHeight, {
      fit: 'fill',
      kernel: sharp.kernel.lanczos3,
    });
    if (hasBleed(dims.bleed)) {
      pipeline = pipeline.extend({ ...dims.bleed, extendWith: 'copy' });
    }
    pipeline = this.encode(this.converter.apply(this.withDensity(pipeline)));

    try {
      const info = await pipeline.toFile(destination);
      logger.debug(
        { destination, width: info.width, height: info.height, converter: this.converter.description },
        'card exported',
      );
      return {
        path: destination,
        width: info.width,
        height: info.height,
        channels: info.channels,
        colorModel: this.converter.colorModel,
        dpi: this.size.dpi,
        format: this.format,
      };
    } catch (error) {
      throw new ExportError(destination, describeError(error), { cause: error });
    }
  }

  /** JPEG carries its DPI in metadata; TIFF sets it in `encode` */
  private withDensity(image: Sharp): Sharp {
    return this.format === 'jpeg' ? image.withMetadata({ density: this.size.dpi }) : image;
  }

  private encode(image: Sharp): Sharp {
    const { dpi } = this.size;
    switch (this.format) {
      case 'tiff':
        // sharp takes TIFF resolution in px/mm
        return image.tiff({
          compression: 'lzw',
          xres: dpi / MM_PER_INCH,
          yres: dpi / MM_PER_INCH,
          resolutionUnit: 'inch',
        });
      case 'jpeg':
        return image.jpeg({ quality: this.jpegQuality, chromaSubsampling: '4:4:4' });
    }
  }
}
