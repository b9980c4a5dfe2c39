/**
 * Working-to-print color conversion
 *
 * The exporter only talks to the ColorConverter interface, so a different
 * conversion (a press-specific profile, a direct channel mapping) can be
 * swapped in without touching compositing.
 */

import type { Sharp } from 'sharp';

export type PrintColorModel = 'cmyk';

export interface ColorConverter {
  readonly colorModel: PrintColorModel;
  /** Channels in the converted image */
  readonly channels: number;
  /** Human-readable description for logs */
  readonly description: string;
  /** Append the conversion to an image pipeline */
  apply(image: Sharp): Sharp;
}

export const BUILT_IN_CMYK = 'cmyk';

/** White paper under transparent pixels */
const PAPER_WHITE = '#ffffff';

/**
 * sRGB to CMYK through an ICC transform.
 *
 * `profile` is either libvips' built-in `cmyk` profile or a path to an
 * .icc file (e.g. the print shop's coated/uncoated profile). The profile is
 * embedded in the output. Transparent pixels are flattened onto white
 * first, since CMYK output has no alpha.
 *
 * The output profile is the last one set on the pipeline, so apply this
 * after `withMetadata`.
 */
export class IccProfileConverter implements ColorConverter {
  readonly colorModel = 'cmyk';
  readonly channels = 4;

  constructor(private readonly profile: string = BUILT_IN_CMYK) {}

  get description(): string {
    return `icc:${this.profile}`;
  }

  apply(image: Sharp): Sharp {
    return image.flatten({ background: PAPER_WHITE }).withIccProfile(this.profile);
  }
}
