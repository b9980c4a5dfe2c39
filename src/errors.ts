/**
 * Error taxonomy for the render pipeline.
 *
 * Per-record errors (validation, export, a frame that vanished mid-run) are
 * caught at the record boundary by the pipeline. Errors raised during
 * preflight abort the run.
 */

export class CardPressError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'CardPressError';
  }
}

/** A record field failed validation. Config errors use rowIndex -1. */
export class ValidationError extends CardPressError {
  constructor(
    public readonly field: string,
    public readonly rowIndex: number,
    message: string,
  ) {
    super('VALIDATION_FAILED', rowIndex >= 0 ? `row ${rowIndex}: ${field}: ${message}` : `${field}: ${message}`);
    this.name = 'ValidationError';
  }
}

export type AssetKind = 'frame' | 'font';

/** A frame or font file is missing or unreadable */
export class AssetNotFoundError extends CardPressError {
  constructor(
    public readonly kind: AssetKind,
    public readonly assetPath: string,
    options?: { cause?: unknown },
  ) {
    super('ASSET_NOT_FOUND', `${kind} asset not found: ${assetPath}`, options);
    this.name = 'AssetNotFoundError';
  }
}

export class ExportError extends CardPressError {
  constructor(
    public readonly destination: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super('EXPORT_FAILED', `export to ${destination} failed: ${message}`, options);
    this.name = 'ExportError';
  }
}

/** Layout boxes break their own invariants */
export class LayoutError extends CardPressError {
  constructor(message: string) {
    super('LAYOUT_INVALID', message);
    this.name = 'LayoutError';
  }
}

/** The tabular source cannot be read */
export class SourceError extends CardPressError {
  constructor(
    public readonly sourcePath: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super('SOURCE_INVALID', `${sourcePath}: ${message}`, options);
    this.name = 'SourceError';
  }
}

/**
 * Not thrown. Recorded on the resolved assets when a card renders with
 * placeholder art.
 */
export interface MissingArtworkWarning {
  readonly code: 'MISSING_ARTWORK';
  readonly name: string;
  readonly searchedPaths: readonly string[];
}

export function isCardPressError(error: unknown): error is CardPressError {
  return error instanceof CardPressError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
