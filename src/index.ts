export * from './errors';
export {
  type OutputFormat,
  type RenderConfig,
  type RenderConfigInput,
  OUTPUT_FORMATS,
  loadConfig,
  renderConfigSchema,
} from './config';
export { type Logger, createLogger, createSilentLogger } from './observability/logging';
export type { CardColor, CardRecord, CardRow, CardType, SourceRow } from './types/card';
export { CARD_COLORS, CARD_TYPES } from './types/card';
export { REQUIRED_COLUMNS, parseCardRecord } from './records/cardRecord';
export { parseCardRows, readCardRows } from './records/csvSource';
export { AssetResolver, type ImageLoader, type ResolvedAssets } from './services/AssetResolver';
export { FontSet, type FontFamilies } from './services/FontSet';
export { type CardLayout, type LayoutBox, type RegionName, createCardLayout } from './layouts/CardLayout';
export { type CardTextLayout, layoutCardText } from './layouts/CardTextLayouter';
export { type CostToken, parseCostTokens } from './layouts/CostLayouter';
export { type FittedParagraph, fitParagraph, fitSingleLine, wrapText } from './layouts/TextLayouter';
export { CanvasTextMeasurer, type FontSpec, type TextMeasurer } from './layouts/TextMeasurer';
export { CardCompositor, type ComposedCard } from './render/CardCompositor';
export { CardFactory, type CardFactoryConfig } from './render/cards';
export { type ColorConverter, IccProfileConverter } from './export/ColorConverter';
export { type ExportResult, PrintExporter, printDimensions } from './export/PrintExporter';
export { CardPipeline, type RenderedCard, type RunSummary, type SkippedCard } from './pipeline/CardPipeline';
export { slugify } from './utils/slug';
