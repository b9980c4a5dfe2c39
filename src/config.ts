/**
 * Render configuration
 *
 * Physical size, bleed, DPI and output format are run-configurable. Values
 * come from explicit overrides first, then `CARD_PRESS_*` environment
 * variables, then the defaults below (63×88 mm, no bleed, 300 DPI, TIFF).
 */

import path from 'node:path';
import { z } from 'zod';
import { ValidationError } from './errors';

export const OUTPUT_FORMATS = ['tiff', 'jpeg'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export const renderConfigSchema = z.object({
  assetsDir: z.string().min(1).default('assets'),
  artDir: z.string().min(1).default('art'),
  /** Base for relative art_file paths */
  workDir: z.string().min(1).default('.'),
  titleFont: z.string().min(1).default('Beleren2016-Bold.ttf'),
  bodyFont: z.string().min(1).default('MPlantin.ttf'),
  symbolFont: z.string().min(1).default('MagicSymbols.ttf'),
  dpi: z.coerce.number().int().min(72).max(2400).default(300),
  widthMm: z.coerce.number().positive().default(63),
  heightMm: z.coerce.number().positive().default(88),
  bleedMm: z.coerce.number().min(0).max(20).default(0),
  format: z.enum(OUTPUT_FORMATS).default('tiff'),
  /** Built-in libvips profile name or path to an .icc file */
  iccProfile: z.string().min(1).default('cmyk'),
  jpegQuality: z.coerce.number().int().min(1).max(100).default(95),
  logLevel: z.enum(LOG_LEVELS).default('info'),
});

export type RenderConfig = z.infer<typeof renderConfigSchema>;
export type RenderConfigInput = z.input<typeof renderConfigSchema>;

const ENV_KEYS: Record<string, keyof RenderConfig> = {
  CARD_PRESS_ASSETS_DIR: 'assetsDir',
  CARD_PRESS_ART_DIR: 'artDir',
  CARD_PRESS_DPI: 'dpi',
  CARD_PRESS_WIDTH_MM: 'widthMm',
  CARD_PRESS_HEIGHT_MM: 'heightMm',
  CARD_PRESS_BLEED_MM: 'bleedMm',
  CARD_PRESS_FORMAT: 'format',
  CARD_PRESS_ICC_PROFILE: 'iccProfile',
  CARD_PRESS_LOG_LEVEL: 'logLevel',
};

/**
 * Merge env and overrides and validate. Invalid values throw a
 * ValidationError with rowIndex -1 and the offending config key as field.
 */
export function loadConfig(
  overrides: Partial<Record<keyof RenderConfig, unknown>> = {},
  env: NodeJS.ProcessEnv = process.env,
): RenderConfig {
  const fromEnv: Record<string, string> = {};
  for (const [envKey, configKey] of Object.entries(ENV_KEYS)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') fromEnv[configKey] = value;
  }

  const definedOverrides = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined),
  );

  const result = renderConfigSchema.safeParse({ ...fromEnv, ...definedOverrides });
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ValidationError(issue.path.join('.') || 'config', -1, issue.message);
  }
  return result.data;
}

/** Resolve an asset-relative file name against assetsDir */
export function assetPath(config: RenderConfig, fileName: string): string {
  return path.resolve(config.assetsDir, fileName);
}

export function outputExtension(format: OutputFormat): string {
  return format === 'tiff' ? 'tif' : 'jpg';
}
