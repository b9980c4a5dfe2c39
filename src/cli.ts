#!/usr/bin/env node
/**
 * card-press CLI
 *
 *   card-press <cards.csv> <output_dir> [options]
 *
 * Exit codes: 0 all cards rendered, 1 usage or fatal error, 2 some cards
 * skipped.
 */

import { mkdir } from 'node:fs/promises';
import { parseArgs } from 'node:util';
import { type RenderConfig, loadConfig } from './config';
import { describeError, isCardPressError } from './errors';
import { createLogger } from './observability/logging';
import { CardPipeline, type RunSummary } from './pipeline/CardPipeline';
import { readCardRows } from './records/csvSource';

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_PARTIAL = 2;

export const USAGE = `Usage: card-press <cards.csv> <output_dir> [options]

Options:
  --assets <dir>      frames, fonts and patterns (default: assets)
  --art <dir>         artwork looked up by card name (default: art)
  --dpi <n>           output resolution (default: 300)
  --width-mm <n>      trim width (default: 63)
  --height-mm <n>     trim height (default: 88)
  --bleed-mm <n>      bleed on every edge (default: 0)
  --format <fmt>      tiff | jpeg (default: tiff)
  --icc <path>        ICC profile for the CMYK conversion (default: built-in)
  --log-level <lvl>   pino level (default: info)
  -h, --help          show this message
`;

export interface CliOutput {
  out: (text: string) => void;
  err: (text: string) => void;
}

const processOutput: CliOutput = {
  out: (text) => process.stdout.write(text),
  err: (text) => process.stderr.write(text),
};

interface ParsedArgs {
  sourcePath: string;
  outputDir: string;
  overrides: Partial<Record<keyof RenderConfig, unknown>>;
}

function parseCliArgs(argv: string[]): ParsedArgs | 'help' {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      assets: { type: 'string' },
      art: { type: 'string' },
      dpi: { type: 'string' },
      'width-mm': { type: 'string' },
      'height-mm': { type: 'string' },
      'bleed-mm': { type: 'string' },
      format: { type: 'string' },
      icc: { type: 'string' },
      'log-level': { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
  });

  if (values.help) return 'help';
  if (positionals.length !== 2) {
    throw new TypeError(`expected 2 arguments, got ${positionals.length}`);
  }

  const [sourcePath, outputDir] = positionals;
  return {
    sourcePath,
    outputDir,
    overrides: {
      assetsDir: values.assets,
      artDir: values.art,
      dpi: values.dpi,
      widthMm: values['width-mm'],
      heightMm: values['height-mm'],
      bleedMm: values['bleed-mm'],
      format: values.format,
      iccProfile: values.icc,
      logLevel: values['log-level'],
    },
  };
}

export function formatSummary(summary: RunSummary): string {
  const lines = [`Rendered ${summary.rendered.length} card(s), skipped ${summary.skipped.length}.`];
  for (const skipped of summary.skipped) {
    lines.push(`  - ${skipped.rowIndex}: ${skipped.name ?? '(unnamed)'}: ${skipped.reason}`);
  }
  return `${lines.join('\n')}\n`;
}

export async function main(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
  output: CliOutput = processOutput,
): Promise<number> {
  let args: ParsedArgs | 'help';
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    output.err(`card-press: ${describeError(error)}\n\n${USAGE}`);
    return EXIT_FATAL;
  }
  if (args === 'help') {
    output.out(USAGE);
    return EXIT_OK;
  }

  try {
    const config = loadConfig(args.overrides, env);
    const logger = createLogger({ service: 'card-press', level: config.logLevel });

    const pipeline = CardPipeline.create(config, { logger });
    const rows = await readCardRows(args.sourcePath);
    await mkdir(args.outputDir, { recursive: true });

    const summary = await pipeline.run(rows, args.outputDir);
    output.out(formatSummary(summary));
    return summary.skipped.length > 0 ? EXIT_PARTIAL : EXIT_OK;
  } catch (error) {
    if (!isCardPressError(error)) throw error;
    output.err(`card-press: ${error.message}\n`);
    return EXIT_FATAL;
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      process.stderr.write(`card-press: unexpected error: ${describeError(error)}\n`);
      process.exitCode = EXIT_FATAL;
    },
  );
}
