import { readFile } from 'node:fs/promises';
import { parse } from 'csv-parse/sync';
import { SourceError, describeError } from '../errors';
import type { CardRow, SourceRow } from '../types/card';
import { REQUIRED_COLUMNS } from './cardRecord';

/**
 * Read a header-named CSV of card rows.
 *
 * Column order does not matter and header names are matched
 * case-insensitively, but every required column must be present.
 */
export async function readCardRows(sourcePath: string): Promise<SourceRow[]> {
  let content: string;
  try {
    content = await readFile(sourcePath, 'utf-8');
  } catch (error) {
    throw new SourceError(sourcePath, describeError(error), { cause: error });
  }
  return parseCardRows(content, sourcePath);
}

export function parseCardRows(content: string, sourcePath = '<inline>'): SourceRow[] {
  let header: string[] = [];
  let parsed: unknown;
  try {
    parsed = parse(content, {
      bom: true,
      trim: true,
      skip_empty_lines: true,
      relax_column_count: true,
      columns: (names: string[]) => {
        header = names.map((name) => name.trim().toLowerCase());
        return header;
      },
    });
  } catch (error) {
    throw new SourceError(sourcePath, describeError(error), { cause: error });
  }

  const missing = REQUIRED_COLUMNS.filter((column) => !header.includes(column));
  if (missing.length > 0) {
    throw new SourceError(sourcePath, `missing required column(s): ${missing.join(', ')}`);
  }

  const rows = Array.isArray(parsed) ? parsed : [];
  return rows.map((record: unknown, index) => ({ rowIndex: index + 1, cells: toCardRow(record) }));
}

function toCardRow(record: unknown): CardRow {
  const cells: CardRow = {};
  if (typeof record !== 'object' || record === null) return cells;
  for (const [key, value] of Object.entries(record)) {
    if (typeof value === 'string') cells[key] = value;
  }
  return cells;
}
