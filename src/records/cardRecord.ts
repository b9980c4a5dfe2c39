/**
 * Record Model
 *
 * Turns one header-keyed data row into a frozen CardRecord. Pure: no I/O.
 * A bad row throws ValidationError naming the first offending column; the
 * pipeline skips that record and carries on with the rest of the batch.
 */

import { z } from 'zod';
import { ValidationError } from '../errors';
import {
  CARD_COLORS,
  CARD_TYPES,
  type CardRecord,
  type CardRow,
} from '../types/card';

/** Columns every data source must provide (order-independent) */
export const REQUIRED_COLUMNS = [
  'name',
  'cost',
  'type',
  'subtype',
  'color',
  'art_file',
  'strength',
  'description',
] as const;

function caseInsensitiveEnum<T extends string>(values: readonly T[]) {
  return z.string().transform((value, ctx) => {
    const trimmed = value.trim();
    const match = values.find((candidate) => candidate.toLowerCase() === trimmed.toLowerCase());
    if (!match) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `expected one of ${values.join(', ')}, got "${trimmed}"`,
      });
      return z.NEVER;
    }
    return match;
  });
}

const optionalText = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim() ?? '';
    return trimmed === '' ? undefined : trimmed;
  });

const optionalInteger = z
  .string()
  .optional()
  .transform((value, ctx) => {
    const trimmed = value?.trim() ?? '';
    if (trimmed === '') return undefined;
    if (!/^-?\d+$/.test(trimmed)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `must be an integer, got "${trimmed}"`,
      });
      return z.NEVER;
    }
    return Number.parseInt(trimmed, 10);
  });

// Spreadsheets often export line breaks as a literal "\n"
function normalizeDescription(value: string): string {
  return value.replace(/\r\n?/g, '\n').replace(/\\n/g, '\n').trim();
}

const cardRowSchema = z
  .object({
    name: z.string({ required_error: 'is required' }).trim().min(1, 'is required'),
    cost: z.string().default('').transform((value) => value.trim()),
    type: caseInsensitiveEnum(CARD_TYPES),
    subtype: optionalText,
    color: caseInsensitiveEnum(CARD_COLORS),
    art_file: optionalText,
    strength: optionalInteger,
    toughness: optionalInteger,
    description: z.string().default('').transform(normalizeDescription),
  })
  .superRefine((row, ctx) => {
    if (row.type === 'Creature' && row.strength === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['strength'],
        message: 'is required for creatures',
      });
    }
    if (row.type !== 'Creature' && row.strength !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['strength'],
        message: `must be empty for ${row.type.toLowerCase()} cards`,
      });
    }
    if (row.type !== 'Creature' && row.toughness !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['toughness'],
        message: `must be empty for ${row.type.toLowerCase()} cards`,
      });
    }
  });

/** Lower-case and trim header names so column matching ignores case */
export function normalizeRow(row: CardRow): CardRow {
  const normalized: CardRow = {};
  for (const [key, value] of Object.entries(row)) {
    normalized[key.trim().toLowerCase()] = value;
  }
  return normalized;
}

/**
 * Parse and validate one row.
 *
 * @param rowIndex - 1-based data row number, reported on failure
 * @throws ValidationError
 */
export function parseCardRecord(row: CardRow, rowIndex: number): CardRecord {
  const result = cardRowSchema.safeParse(normalizeRow(row));
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ValidationError(String(issue.path[0] ?? 'row'), rowIndex, issue.message);
  }

  const { art_file: artFile, ...fields } = result.data;
  const record: CardRecord = {
    name: fields.name,
    cost: fields.cost,
    type: fields.type,
    color: fields.color,
    description: fields.description,
    ...(fields.subtype !== undefined && { subtype: fields.subtype }),
    ...(artFile !== undefined && { artFile }),
    ...(fields.strength !== undefined && { strength: fields.strength }),
    ...(fields.toughness !== undefined && { toughness: fields.toughness }),
  };
  return Object.freeze(record);
}
