import { z } from 'zod';
import { ConfigurationError } from './errors';
import type { CellValue, ColumnDefinition, ColumnSchema, ColumnType, Row } from './types';

const INTEGER_PATTERN = /^[+-]?\d+(?:\.0*)?$/;
const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,6}))?$/;

const TYPE_LABELS: Record<ColumnType, string> = {
  integer: 'an integer',
  float: 'a number',
  text: 'text',
  timestamp: 'a timestamp (YYYY-MM-DD HH:MM:SS)',
};

const parseInteger = (raw: string): number | undefined => {
  if (!INTEGER_PATTERN.test(raw)) return undefined;
  const value = Number(raw);
  return Number.isSafeInteger(value) ? value : undefined;
};

const parseDecimal = (raw: string): number | undefined => {
  if (!FLOAT_PATTERN.test(raw)) return undefined;
  const value = Number(raw);
  return Number.isFinite(value) ? value : undefined;
};

/**
 * Validates a wall-clock timestamp and returns it as `YYYY-MM-DD HH:MM:SS[.ffffff]`, the
 * literal PostgreSQL reads into a TIMESTAMP WITHOUT TIME ZONE. Fractional digits are kept
 * as written; out-of-range fields such as Feb 30 are rejected.
 */
export const parseTimestamp = (raw: string): string | undefined => {
  const match = TIMESTAMP_PATTERN.exec(raw);
  if (!match) return undefined;

  const [, year, month, day, hours, minutes, seconds, fraction] = match;
  const fields = [year, month, day, hours, minutes, seconds].map(Number);
  const date = new Date(Date.UTC(fields[0], fields[1] - 1, fields[2], fields[3], fields[4], fields[5]));

  const roundTrip = [
    date.getUTCFullYear(),
    date.getUTCMonth() + 1,
    date.getUTCDate(),
    date.getUTCHours(),
    date.getUTCMinutes(),
    date.getUTCSeconds(),
  ];
  if (roundTrip.some((value, i) => value !== fields[i])) return undefined;

  const wallClock = `${year}-${month}-${day} ${hours}:${minutes}:${seconds}`;
  return fraction === undefined ? wallClock : `${wallClock}.${fraction}`;
};

const PARSERS: Record<ColumnType, (raw: string) => CellValue | undefined> = {
  integer: parseInteger,
  float: parseDecimal,
  text: (raw) => raw,
  timestamp: parseTimestamp,
};

export const cellSchema = (type: ColumnType): z.ZodType<CellValue, z.ZodTypeDef, string> =>
  z.string().transform((raw, ctx) => {
    const value = type === 'text' ? raw : raw.trim();
    if (value === '') return null;

    const parsed = PARSERS[type](value);
    if (parsed === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected ${TYPE_LABELS[type]}, got "${raw}"` });
      return z.NEVER;
    }
    return parsed;
  });

/** Declared types with the timestamp columns forced to `timestamp`. */
export const resolveColumns = (columns: ColumnSchema, timestampColumns: readonly string[]): ColumnSchema => {
  const unknown = timestampColumns.filter((name) => !columns.some((column) => column.name === name));
  if (unknown.length > 0) {
    throw new ConfigurationError(`Timestamp columns not in schema: ${unknown.join(', ')}`);
  }

  return columns.map((column): ColumnDefinition =>
    timestampColumns.includes(column.name) ? { name: column.name, type: 'timestamp' } : column
  );
};

export type DecodeResult = { success: true; row: Row } | { success: false; column?: string; message: string };

export type RowDecoder = (fields: readonly string[]) => DecodeResult;

/**
 * Build a decoder for one run. Column positions come from the source header, which must
 * already have been checked against the schema.
 */
export const createRowDecoder = (columns: ColumnSchema, header: readonly string[]): RowDecoder => {
  const plan = columns.map((column) => ({
    name: column.name,
    position: header.indexOf(column.name),
    schema: cellSchema(column.type),
  }));

  return (fields) => {
    if (fields.length !== header.length) {
      return { success: false, message: `expected ${header.length} fields, got ${fields.length}` };
    }

    const row: Row = {};
    for (const { name, position, schema } of plan) {
      const result = schema.safeParse(fields[position]);
      if (!result.success) {
        return { success: false, column: name, message: result.error.issues[0]?.message ?? 'invalid value' };
      }
      row[name] = result.data;
    }
    return { success: true, row };
  };
};

export type HeaderMismatch = {
  missing: string[];
  unrecognized: string[];
  duplicated: string[];
};

export const compareHeader = (columns: ColumnSchema, header: readonly string[]): HeaderMismatch | undefined => {
  const declared = new Set(columns.map((column) => column.name));
  const missing = columns.map((column) => column.name).filter((name) => !header.includes(name));
  const unrecognized = header.filter((name) => !declared.has(name));
  const duplicated = header.filter((name, i) => header.indexOf(name) !== i);

  if (missing.length === 0 && unrecognized.length === 0 && duplicated.length === 0) return undefined;
  return { missing, unrecognized, duplicated };
};
