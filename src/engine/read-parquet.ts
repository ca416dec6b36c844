import type { Readable } from 'node:stream';
import { ParquetReader } from '@dsnp/parquetjs';
import { FetchError, IngestionError } from './errors';

export const isParquet = (locator: string): boolean => {
  try {
    return new URL(locator).pathname.endsWith('.parquet');
  } catch {
    return locator.endsWith('.parquet');
  }
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  value !== null && typeof value === 'object' && !Array.isArray(value);

const pad = (n: number, len = 2): string => String(n).padStart(len, '0');

/** Parquet timestamps arrive as Dates whose UTC fields hold the wall-clock time */
const wallClock = (date: Date): string => {
  const text =
    `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
  const millis = date.getUTCMilliseconds();
  return millis === 0 ? text : `${text}.${pad(millis, 3)}`;
};

/**
 * Render a parquet value the way it would appear in a CSV cell, so both formats share one
 * schema check and one coercion path. Missing values become empty cells.
 */
export const toCellText = (value: unknown, column: string): string => {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') return String(value);
  if (value instanceof Date) return wallClock(value);
  if (value instanceof Uint8Array) return Buffer.from(value).toString('utf8');

  throw new FetchError(`Unsupported nested value in parquet column "${column}"`);
};

const readAll = async (input: Readable): Promise<Buffer> => {
  const chunks: Buffer[] = [];
  for await (const chunk of input) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }
  return Buffer.concat(chunks);
};

/**
 * Read a parquet file as records shaped like delimited text: the top-level column names
 * first, then one array of cell texts per row. The footer sits at the end of the file,
 * so the whole body is buffered before the first row is decoded.
 */
export async function* readParquetRecords(input: Readable, locator: string): AsyncGenerator<string[]> {
  let reader: Awaited<ReturnType<typeof ParquetReader.openBuffer>> | undefined;

  try {
    const body = await readAll(input);
    if (body.length === 0) return;

    reader = await ParquetReader.openBuffer(body);
    const header = Object.keys(reader.getSchema().fields);
    yield header;

    const cursor = reader.getCursor();
    for (;;) {
      const record: unknown = await cursor.next();
      if (record === null || record === undefined) break;
      if (!isRecord(record)) {
        throw new FetchError(`Unexpected record shape while reading ${locator}`);
      }
      yield header.map((name) => toCellText(record[name], name));
    }
  } catch (err) {
    if (err instanceof IngestionError) throw err;
    throw new FetchError(`Failed to decode ${locator}: ${err instanceof Error ? err.message : String(err)}`, {
      cause: err,
    });
  } finally {
    await reader?.close();
    input.destroy();
  }
}
