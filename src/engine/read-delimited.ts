import { PassThrough, pipeline, type Readable } from 'node:stream';
import { createGunzip } from 'node:zlib';
import Papa from 'papaparse';
import { FetchError, IngestionError } from './errors';

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((item) => typeof item === 'string');

const messageOf = (err: unknown): string => (err instanceof Error ? err.message : String(err));

export const isCompressed = (locator: string): boolean => {
  try {
    return new URL(locator).pathname.endsWith('.gz');
  } catch {
    return locator.endsWith('.gz');
  }
};

/**
 * Stream the records of a delimited-text resource as string arrays, header included.
 * Transport, decompression and parse failures surface as FetchError.
 */
export async function* readRecords(input: Readable, compressed: boolean, locator: string): AsyncGenerator<string[]> {
  const parser = Papa.parse(Papa.NODE_STREAM_INPUT, { header: false, skipEmptyLines: true });
  // Multibyte characters may straddle chunk boundaries; decode before papaparse sees them
  const text = new PassThrough().setEncoding('utf8');
  const onPipelineEnd = (err: NodeJS.ErrnoException | null): void => {
    if (err) parser.destroy(err);
  };

  if (compressed) {
    pipeline(input, createGunzip(), text, parser, onPipelineEnd);
  } else {
    pipeline(input, text, parser, onPipelineEnd);
  }

  try {
    for await (const value of parser) {
      const record: unknown = value;
      if (!isStringArray(record)) {
        throw new FetchError(`Unexpected record shape while parsing ${locator}`);
      }
      yield record;
    }
  } catch (err) {
    if (err instanceof IngestionError) throw err;
    throw new FetchError(`Failed to decode ${locator}: ${messageOf(err)}`, { cause: err });
  } finally {
    parser.destroy();
    text.destroy();
    input.destroy();
  }
}
