import type { Readable } from 'node:stream';
import type { SourceDialect } from '../dialects/source';
import type { Batch, ColumnSchema, Row } from './types';
import { compareHeader, createRowDecoder, resolveColumns } from './coerce';
import { CoercionError, ConfigurationError, FetchError, IngestionError } from './errors';
import { isCompressed, readRecords } from './read-delimited';
import { isParquet, readParquetRecords } from './read-parquet';

export type ReadOptions = {
  columns: ColumnSchema;
  timestampColumns: readonly string[];
  batchSize: number;
};

export type BatchReader = {
  /** Effective column schema, timestamp columns applied */
  readonly schema: ColumnSchema;

  /**
   * Start a new pass over the source. Every call fetches the resource again; a sequence
   * that has been consumed cannot be replayed.
   */
  batches(): AsyncGenerator<Batch>;
};

const openSource = async (source: SourceDialect): Promise<Readable> => {
  try {
    return await source.open();
  } catch (err) {
    if (err instanceof IngestionError) throw err;
    throw new FetchError(`Failed to open ${source.locator}: ${err instanceof Error ? err.message : String(err)}`, {
      cause: err,
    });
  }
};

/** Records of the resource, header first. The format follows the locator's extension. */
const openRecords = (input: Readable, locator: string): AsyncGenerator<string[]> =>
  isParquet(locator) ? readParquetRecords(input, locator) : readRecords(input, isCompressed(locator), locator);

const normalizeHeader = (header: readonly string[]): string[] =>
  header.map((name, i) => (i === 0 ? name.replace(/^\uFEFF/, '') : name).trim());

/**
 * Decode a source into batches of `batchSize` rows. Rows are coerced as they are read, so
 * a bad row fails the run while its batch is being assembled and before it is handed on.
 */
export async function* readBatches(source: SourceDialect, options: ReadOptions): AsyncGenerator<Batch> {
  const { batchSize } = options;
  if (!Number.isInteger(batchSize) || batchSize <= 0) {
    throw new ConfigurationError(`Batch size must be a positive integer, got ${batchSize}`);
  }

  const schema = resolveColumns(options.columns, options.timestampColumns);
  const input = await openSource(source);
  const records = openRecords(input, source.locator);

  let decode: ReturnType<typeof createRowDecoder> | undefined;
  let rows: Row[] = [];
  let batchIndex = 1;
  let rowNumber = 0;

  for await (const record of records) {
    if (!decode) {
      const header = normalizeHeader(record);
      const mismatch = compareHeader(schema, header);
      if (mismatch) {
        const issues = [
          ...mismatch.missing.map((name) => `missing column "${name}"`),
          ...mismatch.unrecognized.map((name) => `unrecognized column "${name}"`),
          ...mismatch.duplicated.map((name) => `duplicated column "${name}"`),
        ];
        throw new ConfigurationError(`Columns of ${source.locator} do not match the declared schema`, issues);
      }
      decode = createRowDecoder(schema, header);
      continue;
    }

    rowNumber++;
    const result = decode(record);
    if (!result.success) {
      const where = result.column ? `column "${result.column}"` : 'row';
      throw new CoercionError(`Row ${rowNumber} (batch ${batchIndex}): ${where}: ${result.message}`, {
        batchIndex,
        row: rowNumber,
        column: result.column,
      });
    }

    rows.push(result.row);
    if (rows.length === batchSize) {
      yield { index: batchIndex, rows, schema };
      batchIndex++;
      rows = [];
    }
  }

  if (rows.length > 0) {
    yield { index: batchIndex, rows, schema };
  }
}

export const createBatchReader = (source: SourceDialect, options: ReadOptions): BatchReader => ({
  schema: resolveColumns(options.columns, options.timestampColumns),
  batches: () => readBatches(source, options),
});
