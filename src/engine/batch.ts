/** PostgreSQL accepts at most this many bind parameters per statement */
export const MAX_BIND_PARAMETERS = 65_535;

/**
 * Split items into consecutive slices of at most `size`, keeping order.
 */
export const splitIntoChunks = <T>(items: readonly T[], size: number): T[][] => {
  if (!Number.isInteger(size) || size <= 0) {
    throw new RangeError(`Chunk size must be a positive integer, got ${size}`);
  }

  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
};

/**
 * Largest number of rows one multi-row INSERT can carry for a table of `columnCount` columns.
 */
export const maxRowsPerStatement = (columnCount: number): number =>
  Math.max(1, Math.floor(MAX_BIND_PARAMETERS / Math.max(1, columnCount)));
