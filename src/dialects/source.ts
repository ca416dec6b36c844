import type { Readable } from 'node:stream';

/**
 * Source dialect interface.
 * Implement this to fetch a trip file (CSV or parquet) from any location (HTTP, S3, ...).
 */
export interface SourceDialect {
  /** Unique name for logging and diagnostics */
  readonly name: string;

  /** Resource locator, e.g. https://host/file.csv.gz or s3://bucket/key.csv.gz */
  readonly locator: string;

  /** Fetch the resource and return its raw (possibly compressed) bytes */
  open(): Promise<Readable>;

  /** Optional: cleanup resources when done */
  close?(): Promise<void>;
}

/** Builds a source dialect for one locator */
export type SourceDialectFactory = (locator: string) => SourceDialect;
