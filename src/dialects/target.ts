import type { ColumnSchema, Row } from '../engine/types';

/**
 * Target dialect interface.
 * Implement this to write batches to any relational store.
 */
export interface TargetDialect {
  /** Unique name for logging and diagnostics */
  readonly name: string;

  /** Drop the table if it exists and create it empty from the schema */
  replaceTable(tableName: string, columns: ColumnSchema): Promise<void>;

  /** Append rows in order, atomically. Return count of rows written. */
  appendBatch(tableName: string, columns: ColumnSchema, rows: readonly Row[]): Promise<number>;

  /** Optional: cleanup resources when done */
  close?(): Promise<void>;
}

/**
 * Configuration for target dialects
 */
export type TargetConfig = {
  type: 'postgresql';
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  ssl: boolean;
};
