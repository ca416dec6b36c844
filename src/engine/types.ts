export type ColumnType = 'integer' | 'float' | 'text' | 'timestamp';

export type ColumnDefinition = {
  name: string;
  type: ColumnType;
};

/** Ordered column set of one ingestion run. Order is the destination table's column order. */
export type ColumnSchema = ReadonlyArray<ColumnDefinition>;

/**
 * A decoded cell. Integers and floats are numbers; text and timestamps are strings, a
 * timestamp in its wall-clock form `YYYY-MM-DD HH:MM:SS[.ffffff]`. Empty cells are `null`.
 */
export type CellValue = number | string | null;

export type Row = Record<string, CellValue>;

export type Batch = {
  /** 1-based position in the run */
  index: number;
  rows: Row[];
  schema: ColumnSchema;
};

export type RunState = 'INIT' | 'SCHEMA_CREATED' | 'LOADING' | 'DONE' | 'FAILED';

export type BatchProgress = {
  batchIndex: number;
  rows: number;
  totalRows: number;
  elapsedMs: number;
};

/**
 * Observers for a run. Hooks only observe; they never change control flow.
 */
export type ProgressHook = {
  onStart?: (params: { tableName: string; locator: string; batchSize: number; columnCount: number }) => void;

  /** Called after each batch is committed */
  onBatch?: (params: BatchProgress) => void;

  onStateChange?: (state: RunState) => void;

  onComplete?: (params: { tableName: string; batches: number; totalRows: number; elapsedMs: number }) => void;
};

export type IngestionOptions = {
  tableName: string;
  columns: ColumnSchema;
  /** Columns parsed as timestamps whatever their declared type */
  timestampColumns: readonly string[];
  batchSize: number;
  progress?: ProgressHook;
  /** Polled after every committed batch */
  shouldStop?: () => boolean;
};

export type RunResult = {
  state: 'DONE';
  batches: number;
  totalRows: number;
  elapsedMs: number;
};

export type SourceFormat = 'csv' | 'parquet';

export type Period = {
  year: number;
  month: number;
};

/**
 * A named dataset: what its files look like and where they live.
 */
export type IngestionProfile = {
  /** Used in logs and as the --dataset value */
  name: string;

  description: string;

  columns: ColumnSchema;

  timestampColumns: readonly string[];

  defaultTable: string;

  /** Monthly datasets need a year and month to locate their file */
  monthly: boolean;

  /** Formats the dataset is published in, the first being the default */
  formats: readonly SourceFormat[];

  locator: (period: Period | undefined, format: SourceFormat) => string;
};
