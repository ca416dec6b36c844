export type IngestionStage = 'config' | 'fetch' | 'decode' | 'schema-create' | 'batch-append';

type IngestionErrorOptions = {
  batchIndex?: number;
  cause?: unknown;
};

/**
 * Base class for every fatal error of a run. `stage` names the pipeline step that failed.
 */
export class IngestionError extends Error {
  readonly stage: IngestionStage;
  readonly batchIndex: number | undefined;

  constructor(stage: IngestionStage, message: string, options: IngestionErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.stage = stage;
    this.batchIndex = options.batchIndex;
  }
}

export class ConfigurationError extends IngestionError {
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super('config', issues.length > 0 ? `${message}\n${issues.map((issue) => `  - ${issue}`).join('\n')}` : message);
    this.issues = issues;
  }
}

export class FetchError extends IngestionError {
  constructor(message: string, options: IngestionErrorOptions = {}) {
    super('fetch', message, options);
  }
}

export class CoercionError extends IngestionError {
  /** 1-based data row number in the source, header excluded */
  readonly row: number;
  readonly column: string | undefined;

  constructor(message: string, details: { batchIndex: number; row: number; column?: string }) {
    super('decode', message, { batchIndex: details.batchIndex });
    this.row = details.row;
    this.column = details.column;
  }
}

export class WriteError extends IngestionError {
  constructor(stage: 'schema-create' | 'batch-append', message: string, options: IngestionErrorOptions = {}) {
    super(stage, message, options);
  }
}

export class CancelledError extends IngestionError {
  constructor(batchIndex: number) {
    super('batch-append', `Run stopped after batch ${batchIndex}`, { batchIndex });
  }
}
