import type { SourceDialect } from '../dialects/source';
import type { TargetDialect } from '../dialects/target';
import type { Batch, IngestionOptions, RunResult, RunState } from './types';
import { createBatchReader } from './read-batches';
import { CancelledError, IngestionError, WriteError, type IngestionStage } from './errors';
import { log, firstLine, formatDbError } from './logger';

const TRANSITIONS: Readonly<Record<RunState, readonly RunState[]>> = {
  INIT: ['SCHEMA_CREATED', 'FAILED'],
  SCHEMA_CREATED: ['LOADING', 'FAILED'],
  LOADING: ['DONE', 'FAILED'],
  DONE: [],
  FAILED: [],
};

export const canTransition = (from: RunState, to: RunState): boolean => TRANSITIONS[from].includes(to);

const toIngestionError = (err: unknown, stage: IngestionStage, batchIndex: number | undefined): IngestionError => {
  if (err instanceof IngestionError) return err;
  return new IngestionError(stage, firstLine(err), { batchIndex, cause: err });
};

const describeFailure = (err: IngestionError): string => {
  const where = err.batchIndex === undefined ? err.stage : `${err.stage}, batch ${err.batchIndex}`;
  const detail = err.cause === undefined ? '' : `\n${formatDbError(err.cause)}`;
  return `Run failed during ${where}: ${err.message}${detail}`;
};

/**
 * Ingest one source into one table: replace the table from the schema, then append every
 * batch in source order. Batches are read one at a time; the next is not decoded until
 * the previous one has been committed.
 */
export const run = async (
  source: SourceDialect,
  target: TargetDialect,
  options: IngestionOptions
): Promise<RunResult> => {
  const startTime = Date.now();
  const { tableName, batchSize, progress } = options;
  const shouldStop = options.shouldStop ?? (() => false);

  let state: RunState = 'INIT';
  let stage: IngestionStage = 'fetch';
  let batchIndex: number | undefined;
  let batches = 0;
  let totalRows = 0;

  const transition = (to: RunState): void => {
    if (!canTransition(state, to)) {
      throw new Error(`Invalid run transition ${state} -> ${to}`);
    }
    state = to;
    progress?.onStateChange?.(to);
  };

  let sequence: AsyncGenerator<Batch> | undefined;

  const append = async (batch: Batch): Promise<void> => {
    stage = 'batch-append';
    batchIndex = batch.index;
    try {
      await target.appendBatch(tableName, batch.schema, batch.rows);
    } catch (err) {
      throw new WriteError('batch-append', `Failed to append batch ${batch.index} to "${tableName}": ${firstLine(err)}`, {
        batchIndex: batch.index,
        cause: err,
      });
    }

    batches++;
    totalRows += batch.rows.length;

    const event = { batchIndex: batch.index, rows: batch.rows.length, totalRows, elapsedMs: Date.now() - startTime };
    log.batch(event);
    progress?.onBatch?.(event);
  };

  const startInfo = { tableName, locator: source.locator, batchSize, columnCount: options.columns.length };
  log.run.start(startInfo);
  progress?.onStart?.(startInfo);

  try {
    const reader = createBatchReader(source, options);
    sequence = reader.batches();
    const first = await sequence.next();

    stage = 'schema-create';
    const schema = first.done ? reader.schema : first.value.schema;
    try {
      await target.replaceTable(tableName, schema);
    } catch (err) {
      throw new WriteError('schema-create', `Failed to create table "${tableName}": ${firstLine(err)}`, { cause: err });
    }
    transition('SCHEMA_CREATED');
    transition('LOADING');

    let current = first;
    while (!current.done) {
      const committed = current.value.index;
      await append(current.value);

      stage = 'fetch';
      batchIndex = committed + 1;
      current = await sequence.next();

      // A stop request only matters while batches remain
      if (!current.done && shouldStop()) {
        throw new CancelledError(committed);
      }
    }

    transition('DONE');
  } catch (err) {
    const failure = toIngestionError(err, stage, batchIndex);
    transition('FAILED');
    log.error(describeFailure(failure));
    log.run.summary({ tableName, batches, totalRows, completed: false, elapsed: Date.now() - startTime });
    throw failure;
  } finally {
    await sequence?.return(undefined);
  }

  const elapsedMs = Date.now() - startTime;
  log.run.summary({ tableName, batches, totalRows, completed: true, elapsed: elapsedMs });
  progress?.onComplete?.({ tableName, batches, totalRows, elapsedMs });

  return { state: 'DONE', batches, totalRows, elapsedMs };
};
