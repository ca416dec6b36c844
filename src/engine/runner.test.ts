import { run, canTransition } from './runner';
import { CancelledError, CoercionError, ConfigurationError, FetchError, WriteError } from './errors';
import type { ColumnSchema, RunState } from './types';
import { MemorySource, toCsv } from '../testing/memory-source';
import { MemoryTarget } from '../testing/memory-target';

const COLUMNS: ColumnSchema = [
  { name: 'id', type: 'integer' },
  { name: 'pickup', type: 'text' },
  { name: 'fare', type: 'float' },
  { name: 'flag', type: 'text' },
];

const HEADER = ['id', 'pickup', 'fare', 'flag'];

const makeRows = (count: number): string[][] =>
  Array.from({ length: count }, (_, i) => [String(i + 1), '2021-01-01 00:15:30', (i * 0.5).toFixed(2), 'N']);

const options = (batchSize: number) => ({
  tableName: 'trips',
  columns: COLUMNS,
  timestampColumns: ['pickup'],
  batchSize,
});

describe('run', () => {
  beforeEach(() => {
    vi.spyOn(console, 'info').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('creates the table once, then appends full batches and a smaller final one', async () => {
    const source = new MemorySource(toCsv(HEADER, makeRows(250)));
    const target = new MemoryTarget();

    const result = await run(source, target, options(100));

    expect(target.calls).toEqual(['replace:trips', 'append:trips:100', 'append:trips:100', 'append:trips:50']);
    expect(result).toMatchObject({ state: 'DONE', batches: 3, totalRows: 250 });
    expect(target.rows('trips')).toHaveLength(250);
  });

  it('keeps source order across batch boundaries', async () => {
    const source = new MemorySource(toCsv(HEADER, makeRows(25)));
    const target = new MemoryTarget();

    await run(source, target, options(7));

    expect(target.rows('trips').map((row) => row.id)).toEqual(Array.from({ length: 25 }, (_, i) => i + 1));
  });

  it('stores typed values with timestamp columns parsed', async () => {
    const source = new MemorySource(toCsv(HEADER, [['42', '2021-01-31 23:59:01', '12.5', '']]));
    const target = new MemoryTarget();

    await run(source, target, options(10));

    expect(target.rows('trips')).toEqual([
      { id: 42, pickup: '2021-01-31 23:59:01', fare: 12.5, flag: null },
    ]);
    expect(target.tables.get('trips')?.columns).toEqual([
      { name: 'id', type: 'integer' },
      { name: 'pickup', type: 'timestamp' },
      { name: 'fare', type: 'float' },
      { name: 'flag', type: 'text' },
    ]);
  });

  it('creates an empty table when the source has no rows', async () => {
    const source = new MemorySource(toCsv(HEADER, []));
    const target = new MemoryTarget();

    const result = await run(source, target, options(100));

    expect(target.calls).toEqual(['replace:trips']);
    expect(target.tables.get('trips')?.rows).toEqual([]);
    expect(result).toMatchObject({ state: 'DONE', batches: 0, totalRows: 0 });
  });

  it('treats a zero-byte resource as an empty source', async () => {
    const source = new MemorySource('');
    const target = new MemoryTarget();

    const result = await run(source, target, options(100));

    expect(target.calls).toEqual(['replace:trips']);
    expect(result.totalRows).toBe(0);
  });

  it('fails during the second batch and keeps only the first batch', async () => {
    const rows = makeRows(300);
    rows[149] = ['150', '2021-01-01 00:15:30', 'abc', 'N'];
    const source = new MemorySource(toCsv(HEADER, rows));
    const target = new MemoryTarget();

    const error = await run(source, target, options(100)).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(CoercionError);
    expect(error).toMatchObject({ stage: 'decode', batchIndex: 2, row: 150, column: 'fare' });
    expect(target.calls).toEqual(['replace:trips', 'append:trips:100']);
    expect(target.rows('trips')).toHaveLength(100);
  });

  it('reports the batch index when an append is rejected', async () => {
    const source = new MemorySource(toCsv(HEADER, makeRows(30)));
    const target = new MemoryTarget();
    target.failOnAppend = 2;

    const error = await run(source, target, options(10)).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(WriteError);
    expect(error).toMatchObject({ stage: 'batch-append', batchIndex: 2 });
    expect(target.rows('trips')).toHaveLength(10);
  });

  it('aborts before loading any row when the table cannot be created', async () => {
    const source = new MemorySource(toCsv(HEADER, makeRows(5)));
    const target = new MemoryTarget();
    target.failOnReplace = true;

    const error = await run(source, target, options(10)).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(WriteError);
    expect(error).toMatchObject({ stage: 'schema-create', message: 'Failed to create table "trips": connection refused' });
    expect(target.calls).toEqual(['replace:trips']);
  });

  it('leaves the table untouched when the source columns do not match', async () => {
    const source = new MemorySource(toCsv(['id', 'pickup', 'fare', 'extra'], makeRows(3)));
    const target = new MemoryTarget();

    const error = await run(source, target, options(10)).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({
      stage: 'config',
      issues: ['missing column "flag"', 'unrecognized column "extra"'],
    });
    expect(target.calls).toEqual([]);
  });

  it('leaves the table untouched when the resource cannot be fetched', async () => {
    const target = new MemoryTarget();
    const source = {
      name: 'broken',
      locator: 'https://example.test/missing.csv.gz',
      open: async () => {
        throw new FetchError('HTTP 404 Not Found for https://example.test/missing.csv.gz');
      },
    };
    const states: RunState[] = [];

    const error = await run(source, target, { ...options(10), progress: { onStateChange: (s) => states.push(s) } }).catch(
      (err: unknown) => err
    );

    expect(error).toBeInstanceOf(FetchError);
    expect(target.calls).toEqual([]);
    expect(states).toEqual(['FAILED']);
  });

  it('discards rows left by a previous run', async () => {
    const target = new MemoryTarget();
    await run(new MemorySource(toCsv(HEADER, makeRows(20))), target, options(10));

    await run(new MemorySource(toCsv(HEADER, makeRows(5))), target, options(10));

    expect(target.rows('trips')).toHaveLength(5);
  });

  it('reports progress once per committed batch and walks the run states in order', async () => {
    const source = new MemorySource(toCsv(HEADER, makeRows(25)));
    const target = new MemoryTarget();
    const onBatch = vi.fn();
    const states: RunState[] = [];

    await run(source, target, { ...options(10), progress: { onBatch, onStateChange: (s) => states.push(s) } });

    expect(onBatch.mock.calls.map(([event]) => [event.batchIndex, event.rows, event.totalRows])).toEqual([
      [1, 10, 10],
      [2, 10, 20],
      [3, 5, 25],
    ]);
    expect(states).toEqual(['SCHEMA_CREATED', 'LOADING', 'DONE']);
  });

  it('stops after the committed batch when asked to', async () => {
    const source = new MemorySource(toCsv(HEADER, makeRows(30)));
    const target = new MemoryTarget();

    const error = await run(source, target, { ...options(10), shouldStop: () => true }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(CancelledError);
    expect(error).toMatchObject({ batchIndex: 1 });
    expect(target.rows('trips')).toHaveLength(10);
  });

  it('completes when the stop request comes with the last batch', async () => {
    const source = new MemorySource(toCsv(HEADER, makeRows(2)));
    const target = new MemoryTarget();
    const states: RunState[] = [];

    const result = await run(source, target, {
      ...options(10),
      shouldStop: () => true,
      progress: { onStateChange: (s) => states.push(s) },
    });

    expect(result).toMatchObject({ state: 'DONE', batches: 1, totalRows: 2 });
    expect(states).toEqual(['SCHEMA_CREATED', 'LOADING', 'DONE']);
    expect(target.rows('trips')).toHaveLength(2);
  });
});

describe('run hooks', () => {
  beforeEach(() => {
    vi.spyOn(console, 'info').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('reports the start and the completion of a run', async () => {
    const onStart = vi.fn();
    const onComplete = vi.fn();

    await run(new MemorySource(toCsv(HEADER, makeRows(25))), new MemoryTarget(), {
      ...options(10),
      progress: { onStart, onComplete },
    });

    expect(onStart).toHaveBeenCalledWith({
      tableName: 'trips',
      locator: 'memory://test/trips.csv.gz',
      batchSize: 10,
      columnCount: 4,
    });
    expect(onComplete).toHaveBeenCalledWith({
      tableName: 'trips',
      batches: 3,
      totalRows: 25,
      elapsedMs: expect.any(Number),
    });
  });

  it('does not report completion of a failed run', async () => {
    const target = new MemoryTarget();
    target.failOnAppend = 1;
    const onComplete = vi.fn();

    await run(new MemorySource(toCsv(HEADER, makeRows(5))), target, {
      ...options(10),
      progress: { onComplete },
    }).catch((err: unknown) => err);

    expect(onComplete).not.toHaveBeenCalled();
  });
});

describe('canTransition', () => {
  it('never skips schema creation before loading', () => {
    expect(canTransition('INIT', 'LOADING')).toBe(false);
    expect(canTransition('INIT', 'SCHEMA_CREATED')).toBe(true);
    expect(canTransition('SCHEMA_CREATED', 'LOADING')).toBe(true);
  });

  it('allows failure from every state except the terminal ones', () => {
    expect(canTransition('LOADING', 'FAILED')).toBe(true);
    expect(canTransition('DONE', 'FAILED')).toBe(false);
    expect(canTransition('FAILED', 'DONE')).toBe(false);
  });
});
