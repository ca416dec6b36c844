import { createBatchReader, readBatches } from './read-batches';
import { CoercionError, ConfigurationError } from './errors';
import type { Batch, ColumnSchema } from './types';
import { MemorySource, toCsv } from '../testing/memory-source';

const COLUMNS: ColumnSchema = [
  { name: 'LocationID', type: 'integer' },
  { name: 'Borough', type: 'text' },
  { name: 'Zone', type: 'text' },
];

const collect = async (batches: AsyncIterable<Batch>): Promise<Batch[]> => {
  const result: Batch[] = [];
  for await (const batch of batches) {
    result.push(batch);
  }
  return result;
};

describe('readBatches', () => {
  it('groups rows into batches of the requested size', async () => {
    const csv = toCsv(
      ['LocationID', 'Borough', 'Zone'],
      [
        ['1', 'EWR', 'Newark Airport'],
        ['2', 'Queens', 'Jamaica Bay'],
        ['3', 'Bronx', 'Allerton/Pelham Gardens'],
      ]
    );
    const source = new MemorySource(csv, 'memory://test/taxi_zone_lookup.csv');

    const batches = await collect(readBatches(source, { columns: COLUMNS, timestampColumns: [], batchSize: 2 }));

    expect(batches.map((batch) => [batch.index, batch.rows.length])).toEqual([
      [1, 2],
      [2, 1],
    ]);
    expect(batches[1].rows[0]).toEqual({ LocationID: 3, Borough: 'Bronx', Zone: 'Allerton/Pelham Gardens' });
  });

  it('strips a byte order mark from the header', async () => {
    const source = new MemorySource('\uFEFFLocationID,Borough,Zone\n1,EWR,Newark Airport\n', 'memory://test/zones.csv');

    const batches = await collect(readBatches(source, { columns: COLUMNS, timestampColumns: [], batchSize: 10 }));

    expect(batches[0].rows).toEqual([{ LocationID: 1, Borough: 'EWR', Zone: 'Newark Airport' }]);
  });

  it('rejects a non-positive batch size before fetching', async () => {
    const source = new MemorySource('LocationID,Borough,Zone\n');

    await expect(
      collect(readBatches(source, { columns: COLUMNS, timestampColumns: [], batchSize: 0 }))
    ).rejects.toBeInstanceOf(ConfigurationError);
    expect(source.opens).toBe(0);
  });

  it('fails on a row with too few fields', async () => {
    const source = new MemorySource('LocationID,Borough,Zone\n1,EWR\n');

    await expect(
      collect(readBatches(source, { columns: COLUMNS, timestampColumns: [], batchSize: 10 }))
    ).rejects.toMatchObject({ row: 1, batchIndex: 1, message: 'Row 1 (batch 1): row: expected 3 fields, got 2' });
  });

  it('fails on the first value that cannot be coerced', async () => {
    const source = new MemorySource('LocationID,Borough,Zone\n1,EWR,Newark\nx,Queens,Jamaica Bay\n');

    const error = await collect(readBatches(source, { columns: COLUMNS, timestampColumns: [], batchSize: 10 })).catch(
      (err: unknown) => err
    );

    expect(error).toBeInstanceOf(CoercionError);
    expect(error).toMatchObject({ row: 2, column: 'LocationID', batchIndex: 1 });
  });
});

describe('createBatchReader', () => {
  it('fetches the resource again for every pass', async () => {
    const source = new MemorySource(toCsv(['LocationID', 'Borough', 'Zone'], [['1', 'EWR', 'Newark Airport']]));
    const reader = createBatchReader(source, { columns: COLUMNS, timestampColumns: [], batchSize: 10 });

    const first = await collect(reader.batches());
    const second = await collect(reader.batches());

    expect(source.opens).toBe(2);
    expect(second).toEqual(first);
  });

  it('does not replay a consumed sequence', async () => {
    const source = new MemorySource(toCsv(['LocationID', 'Borough', 'Zone'], [['1', 'EWR', 'Newark Airport']]));
    const sequence = createBatchReader(source, { columns: COLUMNS, timestampColumns: [], batchSize: 10 }).batches();

    await collect(sequence);

    expect(await sequence.next()).toEqual({ done: true, value: undefined });
    expect(source.opens).toBe(1);
  });
});
