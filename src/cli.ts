#!/usr/bin/env node
import { parseArgs } from 'node:util';
import { createSource, createTarget } from './dialects';
import { run } from './engine/runner';
import { log } from './engine/logger';
import { IngestionError } from './engine/errors';
import { buildRunConfig, DEFAULT_CHUNKSIZE, DEFAULT_DATASET } from './config';
import { listProfiles } from './profiles/registry';

import 'dotenv/config';

const { values, positionals } = parseArgs({
  allowPositionals: true,
  options: {
    'pg-host': { type: 'string' },
    'pg-port': { type: 'string' },
    'pg-user': { type: 'string' },
    'pg-pass': { type: 'string' },
    'pg-db': { type: 'string' },
    'pg-ssl': { type: 'boolean' },
    dataset: { type: 'string', short: 'd' },
    year: { type: 'string', short: 'y' },
    month: { type: 'string', short: 'm' },
    url: { type: 'string' },
    format: { type: 'string', short: 'f' },
    'target-table': { type: 'string', short: 't' },
    chunksize: { type: 'string', short: 'c' },
  },
});

const command = positionals[0] ?? 'run';

let pipelineStarted = false;

const runCommand = async (): Promise<void> => {
  const config = buildRunConfig(values, process.env);
  const source = createSource(config.locator);
  const target = createTarget(config.target);

  const abortController = new AbortController();
  const shouldStop = () => abortController.signal.aborted;

  const onSignal = () => {
    if (abortController.signal.aborted) return;
    abortController.abort();
    console.info('\nShutdown requested, stopping after the current batch is committed...');
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  try {
    pipelineStarted = true;
    await run(source, target, {
      tableName: config.tableName,
      columns: config.profile.columns,
      timestampColumns: config.profile.timestampColumns,
      batchSize: config.batchSize,
      shouldStop,
    });
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    await target.close?.();
    await source.close?.();
    log.info('Connections closed');
  }
};

const datasetsCommand = (): void => {
  for (const profile of listProfiles()) {
    const period = profile.monthly ? '  (needs --year and --month)' : '';
    const formats = profile.formats.join('/');
    console.info(`  ${profile.name.padEnd(8)} ${profile.description} [${formats}] → ${profile.defaultTable}${period}`);
  }
};

const printUsage = (): void => {
  console.info(`
Usage: taxi-ingest <command> [options]

Commands:
  run        Ingest one dataset file into PostgreSQL (default)
  datasets   List available datasets
  help       Show this message

Options:
  --pg-host <host>           PostgreSQL host (or env PG_HOST)
  --pg-port <port>           PostgreSQL port (or env PG_PORT)
  --pg-user <user>           PostgreSQL user (or env PG_USER)
  --pg-pass <password>       PostgreSQL password (or env PG_PASSWORD)
  --pg-db <name>             PostgreSQL database (or env PG_DATABASE)
  --pg-ssl                   Connect with SSL (or env PG_SSL=true)
  -d, --dataset <name>       Dataset profile (default: ${DEFAULT_DATASET})
  -y, --year <yyyy>          Year of the monthly file
  -m, --month <m>            Month of the monthly file (1-12)
  -f, --format <csv|parquet> File format to fetch (default: csv)
  --url <locator>            Source file, overrides the dataset URL (https:// or s3://);
                             a path ending in .parquet is read as parquet, .gz is gunzipped
  -t, --target-table <name>  Destination table (default: dataset table)
  -c, --chunksize <n>        Rows per batch (default: ${DEFAULT_CHUNKSIZE})

The destination table is dropped and recreated on every run.
`);
};

const main = async (): Promise<void> => {
  switch (command) {
    case 'run':
      await runCommand();
      break;
    case 'datasets':
      datasetsCommand();
      break;
    case 'help':
      printUsage();
      break;
    default:
      printUsage();
      process.exit(1);
  }
};

main().catch((err: unknown) => {
  // The runner has already reported failures of the pipeline itself
  if (err instanceof IngestionError) {
    if (!pipelineStarted) {
      log.error(err.message);
    }
  } else {
    console.error('Fatal error:', err);
  }
  process.exit(1);
});
