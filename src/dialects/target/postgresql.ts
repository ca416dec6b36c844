import Knex, { type Knex as KnexType } from 'knex';
import type { TargetDialect, TargetConfig } from '../target';
import { registerTarget } from '../target-registry';
import type { CellValue, ColumnDefinition, ColumnSchema, Row } from '../../engine/types';
import { maxRowsPerStatement, splitIntoChunks } from '../../engine/batch';
import { log } from '../../engine/logger';

/**
 * Timestamps are already wall-clock text, bound as-is so the driver never applies the
 * process time zone to a TIMESTAMP WITHOUT TIME ZONE column.
 */
export const toInsertRecord = (row: Row, columns: ColumnSchema): Record<string, CellValue> => {
  const record: Record<string, CellValue> = {};
  for (const { name } of columns) {
    record[name] = row[name] ?? null;
  }
  return record;
};

const addColumn = (table: KnexType.CreateTableBuilder, column: ColumnDefinition): void => {
  switch (column.type) {
    case 'integer':
      table.bigInteger(column.name);
      break;
    case 'float':
      table.double(column.name);
      break;
    case 'text':
      table.text(column.name);
      break;
    case 'timestamp':
      table.timestamp(column.name, { useTz: false });
      break;
  }
};

/**
 * Chain a destructive replace of `tableName` onto a schema builder.
 * Exposed so the generated DDL can be inspected without a connection.
 */
export const replaceTableStatements = (
  schema: KnexType.SchemaBuilder,
  tableName: string,
  columns: ColumnSchema
): KnexType.SchemaBuilder =>
  schema.dropTableIfExists(tableName).createTable(tableName, (table) => {
    for (const column of columns) {
      addColumn(table, column);
    }
  });

/**
 * PostgreSQL target dialect.
 * Holds a single connection for the run; every batch is appended in its own transaction.
 */
class PostgreSQLTarget implements TargetDialect {
  readonly name = 'postgresql';

  readonly client: KnexType;

  constructor(config: TargetConfig) {
    const sslConfig = config.ssl ? { rejectUnauthorized: false } : false;

    this.client = Knex({
      client: 'pg',
      connection: {
        host: config.host,
        port: config.port,
        user: config.user,
        password: config.password,
        database: config.database,
        application_name: 'taxi-ingest',
        ssl: sslConfig,
      },
      pool: { min: 1, max: 1 },
      log: {
        warn(message: string) {
          log.knex.warn(message);
        },
        error(message: string) {
          log.knex.error(message);
        },
        deprecate(message: string) {
          log.knex.warn(message);
        },
        debug() {},
      },
    });
  }

  async replaceTable(tableName: string, columns: ColumnSchema): Promise<void> {
    await this.client.transaction(async (trx) => {
      await replaceTableStatements(trx.schema, tableName, columns);
    });
    log.info(`Created table "${tableName}" (${columns.length} columns)`);
  }

  async appendBatch(tableName: string, columns: ColumnSchema, rows: readonly Row[]): Promise<number> {
    if (rows.length === 0) {
      return 0;
    }

    const start = Date.now();
    const statements = splitIntoChunks(rows, maxRowsPerStatement(columns.length));

    await this.client.transaction(async (trx) => {
      for (const chunk of statements) {
        await trx(tableName).insert(chunk.map((row) => toInsertRecord(row, columns)));
      }
    });

    log.db('inserted', rows.length, Date.now() - start);
    return rows.length;
  }

  async close(): Promise<void> {
    await this.client.destroy();
  }
}

export const createPostgreSQLTarget = (config: TargetConfig): TargetDialect => new PostgreSQLTarget(config);

registerTarget('postgresql', createPostgreSQLTarget);
