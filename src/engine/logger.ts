const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  bold: '\x1b[1m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
} as const;

type Color = keyof typeof COLORS;

const paint = (color: Color, text: string): string => `${COLORS[color]}${text}${COLORS.reset}`;

const clock = (): string => {
  const now = new Date();
  return [now.getHours(), now.getMinutes(), now.getSeconds()].map((n) => String(n).padStart(2, '0')).join(':');
};

/** Every log line starts with a dimmed wall-clock time */
const line = (...parts: string[]): string => [paint('dim', clock()), ...parts].join('  ');

const formatNumber = (n: number): string => n.toLocaleString('en-US');

const RULE = paint('dim', '─'.repeat(50));

export const formatElapsed = (elapsedMs: number): string => {
  if (elapsedMs < 60_000) {
    return `${(elapsedMs / 1000).toFixed(1)}s`;
  }

  const minutes = Math.floor(elapsedMs / 60_000);
  const seconds = Math.round((elapsedMs % 60_000) / 1000);
  return `${minutes}m ${seconds}s`;
};

export const log = {
  info: (message: string) => {
    console.info(line(message));
  },

  warn: (message: string) => {
    console.warn(line(paint('yellow', 'WARN'), message));
  },

  error: (message: string) => {
    console.error(line(paint('red', 'ERR '), message));
  },

  batch: (progress: { batchIndex: number; rows: number; totalRows: number; elapsedMs: number }) => {
    console.info(
      line(
        paint('cyan', `batch-${progress.batchIndex}`),
        `appended ${paint('bold', formatNumber(progress.rows))} rows`,
        `total ${paint('green', formatNumber(progress.totalRows))}`,
        paint('dim', formatElapsed(progress.elapsedMs))
      )
    );
  },

  run: {
    start: (config: { tableName: string; locator: string; batchSize: number; columnCount: number }) => {
      console.info(
        [
          '',
          paint('bold', 'Ingestion started'),
          `  source:     ${config.locator}`,
          `  table:      ${config.tableName}`,
          `  columns:    ${config.columnCount}`,
          `  batch size: ${formatNumber(config.batchSize)}`,
          '',
        ].join('\n')
      );
    },

    summary: (stats: { tableName: string; batches: number; totalRows: number; completed: boolean; elapsed: number }) => {
      const status = stats.completed ? paint('green', `${COLORS.bold}DONE`) : paint('red', `${COLORS.bold}FAILED`);

      console.info(
        [
          '',
          RULE,
          `  ${status}  ${paint('dim', `(${formatElapsed(stats.elapsed)})`)}`,
          '',
          `  table:    ${stats.tableName}`,
          `  batches:  ${paint('bold', formatNumber(stats.batches))}`,
          `  rows:     ${paint('green', formatNumber(stats.totalRows))}`,
          RULE,
          '',
        ].join('\n')
      );
    },
  },

  /** One database round trip; slow ones (over a second) are highlighted */
  db: (action: string, rows: number, elapsedMs: number) => {
    const time = paint(elapsedMs > 1000 ? 'yellow' : 'dim', `${elapsedMs}ms`);
    console.info(line(paint('dim', 'db'), `${action} ${paint('bold', formatNumber(rows))} rows`, time));
  },

  knex: {
    warn: (message: string) => {
      log.warn(`[knex] ${message}`);
    },
    error: (message: string) => {
      log.error(`[knex] ${message}`);
    },
  },
};

type PgErrorFields = Partial<Record<'severity' | 'code' | 'detail' | 'constraint' | 'table' | 'column' | 'hint', string>>;

const PG_FIELDS = ['code', 'severity', 'detail', 'constraint', 'table', 'column', 'hint'] as const;

const isPgError = (err: unknown): err is PgErrorFields =>
  err !== null && typeof err === 'object' && 'severity' in err && 'code' in err;

export const firstLine = (err: unknown): string => {
  const msg = err instanceof Error ? err.message : String(err);
  return msg.split('\n')[0].slice(0, 200);
};

const FIELD_INDENT = ' '.repeat(22);

/** Server-side fields of a pg error, one per line; any other error as its first line */
export const formatDbError = (err: unknown): string => {
  if (!isPgError(err)) {
    return firstLine(err);
  }

  return PG_FIELDS.flatMap((field) => {
    const value = err[field];
    return value ? [`${FIELD_INDENT}${paint('dim', field.padEnd(12))}${value}`] : [];
  }).join('\n');
};
