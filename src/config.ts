import { z } from 'zod';
import type { TargetConfig } from './dialects/target';
import type { IngestionProfile, Period, SourceFormat } from './engine/types';
import { ConfigurationError } from './engine/errors';
import { getProfile } from './profiles/registry';

export const DEFAULT_CHUNKSIZE = 100_000;
export const DEFAULT_DATASET = 'yellow';

/** Raw CLI values as returned by parseArgs */
export type CliValues = {
  'pg-host'?: string;
  'pg-port'?: string;
  'pg-user'?: string;
  'pg-pass'?: string;
  'pg-db'?: string;
  'pg-ssl'?: boolean;
  dataset?: string;
  year?: string;
  month?: string;
  url?: string;
  format?: string;
  'target-table'?: string;
  chunksize?: string;
};

export type RunConfig = {
  profile: IngestionProfile;
  locator: string;
  tableName: string;
  batchSize: number;
  target: TargetConfig;
};

const requiredText = (label: string) =>
  z
    .string({ required_error: `${label} is required` })
    .trim()
    .min(1, `${label} is required`);

const integerText = (label: string) =>
  z
    .string({ required_error: `${label} is required` })
    .trim()
    .regex(/^\d+$/, `${label} must be a whole number`)
    .transform(Number);

const ConnectionSchema = z.object({
  host: requiredText('host'),
  port: integerText('port').pipe(z.number().int().min(1, 'port must be 1-65535').max(65535, 'port must be 1-65535')),
  user: requiredText('user'),
  password: z.string({ required_error: 'password is required' }).min(1, 'password is required'),
  database: requiredText('database'),
  ssl: z.boolean(),
});

const RunSchema = z.object({
  dataset: requiredText('dataset'),
  year: integerText('year').pipe(z.number().int().min(2009, 'year must be 2009 or later').max(2100)).optional(),
  month: integerText('month').pipe(z.number().int().min(1, 'month must be 1-12').max(12, 'month must be 1-12')).optional(),
  url: z.string().trim().url('url must be a valid URL').optional(),
  format: z.enum(['csv', 'parquet'], { errorMap: () => ({ message: 'format must be csv or parquet' }) }).optional(),
  tableName: z
    .string()
    .trim()
    .regex(/^[A-Za-z_][A-Za-z0-9_]{0,62}$/, 'target-table must be a SQL identifier of at most 63 characters')
    .optional(),
  chunksize: integerText('chunksize')
    .pipe(z.number().int().positive('chunksize must be a positive integer'))
    .default(String(DEFAULT_CHUNKSIZE)),
});

const FLAG_NAMES: Record<string, string> = {
  host: '--pg-host',
  port: '--pg-port',
  user: '--pg-user',
  password: '--pg-pass',
  database: '--pg-db',
  ssl: '--pg-ssl',
  dataset: '--dataset',
  year: '--year',
  month: '--month',
  url: '--url',
  format: '--format',
  tableName: '--target-table',
  chunksize: '--chunksize',
};

const formatIssues = (error: z.ZodError): string[] =>
  error.issues.map((issue) => {
    const key = String(issue.path[0] ?? '');
    return `${FLAG_NAMES[key] ?? key}: ${issue.message}`;
  });

const blankToUndefined = (value: string | undefined): string | undefined =>
  value === undefined || value.trim() === '' ? undefined : value;

/**
 * Connection parameters from flags, falling back to PG_* environment variables.
 */
export const buildTargetConfig = (values: CliValues, env: NodeJS.ProcessEnv): TargetConfig => {
  const result = ConnectionSchema.safeParse({
    host: values['pg-host'] ?? env.PG_HOST,
    port: values['pg-port'] ?? env.PG_PORT,
    user: values['pg-user'] ?? env.PG_USER,
    password: values['pg-pass'] ?? env.PG_PASSWORD,
    database: values['pg-db'] ?? env.PG_DATABASE,
    ssl: values['pg-ssl'] === true || env.PG_SSL === 'true',
  });

  if (!result.success) {
    throw new ConfigurationError('Invalid connection parameters', formatIssues(result.error));
  }
  return { type: 'postgresql', ...result.data };
};

/**
 * Validate every parameter of a run. Performs no I/O, so a bad invocation fails before
 * anything is fetched or written.
 */
export const buildRunConfig = (values: CliValues, env: NodeJS.ProcessEnv): RunConfig => {
  const issues: string[] = [];

  const target = (() => {
    try {
      return buildTargetConfig(values, env);
    } catch (err) {
      if (!(err instanceof ConfigurationError)) throw err;
      issues.push(...err.issues);
      return undefined;
    }
  })();

  const parsed = RunSchema.safeParse({
    dataset: values.dataset ?? DEFAULT_DATASET,
    year: blankToUndefined(values.year),
    month: blankToUndefined(values.month),
    url: blankToUndefined(values.url),
    format: blankToUndefined(values.format),
    tableName: blankToUndefined(values['target-table']),
    chunksize: blankToUndefined(values.chunksize),
  });

  if (!parsed.success) {
    issues.push(...formatIssues(parsed.error));
  }

  if (!parsed.success || !target) {
    throw new ConfigurationError('Invalid configuration', issues);
  }

  const { dataset, year, month, url, format: requested, tableName, chunksize } = parsed.data;
  const profile = getProfile(dataset);

  const period: Period | undefined = year !== undefined && month !== undefined ? { year, month } : undefined;
  if (profile.monthly && !url && !period) {
    throw new ConfigurationError('Invalid configuration', [
      `--year/--month: dataset "${profile.name}" needs both a year and a month (or --url)`,
    ]);
  }

  const format: SourceFormat = requested ?? profile.formats[0];
  if (!url && !profile.formats.includes(format)) {
    throw new ConfigurationError('Invalid configuration', [
      `--format: dataset "${profile.name}" is only published as ${profile.formats.join(', ')}`,
    ]);
  }

  return {
    profile,
    locator: url ?? profile.locator(period, format),
    tableName: tableName ?? profile.defaultTable,
    batchSize: chunksize,
    target,
  };
};
