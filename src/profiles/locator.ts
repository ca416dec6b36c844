import type { Period, SourceFormat } from '../engine/types';
import { ConfigurationError } from '../engine/errors';

export const RELEASES_BASE_URL = 'https://github.com/DataTalksClub/nyc-tlc-data/releases/download';

/** The TLC publishes current trip files as parquet only */
export const TLC_TRIP_DATA_URL = 'https://d37ci6vzurychx.cloudfront.net/trip-data';

const requirePeriod = (dataset: string, period: Period | undefined): Period => {
  if (!period) {
    throw new ConfigurationError(`Dataset "${dataset}" needs a year and a month`);
  }
  return period;
};

/**
 * Monthly trip file, e.g. .../yellow/yellow_tripdata_2021-01.csv.gz, or
 * .../trip-data/green_tripdata_2025-11.parquet
 */
export const tripDataLocator =
  (dataset: string) =>
  (period: Period | undefined, format: SourceFormat): string => {
    const { year, month } = requirePeriod(dataset, period);
    const file = `${dataset}_tripdata_${year}-${String(month).padStart(2, '0')}`;

    return format === 'parquet'
      ? `${TLC_TRIP_DATA_URL}/${file}.parquet`
      : `${RELEASES_BASE_URL}/${dataset}/${file}.csv.gz`;
  };
