import type { IngestionProfile } from '../engine/types';
import { tripDataLocator } from './locator';

const yellowProfile: IngestionProfile = {
  name: 'yellow',
  description: 'Yellow taxi trip records (monthly)',
  columns: [
    { name: 'VendorID', type: 'integer' },
    { name: 'tpep_pickup_datetime', type: 'text' },
    { name: 'tpep_dropoff_datetime', type: 'text' },
    { name: 'passenger_count', type: 'integer' },
    { name: 'trip_distance', type: 'float' },
    { name: 'RatecodeID', type: 'integer' },
    { name: 'store_and_fwd_flag', type: 'text' },
    { name: 'PULocationID', type: 'integer' },
    { name: 'DOLocationID', type: 'integer' },
    { name: 'payment_type', type: 'integer' },
    { name: 'fare_amount', type: 'float' },
    { name: 'extra', type: 'float' },
    { name: 'mta_tax', type: 'float' },
    { name: 'tip_amount', type: 'float' },
    { name: 'tolls_amount', type: 'float' },
    { name: 'improvement_surcharge', type: 'float' },
    { name: 'total_amount', type: 'float' },
    { name: 'congestion_surcharge', type: 'float' },
  ],
  timestampColumns: ['tpep_pickup_datetime', 'tpep_dropoff_datetime'],
  defaultTable: 'yellow_taxi_data',
  monthly: true,
  formats: ['csv', 'parquet'],
  locator: tripDataLocator('yellow'),
};

export default yellowProfile;
