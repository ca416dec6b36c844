import type { IngestionProfile } from '../engine/types';
import { tripDataLocator } from './locator';

const greenProfile: IngestionProfile = {
  name: 'green',
  description: 'Green taxi trip records (monthly)',
  columns: [
    { name: 'VendorID', type: 'integer' },
    { name: 'lpep_pickup_datetime', type: 'text' },
    { name: 'lpep_dropoff_datetime', type: 'text' },
    { name: 'store_and_fwd_flag', type: 'text' },
    { name: 'RatecodeID', type: 'integer' },
    { name: 'PULocationID', type: 'integer' },
    { name: 'DOLocationID', type: 'integer' },
    { name: 'passenger_count', type: 'integer' },
    { name: 'trip_distance', type: 'float' },
    { name: 'fare_amount', type: 'float' },
    { name: 'extra', type: 'float' },
    { name: 'mta_tax', type: 'float' },
    { name: 'tip_amount', type: 'float' },
    { name: 'tolls_amount', type: 'float' },
    { name: 'ehail_fee', type: 'float' },
    { name: 'improvement_surcharge', type: 'float' },
    { name: 'total_amount', type: 'float' },
    { name: 'payment_type', type: 'integer' },
    { name: 'trip_type', type: 'integer' },
    { name: 'congestion_surcharge', type: 'float' },
  ],
  timestampColumns: ['lpep_pickup_datetime', 'lpep_dropoff_datetime'],
  defaultTable: 'green_taxi_data',
  monthly: true,
  formats: ['csv', 'parquet'],
  locator: tripDataLocator('green'),
};

export default greenProfile;
