import type { IngestionProfile } from '../engine/types';
import { tripDataLocator } from './locator';

// Column spelling follows the published files, including dropOff_datetime and PUlocationID
const fhvProfile: IngestionProfile = {
  name: 'fhv',
  description: 'For-hire vehicle trip records (monthly)',
  columns: [
    { name: 'dispatching_base_num', type: 'text' },
    { name: 'pickup_datetime', type: 'text' },
    { name: 'dropOff_datetime', type: 'text' },
    { name: 'PUlocationID', type: 'integer' },
    { name: 'DOlocationID', type: 'integer' },
    { name: 'SR_Flag', type: 'integer' },
    { name: 'Affiliated_base_number', type: 'text' },
  ],
  timestampColumns: ['pickup_datetime', 'dropOff_datetime'],
  defaultTable: 'fhv_taxi_data',
  monthly: true,
  formats: ['csv', 'parquet'],
  locator: tripDataLocator('fhv'),
};

export default fhvProfile;
