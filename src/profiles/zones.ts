import type { IngestionProfile } from '../engine/types';
import { RELEASES_BASE_URL } from './locator';

const zonesProfile: IngestionProfile = {
  name: 'zones',
  description: 'Taxi zone lookup (LocationID to borough and zone)',
  columns: [
    { name: 'LocationID', type: 'integer' },
    { name: 'Borough', type: 'text' },
    { name: 'Zone', type: 'text' },
    { name: 'service_zone', type: 'text' },
  ],
  timestampColumns: [],
  defaultTable: 'zones',
  monthly: false,
  formats: ['csv'],
  locator: () => `${RELEASES_BASE_URL}/misc/taxi_zone_lookup.csv`,
};

export default zonesProfile;
