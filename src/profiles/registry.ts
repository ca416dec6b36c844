import type { IngestionProfile } from '../engine/types';
import { ConfigurationError } from '../engine/errors';
import yellowProfile from './yellow';
import greenProfile from './green';
import fhvProfile from './fhv';
import zonesProfile from './zones';

/**
 * Register all dataset profiles here.
 * To add a dataset, create a profile under src/profiles/<name>.ts
 * and add it to this map.
 */
const profiles: Record<string, IngestionProfile> = {
  yellow: yellowProfile,
  green: greenProfile,
  fhv: fhvProfile,
  zones: zonesProfile,
};

export const getProfile = (name: string): IngestionProfile => {
  const profile = profiles[name];
  if (!profile) {
    const available = Object.keys(profiles).join(', ');
    throw new ConfigurationError(`Unknown dataset "${name}". Available datasets: ${available}`);
  }
  return profile;
};

export const listProfiles = (): IngestionProfile[] => Object.values(profiles);
