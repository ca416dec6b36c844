import type { TargetConfig, TargetDialect } from './target';
import { ConfigurationError } from '../engine/errors';

type TargetType = TargetConfig['type'];

export type TargetDialectFactory = (config: TargetConfig) => TargetDialect;

const targets = new Map<TargetType, TargetDialectFactory>();

/** Called by each target dialect module when it is loaded */
export const registerTarget = (type: TargetType, factory: TargetDialectFactory): void => {
  targets.set(type, factory);
};

/**
 * Open the destination store described by `config`. Connection errors surface on first
 * use, not here.
 */
export const createTarget = (config: TargetConfig): TargetDialect => {
  const factory = targets.get(config.type);
  if (!factory) {
    throw new ConfigurationError(`No target dialect registered for "${config.type}"`);
  }
  return factory(config);
};
