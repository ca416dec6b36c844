import type { SourceDialect, SourceDialectFactory } from './source';
import { ConfigurationError } from '../engine/errors';

const sources: Record<string, SourceDialectFactory> = {};

/**
 * Register a source dialect factory for a locator scheme (without the trailing colon).
 * Call this in each dialect implementation to register itself.
 */
export const registerSource = (scheme: string, factory: SourceDialectFactory): void => {
  sources[scheme] = factory;
};

/**
 * Create a source dialect from a locator, picking the dialect by its URL scheme
 */
export const createSource = (locator: string): SourceDialect => {
  const scheme = (() => {
    try {
      return new URL(locator).protocol.replace(/:$/, '');
    } catch (err) {
      throw new ConfigurationError(`Invalid source locator "${locator}": ${err instanceof Error ? err.message : String(err)}`);
    }
  })();

  const factory = sources[scheme];
  if (!factory) {
    const available = Object.keys(sources).join(', ');
    throw new ConfigurationError(`Unsupported source scheme "${scheme}". Available: ${available}`);
  }
  return factory(locator);
};

/**
 * List all registered source schemes
 */
export const listSourceSchemes = (): string[] => Object.keys(sources);
