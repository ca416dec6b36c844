import { Readable } from 'node:stream';
import type { SourceDialect } from '../source';
import { registerSource } from '../source-registry';
import { FetchError } from '../../engine/errors';

/**
 * HTTP(S) source dialect.
 * Streams the response body of a single GET request; nothing is cached between runs.
 */
class HttpSource implements SourceDialect {
  readonly name = 'http';

  readonly locator: string;

  constructor(locator: string) {
    this.locator = locator;
  }

  async open(): Promise<Readable> {
    const response = await fetch(this.locator).catch((err: unknown) => {
      throw new FetchError(`Request to ${this.locator} failed: ${err instanceof Error ? err.message : String(err)}`, {
        cause: err,
      });
    });

    if (!response.ok) {
      throw new FetchError(`HTTP ${response.status} ${response.statusText} for ${this.locator}`);
    }

    if (!response.body) {
      throw new FetchError(`Empty response body for ${this.locator}`);
    }

    return Readable.fromWeb(response.body);
  }
}

export const createHttpSource = (locator: string): SourceDialect => new HttpSource(locator);

// Register the dialect for both schemes
registerSource('http', createHttpSource);
registerSource('https', createHttpSource);
