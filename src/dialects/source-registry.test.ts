import { createSource, listSourceSchemes } from './index';
import { ConfigurationError } from '../engine/errors';

describe('source registry', () => {
  it('registers the built-in schemes', () => {
    expect(listSourceSchemes()).toEqual(expect.arrayContaining(['http', 'https', 's3']));
  });

  it('picks the dialect from the locator scheme', async () => {
    const http = createSource('https://example.test/yellow.csv.gz');
    const s3 = createSource('s3://trip-lake/yellow.csv.gz');

    expect(http.name).toBe('http');
    expect(s3.name).toBe('s3');
    await s3.close?.();
  });

  it('rejects an unknown scheme', () => {
    expect(() => createSource('ftp://example.test/yellow.csv.gz')).toThrow(
      'Unsupported source scheme "ftp". Available: http, https, s3'
    );
  });

  it('rejects a locator that is not a URL', () => {
    expect(() => createSource('yellow.csv.gz')).toThrow(ConfigurationError);
  });
});
