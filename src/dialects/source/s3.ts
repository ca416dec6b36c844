import { S3Client, GetObjectCommand } from '@aws-sdk/client-s3';
import { Readable } from 'node:stream';
import type { SourceDialect } from '../source';
import { registerSource } from '../source-registry';
import { ConfigurationError, FetchError } from '../../engine/errors';

export type ObjectReader = (bucket: string, key: string) => Promise<Readable>;

export const s3ObjectReader =
  (client: S3Client): ObjectReader =>
  async (bucket, key) => {
    const response = await client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));

    if (!(response.Body instanceof Readable)) {
      throw new FetchError(`No readable body for s3://${bucket}/${key}`);
    }
    return response.Body;
  };

export const parseS3Locator = (locator: string): { bucket: string; key: string } => {
  const url = new URL(locator);
  const bucket = url.hostname;
  const key = decodeURIComponent(url.pathname.replace(/^\//, ''));

  if (!bucket || !key) {
    throw new ConfigurationError(`Invalid S3 locator "${locator}": expected s3://<bucket>/<key>`);
  }
  return { bucket, key };
};

/**
 * S3 source dialect.
 * Reads one object, e.g. a monthly trip file staged in the data-lake bucket.
 */
class S3Source implements SourceDialect {
  readonly name = 's3';

  readonly locator: string;
  private readonly bucket: string;
  private readonly key: string;
  private readonly client: S3Client | undefined;
  private readonly readObject: ObjectReader;

  constructor(locator: string, readObject?: ObjectReader) {
    const { bucket, key } = parseS3Locator(locator);
    this.locator = locator;
    this.bucket = bucket;
    this.key = key;

    if (readObject) {
      this.client = undefined;
      this.readObject = readObject;
    } else {
      this.client = new S3Client({});
      this.readObject = s3ObjectReader(this.client);
    }
  }

  async open(): Promise<Readable> {
    try {
      return await this.readObject(this.bucket, this.key);
    } catch (err) {
      if (err instanceof FetchError) throw err;
      throw new FetchError(
        `Failed to read ${this.locator}: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err }
      );
    }
  }

  async close(): Promise<void> {
    this.client?.destroy();
  }
}

export const createS3Source = (locator: string, readObject?: ObjectReader): SourceDialect =>
  new S3Source(locator, readObject);

registerSource('s3', (locator) => createS3Source(locator));
