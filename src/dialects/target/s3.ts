import { PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import type { StorageCredentials } from '../../config/schema';
import type { StorageSink } from '../target';
import { StorageError, errorMessage } from '../../engine/errors';
import { redact, type Secret } from '../../engine/secret';

const CONTENT_TYPE = 'application/x-ndjson';

/** The slice of S3Client the sink uses */
export interface S3Sender {
  send(command: PutObjectCommand): Promise<unknown>;
  destroy(): void;
}

export const createS3Client = (credentials: StorageCredentials): S3Client =>
  new S3Client({
    region: credentials.region,
    endpoint: credentials.endpoint,
    forcePathStyle: credentials.forcePathStyle,
    credentials: credentials.keys
      ? {
          accessKeyId: credentials.keys.accessKeyId,
          secretAccessKey: credentials.keys.secretAccessKey.reveal(),
          sessionToken: credentials.keys.sessionToken?.reveal(),
        }
      : undefined,
  });

/**
 * S3 storage sink.
 * Writes each batch as one newline-delimited JSON object.
 */
export class S3Sink implements StorageSink {
  readonly name = 's3';

  constructor(
    private readonly client: S3Sender,
    private readonly secrets: readonly Secret[] = []
  ) {}

  async put(bucket: string, key: string, payload: Buffer): Promise<void> {
    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: bucket,
          Key: key,
          Body: payload,
          ContentType: CONTENT_TYPE,
        })
      );
    } catch (err) {
      throw new StorageError(key, redact(errorMessage(err), this.secrets), { cause: err });
    }
  }

  async close(): Promise<void> {
    this.client.destroy();
  }
}

export const createS3Sink = (credentials: StorageCredentials): S3Sink => {
  const secrets = credentials.keys
    ? [credentials.keys.secretAccessKey, ...(credentials.keys.sessionToken ? [credentials.keys.sessionToken] : [])]
    : [];
  const client = createS3Client(credentials);
  return new S3Sink(
    {
      send: (command) => client.send(command),
      destroy: () => client.destroy(),
    },
    secrets
  );
};
