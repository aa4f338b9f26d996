import type { StorageTarget } from '../config/types';
import { loadStorageCredentials } from '../config/load';
import type { StorageSink } from './target';
import { createS3Sink } from './target/s3';
import { DryRunSink } from './target/memory';

export type SinkOptions = {
  dryRun: boolean;
};

/**
 * Create the storage sink for a run. Dry runs never read the credentials file.
 */
export const createSink = (storage: StorageTarget, options: SinkOptions): StorageSink => {
  if (options.dryRun) {
    return new DryRunSink();
  }
  return createS3Sink(loadStorageCredentials(storage.credentialsPath));
};
