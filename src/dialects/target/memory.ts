import type { StorageSink } from '../target';
import { log } from '../../engine/logger';

type DryRunWrite = {
  readonly bucket: string;
  readonly key: string;
  readonly bytes: number;
};

/**
 * Dry-run sink: records what would be written (keys and sizes, not payloads)
 * and logs it.
 */
export class DryRunSink implements StorageSink {
  readonly name = 'dry-run';

  private readonly log: DryRunWrite[] = [];

  get writes(): readonly DryRunWrite[] {
    return this.log;
  }

  async put(bucket: string, key: string, payload: Buffer): Promise<void> {
    this.log.push({ bucket, key, bytes: payload.byteLength });
    log.info(`[dry run] would write ${payload.byteLength.toLocaleString('en-US')} bytes to ${bucket}/${key}`);
  }
}
