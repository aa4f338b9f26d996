import type { Config, SourceSpec } from '../config/types';
import { secretsOf } from '../config/types';
import type { ConnectorHandle } from '../dialects/source';
import { defaultConnectors, openSource, type ConnectorRegistry } from '../dialects/source-registry';
import type { StorageSink } from '../dialects/target';
import { serialize } from './batch';
import { ConfigError, ConnectionError, ExtractionError, errorMessage, isSyncError, type SyncError } from './errors';
import { log } from './logger';
import { redact } from './secret';
import { batchKey, formatRunStamp, sourcePrefix } from './storage-key';
import type { MetricsHook, RunOptions, Selector, SyncResult } from './types';

type SourceContext = {
  readonly client: string;
  readonly bucket: string;
  readonly runStamp: string;
  readonly sink: StorageSink;
  readonly shouldStop: () => boolean;
  readonly signal?: AbortSignal;
  readonly metrics: MetricsHook;
};

/**
 * Resolve a selector against the configured sources, in declaration order.
 */
export const resolveSelector = (config: Config, selector: Selector): readonly SourceSpec[] => {
  if (selector.kind === 'all') {
    return config.sources;
  }

  const spec = config.sources.find((s) => s.name === selector.name);
  if (!spec) {
    const known = config.sources.map((s) => s.name).join(', ') || '(none)';
    throw new ConfigError(`Unknown source "${selector.name}". Configured sources: ${known}`);
  }
  return [spec];
};

const toResult = (result: SyncResult): SyncResult => Object.freeze({ ...result });

type Failure = NonNullable<SyncResult['error']>;

const describeFailure = (spec: SourceSpec, err: SyncError): Failure =>
  Object.freeze({ kind: err.kind, message: redact(err.message, secretsOf(spec)) });

const asSyncError = (spec: SourceSpec, err: unknown, fallback: 'open' | 'extract'): SyncError => {
  if (isSyncError(err)) return err;
  const detail = redact(errorMessage(err), secretsOf(spec));
  return fallback === 'open'
    ? new ConnectionError(spec.name, detail, { cause: err })
    : new ExtractionError(spec.name, detail, { cause: err });
};

const closeQuietly = async (handle: ConnectorHandle, index: number, spec: SourceSpec): Promise<void> => {
  try {
    await handle.close();
  } catch (err) {
    log.sourceError(index, spec.name, 'close failed', redact(errorMessage(err), secretsOf(spec)));
  }
};

/**
 * Sync one source: open, stream batches into the sink, close.
 * Never throws; every outcome becomes a result.
 */
const syncSource = async (
  spec: SourceSpec,
  index: number,
  ctx: SourceContext,
  connectors: ConnectorRegistry
): Promise<SyncResult> => {
  const prefix = sourcePrefix(ctx.client, spec.name, ctx.runStamp);
  let recordsWritten = 0;
  let batchesWritten = 0;

  const settle = (status: SyncResult['status'], err?: SyncError): SyncResult =>
    toResult({
      sourceName: spec.name,
      status,
      recordsWritten,
      ...(err ? { error: describeFailure(spec, err) } : {}),
      ...(batchesWritten > 0 ? { storageKey: `${ctx.bucket}/${prefix}` } : {}),
    });

  log.source(index, spec.name, `opening ${spec.sourceType} source`);

  let handle: ConnectorHandle;
  try {
    handle = await openSource(spec, connectors);
  } catch (err) {
    const failure = asSyncError(spec, err, 'open');
    log.sourceError(index, spec.name, failure.kind, describeFailure(spec, failure).message);
    return settle('failed', failure);
  }

  // Closing the in-flight handle unblocks a pending request or backoff wait
  const aborted: { closing?: Promise<void> } = {};
  const onAbort = () => {
    log.source(index, spec.name, 'stop requested, closing source');
    aborted.closing = closeQuietly(handle, index, spec);
  };
  ctx.signal?.addEventListener('abort', onAbort, { once: true });

  try {
    if (ctx.shouldStop()) {
      return settle('cancelled');
    }

    for await (const batch of handle.extract()) {
      if (ctx.shouldStop()) {
        log.source(index, spec.name, 'stop requested, cancelling');
        return settle('cancelled');
      }

      const payload = serialize(batch);
      const key = batchKey(prefix, batch.dataset, batch.sequence);
      const started = Date.now();
      await ctx.sink.put(ctx.bucket, key, payload);

      recordsWritten += batch.records.length;
      batchesWritten++;
      log.storage('wrote', key, batch.records.length, Date.now() - started);
      ctx.metrics.onBatchWritten?.({
        sourceName: spec.name,
        dataset: batch.dataset,
        sequence: batch.sequence,
        records: batch.records.length,
        bytes: payload.byteLength,
        key,
      });
    }

    log.source(index, spec.name, `done, ${recordsWritten.toLocaleString('en-US')} records`);
    return settle('success');
  } catch (err) {
    if (ctx.shouldStop()) {
      log.source(index, spec.name, 'cancelled');
      return settle('cancelled');
    }
    const failure = asSyncError(spec, err, 'extract');
    log.sourceError(index, spec.name, failure.kind, describeFailure(spec, failure).message);
    return settle(batchesWritten > 0 ? 'partial' : 'failed', failure);
  } finally {
    ctx.signal?.removeEventListener('abort', onAbort);
    await (aborted.closing ?? closeQuietly(handle, index, spec));
  }
};

/**
 * Run one sync over the selected sources, strictly in order.
 * Only an unresolvable selector throws; per-source failures become results.
 */
export const run = async (config: Config, selector: Selector, options: RunOptions): Promise<readonly SyncResult[]> => {
  const specs = resolveSelector(config, selector);
  const startTime = Date.now();
  const runStamp = formatRunStamp(options.now ?? new Date());
  const metrics = options.metrics ?? {};
  const { shouldStop, signal } = options;

  const ctx: SourceContext = {
    client: config.client,
    bucket: config.storage.bucketName,
    runStamp,
    sink: options.sink,
    shouldStop: () => (signal?.aborted ?? false) || (shouldStop?.() ?? false),
    signal,
    metrics,
  };

  log.sync.start({
    client: config.client,
    bucket: ctx.bucket,
    sourceCount: specs.length,
    runStamp,
    dryRun: options.dryRun ?? false,
  });
  metrics.onStart?.({ client: config.client, sourceCount: specs.length, runStamp });

  const results: SyncResult[] = [];

  for (const [index, spec] of specs.entries()) {
    if (ctx.shouldStop()) {
      log.info('Stop requested, skipping remaining sources');
      break;
    }

    const result = await syncSource(spec, index, ctx, options.connectors ?? defaultConnectors);
    results.push(result);
    metrics.onSourceComplete?.(result);

    if (result.status === 'cancelled') {
      break;
    }
  }

  const elapsedMs = Date.now() - startTime;
  const frozen = Object.freeze(results);

  log.sync.summary(frozen, elapsedMs);
  metrics.onComplete?.({ results: frozen, elapsedMs });

  return frozen;
};
