import type { ConnectorRegistry } from '../dialects/source-registry';
import type { StorageSink } from '../dialects/target';
import type { ErrorKind } from './errors';

/** One extracted row or API object. The core never validates its schema. */
export type ExtractedRecord = Readonly<Record<string, unknown>>;

/** A bounded chunk of records, in extraction order. */
export type Batch = {
  /** Table, query or API object the records came from */
  readonly dataset: string;
  /** 1-based position of this batch within its dataset */
  readonly sequence: number;
  readonly records: readonly ExtractedRecord[];
};

export type SyncStatus = 'success' | 'partial' | 'failed' | 'cancelled';

export type SyncResult = {
  readonly sourceName: string;
  readonly status: SyncStatus;
  readonly recordsWritten: number;
  readonly error?: { readonly kind: ErrorKind; readonly message: string };
  /** Run prefix the source wrote under; absent when nothing was written */
  readonly storageKey?: string;
};

export type Selector = { readonly kind: 'all' } | { readonly kind: 'named'; readonly name: string };

export const selectAll = (): Selector => ({ kind: 'all' });

export const selectNamed = (name: string): Selector => ({ kind: 'named', name });

/**
 * Metrics hook for monitoring sync progress.
 * Called at various points during a run.
 */
export type MetricsHook = {
  /** Called once the selector is resolved */
  onStart?: (params: { client: string; sourceCount: number; runStamp: string }) => void;

  /** Called after each batch lands in the sink */
  onBatchWritten?: (params: {
    sourceName: string;
    dataset: string;
    sequence: number;
    records: number;
    bytes: number;
    key: string;
  }) => void;

  /** Called with each source's final result */
  onSourceComplete?: (result: SyncResult) => void;

  /** Called when the run returns, including cancelled runs */
  onComplete?: (params: { results: readonly SyncResult[]; elapsedMs: number }) => void;
};

export type RunOptions = {
  sink: StorageSink;
  /** Connector per source type; defaults to the built-in registry */
  connectors?: ConnectorRegistry;
  /** Polled before each source and each batch write */
  shouldStop?: () => boolean;
  /** Stops the run like `shouldStop`, and also closes the source in flight when it fires */
  signal?: AbortSignal;
  /** Run timestamp used in storage keys; defaults to the current time */
  now?: Date;
  metrics?: MetricsHook;
  /** Only used for the start banner */
  dryRun?: boolean;
};
