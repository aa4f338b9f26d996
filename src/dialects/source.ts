import type { SourceSpec, SourceType } from '../config/types';
import type { BatchCursor } from '../engine/cursor';

/**
 * An opened source. Owns whatever connection or session `open` acquired.
 */
export interface ConnectorHandle {
  readonly sourceName: string;

  /** Start the single, lazy pass over the source. Throws if called twice. */
  extract(): BatchCursor;

  /** Release the connection. Safe to call more than once. */
  close(): Promise<void>;
}

/**
 * Source connector interface.
 * One implementation per source type; see the registry for the closed set.
 */
export interface SourceConnector<TSpec extends SourceSpec = SourceSpec> {
  readonly kind: SourceType;

  /** Connect and verify credentials. Rejects with ConnectionError. */
  open(spec: TSpec): Promise<ConnectorHandle>;
}
