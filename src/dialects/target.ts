/**
 * Storage sink interface.
 * Durable write target addressed by bucket + key. Each put is independent and
 * idempotent by key: writing the same key again overwrites it.
 */
export interface StorageSink {
  /** Unique name for logging and diagnostics */
  readonly name: string;

  /** Write one serialized batch. Rejects with StorageError. */
  put(bucket: string, key: string, payload: Buffer): Promise<void>;

  /** Optional: cleanup resources when done */
  close?(): Promise<void>;
}
