import { formatStatus } from './logger';
import type { SyncResult } from './types';

/** 0 only when every source succeeded. An empty run is a success. */
export const exitCodeFor = (results: readonly SyncResult[]): number =>
  results.every((r) => r.status === 'success') ? 0 : 1;

/**
 * Render one result line. The default view is name and status; verbose adds
 * the record count, the storage prefix and the error.
 */
export const formatResult = (result: SyncResult, verbose: boolean, color = true): string => {
  const status = color ? formatStatus(result.status) : result.status.toUpperCase();
  const head = `${result.sourceName}: ${status}`;
  if (!verbose) return head;

  const parts = [head, `records=${result.recordsWritten}`];
  if (result.storageKey) parts.push(`key=${result.storageKey}`);
  if (result.error) parts.push(`error=${result.error.kind}: ${result.error.message}`);
  return parts.join('  ');
};
