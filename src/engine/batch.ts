import { SerializationError } from './errors';
import type { Batch, ExtractedRecord } from './types';

type JsonScalar = string | number | boolean | null;

const describeValue = (value: unknown): string => {
  if (Array.isArray(value)) return 'array';
  if (value instanceof Date) return 'invalid date';
  if (typeof value === 'number') return String(value);
  return typeof value;
};

/**
 * Map a field value to its JSON form. `null` and `undefined` both become an
 * explicit `null` so absent values keep their key.
 */
const encodeValue = (value: unknown): JsonScalar | undefined => {
  if (value === null || value === undefined) return null;

  switch (typeof value) {
    case 'string':
    case 'boolean':
      return value;
    case 'number':
      return Number.isFinite(value) ? value : undefined;
    case 'bigint':
      return value.toString();
    default:
      break;
  }

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? undefined : value.toISOString();
  }
  if (value instanceof Uint8Array) {
    return Buffer.from(value).toString('base64');
  }
  return undefined;
};

const encodeRecord = (record: ExtractedRecord, index: number, batch: Batch): string => {
  const encoded: Record<string, JsonScalar> = {};

  for (const [field, value] of Object.entries(record)) {
    const scalar = encodeValue(value);
    if (scalar === undefined) {
      throw new SerializationError(
        field,
        `Unsupported value (${describeValue(value)}) in field "${field}" of record ${index} in ${batch.dataset}#${batch.sequence}`
      );
    }
    encoded[field] = scalar;
  }

  return JSON.stringify(encoded);
};

/**
 * Serialize a batch as newline-delimited JSON, one line per record in batch order.
 * Pure: the same batch always yields the same bytes.
 */
export const serialize = (batch: Batch): Buffer => {
  if (batch.records.length === 0) {
    return Buffer.alloc(0);
  }

  const lines = batch.records.map((record, index) => encodeRecord(record, index, batch));
  return Buffer.from(`${lines.join('\n')}\n`, 'utf-8');
};
