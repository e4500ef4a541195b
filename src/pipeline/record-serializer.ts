import { FieldValue, PipelineRecord } from './pipeline.types';

export type SerializedValue = string | number;

/**
 * Sink-facing form of a field: timestamps as ISO-8601, binary as base64.
 */
export function serializeValue(value: FieldValue): SerializedValue {
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (Buffer.isBuffer(value)) {
    return value.toString('base64');
  }
  return value;
}

export function serializeRecord(
  record: PipelineRecord,
): Record<string, SerializedValue> {
  const out: Record<string, SerializedValue> = {};
  for (const [name, value] of Object.entries(record)) {
    out[name] = serializeValue(value);
  }
  return out;
}

/**
 * `key=value` pairs separated by spaces, in field order.
 */
export function formatRecordText(record: PipelineRecord): string {
  return Object.entries(record)
    .map(([name, value]) => `${name}=${String(serializeValue(value))}`)
    .join(' ');
}
