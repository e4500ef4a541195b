import { FieldValue } from '../pipeline/pipeline.types';

export type FieldKind = 'ascii' | 'u8' | 'u16' | 'u32' | 'i16' | 'unixtime';

/**
 * One typed field at a fixed byte offset of the decrypted payload.
 * Numeric fields are stored as integers; `scale` divides on decode.
 */
export interface FieldDefinition {
  readonly name: string;
  readonly offset: number;
  readonly kind: FieldKind;
  /** Byte length, ascii only */
  readonly length?: number;
  readonly scale?: number;
  /** Integer to label mapping for enumerated fields */
  readonly labels?: Readonly<Record<number, string>>;
}

export const MESSAGE_TYPE_REALTIME = 0x01;
export const REALTIME_PAYLOAD_LENGTH = 40;

export const INVERTER_STATUS: Readonly<Record<number, string>> = {
  0: 'waiting',
  1: 'normal',
  2: 'fault',
  3: 'standby',
};

/**
 * Realtime data message. Bytes 40 and up are reserved; newer firmware may
 * append fields there, which older layouts simply ignore.
 */
export const REALTIME_LAYOUT: readonly FieldDefinition[] = [
  { name: 'deviceEcho', offset: 0, kind: 'ascii', length: 8 },
  { name: 'timestamp', offset: 8, kind: 'unixtime' },
  { name: 'messageType', offset: 12, kind: 'u8' },
  { name: 'status', offset: 13, kind: 'u8', labels: INVERTER_STATUS },
  { name: 'pvVoltage1', offset: 14, kind: 'u16', scale: 10 },
  { name: 'pvCurrent1', offset: 16, kind: 'u16', scale: 10 },
  { name: 'pvVoltage2', offset: 18, kind: 'u16', scale: 10 },
  { name: 'pvCurrent2', offset: 20, kind: 'u16', scale: 10 },
  { name: 'acVoltage', offset: 22, kind: 'u16', scale: 10 },
  { name: 'acCurrent', offset: 24, kind: 'u16', scale: 10 },
  { name: 'acFrequency', offset: 26, kind: 'u16', scale: 100 },
  { name: 'activePower', offset: 28, kind: 'u32' },
  { name: 'energyToday', offset: 32, kind: 'u16', scale: 10 },
  { name: 'energyTotal', offset: 34, kind: 'u32', scale: 10 },
  { name: 'temperature', offset: 38, kind: 'i16', scale: 10 },
];

export function fieldSize(field: FieldDefinition): number {
  switch (field.kind) {
    case 'ascii':
      return field.length ?? 0;
    case 'u8':
      return 1;
    case 'u16':
    case 'i16':
      return 2;
    case 'u32':
    case 'unixtime':
      return 4;
  }
}

/**
 * Project a payload onto a layout. Fields that do not fit in the payload are
 * left out rather than failing; the caller decides which ones it requires.
 */
export function extractFields(
  payload: Buffer,
  layout: readonly FieldDefinition[],
): Record<string, FieldValue> {
  const fields: Record<string, FieldValue> = {};
  for (const field of layout) {
    if (field.offset + fieldSize(field) > payload.length) {
      continue;
    }
    fields[field.name] = readField(payload, field);
  }
  return fields;
}

function readField(payload: Buffer, field: FieldDefinition): FieldValue {
  const { offset } = field;
  switch (field.kind) {
    case 'ascii': {
      const raw = payload.subarray(offset, offset + fieldSize(field));
      return raw.toString('latin1').replace(/\0+$/, '');
    }
    case 'unixtime':
      return new Date(payload.readUInt32BE(offset) * 1000);
    case 'u8':
      return label(field, payload.readUInt8(offset));
    case 'u16':
      return scaled(field, payload.readUInt16BE(offset));
    case 'i16':
      return scaled(field, payload.readInt16BE(offset));
    case 'u32':
      return scaled(field, payload.readUInt32BE(offset));
  }
}

function label(field: FieldDefinition, raw: number): FieldValue {
  if (!field.labels) {
    return raw;
  }
  return field.labels[raw] ?? `unknown(${raw})`;
}

function scaled(field: FieldDefinition, raw: number): number {
  return field.scale ? raw / field.scale : raw;
}

/**
 * Inverse of `extractFields`, used by devices and tests. Missing values are
 * written as zero.
 */
export function encodeFields(
  values: Readonly<Record<string, FieldValue | undefined>>,
  layout: readonly FieldDefinition[],
  length: number,
): Buffer {
  const payload = Buffer.alloc(length);
  for (const field of layout) {
    const value = values[field.name];
    if (value === undefined) continue;
    writeField(payload, field, value);
  }
  return payload;
}

function writeField(
  payload: Buffer,
  field: FieldDefinition,
  value: FieldValue,
): void {
  const { offset } = field;
  switch (field.kind) {
    case 'ascii':
      payload.write(String(value), offset, fieldSize(field), 'latin1');
      return;
    case 'unixtime': {
      const millis = value instanceof Date ? value.getTime() : Number(value);
      payload.writeUInt32BE(Math.floor(millis / 1000), offset);
      return;
    }
    case 'u8':
      payload.writeUInt8(unlabel(field, value), offset);
      return;
    case 'u16':
      payload.writeUInt16BE(unscale(field, value), offset);
      return;
    case 'i16':
      payload.writeInt16BE(unscale(field, value), offset);
      return;
    case 'u32':
      payload.writeUInt32BE(unscale(field, value), offset);
      return;
  }
}

function unlabel(field: FieldDefinition, value: FieldValue): number {
  if (typeof value === 'string' && field.labels) {
    for (const [raw, name] of Object.entries(field.labels)) {
      if (name === value) return Number(raw);
    }
    throw new RangeError(`Unknown ${field.name} label '${value}'`);
  }
  return Number(value);
}

function unscale(field: FieldDefinition, value: FieldValue): number {
  return Math.round(Number(value) * (field.scale ?? 1));
}
