import { z } from 'zod';
import {
  DataUnit,
  FieldValue,
  PipelineRecord,
} from '../../pipeline/pipeline.types';
import { DecodeOutcome, Decoder } from '../interfaces/plugin.interface';
import { definePlugin } from '../plugin-options';

/**
 * Flatten a parsed JSON object into record fields.
 *
 * Nested objects become dotted names (`a.b.c`), arrays are kept as their JSON
 * text, booleans become "true"/"false" and nulls are skipped.
 */
export function flattenJson(
  value: Readonly<Record<string, unknown>>,
  prefix = '',
  into: Record<string, FieldValue> = {},
): Record<string, FieldValue> {
  for (const [key, item] of Object.entries(value)) {
    const name = `${prefix}${key}`;
    if (item === null || item === undefined) {
      continue;
    }
    if (typeof item === 'number' || typeof item === 'string') {
      into[name] = item;
    } else if (typeof item === 'boolean') {
      into[name] = item ? 'true' : 'false';
    } else if (Array.isArray(item)) {
      into[name] = JSON.stringify(item);
    } else if (isJsonObject(item)) {
      flattenJson(item, `${name}.`, into);
    }
  }
  return into;
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parses each payload as one JSON object and merges its fields.
 */
export class JsonDecoder implements Decoder {
  decode(unit: DataUnit, fields: PipelineRecord): DecodeOutcome {
    const parsed: unknown = JSON.parse(unit.payload.toString('utf8'));
    if (!isJsonObject(parsed)) {
      throw new TypeError(
        `Expected a JSON object, got ${Array.isArray(parsed) ? 'array' : typeof parsed}`,
      );
    }
    return {
      action: 'forward',
      unit,
      fields: { ...fields, ...flattenJson(parsed) },
    };
  }
}

export const jsonDecoderPlugin = definePlugin({
  role: 'decode',
  name: 'json',
  description: 'Parse the payload as a JSON object and merge its fields',
  defaults: {},
  options: z.object({}).strict(),
  create: () => new JsonDecoder(),
});
