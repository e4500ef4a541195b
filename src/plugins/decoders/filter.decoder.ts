import { z } from 'zod';
import { describeError } from '../../common/pipeline.errors';
import { DataUnit, PipelineRecord } from '../../pipeline/pipeline.types';
import { serializeValue } from '../../pipeline/record-serializer';
import { DecodeOutcome, Decoder } from '../interfaces/plugin.interface';
import { booleanOption, definePlugin, requiredString } from '../plugin-options';

export interface FilterOptions {
  field: string;
  equals?: string;
  matches?: RegExp;
  invert: boolean;
}

/**
 * Drops units whose `field` does not match. With `invert`, drops the ones
 * that do. A missing field never matches.
 */
export class FilterDecoder implements Decoder {
  constructor(private readonly options: FilterOptions) {}

  decode(unit: DataUnit, fields: PipelineRecord): DecodeOutcome {
    const { field, invert } = this.options;
    if (this.matches(fields) !== invert) {
      return { action: 'forward', unit, fields };
    }
    return {
      action: 'drop',
      reason: invert
        ? `field '${field}' matches`
        : `field '${field}' does not match`,
    };
  }

  private matches(fields: PipelineRecord): boolean {
    const value = fields[this.options.field];
    if (value === undefined) {
      return false;
    }
    const text = String(serializeValue(value));
    if (this.options.equals !== undefined) {
      return text === this.options.equals;
    }
    return this.options.matches ? this.options.matches.test(text) : false;
  }
}

const filterOptions = z
  .object({
    field: requiredString(),
    equals: z.string().optional(),
    matches: z
      .string()
      .optional()
      .transform((pattern, ctx) => {
        if (pattern === undefined) return undefined;
        try {
          return new RegExp(pattern);
        } catch (error) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `is not a valid regular expression: ${describeError(error)}`,
          });
          return z.NEVER;
        }
      }),
    invert: booleanOption(),
  })
  .strict()
  .superRefine((options, ctx) => {
    if ((options.equals === undefined) === (options.matches === undefined)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['equals'],
        message: "exactly one of 'equals' or 'matches' must be set",
      });
    }
  });

export const filterDecoderPlugin = definePlugin({
  role: 'decode',
  name: 'filter',
  description: 'Drop units whose field does not equal or match a value',
  defaults: { invert: 'false' },
  options: filterOptions,
  create: (options) => new FilterDecoder(options),
});
