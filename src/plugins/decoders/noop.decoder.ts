import { z } from 'zod';
import { DataUnit, PipelineRecord } from '../../pipeline/pipeline.types';
import { DecodeOutcome, Decoder } from '../interfaces/plugin.interface';
import { definePlugin } from '../plugin-options';

/**
 * Pass-through decoder: exposes the payload as UTF-8 text in field `data`.
 */
export class NoopDecoder implements Decoder {
  decode(unit: DataUnit, fields: PipelineRecord): DecodeOutcome {
    return {
      action: 'forward',
      unit,
      fields: { ...fields, data: unit.payload.toString('utf8') },
    };
  }
}

export const noopDecoderPlugin = definePlugin({
  role: 'decode',
  name: 'noop',
  description: 'Forward every unit, payload as UTF-8 in field "data"',
  defaults: {},
  options: z.object({}).strict(),
  create: () => new NoopDecoder(),
});
