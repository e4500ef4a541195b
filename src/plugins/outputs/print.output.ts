import { z } from 'zod';
import { DataUnit, PipelineRecord } from '../../pipeline/pipeline.types';
import {
  formatRecordText,
  serializeRecord,
} from '../../pipeline/record-serializer';
import { OutputSink } from '../interfaces/plugin.interface';
import { booleanOption, definePlugin } from '../plugin-options';

export type PrintFormat = 'json' | 'text';

export interface PrintOptions {
  format: PrintFormat;
  raw: boolean;
}

/**
 * Writes one line per record to stdout. With `raw`, every unit is also
 * printed as hex before it is decoded.
 */
export class PrintOutput implements OutputSink {
  constructor(
    private readonly options: PrintOptions,
    private readonly out: NodeJS.WritableStream = process.stdout,
  ) {}

  emit(record: PipelineRecord): void {
    const line =
      this.options.format === 'json'
        ? JSON.stringify(serializeRecord(record))
        : formatRecordText(record);
    this.out.write(`${line}\n`);
  }

  emitRaw(unit: DataUnit): void {
    if (!this.options.raw) return;
    this.out.write(
      `raw ${unit.origin.streamId} ${unit.payload.toString('hex')}\n`,
    );
  }
}

export const printOutputPlugin = definePlugin({
  role: 'output',
  name: 'print',
  description: 'Print records to stdout as JSON lines or key=value text',
  defaults: { format: 'json', raw: 'false' },
  options: z
    .object({
      format: z.enum(['json', 'text']),
      raw: booleanOption(),
    })
    .strict(),
  create: (options) => new PrintOutput(options),
});
