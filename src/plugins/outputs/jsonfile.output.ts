import { Logger } from '@nestjs/common';
import { FileHandle, open } from 'node:fs/promises';
import { z } from 'zod';
import { PipelineRecord } from '../../pipeline/pipeline.types';
import { serializeRecord } from '../../pipeline/record-serializer';
import { OutputSink } from '../interfaces/plugin.interface';
import { definePlugin, requiredString } from '../plugin-options';

/**
 * Appends each record as one JSON line to a file. The file is opened (and
 * created) on initialize, never truncated.
 */
export class JsonFileOutput implements OutputSink {
  private readonly logger = new Logger(JsonFileOutput.name);
  private handle: FileHandle | null = null;
  private lines = 0;

  constructor(private readonly path: string) {}

  async initialize(): Promise<void> {
    this.handle = await open(this.path, 'a');
    this.logger.log(`Appending records to ${this.path}`);
  }

  async emit(record: PipelineRecord): Promise<void> {
    if (!this.handle) {
      throw new Error(`${this.path} is not open`);
    }
    await this.handle.appendFile(`${JSON.stringify(serializeRecord(record))}\n`);
    this.lines++;
  }

  async close(): Promise<void> {
    if (!this.handle) return;
    const handle = this.handle;
    this.handle = null;
    await handle.close();
    this.logger.log(`Wrote ${this.lines} line(s) to ${this.path}`);
  }
}

export const jsonFileOutputPlugin = definePlugin({
  role: 'output',
  name: 'jsonfile',
  description: 'Append records as JSON lines to a file',
  defaults: {},
  options: z.object({ path: requiredString() }).strict(),
  create: (options) => new JsonFileOutput(options.path),
});
