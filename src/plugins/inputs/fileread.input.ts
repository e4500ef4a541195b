import { Logger } from '@nestjs/common';
import { FileHandle, open } from 'node:fs/promises';
import { createInterface } from 'node:readline';
import { Readable } from 'node:stream';
import { z } from 'zod';
import { DeliveryChannel } from '../../pipeline/pipeline.types';
import { InputSource } from '../interfaces/plugin.interface';
import {
  booleanOption,
  definePlugin,
  integerOption,
  requiredString,
} from '../plugin-options';

export type FileReadMode = 'line' | 'chunk';

export interface FileReadOptions {
  /** File path, or `-` for standard input */
  path: string;
  mode: FileReadMode;
  chunkSize: number;
  skipBlank: boolean;
}

const STDIN = '-';

/**
 * FileReadInput - Reads a file (or stdin) once, in order
 *
 * `line` mode delivers each line without its terminator; `chunk` mode
 * delivers fixed-size reads. The run ends at end of file.
 */
export class FileReadInput implements InputSource {
  private readonly logger = new Logger(FileReadInput.name);
  private handle: FileHandle | null = null;

  constructor(
    private readonly options: FileReadOptions,
    private readonly stdin: Readable = process.stdin,
  ) {}

  async initialize(): Promise<void> {
    if (this.options.path !== STDIN) {
      this.handle = await open(this.options.path, 'r');
    }
  }

  async run(channel: DeliveryChannel, signal: AbortSignal): Promise<void> {
    const streamId = `file:${this.options.path}`;
    const input = this.openStream();
    const onAbort = () => input.destroy();
    signal.addEventListener('abort', onAbort, { once: true });

    let units = 0;
    try {
      const payloads =
        this.options.mode === 'line' ? this.lines(input) : chunks(input);
      for await (const payload of payloads) {
        await channel.deliver(payload, { streamId });
        units++;
      }
    } catch (error) {
      if (!signal.aborted) throw error;
    } finally {
      signal.removeEventListener('abort', onAbort);
      channel.endStream(streamId);
    }
    this.logger.log(`Read ${units} unit(s) from ${this.options.path}`);
  }

  async close(): Promise<void> {
    if (!this.handle) return;
    const handle = this.handle;
    this.handle = null;
    await handle.close();
  }

  private openStream(): Readable {
    if (!this.handle) {
      return this.stdin;
    }
    return this.handle.createReadStream({
      highWaterMark: this.options.chunkSize,
      autoClose: false,
    });
  }

  private async *lines(input: Readable): AsyncGenerator<Buffer> {
    const reader = createInterface({ input, crlfDelay: Infinity });
    for await (const line of reader) {
      if (this.options.skipBlank && line.trim() === '') continue;
      yield Buffer.from(line, 'utf8');
    }
  }
}

async function* chunks(input: Readable): AsyncGenerator<Buffer> {
  for await (const chunk of input) {
    yield Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
  }
}

export const fileReadInputPlugin = definePlugin({
  role: 'input',
  name: 'fileread',
  description: "Read a file (or '-' for stdin) line by line or in chunks",
  defaults: { path: STDIN, mode: 'line', chunksize: '4096', skipblank: 'false' },
  options: z
    .object({
      path: requiredString(),
      mode: z.enum(['line', 'chunk']),
      chunksize: integerOption(1, 16 * 1024 * 1024),
      skipblank: booleanOption(),
    })
    .strict(),
  create: (options) =>
    new FileReadInput({
      path: options.path,
      mode: options.mode,
      chunkSize: options.chunksize,
      skipBlank: options.skipblank,
    }),
});
