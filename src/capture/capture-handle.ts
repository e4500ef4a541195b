import { Logger } from '@nestjs/common';
import { ChildProcess, spawn } from 'node:child_process';
import { once } from 'node:events';
import { createReadStream } from 'node:fs';
import { Readable } from 'node:stream';
import { describeError } from '../common/pipeline.errors';
import { CaptureError, PcapFormatError } from './capture.errors';
import { PcapHeader, PcapPacket, PcapStreamParser } from './pcap-reader';

/**
 * An open source of captured frames.
 */
export interface CaptureHandle {
  readonly description: string;
  /** True for a running capture process, false for a file */
  readonly live: boolean;
  readHeader(): Promise<PcapHeader>;
  packets(): AsyncGenerator<PcapPacket>;
  close(): Promise<void>;
}

export interface LiveCaptureOptions {
  command: string;
  interface: string;
  snaplen: number;
  /** BPF expression passed to the capture tool */
  filter: string;
  /** How long a silent but running capture tool gets before we go ahead */
  startupGraceMs?: number;
}

const DEFAULT_STARTUP_GRACE_MS = 1000;
const MAX_STDERR_BYTES = 4 * 1024;

/**
 * Pcap byte stream → packets. The global header is read once and shared by
 * `readHeader` and `packets`.
 */
class PcapStreamHandle implements CaptureHandle {
  private readonly parser = new PcapStreamParser();
  private readonly iterator: AsyncIterator<unknown>;
  private backlog: PcapPacket[] = [];
  private header: Promise<PcapHeader> | null = null;

  constructor(
    private readonly source: Readable,
    readonly description: string,
    readonly live: boolean,
  ) {
    this.iterator = source[Symbol.asyncIterator]();
  }

  readHeader(): Promise<PcapHeader> {
    this.header ??= this.loadHeader();
    return this.header;
  }

  async *packets(): AsyncGenerator<PcapPacket> {
    await this.readHeader();
    const backlog = this.backlog;
    this.backlog = [];
    yield* backlog;

    for (;;) {
      const next = await this.iterator.next();
      if (next.done) break;
      yield* this.parser.push(toBuffer(next.value));
    }
    if (this.parser.buffered > 0) {
      throw new PcapFormatError(
        `${this.description} ended inside a packet (${this.parser.buffered} byte(s) left)`,
      );
    }
  }

  async close(): Promise<void> {
    this.source.destroy();
  }

  private async loadHeader(): Promise<PcapHeader> {
    for (;;) {
      const header = this.parser.globalHeader;
      if (header) return header;
      const next = await this.iterator.next();
      if (next.done) {
        throw new CaptureError(`${this.description} ended before a pcap header`);
      }
      this.backlog.push(...this.parser.push(toBuffer(next.value)));
    }
  }
}

/**
 * A pcap stream produced by a child capture process.
 */
class ProcessCaptureHandle extends PcapStreamHandle {
  constructor(
    private readonly child: ChildProcess,
    stdout: Readable,
    description: string,
  ) {
    super(stdout, description, true);
  }

  async close(): Promise<void> {
    await super.close();
    if (this.child.exitCode === null && this.child.signalCode === null) {
      const exited = once(this.child, 'close');
      this.child.kill('SIGTERM');
      await exited;
    }
  }
}

function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) return chunk;
  if (typeof chunk === 'string') return Buffer.from(chunk, 'latin1');
  throw new TypeError('Capture source produced a non-binary chunk');
}

/**
 * Open an offline capture file.
 *
 * @throws CaptureError when the file cannot be read or is not a pcap file
 */
export async function openCaptureFile(path: string): Promise<CaptureHandle> {
  const handle = new PcapStreamHandle(
    createReadStream(path),
    `capture file ${path}`,
    false,
  );
  try {
    await handle.readHeader();
  } catch (error) {
    await handle.close();
    throw error instanceof CaptureError
      ? error
      : new CaptureError(`Cannot read ${path}: ${describeError(error)}`, {
          cause: error,
        });
  }
  return handle;
}

/**
 * Start the capture tool writing pcap to stdout, e.g.
 * `tcpdump -i eth0 -U -n -s 65535 -w - udp and (port 53)`.
 *
 * Resolves once the tool has written its pcap header, or once it has kept
 * running quietly for the startup grace period. Rejects with a CaptureError
 * when the tool cannot be started or exits during startup, carrying its
 * stderr (e.g. a missing capture privilege).
 */
export async function openLiveCapture(
  options: LiveCaptureOptions,
): Promise<CaptureHandle> {
  const logger = new Logger('LiveCapture');
  const args = [
    '-i',
    options.interface,
    '-U',
    '-n',
    '-s',
    String(options.snaplen),
    '-w',
    '-',
    ...(options.filter ? [options.filter] : []),
  ];
  logger.debug(`Starting ${options.command} ${args.join(' ')}`);

  const child = spawn(options.command, args, {
    stdio: ['ignore', 'pipe', 'pipe'],
  });
  const { stdout, stderr } = child;
  if (!stdout || !stderr) {
    child.kill();
    throw new CaptureError(`${options.command} has no output pipes`);
  }

  let errorText = '';
  stderr.setEncoding('utf8');
  stderr.on('data', (text: string) => {
    if (errorText.length < MAX_STDERR_BYTES) errorText += text;
  });

  const handle = new ProcessCaptureHandle(
    child,
    stdout,
    `${options.command} on ${options.interface}`,
  );

  await new Promise<void>((resolve, reject) => {
    const cleanup = () => {
      clearTimeout(timer);
      child.off('error', onError);
      child.off('close', onClose);
    };
    const ready = () => {
      cleanup();
      resolve();
    };
    const fail = (error: CaptureError) => {
      cleanup();
      reject(error);
    };
    const onError = (error: Error) =>
      fail(
        new CaptureError(
          `Cannot start ${options.command}: ${error.message}`,
          { cause: error },
        ),
      );
    const onClose = (code: number | null, signal: NodeJS.Signals | null) =>
      fail(
        new CaptureError(
          `${options.command} exited with ${code !== null ? `code ${code}` : `signal ${signal ?? '?'}`}${errorText.trim() ? `: ${errorText.trim()}` : ''}`,
        ),
      );
    const timer = setTimeout(ready, options.startupGraceMs ?? DEFAULT_STARTUP_GRACE_MS);

    child.once('error', onError);
    child.once('close', onClose);
    handle.readHeader().then(ready, (error: unknown) => {
      // An early end of stdout is reported by the close handler with the
      // tool's exit status
      if (error instanceof PcapFormatError) {
        fail(new CaptureError(describeError(error), { cause: error }));
      }
    });
  });

  stderr.on('data', (text: string) => {
    for (const line of text.split('\n')) {
      if (line.trim()) logger.debug(`${options.command}: ${line.trim()}`);
    }
  });
  return handle;
}
