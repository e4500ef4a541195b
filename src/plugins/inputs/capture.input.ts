import { Logger } from '@nestjs/common';
import { z } from 'zod';
import {
  CaptureHandle,
  openCaptureFile,
  openLiveCapture,
} from '../../capture/capture-handle';
import { CaptureError } from '../../capture/capture.errors';
import {
  SUPPORTED_LINKTYPES,
  TransportPacket,
  decodePacket,
} from '../../capture/packet-decoder';
import {
  CaptureFilter,
  matchesFilter,
  toBpfExpression,
} from '../../capture/packet-filter';
import { describeError } from '../../common/pipeline.errors';
import { DeliveryChannel } from '../../pipeline/pipeline.types';
import { InputSource } from '../interfaces/plugin.interface';
import {
  definePlugin,
  integerOption,
  listOption,
  optionalString,
  requiredString,
} from '../plugin-options';

export interface CaptureInputOptions {
  interface: string;
  /** Offline pcap file; when set, no capture process is started */
  file?: string;
  command: string;
  snaplen: number;
  filter: CaptureFilter;
}

export type CaptureOpener = (
  options: CaptureInputOptions,
) => Promise<CaptureHandle>;

export const openCapture: CaptureOpener = (options) =>
  options.file
    ? openCaptureFile(options.file)
    : openLiveCapture({
        command: options.command,
        interface: options.interface,
        snaplen: options.snaplen,
        filter: toBpfExpression(options.filter),
      });

function endpoint(address: string, port: number): string {
  return address.includes(':') ? `[${address}]:${port}` : `${address}:${port}`;
}

/**
 * Stream id of one flow direction, e.g. `udp:10.0.0.5:4000>10.0.0.1:53`.
 */
export function flowId(packet: TransportPacket): string {
  return `${packet.protocol}:${endpoint(packet.sourceAddress, packet.sourcePort)}>${endpoint(packet.destinationAddress, packet.destinationPort)}`;
}

/**
 * CaptureInput - Passive capture source
 *
 * Decodes captured frames down to TCP/UDP and delivers the non-empty
 * transport payloads that pass the filter, one stream per flow direction.
 * A flow's stream ends on TCP FIN/RST and when the capture ends.
 *
 * An offline file ends the run at end of file. A live capture runs until
 * aborted; the capture tool exiting on its own is a source failure.
 */
export class CaptureInput implements InputSource {
  private readonly logger = new Logger(CaptureInput.name);
  private handle: CaptureHandle | null = null;

  constructor(
    private readonly options: CaptureInputOptions,
    private readonly open: CaptureOpener = openCapture,
  ) {}

  async initialize(): Promise<void> {
    const handle = await this.open(this.options);
    this.handle = handle;
    if (!handle.live) {
      assertSupported((await handle.readHeader()).linktype);
    }
    this.logger.log(`Capturing from ${handle.description}`);
  }

  async run(channel: DeliveryChannel, signal: AbortSignal): Promise<void> {
    const handle = this.handle;
    if (!handle) {
      throw new Error('Capture input is not initialized');
    }
    const onAbort = () => {
      handle.close().catch((error: unknown) => {
        this.logger.warn(`Closing capture failed: ${describeError(error)}`);
      });
    };
    signal.addEventListener('abort', onAbort, { once: true });

    const streams = new Set<string>();
    let delivered = 0;
    let undecodable = 0;
    try {
      const { linktype } = await handle.readHeader();
      assertSupported(linktype);

      for await (const packet of handle.packets()) {
        const decoded = decodePacket(linktype, packet.data);
        if (!decoded) {
          undecodable++;
          continue;
        }
        if (!matchesFilter(decoded, this.options.filter)) {
          continue;
        }
        const streamId = flowId(decoded);
        if (decoded.payload.length > 0) {
          streams.add(streamId);
          await channel.deliver(Buffer.from(decoded.payload), { streamId });
          delivered++;
        }
        if (decoded.closing && streams.delete(streamId)) {
          channel.endStream(streamId);
        }
      }
      if (handle.live && !signal.aborted) {
        throw new Error(`${handle.description} stopped unexpectedly`);
      }
    } catch (error) {
      if (!signal.aborted) throw error;
    } finally {
      signal.removeEventListener('abort', onAbort);
      for (const streamId of streams) {
        channel.endStream(streamId);
      }
    }
    this.logger.log(
      `Capture finished: ${delivered} payload(s) delivered, ${undecodable} frame(s) not TCP/UDP`,
    );
  }

  async close(): Promise<void> {
    const handle = this.handle;
    this.handle = null;
    await handle?.close();
  }
}

function assertSupported(linktype: number): void {
  if (!SUPPORTED_LINKTYPES.includes(linktype)) {
    throw new CaptureError(`Unsupported link type ${linktype}`);
  }
}

const captureOptions = z
  .object({
    interface: requiredString(),
    file: optionalString(),
    protocol: z.enum(['tcp', 'udp', 'any']),
    port: listOption().pipe(
      z.array(
        z
          .string()
          .regex(/^\d+$/, 'must be an integer')
          .transform(Number)
          .pipe(z.number().int().min(1).max(65535)),
      ),
    ),
    command: requiredString(),
    snaplen: integerOption(64, 262144),
  })
  .strict();

export const captureInputPlugin = definePlugin({
  role: 'input',
  name: 'capture',
  description: 'Capture TCP/UDP payloads from an interface or a pcap file',
  defaults: {
    interface: 'any',
    protocol: 'any',
    port: '',
    command: 'tcpdump',
    snaplen: '65535',
  },
  options: captureOptions,
  create: (options) =>
    new CaptureInput({
      interface: options.interface,
      file: options.file,
      command: options.command,
      snaplen: options.snaplen,
      filter: { protocol: options.protocol, ports: options.port },
    }),
});
