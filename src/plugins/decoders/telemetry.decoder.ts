import { Logger } from '@nestjs/common';
import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { describeError } from '../../common/pipeline.errors';
import { DataUnit, PipelineRecord } from '../../pipeline/pipeline.types';
import {
  DEFAULT_MAX_PAYLOAD_LENGTH,
  ResyncPolicy,
  SessionKeyStore,
  TelemetryCodec,
  encodeAcknowledgement,
} from '../../protocol';
import {
  DecodeOutcome,
  DecodedUnit,
  Decoder,
} from '../interfaces/plugin.interface';
import {
  booleanOption,
  definePlugin,
  integerOption,
  optionalString,
} from '../plugin-options';

export interface TelemetryDecoderOptions {
  keys: SessionKeyStore;
  keyfile?: string;
  maxPayloadLength: number;
  resync: ResyncPolicy;
  acknowledge: boolean;
}

export interface TelemetryDecoderStats {
  framesDecoded: number;
  framesRejected: number;
}

/**
 * TelemetryDecoder - Inverter protocol decoder stage
 *
 * Reassembles frames per stream, verifies the CRC, decrypts with the
 * device's session key and emits one part per decoded frame. Rejected frames
 * (framing, checksum, key, payload) are logged and counted; they never stop
 * the frames around them.
 *
 * With `acknowledge`, every decoded frame is answered with an ACK frame sent
 * back over the unit's origin.
 */
export class TelemetryDecoder implements Decoder {
  private readonly logger = new Logger(TelemetryDecoder.name);
  private readonly codec: TelemetryCodec;
  private readonly counters: TelemetryDecoderStats = {
    framesDecoded: 0,
    framesRejected: 0,
  };

  constructor(private readonly options: TelemetryDecoderOptions) {
    this.codec = new TelemetryCodec(options.keys, {
      maxPayloadLength: options.maxPayloadLength,
      resync: options.resync,
    });
  }

  get stats(): TelemetryDecoderStats {
    return { ...this.counters };
  }

  async initialize(): Promise<void> {
    const { keyfile, keys } = this.options;
    if (keyfile) {
      const document: unknown = JSON.parse(await readFile(keyfile, 'utf8'));
      keys.registerJson(document);
    }
    this.logger.log(`Loaded ${keys.size} session key(s)`);
  }

  decode(unit: DataUnit, fields: PipelineRecord): DecodeOutcome {
    const { streamId } = unit.origin;
    const parts: DecodedUnit[] = [];
    const acks: Buffer[] = [];

    const results = this.codec.decode(streamId, unit.payload);
    for (const result of results) {
      if (!result.ok) {
        this.counters.framesRejected++;
        this.logger.warn(
          `Frame rejected on ${streamId}: ${result.error.name}: ${result.error.message}`,
        );
        continue;
      }
      this.counters.framesDecoded++;
      const { frame, record } = result.decoded;
      parts.push({ unit, fields: { ...fields, ...record } });
      if (this.options.acknowledge) {
        acks.push(encodeAcknowledgement(frame.deviceId, frame.sequence));
      }
    }

    const response = acks.length > 0 ? Buffer.concat(acks) : undefined;
    if (parts.length === 0) {
      return {
        action: 'drop',
        reason:
          results.length === 0 ? 'incomplete frame buffered' : 'no valid frame',
        response,
      };
    }
    return { action: 'split', parts, response };
  }

  releaseStream(streamId: string): void {
    for (const result of this.codec.releaseStream(streamId)) {
      if (result.ok) {
        // push() extracts every complete frame, so only leftovers get here
        continue;
      }
      this.counters.framesRejected++;
      this.logger.warn(
        `Frame rejected at end of ${streamId}: ${result.error.name}: ${result.error.message}`,
      );
    }
  }

  close(): void {
    this.codec.reset();
    this.options.keys.clear();
    this.logger.log(
      `Decoded ${this.counters.framesDecoded} frame(s), rejected ${this.counters.framesRejected}`,
    );
  }
}

const telemetryOptions = z
  .object({
    keys: z.string().transform((list, ctx) => {
      const store = new SessionKeyStore();
      try {
        store.registerList(list);
      } catch (error) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: describeError(error),
        });
        return z.NEVER;
      }
      return store;
    }),
    keyfile: optionalString(),
    maxpayload: integerOption(16, 0xffff),
    resync: z.enum(['scan', 'discard']),
    acknowledge: booleanOption(),
  })
  .strict()
  .superRefine((options, ctx) => {
    if (options.keys.size === 0 && !options.keyfile) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['keys'],
        message: "no session keys: set 'keys' or 'keyfile'",
      });
    }
  });

export const telemetryDecoderPlugin = definePlugin({
  role: 'decode',
  name: 'telemetry',
  description: 'Reassemble, verify and decrypt inverter telemetry frames',
  defaults: {
    keys: '',
    maxpayload: String(DEFAULT_MAX_PAYLOAD_LENGTH),
    resync: 'scan',
    acknowledge: 'false',
  },
  options: telemetryOptions,
  create: (options) =>
    new TelemetryDecoder({
      keys: options.keys,
      keyfile: options.keyfile,
      maxPayloadLength: options.maxpayload,
      resync: options.resync,
      acknowledge: options.acknowledge,
    }),
});
