import { FieldValue, PipelineRecord } from '../pipeline/pipeline.types';
import {
  MESSAGE_TYPE_REALTIME,
  REALTIME_LAYOUT,
  REALTIME_PAYLOAD_LENGTH,
  encodeFields,
  extractFields,
} from './field-layout';
import { DEFAULT_MAX_PAYLOAD_LENGTH, Frame, encodeFrame } from './frame';
import {
  Extraction,
  FrameReassembler,
  ResyncPolicy,
} from './frame-reassembler';
import { decryptPayload, encryptPayload } from './payload-cipher';
import {
  PayloadError,
  ProtocolError,
  UnknownKeyError,
} from './protocol.errors';
import { SessionKeyStore } from './session-keys';

/**
 * Realtime reading reported by an inverter.
 */
export interface RealtimeReading {
  timestamp: Date;
  status: string;
  pvVoltage1: number;
  pvCurrent1: number;
  pvVoltage2: number;
  pvCurrent2: number;
  acVoltage: number;
  acCurrent: number;
  acFrequency: number;
  activePower: number;
  energyToday: number;
  energyTotal: number;
  temperature: number;
}

export interface TelemetryCodecOptions {
  maxPayloadLength: number;
  resync: ResyncPolicy;
}

export interface DecodedFrame {
  readonly frame: Frame;
  readonly record: PipelineRecord;
}

export type CodecResult =
  | { readonly ok: true; readonly decoded: DecodedFrame }
  | { readonly ok: false; readonly error: ProtocolError };

/**
 * Inverter telemetry codec.
 *
 * Per stream, bytes move through:
 *
 *   AWAITING_FRAME -> FRAME_READY -> VALID | CHECKSUM_FAILED
 *   VALID -> DECRYPTED | KEY_MISSING
 *   DECRYPTED -> RECORD_EMITTED
 *
 * Failure states drop the frame and return the stream to AWAITING_FRAME.
 * Reassembly buffers are keyed by stream id, keys by device id.
 */
export class TelemetryCodec {
  private readonly streams = new Map<string, FrameReassembler>();
  private readonly options: TelemetryCodecOptions;

  constructor(
    private readonly keys: SessionKeyStore,
    options: Partial<TelemetryCodecOptions> = {},
  ) {
    this.options = {
      maxPayloadLength: options.maxPayloadLength ?? DEFAULT_MAX_PAYLOAD_LENGTH,
      resync: options.resync ?? 'scan',
    };
  }

  /** Number of streams with live reassembly state. */
  get activeStreams(): number {
    return this.streams.size;
  }

  /**
   * Feed a chunk of one stream and return every frame it completed, in
   * stream order.
   */
  decode(streamId: string, chunk: Buffer): CodecResult[] {
    return this.decodeExtractions(this.reassembler(streamId).push(chunk));
  }

  /**
   * Forget a stream. Frames still buffered for it are drained first, so a
   * partial frame left at the end is reported rather than silently lost.
   */
  releaseStream(streamId: string): CodecResult[] {
    const reassembler = this.streams.get(streamId);
    this.streams.delete(streamId);
    return reassembler ? this.decodeExtractions(reassembler.drain()) : [];
  }

  private decodeExtractions(extractions: Extraction[]): CodecResult[] {
    const results: CodecResult[] = [];
    for (const extraction of extractions) {
      if (!extraction.ok) {
        results.push(extraction);
        continue;
      }
      try {
        results.push({ ok: true, decoded: this.decodeFrame(extraction.frame) });
      } catch (error) {
        if (!(error instanceof ProtocolError)) throw error;
        results.push({ ok: false, error });
      }
    }
    return results;
  }

  /**
   * Decrypt and project one checksum-verified frame.
   */
  decodeFrame(frame: Frame): DecodedFrame {
    const material = this.keys.get(frame.deviceId);
    if (!material) {
      throw new UnknownKeyError(frame.deviceId);
    }

    let plaintext: Buffer;
    try {
      plaintext = decryptPayload(
        frame.payload,
        material.key,
        frame.deviceId,
        frame.sequence,
      );
    } catch {
      throw new UnknownKeyError(
        frame.deviceId,
        'session key does not decrypt the payload',
      );
    }

    const fields = extractFields(plaintext, REALTIME_LAYOUT);
    if (fields.deviceEcho !== frame.deviceId) {
      throw new PayloadError(
        frame.deviceId,
        'device echo mismatch (wrong key or corrupted payload)',
      );
    }
    if (fields.messageType !== MESSAGE_TYPE_REALTIME) {
      throw new PayloadError(
        frame.deviceId,
        `unsupported message type ${String(fields.messageType)}`,
      );
    }
    if (!(fields.timestamp instanceof Date)) {
      throw new PayloadError(frame.deviceId, 'payload too short');
    }

    const record: Record<string, FieldValue> = {
      deviceId: frame.deviceId,
      sequence: frame.sequence,
    };
    for (const [name, value] of Object.entries(fields)) {
      if (name === 'deviceEcho' || name === 'messageType') continue;
      record[name] = value;
    }
    return { frame, record };
  }

  reset(): void {
    this.streams.clear();
  }

  private reassembler(streamId: string): FrameReassembler {
    let reassembler = this.streams.get(streamId);
    if (!reassembler) {
      reassembler = new FrameReassembler(this.options);
      this.streams.set(streamId, reassembler);
    }
    return reassembler;
  }
}

export function encodeRealtimePayload(
  deviceId: string,
  reading: RealtimeReading,
): Buffer {
  return encodeFields(
    { ...reading, deviceEcho: deviceId, messageType: MESSAGE_TYPE_REALTIME },
    REALTIME_LAYOUT,
    REALTIME_PAYLOAD_LENGTH,
  );
}

/**
 * Build a complete encrypted frame carrying one realtime reading.
 */
export function encodeTelemetryFrame(
  message: { deviceId: string; sequence: number; reading: RealtimeReading },
  key: Buffer,
): Buffer {
  const plaintext = encodeRealtimePayload(message.deviceId, message.reading);
  return encodeFrame({
    deviceId: message.deviceId,
    sequence: message.sequence,
    payload: encryptPayload(
      plaintext,
      key,
      message.deviceId,
      message.sequence,
    ),
  });
}
