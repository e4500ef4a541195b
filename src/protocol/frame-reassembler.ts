import { crc16Modbus } from './crc16';
import {
  DEFAULT_MAX_PAYLOAD_LENGTH,
  FRAME_MAGIC,
  Frame,
  HEADER_LENGTH,
  TRAILER_LENGTH,
  implausibility,
  readHeader,
} from './frame';
import { ChecksumError, FramingError } from './protocol.errors';

/**
 * How bytes are thrown away after a malformed header or a checksum failure.
 *
 * - `scan`: skip to the next occurrence of the frame magic
 * - `discard`: drop everything buffered for the stream
 */
export type ResyncPolicy = 'scan' | 'discard';

export const RESYNC_POLICIES: readonly ResyncPolicy[] = ['scan', 'discard'];

export interface ReassemblerOptions {
  maxPayloadLength: number;
  resync: ResyncPolicy;
}

export type Extraction =
  | { readonly ok: true; readonly frame: Frame }
  | { readonly ok: false; readonly error: FramingError | ChecksumError };

const EMPTY = Buffer.alloc(0);

/**
 * Stateful reassembly buffer for one byte stream.
 *
 * Chunks may split or join frames arbitrarily. Every complete frame found in
 * the buffer is extracted and checksum-verified; incomplete trailing bytes
 * stay buffered until the next push.
 */
export class FrameReassembler {
  private buffer: Buffer = EMPTY;
  private readonly options: ReassemblerOptions;

  constructor(options: Partial<ReassemblerOptions> = {}) {
    this.options = {
      maxPayloadLength: options.maxPayloadLength ?? DEFAULT_MAX_PAYLOAD_LENGTH,
      resync: options.resync ?? 'scan',
    };
  }

  /** Bytes currently held waiting for the rest of a frame. */
  get buffered(): number {
    return this.buffer.length;
  }

  push(chunk: Buffer): Extraction[] {
    this.buffer =
      this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);

    const results: Extraction[] = [];
    let next = this.extractNext();
    while (next) {
      results.push(next);
      next = this.extractNext();
    }
    return results;
  }

  /**
   * End of stream: report whatever is still buffered. Complete frames are
   * extracted as usual; a trailing partial frame is reported as a
   * FramingError and any frame start behind it is rescanned.
   */
  drain(): Extraction[] {
    const results: Extraction[] = [];
    while (this.buffer.length > 0) {
      const next = this.extractNext();
      if (next) {
        results.push(next);
        continue;
      }
      const following = this.findMagic(1);
      const cut =
        this.options.resync === 'scan' && following > 0
          ? following
          : this.buffer.length;
      this.buffer = this.buffer.subarray(cut);
      results.push({
        ok: false,
        error: new FramingError('Stream ended inside a frame', cut),
      });
    }
    return results;
  }

  reset(): void {
    this.buffer = EMPTY;
  }

  private extractNext(): Extraction | null {
    if (this.buffer.length === 0) {
      return null;
    }

    const start = this.findMagic(0);
    if (start !== 0) {
      const cut = start > 0 ? start : this.buffer.length - this.partialMagic();
      if (cut === 0) {
        return null;
      }
      this.buffer = this.buffer.subarray(cut);
      return {
        ok: false,
        error: new FramingError('Bytes outside of a frame', cut),
      };
    }

    if (this.buffer.length < HEADER_LENGTH) {
      return null;
    }

    const header = readHeader(this.buffer);
    const problem = implausibility(header, this.options.maxPayloadLength);
    if (problem) {
      return {
        ok: false,
        error: new FramingError(problem, this.resynchronize()),
      };
    }

    const total = HEADER_LENGTH + header.length + TRAILER_LENGTH;
    if (this.buffer.length < total) {
      // A corrupted length can point past frames that are already here.
      const next = this.verifiedFrameAfter(1);
      if (next < 0) {
        return null;
      }
      const cut = this.options.resync === 'scan' ? next : this.buffer.length;
      this.buffer = this.buffer.subarray(cut);
      return {
        ok: false,
        error: new FramingError(
          `Payload length ${header.length} overruns the next frame`,
          cut,
        ),
      };
    }

    const payload = Buffer.from(
      this.buffer.subarray(HEADER_LENGTH, HEADER_LENGTH + header.length),
    );
    const checksum = this.buffer.readUInt16LE(HEADER_LENGTH + header.length);
    const actual = crc16Modbus(payload);
    if (actual !== checksum) {
      // The length field itself may be corrupt, so rescan instead of
      // consuming `total` bytes.
      this.resynchronize();
      return {
        ok: false,
        error: new ChecksumError(
          header.deviceId,
          header.sequence,
          checksum,
          actual,
        ),
      };
    }

    this.buffer = this.buffer.subarray(total);
    return { ok: true, frame: { ...header, payload, checksum } };
  }

  /**
   * Drop bytes from the head of the buffer per the resync policy. Returns
   * the number of bytes discarded.
   */
  private resynchronize(): number {
    if (this.options.resync === 'discard') {
      const discarded = this.buffer.length;
      this.buffer = EMPTY;
      return discarded;
    }
    const next = this.findMagic(1);
    const cut = next > 0 ? next : this.buffer.length - this.partialMagic();
    this.buffer = this.buffer.subarray(cut);
    return cut;
  }

  /**
   * Offset of the first frame start at or after `from` that is followed by
   * a complete frame with a valid checksum, or -1.
   */
  private verifiedFrameAfter(from: number): number {
    for (
      let start = this.findMagic(from);
      start > 0;
      start = this.findMagic(start + 1)
    ) {
      const rest = this.buffer.subarray(start);
      if (rest.length < HEADER_LENGTH) {
        return -1;
      }
      const header = readHeader(rest);
      if (implausibility(header, this.options.maxPayloadLength)) {
        continue;
      }
      const end = HEADER_LENGTH + header.length;
      if (rest.length < end + TRAILER_LENGTH) {
        continue;
      }
      const payload = rest.subarray(HEADER_LENGTH, end);
      if (crc16Modbus(payload) === rest.readUInt16LE(end)) {
        return start;
      }
    }
    return -1;
  }

  private findMagic(from: number): number {
    for (let i = from; i + 1 < this.buffer.length; i++) {
      if (
        this.buffer[i] === FRAME_MAGIC[0] &&
        this.buffer[i + 1] === FRAME_MAGIC[1]
      ) {
        return i;
      }
    }
    return -1;
  }

  /** 1 when the last buffered byte could be the first half of the magic. */
  private partialMagic(): number {
    return this.buffer[this.buffer.length - 1] === FRAME_MAGIC[0] ? 1 : 0;
  }
}
