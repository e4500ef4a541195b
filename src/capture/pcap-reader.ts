import { PcapFormatError } from './capture.errors';

export const PCAP_GLOBAL_HEADER_LENGTH = 24;
export const PCAP_RECORD_HEADER_LENGTH = 16;

/** Records larger than this are treated as corruption. */
const MAX_RECORD_LENGTH = 256 * 1024;

const MAGIC_MICROS = 0xa1b2c3d4;
const MAGIC_NANOS = 0xa1b23c4d;
const MAGIC_PCAPNG = 0x0a0d0d0a;

export interface PcapHeader {
  readonly littleEndian: boolean;
  readonly nanosecond: boolean;
  readonly versionMajor: number;
  readonly versionMinor: number;
  readonly snaplen: number;
  readonly linktype: number;
}

export interface PcapPacket {
  readonly timestamp: Date;
  readonly data: Buffer;
  readonly originalLength: number;
}

const EMPTY = Buffer.alloc(0);

/**
 * Incremental parser for the classic pcap format, as written by
 * `tcpdump -w -`. Accepts either byte order and micro- or nanosecond
 * timestamps.
 */
export class PcapStreamParser {
  private buffer: Buffer = EMPTY;
  private header: PcapHeader | null = null;

  get globalHeader(): PcapHeader | null {
    return this.header;
  }

  /** Bytes of an incomplete record still waiting for more input. */
  get buffered(): number {
    return this.buffer.length;
  }

  /**
   * @throws PcapFormatError on a bad magic number or a corrupt record header
   */
  push(chunk: Buffer): PcapPacket[] {
    this.buffer =
      this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);

    if (!this.header) {
      if (this.buffer.length < PCAP_GLOBAL_HEADER_LENGTH) {
        return [];
      }
      this.header = parseGlobalHeader(this.buffer);
      this.buffer = this.buffer.subarray(PCAP_GLOBAL_HEADER_LENGTH);
    }

    const header = this.header;
    const packets: PcapPacket[] = [];
    while (this.buffer.length >= PCAP_RECORD_HEADER_LENGTH) {
      const read = (offset: number) =>
        header.littleEndian
          ? this.buffer.readUInt32LE(offset)
          : this.buffer.readUInt32BE(offset);
      const seconds = read(0);
      const fraction = read(4);
      const capturedLength = read(8);
      const originalLength = read(12);

      if (capturedLength > Math.max(header.snaplen, MAX_RECORD_LENGTH)) {
        throw new PcapFormatError(
          `Corrupt pcap record: captured length ${capturedLength}`,
        );
      }
      const end = PCAP_RECORD_HEADER_LENGTH + capturedLength;
      if (this.buffer.length < end) {
        break;
      }

      const millis = header.nanosecond ? fraction / 1e6 : fraction / 1e3;
      packets.push({
        timestamp: new Date(seconds * 1000 + Math.floor(millis)),
        data: Buffer.from(this.buffer.subarray(PCAP_RECORD_HEADER_LENGTH, end)),
        originalLength,
      });
      this.buffer = this.buffer.subarray(end);
    }
    return packets;
  }
}

export function parseGlobalHeader(buffer: Buffer): PcapHeader {
  const magic = buffer.readUInt32BE(0);
  const swapped = buffer.readUInt32LE(0);

  let littleEndian: boolean;
  let nanosecond: boolean;
  if (magic === MAGIC_MICROS || magic === MAGIC_NANOS) {
    littleEndian = false;
    nanosecond = magic === MAGIC_NANOS;
  } else if (swapped === MAGIC_MICROS || swapped === MAGIC_NANOS) {
    littleEndian = true;
    nanosecond = swapped === MAGIC_NANOS;
  } else if (magic === MAGIC_PCAPNG) {
    throw new PcapFormatError('pcapng captures are not supported');
  } else {
    throw new PcapFormatError(
      `Not a pcap capture (magic 0x${magic.toString(16).padStart(8, '0')})`,
    );
  }

  const u16 = (offset: number) =>
    littleEndian ? buffer.readUInt16LE(offset) : buffer.readUInt16BE(offset);
  const u32 = (offset: number) =>
    littleEndian ? buffer.readUInt32LE(offset) : buffer.readUInt32BE(offset);

  return {
    littleEndian,
    nanosecond,
    versionMajor: u16(4),
    versionMinor: u16(6),
    snaplen: u32(16),
    // Upper bits carry FCS information
    linktype: u32(20) & 0xffff,
  };
}
