import { crc16Modbus } from './crc16';

/**
 * Inverter telemetry frame layout (header integers big-endian):
 *
 * | offset | size | field                                        |
 * |--------|------|----------------------------------------------|
 * | 0      | 2    | magic 0xA5 0x5A                              |
 * | 2      | 1    | version (0x01)                               |
 * | 3      | 1    | flags (bit 7 = acknowledgement)              |
 * | 4      | 2    | payload length                               |
 * | 6      | 8    | device identifier, ASCII, NUL-padded         |
 * | 14     | 4    | sequence number                              |
 * | 18     | n    | payload (AES-128-CBC ciphertext)             |
 * | 18+n   | 2    | CRC-16/MODBUS over payload, little-endian    |
 */
export const FRAME_MAGIC = Buffer.from([0xa5, 0x5a]);
export const FRAME_VERSION = 0x01;
export const HEADER_LENGTH = 18;
export const TRAILER_LENGTH = 2;
export const DEVICE_ID_LENGTH = 8;
export const CIPHER_BLOCK_SIZE = 16;
export const FLAG_ACK = 0x80;
export const DEFAULT_MAX_PAYLOAD_LENGTH = 1024;

export interface FrameHeader {
  readonly version: number;
  readonly flags: number;
  readonly length: number;
  readonly deviceId: string;
  readonly sequence: number;
}

export interface Frame extends FrameHeader {
  readonly payload: Buffer;
  readonly checksum: number;
}

/**
 * Read the fixed header. Caller guarantees at least HEADER_LENGTH bytes.
 */
export function readHeader(buffer: Buffer): FrameHeader {
  return {
    version: buffer.readUInt8(2),
    flags: buffer.readUInt8(3),
    length: buffer.readUInt16BE(4),
    deviceId: decodeDeviceId(buffer.subarray(6, 6 + DEVICE_ID_LENGTH)),
    sequence: buffer.readUInt32BE(14),
  };
}

/**
 * Returns why a header cannot start a data frame, or null when plausible.
 */
export function implausibility(
  header: FrameHeader,
  maxPayloadLength: number,
): string | null {
  if (header.version !== FRAME_VERSION) {
    return `Unsupported frame version ${header.version}`;
  }
  if (header.length === 0 || header.length > maxPayloadLength) {
    return `Implausible payload length ${header.length}`;
  }
  if (header.length % CIPHER_BLOCK_SIZE !== 0) {
    return `Payload length ${header.length} is not a multiple of ${CIPHER_BLOCK_SIZE}`;
  }
  return null;
}

export function encodeFrame(input: {
  deviceId: string;
  sequence: number;
  payload: Buffer;
  flags?: number;
}): Buffer {
  const { payload } = input;
  const frame = Buffer.alloc(HEADER_LENGTH + payload.length + TRAILER_LENGTH);
  FRAME_MAGIC.copy(frame, 0);
  frame.writeUInt8(FRAME_VERSION, 2);
  frame.writeUInt8(input.flags ?? 0, 3);
  frame.writeUInt16BE(payload.length, 4);
  encodeDeviceId(input.deviceId).copy(frame, 6);
  frame.writeUInt32BE(input.sequence >>> 0, 14);
  payload.copy(frame, HEADER_LENGTH);
  frame.writeUInt16LE(crc16Modbus(payload), HEADER_LENGTH + payload.length);
  return frame;
}

/**
 * Acknowledgement sent back to a device after a frame was decoded: a bare
 * header with the ACK flag set and an empty payload.
 */
export function encodeAcknowledgement(
  deviceId: string,
  sequence: number,
): Buffer {
  return encodeFrame({
    deviceId,
    sequence,
    payload: Buffer.alloc(0),
    flags: FLAG_ACK,
  });
}

export function encodeDeviceId(deviceId: string): Buffer {
  if (!/^[\x21-\x7e]{1,8}$/.test(deviceId)) {
    throw new RangeError(
      `Device id must be 1-${DEVICE_ID_LENGTH} printable ASCII characters: '${deviceId}'`,
    );
  }
  const out = Buffer.alloc(DEVICE_ID_LENGTH);
  out.write(deviceId, 'latin1');
  return out;
}

export function decodeDeviceId(raw: Buffer): string {
  let end = raw.length;
  while (end > 0 && raw[end - 1] === 0) {
    end--;
  }
  return raw.toString('latin1', 0, end);
}
