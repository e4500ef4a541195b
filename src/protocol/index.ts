// Re-export public API
export { crc16Modbus } from './crc16';
export {
  DEFAULT_MAX_PAYLOAD_LENGTH,
  FLAG_ACK,
  HEADER_LENGTH,
  TRAILER_LENGTH,
  encodeAcknowledgement,
  encodeFrame,
} from './frame';
export type { Frame, FrameHeader } from './frame';
export { FrameReassembler, RESYNC_POLICIES } from './frame-reassembler';
export type { Extraction, ResyncPolicy } from './frame-reassembler';
export { KEY_LENGTH, decryptPayload, encryptPayload } from './payload-cipher';
export { SessionKeyStore } from './session-keys';
export {
  ChecksumError,
  FramingError,
  PayloadError,
  ProtocolError,
  UnknownKeyError,
} from './protocol.errors';
export {
  TelemetryCodec,
  encodeRealtimePayload,
  encodeTelemetryFrame,
} from './telemetry-codec';
export type {
  CodecResult,
  DecodedFrame,
  RealtimeReading,
  TelemetryCodecOptions,
} from './telemetry-codec';
