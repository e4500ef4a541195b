import { PipelineError } from '../common/pipeline.errors';

/**
 * Per-frame codec failure. The offending bytes are dropped and decoding
 * continues with the rest of the stream.
 */
export class ProtocolError extends PipelineError {}

/**
 * Bad magic/version or an implausible length. `discarded` is the number of
 * bytes thrown away while resynchronizing.
 */
export class FramingError extends ProtocolError {
  constructor(
    reason: string,
    public readonly discarded: number,
  ) {
    super(`${reason} (discarded ${discarded} byte(s))`);
  }
}

export class ChecksumError extends ProtocolError {
  constructor(
    public readonly deviceId: string,
    public readonly sequence: number,
    public readonly expected: number,
    public readonly actual: number,
  ) {
    super(
      `Checksum mismatch for ${deviceId}#${sequence}: expected 0x${hex16(expected)}, got 0x${hex16(actual)}`,
    );
  }
}

/**
 * No session key registered for the device, or the key does not fit the
 * ciphertext. Not retried: the device needs a key registered by an operator.
 */
export class UnknownKeyError extends ProtocolError {
  constructor(
    public readonly deviceId: string,
    reason = 'no session key registered',
  ) {
    super(`Device ${deviceId}: ${reason}`);
  }
}

/**
 * Decrypted payload failed field validation.
 */
export class PayloadError extends ProtocolError {
  constructor(
    public readonly deviceId: string,
    reason: string,
  ) {
    super(`Device ${deviceId}: ${reason}`);
  }
}

function hex16(value: number): string {
  return value.toString(16).padStart(4, '0');
}
