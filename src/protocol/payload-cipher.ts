import { createCipheriv, createDecipheriv, createHmac } from 'node:crypto';

export const KEY_LENGTH = 16;
const ALGORITHM = 'aes-128-cbc';

/**
 * Per-frame IV: first 16 bytes of HMAC-SHA256(key, deviceId || sequence).
 */
export function deriveIv(
  key: Buffer,
  deviceId: string,
  sequence: number,
): Buffer {
  const seq = Buffer.alloc(4);
  seq.writeUInt32BE(sequence >>> 0);
  return createHmac('sha256', key)
    .update(deviceId, 'latin1')
    .update(seq)
    .digest()
    .subarray(0, 16);
}

export function encryptPayload(
  plaintext: Buffer,
  key: Buffer,
  deviceId: string,
  sequence: number,
): Buffer {
  const cipher = createCipheriv(
    ALGORITHM,
    key,
    deriveIv(key, deviceId, sequence),
  );
  return Buffer.concat([cipher.update(plaintext), cipher.final()]);
}

/**
 * Throws when the padding does not check out, which is what a wrong key
 * produces in all but roughly 1 in 256 cases.
 */
export function decryptPayload(
  ciphertext: Buffer,
  key: Buffer,
  deviceId: string,
  sequence: number,
): Buffer {
  const decipher = createDecipheriv(
    ALGORITHM,
    key,
    deriveIv(key, deviceId, sequence),
  );
  return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
}
