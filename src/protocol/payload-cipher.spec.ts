import { decryptPayload, deriveIv, encryptPayload } from './payload-cipher';
import { KEY_A, KEY_B, DEVICE_A } from '../../test/utils/telemetry-builder';

describe('payload cipher', () => {
  const plaintext = Buffer.from('realtime reading for INV00001 ....', 'ascii');

  it('should restore the original payload bit-for-bit', () => {
    const ciphertext = encryptPayload(plaintext, KEY_A, DEVICE_A, 9);

    expect(ciphertext.equals(plaintext)).toBe(false);
    expect(ciphertext.length % 16).toBe(0);
    expect(decryptPayload(ciphertext, KEY_A, DEVICE_A, 9)).toEqual(plaintext);
  });

  it('should derive a different IV for each sequence number', () => {
    expect(deriveIv(KEY_A, DEVICE_A, 1)).not.toEqual(deriveIv(KEY_A, DEVICE_A, 2));
    expect(deriveIv(KEY_A, DEVICE_A, 1)).toHaveLength(16);
  });

  it('should not recover the payload with another key', () => {
    const ciphertext = encryptPayload(plaintext, KEY_A, DEVICE_A, 9);

    let recovered: Buffer | null;
    try {
      recovered = decryptPayload(ciphertext, KEY_B, DEVICE_A, 9);
    } catch {
      recovered = null;
    }

    expect(recovered === null || !recovered.equals(plaintext)).toBe(true);
  });
});
