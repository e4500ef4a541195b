import { SessionKeyStore } from './session-keys';
import { KEY_A_HEX, KEY_B_HEX } from '../../test/utils/telemetry-builder';

describe('SessionKeyStore', () => {
  let store: SessionKeyStore;

  beforeEach(() => {
    store = new SessionKeyStore();
  });

  it('should register keys from a DEVICE=hex list', () => {
    store.registerList(`INV00001=${KEY_A_HEX}, INV00002 = ${KEY_B_HEX},`);

    expect(store.size).toBe(2);
    expect(store.get('INV00001')?.key.toString('hex')).toBe(KEY_A_HEX);
    expect(store.get('INV00002')?.key.toString('hex')).toBe(KEY_B_HEX);
  });

  it('should register keys from a JSON object', () => {
    store.registerJson({ INV00003: KEY_A_HEX });

    expect(store.has('INV00003')).toBe(true);
  });

  it('should reject keys of the wrong length', () => {
    expect(() => store.register('INV00001', 'abcd')).toThrow(
      'Key for device INV00001 must be 16 bytes, got 2',
    );
  });

  it('should reject non-hex keys', () => {
    expect(() => store.register('INV00001', 'zz'.repeat(16))).toThrow(
      'Key must be an even-length hex string',
    );
  });

  it('should reject list entries without a device id', () => {
    expect(() => store.registerList(KEY_A_HEX)).toThrow(
      `Expected DEVICE=hexkey, got '${KEY_A_HEX}'`,
    );
  });

  it('should reject a key file that is not an object', () => {
    expect(() => store.registerJson([KEY_A_HEX])).toThrow(
      'Key file must contain a JSON object',
    );
  });

  it('should zero key material on clear', () => {
    store.register('INV00001', KEY_A_HEX);
    const material = store.get('INV00001');

    store.clear();

    expect(store.size).toBe(0);
    expect(material?.key.every((byte) => byte === 0)).toBe(true);
  });
});
