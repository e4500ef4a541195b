import { KEY_LENGTH } from './payload-cipher';

export interface SessionKeyMaterial {
  readonly deviceId: string;
  readonly key: Buffer;
}

/**
 * Per-device symmetric keys, scoped to one decoder instance and never
 * persisted. Entries are partitioned by device id so concurrent streams
 * cannot see each other's keys.
 */
export class SessionKeyStore {
  private readonly keys = new Map<string, SessionKeyMaterial>();

  register(deviceId: string, key: Buffer | string): void {
    const material = typeof key === 'string' ? parseHexKey(key) : key;
    if (material.length !== KEY_LENGTH) {
      throw new RangeError(
        `Key for device ${deviceId} must be ${KEY_LENGTH} bytes, got ${material.length}`,
      );
    }
    this.keys.set(deviceId, { deviceId, key: Buffer.from(material) });
  }

  get(deviceId: string): SessionKeyMaterial | undefined {
    return this.keys.get(deviceId);
  }

  has(deviceId: string): boolean {
    return this.keys.has(deviceId);
  }

  get size(): number {
    return this.keys.size;
  }

  /**
   * Register every `DEVICE=hexkey` pair of a comma-separated list.
   */
  registerList(spec: string): void {
    for (const entry of spec.split(',')) {
      const trimmed = entry.trim();
      if (!trimmed) continue;
      const separator = trimmed.indexOf('=');
      if (separator <= 0) {
        throw new SyntaxError(`Expected DEVICE=hexkey, got '${trimmed}'`);
      }
      this.register(
        trimmed.slice(0, separator).trim(),
        trimmed.slice(separator + 1).trim(),
      );
    }
  }

  /**
   * Register keys from a parsed JSON document `{ "<deviceId>": "<hexkey>" }`.
   */
  registerJson(document: unknown): void {
    if (
      typeof document !== 'object' ||
      document === null ||
      Array.isArray(document)
    ) {
      throw new TypeError('Key file must contain a JSON object');
    }
    for (const [deviceId, key] of Object.entries(document)) {
      if (typeof key !== 'string') {
        throw new TypeError(`Key for device ${deviceId} must be a hex string`);
      }
      this.register(deviceId, key);
    }
  }

  /** Overwrite and forget all key material. */
  clear(): void {
    for (const material of this.keys.values()) {
      material.key.fill(0);
    }
    this.keys.clear();
  }
}

function parseHexKey(hex: string): Buffer {
  if (!/^(?:[0-9a-fA-F]{2})+$/.test(hex)) {
    throw new SyntaxError('Key must be an even-length hex string');
  }
  return Buffer.from(hex, 'hex');
}
