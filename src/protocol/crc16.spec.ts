import { crc16Modbus } from './crc16';

describe('crc16Modbus', () => {
  it('should match the standard check value for "123456789"', () => {
    expect(crc16Modbus(Buffer.from('123456789', 'ascii'))).toBe(0x4b37);
  });

  it('should return the init value for empty input', () => {
    expect(crc16Modbus(Buffer.alloc(0))).toBe(0xffff);
  });

  it('should change when a single byte changes', () => {
    const a = Buffer.from('inverter telemetry');
    const b = Buffer.from(a);
    b[3] ^= 0x01;
    expect(crc16Modbus(a)).not.toBe(crc16Modbus(b));
  });
});
