import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { CaptureHandle } from '../../capture/capture-handle';
import { PcapHeader, PcapPacket } from '../../capture/pcap-reader';
import {
  CaptureInput,
  CaptureInputOptions,
  captureInputPlugin,
  flowId,
} from './capture.input';
import { RecordingChannel } from '../../../test/utils/recording-channel';
import {
  TCP_FIN_ACK,
  ethernet,
  ipv4,
  pcapFile,
} from '../../../test/utils/pcap-builder';

const HEADER: PcapHeader = {
  littleEndian: true,
  nanosecond: false,
  versionMajor: 2,
  versionMinor: 4,
  snaplen: 65535,
  linktype: 1,
};

/**
 * Live capture stand-in: yields the given frames, then either ends (the tool
 * died) or waits until closed.
 */
class FakeLiveHandle implements CaptureHandle {
  readonly description = 'fake capture';
  readonly live = true;
  closed = false;
  private release: () => void = () => undefined;
  private readonly released = new Promise<void>((resolve) => {
    this.release = resolve;
  });

  constructor(
    private readonly frames: Buffer[],
    private readonly holdOpen: boolean,
  ) {}

  async readHeader(): Promise<PcapHeader> {
    return HEADER;
  }

  async *packets(): AsyncGenerator<PcapPacket> {
    for (const data of this.frames) {
      yield { timestamp: new Date(0), data, originalLength: data.length };
    }
    if (this.holdOpen) {
      await this.released;
    }
  }

  async close(): Promise<void> {
    this.closed = true;
    this.release();
  }
}

function udpFrame(sport: number, dport: number, payload: string): Buffer {
  return ethernet(
    ipv4('udp', { src: '10.0.0.5', dst: '10.0.0.1', sport, dport, payload }),
  );
}

describe('CaptureInput', () => {
  let dir: string;
  let channel: RecordingChannel;
  const signal = new AbortController().signal;

  const baseOptions: CaptureInputOptions = {
    interface: 'any',
    command: 'tcpdump',
    snaplen: 65535,
    filter: { protocol: 'any', ports: [] },
  };

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'capture-input-'));
    channel = new RecordingChannel();
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeCapture(linktype: number, frames: Buffer[]): string {
    const file = path.join(dir, 'capture.pcap');
    fs.writeFileSync(
      file,
      pcapFile(
        linktype,
        frames.map((data) => ({ data })),
      ),
    );
    return file;
  }

  it('should deliver only payloads that pass the filter', async () => {
    const file = writeCapture(1, [
      ethernet(
        ipv4('tcp', {
          src: '10.0.0.5',
          dst: '10.0.0.1',
          sport: 40001,
          dport: 53,
          payload: 'tcp-dns',
        }),
      ),
      udpFrame(40000, 53, 'udp-dns'),
      udpFrame(40000, 123, 'ntp'),
      ethernet(Buffer.alloc(28), { ethertype: 0x0806 }),
    ]);
    const input = new CaptureInput({
      ...baseOptions,
      file,
      filter: { protocol: 'udp', ports: [53] },
    });

    await input.initialize();
    await input.run(channel, signal);
    await input.close();

    expect(channel.texts()).toEqual(['udp-dns']);
    expect(channel.units[0].origin).toEqual({
      streamId: 'udp:10.0.0.5:40000>10.0.0.1:53',
    });
    expect(channel.ended).toEqual(['udp:10.0.0.5:40000>10.0.0.1:53']);
  });

  it('should end a TCP flow on FIN and the rest at end of capture', async () => {
    const client = {
      src: '192.168.1.20',
      dst: '192.168.1.1',
      sport: 5000,
      dport: 502,
    };
    const file = writeCapture(1, [
      ethernet(ipv4('tcp', { ...client, payload: 'first' })),
      ethernet(ipv4('tcp', { ...client, flags: TCP_FIN_ACK })),
      udpFrame(40000, 53, 'second'),
    ]);
    const input = new CaptureInput({ ...baseOptions, file });

    await input.initialize();
    await input.run(channel, signal);
    await input.close();

    expect(channel.texts()).toEqual(['first', 'second']);
    expect(channel.ended).toEqual([
      'tcp:192.168.1.20:5000>192.168.1.1:502',
      'udp:10.0.0.5:40000>10.0.0.1:53',
    ]);
  });

  it('should refuse a capture file with an unsupported link type', async () => {
    const file = writeCapture(147, [udpFrame(1, 2, 'x')]);
    const input = new CaptureInput({ ...baseOptions, file });

    await expect(input.initialize()).rejects.toThrow('Unsupported link type 147');
    await input.close();
  });

  it('should treat a live capture that ends on its own as a failure', async () => {
    const handle = new FakeLiveHandle([udpFrame(40000, 53, 'only')], false);
    const input = new CaptureInput(baseOptions, async () => handle);

    await input.initialize();

    await expect(input.run(channel, signal)).rejects.toThrow(
      'fake capture stopped unexpectedly',
    );
    expect(channel.texts()).toEqual(['only']);
    expect(channel.ended).toEqual(['udp:10.0.0.5:40000>10.0.0.1:53']);
  });

  it('should stop a live capture quietly when aborted', async () => {
    const handle = new FakeLiveHandle([udpFrame(40000, 53, 'live')], true);
    const input = new CaptureInput(baseOptions, async () => handle);
    const controller = new AbortController();

    await input.initialize();
    const running = input.run(channel, controller.signal);
    await channel.waitFor(() => channel.units.length === 1);
    controller.abort();

    await expect(running).resolves.toBeUndefined();
    expect(handle.closed).toBe(true);
  });

  it('should pass the filter options to the opener', async () => {
    const open = jest.fn(async () => new FakeLiveHandle([], true));
    const input = new CaptureInput(
      {
        ...baseOptions,
        interface: 'eth1',
        filter: { protocol: 'tcp', ports: [502] },
      },
      open,
    );

    await input.initialize();
    await input.close();

    expect(open).toHaveBeenCalledWith(
      expect.objectContaining({
        interface: 'eth1',
        filter: { protocol: 'tcp', ports: [502] },
      }),
    );
  });
});

describe('flowId', () => {
  it('should bracket IPv6 addresses', () => {
    expect(
      flowId({
        protocol: 'tcp',
        sourceAddress: '2001:db8::5',
        sourcePort: 5000,
        destinationAddress: '2001:db8::1',
        destinationPort: 502,
        payload: Buffer.alloc(0),
        closing: false,
      }),
    ).toBe('tcp:[2001:db8::5]:5000>[2001:db8::1]:502');
  });
});

describe('captureInputPlugin options', () => {
  it('should parse the protocol and port list', () => {
    const result = captureInputPlugin.instantiate({
      ...captureInputPlugin.defaults,
      file: 'sample.pcap',
      protocol: 'udp',
      port: '53, 5353',
    });

    expect(result.ok).toBe(true);
  });

  it('should reject an out of range port', () => {
    const result = captureInputPlugin.instantiate({
      ...captureInputPlugin.defaults,
      port: '53,70000',
    });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.issues[0].option).toBe('port.1');
    }
  });

  it.each(['0x35', '1e1', '53.0'])('should reject port %s', (port) => {
    const result = captureInputPlugin.instantiate({
      ...captureInputPlugin.defaults,
      port,
    });

    expect(result).toEqual({
      ok: false,
      issues: [{ option: 'port.0', message: 'must be an integer' }],
    });
  });

  it('should reject an unknown protocol', () => {
    const result = captureInputPlugin.instantiate({
      ...captureInputPlugin.defaults,
      protocol: 'icmp',
    });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.issues.map((issue) => issue.option)).toEqual(['protocol']);
    }
  });
});
