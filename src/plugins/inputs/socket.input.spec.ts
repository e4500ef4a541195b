import { createSocket } from 'node:dgram';
import { EventEmitter } from 'node:events';
import { Socket, connect } from 'node:net';
import { SocketInput, socketInputPlugin } from './socket.input';
import { RecordingChannel } from '../../../test/utils/recording-channel';

function connectTo(port: number): Promise<Socket> {
  return new Promise((resolve, reject) => {
    const client = connect(port, '127.0.0.1', () => resolve(client));
    client.once('error', reject);
  });
}

function boundPort(input: SocketInput): number {
  const address = input.address();
  if (!address) throw new Error('not bound');
  return address.port;
}

describe('SocketInput', () => {
  let channel: RecordingChannel;
  let controller: AbortController;

  beforeEach(() => {
    channel = new RecordingChannel();
    controller = new AbortController();
  });

  describe('tcp', () => {
    let input: SocketInput;

    beforeEach(async () => {
      input = new SocketInput({ protocol: 'tcp', host: '127.0.0.1', port: 0 });
      await input.initialize();
    });

    afterEach(async () => {
      controller.abort();
      await input.close();
    });

    it('should deliver chunks per connection and end the stream on disconnect', async () => {
      const running = input.run(channel, controller.signal);
      const client = await connectTo(boundPort(input));

      client.write('hello');
      await channel.waitFor(() => channel.units.length === 1);
      client.end();
      await channel.waitFor(() => channel.ended.length === 1);
      controller.abort();
      await running;

      const streamId = `tcp:127.0.0.1:${client.localPort ?? 0}`;
      expect(channel.texts()).toEqual(['hello']);
      expect(channel.units[0].origin?.streamId).toBe(streamId);
      expect(channel.ended).toEqual([streamId]);
    });

    it('should write responses back on the connection', async () => {
      const running = input.run(channel, controller.signal);
      const client = await connectTo(boundPort(input));
      const reply = new Promise<string>((resolve) =>
        client.once('data', (data: Buffer) => resolve(data.toString())),
      );

      client.write('ping');
      await channel.waitFor(() => channel.units.length === 1);
      await channel.units[0].origin?.respond?.(Buffer.from('pong'));

      await expect(reply).resolves.toBe('pong');
      client.destroy();
      controller.abort();
      await running;
    });

    it('should keep serving other connections when one is reset', async () => {
      const running = input.run(channel, controller.signal);
      const broken = await connectTo(boundPort(input));
      const healthy = await connectTo(boundPort(input));

      broken.resetAndDestroy();
      await channel.waitFor(() => channel.ended.length === 1);
      healthy.write('still here');
      await channel.waitFor(() => channel.units.length === 1);

      expect(channel.texts()).toEqual(['still here']);
      healthy.destroy();
      controller.abort();
      await running;
    });

    it('should hold a connection accepted before the run starts', async () => {
      const client = await connectTo(boundPort(input));
      client.write('early');
      await new Promise((resolve) => setTimeout(resolve, 50));
      expect(channel.units).toHaveLength(0);

      const running = input.run(channel, controller.signal);
      await channel.waitFor(() => channel.units.length === 1);

      expect(channel.texts()).toEqual(['early']);
      client.destroy();
      controller.abort();
      await running;
    });

    it('should drop connections still waiting when closed before running', async () => {
      const client = await connectTo(boundPort(input));
      const closed = new Promise<void>((resolve) =>
        client.once('close', () => resolve()),
      );

      await input.close();

      await expect(closed).resolves.toBeUndefined();
      expect(channel.units).toHaveLength(0);
    });

    it('should return promptly once aborted', async () => {
      const running = input.run(channel, controller.signal);
      await connectTo(boundPort(input));

      controller.abort();

      await expect(running).resolves.toBeUndefined();
    });
  });

  describe('udp', () => {
    it('should deliver each datagram as one unit', async () => {
      const input = new SocketInput({
        protocol: 'udp',
        host: '127.0.0.1',
        port: 0,
      });
      await input.initialize();
      const running = input.run(channel, controller.signal);
      const client = createSocket('udp4');

      await new Promise<void>((resolve) =>
        client.send('one', boundPort(input), '127.0.0.1', () => resolve()),
      );
      await channel.waitFor(() => channel.units.length === 1);
      await new Promise<void>((resolve) =>
        client.send('two', boundPort(input), '127.0.0.1', () => resolve()),
      );
      await channel.waitFor(() => channel.units.length === 2);

      expect(channel.texts()).toEqual(['one', 'two']);
      expect(channel.units[0].origin?.streamId).toMatch(
        /^udp:127\.0\.0\.1:\d+$/,
      );

      client.close();
      controller.abort();
      await running;
      await input.close();
    });
  });

  describe('udp before run', () => {
    let input: SocketInput;

    beforeEach(async () => {
      input = new SocketInput({ protocol: 'udp', host: '127.0.0.1', port: 0 });
      await input.initialize();
    });

    afterEach(async () => {
      controller.abort();
      await input.close();
    });

    it('should deliver datagrams received before the run starts', async () => {
      const client = createSocket('udp4');
      await new Promise<void>((resolve) =>
        client.send('queued', boundPort(input), '127.0.0.1', () => resolve()),
      );
      await new Promise((resolve) => setTimeout(resolve, 50));

      const running = input.run(channel, controller.signal);
      await channel.waitFor(() => channel.units.length === 1);

      expect(channel.texts()).toEqual(['queued']);
      client.close();
      controller.abort();
      await running;
    });

    it('should fail the run with a listener error raised before it started', async () => {
      const udp = (input as unknown as { udp: EventEmitter }).udp;
      udp.emit('error', new Error('socket exploded'));

      await expect(input.run(channel, controller.signal)).rejects.toThrow(
        'socket exploded',
      );
    });
  });

  it('should fail to initialize on a port already in use', async () => {
    const first = new SocketInput({ protocol: 'tcp', host: '127.0.0.1', port: 0 });
    await first.initialize();
    const second = new SocketInput({
      protocol: 'tcp',
      host: '127.0.0.1',
      port: boundPort(first),
    });

    await expect(second.initialize()).rejects.toThrow('EADDRINUSE');
    await second.close();
    await first.close();
  });

  it('should require a port', () => {
    const result = socketInputPlugin.instantiate(socketInputPlugin.defaults);

    expect(result).toEqual({
      ok: false,
      issues: [{ option: 'port', message: 'is required' }],
    });
  });
});
