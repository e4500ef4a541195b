import { Logger } from '@nestjs/common';
import { Socket as UdpSocket, RemoteInfo, createSocket } from 'node:dgram';
import { AddressInfo, Server, Socket, createServer, isIPv6 } from 'node:net';
import { z } from 'zod';
import { describeError } from '../../common/pipeline.errors';
import { DeliveryChannel } from '../../pipeline/pipeline.types';
import { InputSource } from '../interfaces/plugin.interface';
import { definePlugin, integerOption, requiredString } from '../plugin-options';

export type SocketProtocol = 'tcp' | 'udp';

export interface SocketInputOptions {
  protocol: SocketProtocol;
  host: string;
  /** 0 binds an ephemeral port */
  port: number;
}

/**
 * SocketInput - Network listener
 *
 * TCP: every connection is its own stream (`tcp:<addr>:<port>`); its chunks
 * are delivered strictly in order and the stream is ended when the peer
 * disconnects. A failing connection is logged and closed without touching
 * the others. Decoder responses are written back on the connection.
 *
 * UDP: every datagram is one unit on stream `udp:<addr>:<port>`; responses
 * are sent back to the peer.
 *
 * The listener is bound in initialize; connections and datagrams arriving
 * before the run starts wait for it. Listens until the run is aborted. A
 * listener error ends the run with an error.
 */
export class SocketInput implements InputSource {
  private readonly logger = new Logger(SocketInput.name);
  private server: Server | null = null;
  private udp: UdpSocket | null = null;
  private readonly connections = new Set<Socket>();
  private readonly tasks = new Set<Promise<void>>();
  // Datagrams share one queue so they reach the decoders in arrival order
  private datagrams: Promise<void> = Promise.resolve();
  private channel: DeliveryChannel | null = null;
  private readonly waiting: ((channel: DeliveryChannel | null) => void)[] = [];
  private failure: Error | null = null;
  private readonly failureListeners = new Set<(error: Error) => void>();
  private stopping = false;

  constructor(private readonly options: SocketInputOptions) {}

  /**
   * Bound address, available after initialize.
   */
  address(): AddressInfo | null {
    if (this.server) {
      const address = this.server.address();
      return typeof address === 'object' ? address : null;
    }
    return this.udp ? this.udp.address() : null;
  }

  /**
   * Bind the listener. Connections and datagrams arriving before `run` are
   * accepted and held until the run hands over its channel.
   */
  async initialize(): Promise<void> {
    const { protocol, host, port } = this.options;
    if (protocol === 'tcp') {
      const server = createServer();
      this.server = server;
      server.on('connection', (socket: Socket) =>
        this.track(this.serveConnection(socket)),
      );
      await new Promise<void>((resolve, reject) => {
        server.once('error', reject);
        server.listen(port, host, () => {
          server.off('error', reject);
          resolve();
        });
      });
      server.on('error', this.onListenerError);
    } else {
      const udp = createSocket(isIPv6(host) ? 'udp6' : 'udp4');
      this.udp = udp;
      udp.on('message', (message: Buffer, peer: RemoteInfo) => {
        this.datagrams = this.datagrams.then(() =>
          this.serveDatagram(message, peer),
        );
        this.track(this.datagrams);
      });
      await new Promise<void>((resolve, reject) => {
        udp.once('error', reject);
        udp.bind(port, host, () => {
          udp.off('error', reject);
          resolve();
        });
      });
      udp.on('error', this.onListenerError);
    }
    const bound = this.address();
    this.logger.log(
      `Listening on ${protocol}://${bound ? `${bound.address}:${bound.port}` : `${host}:${port}`}`,
    );
  }

  async run(channel: DeliveryChannel, signal: AbortSignal): Promise<void> {
    if (!this.server && !this.udp) {
      throw new Error('Socket input is not initialized');
    }

    this.stopping = false;
    this.handOver(channel);
    try {
      await this.untilAbortedOrFailed(signal);
    } finally {
      this.stopping = true;
      this.handOver(null);
      for (const socket of this.connections) {
        socket.destroy();
      }
      await Promise.all(this.tasks);
    }
  }

  async close(): Promise<void> {
    this.stopping = true;
    this.handOver(null);
    for (const socket of this.connections) {
      socket.destroy();
    }
    const server = this.server;
    const udp = this.udp;
    this.server = null;
    this.udp = null;
    if (server?.listening) {
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }
    if (udp) {
      await new Promise<void>((resolve) => udp.close(() => resolve()));
    }
  }

  private readonly onListenerError = (error: Error): void => {
    if (this.failureListeners.size === 0) {
      this.logger.error(`Listener failed: ${describeError(error)}`);
    }
    this.failure = this.failure ?? error;
    for (const notify of [...this.failureListeners]) {
      notify(error);
    }
  };

  /** Set (or with null, withdraw) the channel and wake pending deliveries. */
  private handOver(channel: DeliveryChannel | null): void {
    this.channel = channel;
    for (const resolve of this.waiting.splice(0)) {
      resolve(channel);
    }
  }

  /** The run's channel, or null once the input is stopping. */
  private channelReady(): Promise<DeliveryChannel | null> {
    if (this.stopping) return Promise.resolve(null);
    if (this.channel) return Promise.resolve(this.channel);
    return new Promise((resolve) => this.waiting.push(resolve));
  }

  /**
   * Resolves when the signal aborts, rejects on a listener error.
   */
  private untilAbortedOrFailed(signal: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (this.failure) {
        reject(this.failure);
        return;
      }
      if (signal.aborted) {
        resolve();
        return;
      }
      const onAbort = () => {
        this.failureListeners.delete(onError);
        resolve();
      };
      const onError = (error: Error) => {
        signal.removeEventListener('abort', onAbort);
        this.failureListeners.delete(onError);
        reject(error);
      };
      signal.addEventListener('abort', onAbort, { once: true });
      this.failureListeners.add(onError);
    });
  }

  private track(task: Promise<void>): void {
    this.tasks.add(task);
    void task.finally(() => this.tasks.delete(task));
  }

  /**
   * Deliver one connection's chunks in order. Never rejects.
   */
  private async serveConnection(socket: Socket): Promise<void> {
    const streamId = `tcp:${socket.remoteAddress ?? '?'}:${socket.remotePort ?? 0}`;
    this.connections.add(socket);
    this.logger.debug(`Connection opened: ${streamId}`);
    const channel = await this.channelReady();
    if (!channel) {
      this.connections.delete(socket);
      socket.destroy();
      return;
    }
    const respond = (data: Buffer) =>
      new Promise<void>((resolve, reject) => {
        socket.write(data, (error) => (error ? reject(error) : resolve()));
      });

    try {
      for await (const chunk of socket) {
        if (Buffer.isBuffer(chunk)) {
          await channel.deliver(chunk, { streamId, respond });
        }
      }
    } catch (error) {
      if (!this.stopping) {
        this.logger.warn(
          `Connection ${streamId} failed: ${describeError(error)}`,
        );
      }
    } finally {
      this.connections.delete(socket);
      socket.destroy();
      channel.endStream(streamId);
      this.logger.debug(`Connection closed: ${streamId}`);
    }
  }

  private async serveDatagram(
    message: Buffer,
    peer: RemoteInfo,
  ): Promise<void> {
    const channel = await this.channelReady();
    if (!channel) return;
    const streamId = `udp:${peer.address}:${peer.port}`;
    const udp = this.udp;
    const respond = (data: Buffer) =>
      new Promise<void>((resolve, reject) => {
        if (!udp) {
          reject(new Error('Socket closed'));
          return;
        }
        udp.send(data, peer.port, peer.address, (error) =>
          error ? reject(error) : resolve(),
        );
      });
    try {
      await channel.deliver(message, { streamId, respond });
    } catch (error) {
      this.logger.warn(`Datagram from ${streamId} failed: ${describeError(error)}`);
    }
  }
}

export const socketInputPlugin = definePlugin({
  role: 'input',
  name: 'socket',
  description: 'Listen for TCP connections or UDP datagrams',
  defaults: { protocol: 'tcp', host: '0.0.0.0' },
  options: z
    .object({
      protocol: z.enum(['tcp', 'udp']),
      host: requiredString(),
      port: integerOption(0, 65535),
    })
    .strict(),
  create: (options) => new SocketInput(options),
});
