/**
 * UDP transport over node:dgram. The socket is bound to an ephemeral local
 * port and connected to the device, so only its datagrams are delivered.
 * A zero-length datagram is treated as the peer closing.
 */

import dgram from 'node:dgram';
import { DEFAULT_TIMEOUT_MS, type FramingMode } from '@zklink/config';
import {
  AlreadyConnectedError,
  ConnectionClosedError,
  NotConnectedError,
  TransportIoError,
} from '@zklink/utils/errors';
import { transportLog } from '@zklink/utils/logger';
import { formatAddress, resolveAddress } from './address.js';
import { createFraming, type FrameCodec } from './framing.js';
import { ReceiveQueue } from './receive-queue.js';
import type { Transport, TransportOptions } from './types.js';

export class UdpTransport implements Transport {
  readonly protocol = 'udp' as const;
  readonly framing: FramingMode;

  private socket?: dgram.Socket;
  private readonly codec: FrameCodec;
  private readonly queue = new ReceiveQueue();
  private readonly readTimeoutMs: number;
  private remote: string;

  constructor(private readonly options: TransportOptions) {
    this.framing = options.framing ?? 'raw';
    this.codec = createFraming(this.framing);
    this.readTimeoutMs = options.readTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.remote = formatAddress(options.host, options.port);
  }

  async connect(): Promise<void> {
    if (this.socket) {
      throw new AlreadyConnectedError();
    }

    const resolved = await resolveAddress(this.options.host, this.options.port);
    this.remote = formatAddress(resolved.address, resolved.port);
    this.queue.reset();

    const socket = dgram.createSocket(resolved.family === 6 ? 'udp6' : 'udp4');

    try {
      await new Promise<void>((resolve, reject) => {
        socket.once('error', reject);
        socket.bind(0, () => {
          socket.connect(resolved.port, resolved.address, () => {
            socket.off('error', reject);
            resolve();
          });
        });
      });
    } catch (err) {
      socket.close();
      throw new TransportIoError(err);
    }

    socket.on('message', (msg: Buffer) => {
      if (msg.length === 0) {
        this.queue.fail(new ConnectionClosedError());
        return;
      }
      this.queue.push(msg);
    });
    socket.on('error', (err) => {
      transportLog.warn('UDP socket error', { remote: this.remote, error: err.message });
      this.queue.fail(new TransportIoError(err));
    });

    this.socket = socket;
    transportLog.debug('UDP connected', { remote: this.remote, local: socket.address().port });
  }

  async disconnect(): Promise<void> {
    const socket = this.socket;
    if (!socket) return;
    this.socket = undefined;

    await new Promise<void>((resolve) => socket.close(() => resolve()));
    this.queue.fail(new NotConnectedError());
    transportLog.debug('UDP disconnected', { remote: this.remote });
  }

  isConnected(): boolean {
    return this.socket !== undefined;
  }

  async send(data: Uint8Array): Promise<void> {
    const socket = this.socket;
    if (!socket) {
      throw new NotConnectedError();
    }

    const frame = this.codec.wrap(data);
    transportLog.debug('UDP send', { bytes: frame.length, data: frame });

    await new Promise<void>((resolve, reject) => {
      socket.send(frame, (err) => {
        if (err) {
          reject(new TransportIoError(err));
          return;
        }
        resolve();
      });
    });
  }

  async receive(timeoutMs: number = this.readTimeoutMs): Promise<Buffer> {
    if (!this.socket) {
      throw new NotConnectedError();
    }

    const datagram = await this.queue.next(timeoutMs);
    transportLog.debug('UDP recv', { bytes: datagram.length, data: datagram });
    return this.codec.unwrap(datagram).payload;
  }

  remoteAddress(): string {
    return this.remote;
  }
}
