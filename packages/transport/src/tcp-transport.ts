/**
 * TCP transport over node:net.
 *
 * Each inbound `data` event is taken as one packet. Nagle is disabled so
 * small request packets go out immediately.
 */

import net from 'node:net';
import { DEFAULT_TIMEOUT_MS, type FramingMode } from '@zklink/config';
import {
  AlreadyConnectedError,
  ConnectionClosedError,
  ConnectionTimeoutError,
  NotConnectedError,
  TransportIoError,
} from '@zklink/utils/errors';
import { transportLog } from '@zklink/utils/logger';
import { formatAddress, resolveAddress } from './address.js';
import { createFraming, type FrameCodec } from './framing.js';
import { ReceiveQueue } from './receive-queue.js';
import type { Transport, TransportOptions } from './types.js';

export class TcpTransport implements Transport {
  readonly protocol = 'tcp' as const;
  readonly framing: FramingMode;

  private socket?: net.Socket;
  private readonly codec: FrameCodec;
  private readonly queue = new ReceiveQueue();
  private readonly connectTimeoutMs: number;
  private readonly readTimeoutMs: number;
  private remote: string;

  constructor(private readonly options: TransportOptions) {
    this.framing = options.framing ?? 'raw';
    this.codec = createFraming(this.framing);
    this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_TIMEOUT_MS;
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

    const socket = await new Promise<net.Socket>((resolve, reject) => {
      let settled = false;
      const sock = net.createConnection({
        host: resolved.address,
        port: resolved.port,
        family: resolved.family,
      });

      const timeout = setTimeout(() => {
        if (settled) return;
        settled = true;
        sock.destroy();
        reject(new ConnectionTimeoutError(this.connectTimeoutMs));
      }, this.connectTimeoutMs);

      sock.once('connect', () => {
        if (settled) return;
        settled = true;
        clearTimeout(timeout);
        resolve(sock);
      });

      sock.once('error', (err) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeout);
        sock.destroy();
        reject(new TransportIoError(err));
      });
    });

    socket.setNoDelay(true);
    this.attach(socket);
    this.socket = socket;
    transportLog.debug('TCP connected', { remote: this.remote, framing: this.framing });
  }

  async disconnect(): Promise<void> {
    const socket = this.socket;
    if (!socket) return;
    this.socket = undefined;

    await new Promise<void>((resolve) => {
      if (socket.destroyed) {
        resolve();
        return;
      }
      socket.once('close', () => resolve());
      socket.destroy();
    });
    this.queue.fail(new NotConnectedError());
    transportLog.debug('TCP disconnected', { remote: this.remote });
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
    transportLog.debug('TCP send', { bytes: frame.length, data: frame });

    await new Promise<void>((resolve, reject) => {
      socket.write(frame, (err) => {
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

    const chunk = await this.queue.next(timeoutMs);
    transportLog.debug('TCP recv', { bytes: chunk.length, data: chunk });
    return this.codec.unwrap(chunk).payload;
  }

  remoteAddress(): string {
    return this.remote;
  }

  private attach(socket: net.Socket): void {
    socket.on('data', (chunk: Buffer) => this.queue.push(chunk));
    socket.on('error', (err) => {
      transportLog.warn('TCP socket error', { remote: this.remote, error: err.message });
      this.queue.fail(new TransportIoError(err));
    });
    socket.on('end', () => this.queue.fail(new ConnectionClosedError()));
    socket.on('close', () => this.queue.fail(new ConnectionClosedError()));
  }
}
