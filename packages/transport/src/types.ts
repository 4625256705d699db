import type { FramingMode, TransportProtocol } from '@zklink/config';

/**
 * Byte channel to one device. Exactly one owner sends on it at a time.
 */
export interface Transport {
  readonly protocol: TransportProtocol;
  readonly framing: FramingMode;

  /** @throws AlreadyConnectedError, InvalidAddressError, ConnectionTimeoutError, TransportIoError */
  connect(): Promise<void>;

  /** Release the socket. Safe to call when not connected. */
  disconnect(): Promise<void>;

  isConnected(): boolean;

  /** @throws NotConnectedError, TransportIoError */
  send(data: Uint8Array): Promise<void>;

  /**
   * Wait for the next inbound packet, envelope stripped.
   * @param timeoutMs - defaults to the transport's read timeout
   * @throws NotConnectedError, ReadTimeoutError, ConnectionClosedError, TransportIoError
   */
  receive(timeoutMs?: number): Promise<Buffer>;

  /** host:port, resolved once connected */
  remoteAddress(): string;
}

export interface TransportOptions {
  host: string;
  port: number;
  framing?: FramingMode;
  connectTimeoutMs?: number;
  readTimeoutMs?: number;
}
