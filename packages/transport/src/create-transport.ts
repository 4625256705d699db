import type { DeviceConfig } from '@zklink/config';
import { TcpTransport } from './tcp-transport.js';
import { UdpTransport } from './udp-transport.js';
import type { Transport } from './types.js';

/**
 * Build the transport a resolved device config asks for. The returned
 * transport is not yet connected.
 */
export function createTransport(config: DeviceConfig): Transport {
  const options = {
    host: config.host,
    port: config.port,
    framing: config.framing,
    connectTimeoutMs: config.connectTimeoutMs,
    readTimeoutMs: config.readTimeoutMs,
  };

  return config.protocol === 'tcp' ? new TcpTransport(options) : new UdpTransport(options);
}
