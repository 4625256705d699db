import net from 'node:net';
import { lookup } from 'node:dns/promises';
import { InvalidAddressError } from '@zklink/utils/errors';

export interface ResolvedAddress {
  address: string;
  family: 4 | 6;
  port: number;
}

export function formatAddress(host: string, port: number): string {
  return net.isIPv6(host) ? `[${host}]:${port}` : `${host}:${port}`;
}

/**
 * Validate host/port and resolve the host to a single IP address.
 * @throws InvalidAddressError
 */
export async function resolveAddress(host: string, port: number): Promise<ResolvedAddress> {
  const display = formatAddress(host, port);

  if (host.trim() === '') {
    throw new InvalidAddressError(display, 'empty host');
  }
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidAddressError(display, 'port out of range');
  }

  const literal = net.isIP(host);
  if (literal === 4 || literal === 6) {
    return { address: host, family: literal, port };
  }

  try {
    const result = await lookup(host);
    return { address: result.address, family: result.family === 6 ? 6 : 4, port };
  } catch (err) {
    throw new InvalidAddressError(display, err instanceof Error ? err.message : String(err));
  }
}
