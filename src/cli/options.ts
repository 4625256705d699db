import { InvalidArgumentError } from 'commander';
import {
  loadDeviceConfigFromEnv,
  resolveDeviceConfig,
  type DeviceConfig,
  type DeviceConfigInput,
} from '@zklink/config';

/** Connection flags shared by every subcommand */
export interface ConnectionFlags {
  host?: string;
  port?: number;
  tcp?: boolean;
  wrapped?: boolean;
  password?: number;
  timeout?: number;
}

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

/**
 * Flags win over ZKLINK_* environment variables, which win over defaults.
 * @throws ConfigError when the result is invalid (e.g. no host anywhere)
 */
export function buildDeviceConfig(flags: ConnectionFlags, env: NodeJS.ProcessEnv = process.env): DeviceConfig {
  const input: DeviceConfigInput = loadDeviceConfigFromEnv(env);

  if (flags.host !== undefined) input.host = flags.host;
  if (flags.port !== undefined) input.port = flags.port;
  if (flags.tcp) input.protocol = 'tcp';
  if (flags.wrapped) input.framing = 'wrapped';
  if (flags.password !== undefined) input.password = flags.password;
  if (flags.timeout !== undefined) {
    input.connectTimeoutMs = flags.timeout;
    input.readTimeoutMs = flags.timeout;
  }

  return resolveDeviceConfig(input);
}
