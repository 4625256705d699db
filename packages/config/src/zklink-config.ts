import type { z } from 'zod';
import { ConfigError } from '@zklink/utils/errors';
import { DeviceConfigSchema, type FramingModeSchema, type TransportProtocolSchema } from './schemas.js';

export type TransportProtocol = z.infer<typeof TransportProtocolSchema>;
export type FramingMode = z.infer<typeof FramingModeSchema>;
export type DeviceConfig = z.infer<typeof DeviceConfigSchema>;

/** Standard ZKTeco device port (UDP and TCP) */
export const DEFAULT_DEVICE_PORT = 4370;

/** Connect and per-response read timeout */
export const DEFAULT_TIMEOUT_MS = 5000;

/** Factory CommKey */
export const DEFAULT_COMM_KEY = 0;

/** Ticks byte mixed into the auth key */
export const DEFAULT_TICKS = 50;

export const DEFAULT_DEVICE_CONFIG = {
  port: DEFAULT_DEVICE_PORT,
  protocol: 'udp',
  framing: 'raw',
  password: DEFAULT_COMM_KEY,
  ticks: DEFAULT_TICKS,
  connectTimeoutMs: DEFAULT_TIMEOUT_MS,
  readTimeoutMs: DEFAULT_TIMEOUT_MS,
  strictReplyIds: false,
} as const satisfies Omit<DeviceConfig, 'host'>;

export type DeviceConfigInput = Partial<DeviceConfig> & { host?: string };

/**
 * Merge user settings over defaults and validate the result.
 * @throws ConfigError listing each offending path
 */
export function resolveDeviceConfig(input: DeviceConfigInput): DeviceConfig {
  const merged: Record<string, unknown> = { ...DEFAULT_DEVICE_CONFIG };
  for (const [key, value] of Object.entries(input)) {
    if (value !== undefined) merged[key] = value;
  }

  const result = DeviceConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return result.data;
}

function parseNumber(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError([`${name}: expected a number, got "${raw}"`]);
  }
  return value;
}

function parseBoolean(raw: string | undefined): boolean | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  return ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase());
}

/**
 * Read device settings from ZKLINK_* environment variables.
 * Only variables that are set appear in the result.
 */
export function loadDeviceConfigFromEnv(env: NodeJS.ProcessEnv = process.env): DeviceConfigInput {
  const config: DeviceConfigInput = {};

  if (env.ZKLINK_HOST) config.host = env.ZKLINK_HOST;

  const port = parseNumber('ZKLINK_PORT', env.ZKLINK_PORT);
  if (port !== undefined) config.port = port;

  const protocol = env.ZKLINK_PROTOCOL?.toLowerCase();
  if (protocol === 'udp' || protocol === 'tcp') {
    config.protocol = protocol;
  } else if (protocol) {
    throw new ConfigError([`ZKLINK_PROTOCOL: expected "udp" or "tcp", got "${env.ZKLINK_PROTOCOL}"`]);
  }

  const framing = env.ZKLINK_FRAMING?.toLowerCase();
  if (framing === 'raw' || framing === 'wrapped') {
    config.framing = framing;
  } else if (framing) {
    throw new ConfigError([`ZKLINK_FRAMING: expected "raw" or "wrapped", got "${env.ZKLINK_FRAMING}"`]);
  }

  const password = parseNumber('ZKLINK_PASSWORD', env.ZKLINK_PASSWORD);
  if (password !== undefined) config.password = password;

  const timeoutMs = parseNumber('ZKLINK_TIMEOUT_MS', env.ZKLINK_TIMEOUT_MS);
  if (timeoutMs !== undefined) {
    config.connectTimeoutMs = timeoutMs;
    config.readTimeoutMs = timeoutMs;
  }

  const strict = parseBoolean(env.ZKLINK_STRICT_REPLY_IDS);
  if (strict !== undefined) config.strictReplyIds = strict;

  return config;
}
