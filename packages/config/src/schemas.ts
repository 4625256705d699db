import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

const withId = <T extends object>(schema: T, id: string): T & { $id: string } => ({ ...schema, $id: id });

export const TransportProtocolSchema = z.enum(['udp', 'tcp']);
export const FramingModeSchema = z.enum(['raw', 'wrapped']);

// Connection settings for a single terminal
export const DeviceConfigSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535),
  protocol: TransportProtocolSchema,
  framing: FramingModeSchema,
  password: z.number().int().min(0).max(0xffffffff),
  ticks: z.number().int().min(0).max(0xff),
  connectTimeoutMs: z.number().int().positive(),
  readTimeoutMs: z.number().int().positive(),
  strictReplyIds: z.boolean(),
});

export const jsonSchemas = {
  device: withId(zodToJsonSchema(DeviceConfigSchema, { target: 'jsonSchema7' }), 'ZkLinkDeviceConfig'),
};
