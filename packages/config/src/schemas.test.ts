import { describe, it, expect } from 'vitest';
import { DeviceConfigSchema, jsonSchemas } from './schemas.js';
import { DEFAULT_DEVICE_CONFIG } from './zklink-config.js';

describe('config schemas', () => {
  it('validates device defaults once a host is supplied', () => {
    const cfg = { ...DEFAULT_DEVICE_CONFIG, host: '192.168.1.201' };
    expect(DeviceConfigSchema.parse(cfg)).toEqual(cfg);
  });

  it('rejects a password wider than 32 bits', () => {
    const result = DeviceConfigSchema.safeParse({ ...DEFAULT_DEVICE_CONFIG, host: 'h', password: 0x1_0000_0000 });
    expect(result.success).toBe(false);
  });

  it('rejects a ticks value wider than one byte', () => {
    const result = DeviceConfigSchema.safeParse({ ...DEFAULT_DEVICE_CONFIG, host: 'h', ticks: 256 });
    expect(result.success).toBe(false);
  });

  it('rejects unknown transport protocols', () => {
    const result = DeviceConfigSchema.safeParse({ ...DEFAULT_DEVICE_CONFIG, host: 'h', protocol: 'serial' });
    expect(result.success).toBe(false);
  });

  it('exports a JSON schema with an id', () => {
    expect(jsonSchemas.device.$id).toBe('ZkLinkDeviceConfig');
    expect(jsonSchemas.device).toHaveProperty('properties');
  });
});
