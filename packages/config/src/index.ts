export {
  DEFAULT_DEVICE_PORT,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_COMM_KEY,
  DEFAULT_TICKS,
  DEFAULT_DEVICE_CONFIG,
  resolveDeviceConfig,
  loadDeviceConfigFromEnv,
  type DeviceConfig,
  type DeviceConfigInput,
  type TransportProtocol,
  type FramingMode,
} from './zklink-config.js';

export {
  DeviceConfigSchema,
  TransportProtocolSchema,
  FramingModeSchema,
  jsonSchemas,
} from './schemas.js';
