/**
 * @zklink/sdk
 *
 * Client for ZKTeco biometric terminals over UDP or TCP.
 *
 * ```typescript
 * import { ZkClient, ZkDevice } from '@zklink/sdk';
 *
 * const client = new ZkClient({ host: '192.168.1.201', password: 0 });
 * await client.connect();
 * console.log(await new ZkDevice(client).getFirmwareVersion());
 * await client.disconnect();
 * ```
 */

// Main client
export {
  ZkClient,
  type ClientState,
  type ClientOptions,
} from './client.js';

// Device commands
export { ZkDevice, decodeText } from './device.js';

// Errors
export * from './errors.js';

// Re-exports for callers that build packets or configs themselves
export {
  Command,
  Session,
  commandName,
  describeCommand,
  describePacket,
  type Packet,
  type SessionState,
} from '@zklink/protocol';
export {
  resolveDeviceConfig,
  loadDeviceConfigFromEnv,
  type DeviceConfig,
  type DeviceConfigInput,
} from '@zklink/config';
export { createTransport, type Transport } from '@zklink/transport';
