/**
 * Connect to a terminal, print its firmware version and disconnect.
 *
 *   ZKLINK_HOST=192.168.1.201 npx tsx examples/read-version.ts
 */

import { ZkClient, ZkDevice, loadDeviceConfigFromEnv, isZkError } from '@zklink/sdk';

async function main(): Promise<void> {
  const client = new ZkClient(loadDeviceConfigFromEnv());
  client.onStateChange = (state, previous) => console.log(`[state] ${previous} -> ${state}`);

  await client.connect();
  try {
    const version = await new ZkDevice(client).getFirmwareVersion();
    console.log(`Firmware: ${version} (session ${client.sessionId})`);
  } finally {
    await client.disconnect();
  }
}

main().catch((err: unknown) => {
  if (isZkError(err) && err.isRecoverable()) {
    console.error(`Transient failure, try again: ${err.message}`);
  } else {
    console.error(err);
  }
  process.exitCode = 1;
});
