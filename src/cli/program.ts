/**
 * zklink command tree. Built by a factory so tests can swap the client and
 * capture output.
 */

import { Command } from 'commander';
import type { DeviceConfig } from '@zklink/config';
import { ZkClient, ZkDevice } from '@zklink/sdk';
import { buildDeviceConfig, parseInteger, type ConnectionFlags } from './options.js';

export const VERSION = '0.1.0';

export interface ProgramDeps {
  createClient?: (config: DeviceConfig) => ZkClient;
  env?: NodeJS.ProcessEnv;
  print?: (line: string) => void;
}

function addConnectionOptions(command: Command): Command {
  return command
    .option('-H, --host <host>', 'Device address (or ZKLINK_HOST)')
    .option('-p, --port <port>', 'Device port (default 4370)', parseInteger)
    .option('--tcp', 'Use TCP instead of UDP')
    .option('--wrapped', 'Wrap TCP packets in the 8-byte envelope')
    .option('--password <commkey>', 'CommKey password (default 0)', parseInteger)
    .option('-t, --timeout <ms>', 'Connect and read timeout in milliseconds', parseInteger);
}

export function createProgram(deps: ProgramDeps = {}): Command {
  const createClient = deps.createClient ?? ((config: DeviceConfig) => new ZkClient(config));
  const print = deps.print ?? ((line: string) => console.log(line));
  const env = deps.env ?? process.env;

  async function withDevice(flags: ConnectionFlags, fn: (device: ZkDevice) => Promise<void>): Promise<void> {
    const client = createClient(buildDeviceConfig(flags, env));
    await client.connect();
    try {
      await fn(new ZkDevice(client));
    } finally {
      await client.disconnect();
    }
  }

  const program = new Command();

  program
    .name('zklink')
    .description('Talk to ZKTeco biometric terminals over UDP or TCP')
    .version(VERSION);

  addConnectionOptions(program.command('connect'))
    .description('Handshake with the device and print the session id')
    .action(async (flags: ConnectionFlags) => {
      await withDevice(flags, async (device) => {
        print(`Connected to ${device.client.remoteAddress()} (session ${device.client.sessionId})`);
      });
    });

  addConnectionOptions(program.command('version'))
    .description('Print the firmware version')
    .action(async (flags: ConnectionFlags) => {
      await withDevice(flags, async (device) => {
        print(await device.getFirmwareVersion());
      });
    });

  addConnectionOptions(program.command('enable'))
    .description('Return the device to normal operation')
    .action(async (flags: ConnectionFlags) => {
      await withDevice(flags, async (device) => {
        await device.enableDevice();
        print('Device enabled');
      });
    });

  addConnectionOptions(program.command('disable'))
    .description('Lock the device keypad and sensor')
    .action(async (flags: ConnectionFlags) => {
      await withDevice(flags, async (device) => {
        await device.disableDevice();
        print('Device disabled');
      });
    });

  addConnectionOptions(program.command('restart'))
    .description('Restart the device')
    .action(async (flags: ConnectionFlags) => {
      await withDevice(flags, async (device) => {
        await device.restart();
        print('Restart sent');
      });
    });

  return program;
}
