import { Command } from '@zklink/protocol';
import { clientLog } from '@zklink/utils/logger';
import type { ZkClient } from './client.js';

/**
 * Device control commands over a connected {@link ZkClient}.
 */
export class ZkDevice {
  constructor(readonly client: ZkClient) {}

  /** Firmware version string as reported by CMD_GET_VERSION. */
  async getFirmwareVersion(): Promise<string> {
    const response = await this.client.requestOk(Command.GetVersion);
    return decodeText(response.payload);
  }

  /** Return the terminal to normal operation. */
  async enableDevice(): Promise<void> {
    await this.client.requestOk(Command.EnableDevice);
    clientLog.debug('Device enabled');
  }

  /** Lock the terminal's keypad and sensor ("Working..." on the LCD). */
  async disableDevice(): Promise<void> {
    await this.client.requestOk(Command.DisableDevice);
    clientLog.debug('Device disabled');
  }

  // The device drops the link after these two without replying, so the
  // session is closed locally.

  async restart(): Promise<void> {
    clientLog.warn('Restarting device', { remote: this.client.remoteAddress() });
    await this.client.notify(Command.Restart);
    this.client.closeSession();
  }

  async powerOff(): Promise<void> {
    clientLog.warn('Powering off device', { remote: this.client.remoteAddress() });
    await this.client.notify(Command.PowerOff);
    this.client.closeSession();
  }
}

/** Device strings are NUL-padded. */
export function decodeText(payload: Uint8Array): string {
  return Buffer.from(payload).toString('utf8').replace(/\0+$/, '');
}
