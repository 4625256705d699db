import { describe, it, expect, vi } from 'vitest';
import { Command, createPacket, type Packet } from '@zklink/protocol';
import { ZkDevice, decodeText } from './device.js';
import { ZkClient } from './client.js';
import { DeviceError } from './errors.js';

function reply(command: Command, payload?: Uint8Array): Packet {
  return createPacket(command, 7, 65534, payload);
}

describe('ZkDevice', () => {
  it('reads the firmware version without trailing NULs', async () => {
    const client = new ZkClient({ host: '192.0.2.10' });
    const requestOk = vi
      .spyOn(client, 'requestOk')
      .mockResolvedValue(reply(Command.AckOk, Buffer.from('Ver 6.60 Apr 28 2017\0\0\0')));

    await expect(new ZkDevice(client).getFirmwareVersion()).resolves.toBe('Ver 6.60 Apr 28 2017');
    expect(requestOk).toHaveBeenCalledWith(Command.GetVersion);
  });

  it('sends enable and disable as checked requests', async () => {
    const client = new ZkClient({ host: '192.0.2.10' });
    const requestOk = vi.spyOn(client, 'requestOk').mockResolvedValue(reply(Command.AckOk));
    const device = new ZkDevice(client);

    await device.enableDevice();
    await device.disableDevice();

    expect(requestOk.mock.calls).toEqual([[Command.EnableDevice], [Command.DisableDevice]]);
  });

  it('propagates a device error ack', async () => {
    const client = new ZkClient({ host: '192.0.2.10' });
    vi.spyOn(client, 'requestOk').mockRejectedValue(new DeviceError(Command.AckError, 'CMD_ACK_ERROR'));

    await expect(new ZkDevice(client).disableDevice()).rejects.toBeInstanceOf(DeviceError);
  });

  it.each([
    ['restart', Command.Restart],
    ['powerOff', Command.PowerOff],
  ] as const)('%s notifies the device and closes the session locally', async (method, command) => {
    const client = new ZkClient({ host: '192.0.2.10' });
    client.session.initialize(7);
    const notify = vi.spyOn(client, 'notify').mockResolvedValue(undefined);

    await new ZkDevice(client)[method]();

    expect(notify).toHaveBeenCalledWith(command);
    expect(client.sessionState).toBe('DISCONNECTED');
  });
});

describe('decodeText', () => {
  it('keeps interior bytes and strips only trailing NULs', () => {
    expect(decodeText(Buffer.from('A\0B\0\0'))).toBe('A\0B');
    expect(decodeText(new Uint8Array(0))).toBe('');
  });
});
