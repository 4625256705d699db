import { describe, it, expect, beforeEach } from 'vitest';
import { Command, createPacket, decodePacket, encodePacket, makeCommKey, type Packet } from '@zklink/protocol';
import type { Transport } from '@zklink/transport';
import {
  AlreadyConnectedError,
  AuthenticationFailedError,
  AuthenticationRequiredError,
  DeviceError,
  InvalidReplyIdError,
  ReadTimeoutError,
  SessionNotInitializedError,
  TimeoutError,
  TransportIoError,
  UnexpectedResponseError,
} from './errors.js';
import { ZkClient, type ClientState } from './client.js';

type Reply = (request: Packet) => Buffer | Error | Promise<Buffer>;

/**
 * In-memory transport answering each sent packet from a script.
 */
class ScriptedTransport implements Transport {
  readonly protocol = 'udp' as const;
  readonly framing = 'raw' as const;
  readonly sent: Packet[] = [];
  failSend = false;
  private connected = false;
  private replies: Reply[] = [];
  private lastRequest?: Packet;

  script(...replies: Reply[]): void {
    this.replies.push(...replies);
  }

  async connect(): Promise<void> {
    this.connected = true;
  }

  async disconnect(): Promise<void> {
    this.connected = false;
  }

  isConnected(): boolean {
    return this.connected;
  }

  async send(data: Uint8Array): Promise<void> {
    if (this.failSend) {
      throw new TransportIoError(new Error('socket gone'));
    }
    const packet = decodePacket(data);
    this.sent.push(packet);
    this.lastRequest = packet;
  }

  async receive(): Promise<Buffer> {
    const reply = this.replies.shift();
    const request = this.lastRequest;
    if (!reply || !request) {
      throw new ReadTimeoutError(5000);
    }
    const out = await reply(request);
    if (out instanceof Error) throw out;
    return out;
  }

  remoteAddress(): string {
    return '192.0.2.10:4370';
  }
}

/** Reply with `command`, echoing the request's reply id unless one is given. */
function ack(command: Command, sessionId: number, payload?: Uint8Array, replyId?: number): Reply {
  return (request) => encodePacket(createPacket(command, sessionId, replyId ?? request.replyId, payload));
}

describe('ZkClient', () => {
  let transport: ScriptedTransport;

  beforeEach(() => {
    transport = new ScriptedTransport();
  });

  function newClient(options: { password?: number; strictReplyIds?: boolean } = {}): ZkClient {
    return new ZkClient({ host: '192.0.2.10', ...options }, { transport });
  }

  async function connected(options: { strictReplyIds?: boolean } = {}): Promise<ZkClient> {
    const client = newClient(options);
    transport.script(ack(Command.AckOk, 0x1234));
    await client.connect();
    return client;
  }

  describe('handshake', () => {
    it('adopts the session id when the device accepts Connect', async () => {
      const client = newClient();
      const states: ClientState[] = [];
      client.onStateChange = (state) => states.push(state);
      transport.script(ack(Command.AckOk, 0x1234));

      await client.connect();

      expect(transport.sent).toHaveLength(1);
      expect(transport.sent[0]).toMatchObject({ command: Command.Connect, sessionId: 0, replyId: 0 });
      expect(transport.sent[0].payload.length).toBe(0);
      expect(client.isConnected()).toBe(true);
      expect(client.sessionId).toBe(0x1234);
      expect(client.sessionState).toBe('CONNECTED');
      expect(states).toEqual(['CONNECTING', 'HANDSHAKING', 'READY']);
    });

    it('authenticates with the CommKey when the device answers unauthorized', async () => {
      const client = newClient({ password: 123 });
      transport.script(ack(Command.AckUnauth, 42), ack(Command.AckOk, 42));

      await client.connect();

      expect(transport.sent).toHaveLength(2);
      const auth = transport.sent[1];
      expect(auth).toMatchObject({ command: Command.Auth, sessionId: 42, replyId: 0 });
      expect(auth.payload.equals(makeCommKey(123, 42, 50))).toBe(true);
      expect(client.sessionId).toBe(42);
      expect(client.sessionState).toBe('CONNECTED');
    });

    it('fails with AuthenticationFailedError and closes the transport on a rejected key', async () => {
      const client = newClient({ password: 1 });
      transport.script(ack(Command.AckUnauth, 42), ack(Command.AckError, 42));

      await expect(client.connect()).rejects.toBeInstanceOf(AuthenticationFailedError);
      expect(transport.isConnected()).toBe(false);
      expect(client.sessionState).toBe('DISCONNECTED');
      expect(client.state).toBe('DISCONNECTED');
    });

    it('accepts CMD_ACK_DATA as a successful reply to Connect', async () => {
      const client = newClient();
      transport.script(ack(Command.AckData, 0x0abc));

      await client.connect();

      expect(client.state).toBe('READY');
      expect(client.sessionId).toBe(0x0abc);
      expect(client.isConnected()).toBe(true);
    });

    it('accepts CMD_ACK_DATA as a successful reply to Auth', async () => {
      const client = newClient({ password: 123 });
      transport.script(ack(Command.AckUnauth, 42), ack(Command.AckData, 42));

      await client.connect();

      expect(client.sessionId).toBe(42);
      expect(client.sessionState).toBe('CONNECTED');
    });

    it('reports any other reply to Auth as unexpected', async () => {
      const client = newClient();
      transport.script(ack(Command.AckUnauth, 42), ack(Command.AckRetry, 42));

      await expect(client.connect()).rejects.toThrow('Unexpected auth response: CMD_ACK_RETRY(2003)');
    });

    it('refuses a second connect and keeps the live connection intact', async () => {
      const client = await connected();

      await expect(client.connect()).rejects.toBeInstanceOf(AlreadyConnectedError);

      expect(client.state).toBe('READY');
      expect(client.sessionState).toBe('CONNECTED');
      expect(client.isConnected()).toBe(true);
      expect(transport.sent).toHaveLength(1);
    });

    it('maps an error ack to Connect to DeviceError', async () => {
      const client = newClient();
      transport.script(ack(Command.AckError, 0));

      await expect(client.connect()).rejects.toThrow('Device returned error: CMD_ACK_ERROR(2001)');
      expect(client.isConnected()).toBe(false);
    });

    it('reports any other reply to Connect as unexpected', async () => {
      const client = newClient();
      transport.script(ack(Command.AckRetry, 0));

      const err = await client.connect().catch((e: unknown) => e);
      expect(err).toBeInstanceOf(UnexpectedResponseError);
      expect(err).toMatchObject({ stage: 'connect', commandCode: Command.AckRetry });
    });

    it('turns a silent device into TimeoutError', async () => {
      const client = newClient();

      const err = await client.connect().catch((e: unknown) => e);
      expect(err).toBeInstanceOf(TimeoutError);
      expect(err).toMatchObject({ operation: 'connect', timeoutMs: 5000 });
    });
  });

  describe('request', () => {
    it('refuses to send before the handshake', async () => {
      const client = newClient();
      await expect(client.request(Command.GetVersion)).rejects.toBeInstanceOf(SessionNotInitializedError);
      expect(transport.sent).toHaveLength(0);
    });

    it('stamps the session id and consumes reply ids in order', async () => {
      const client = await connected();
      transport.script(ack(Command.AckOk, 0x1234), ack(Command.AckOk, 0x1234), ack(Command.AckOk, 0x1234));

      await client.request(Command.GetVersion);
      await client.request(Command.EnableDevice);
      await client.request(Command.DisableDevice);

      expect(transport.sent.slice(1).map((p) => [p.command, p.sessionId, p.replyId])).toEqual([
        [Command.GetVersion, 0x1234, 65534],
        [Command.EnableDevice, 0x1234, 65535],
        [Command.DisableDevice, 0x1234, 0],
      ]);
    });

    it('runs concurrent requests one at a time', async () => {
      const client = await connected();
      transport.script(ack(Command.AckOk, 0x1234, Buffer.from('a')), ack(Command.AckOk, 0x1234, Buffer.from('b')));

      const [first, second] = await Promise.all([
        client.request(Command.GetVersion),
        client.request(Command.GetVersion),
      ]);

      expect(first.payload.toString()).toBe('a');
      expect(second.payload.toString()).toBe('b');
      expect(first.replyId).toBe(65534);
      expect(second.replyId).toBe(65535);
    });

    it('ignores a mismatched reply id by default', async () => {
      const client = await connected();
      transport.script(ack(Command.AckOk, 0x1234, undefined, 5));

      const response = await client.request(Command.GetVersion);
      expect(response.replyId).toBe(5);
    });

    it('rejects a mismatched reply id when strictReplyIds is set', async () => {
      const client = await connected({ strictReplyIds: true });
      transport.script(ack(Command.AckOk, 0x1234, undefined, 5));

      const err = await client.request(Command.GetVersion).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(InvalidReplyIdError);
      expect(err).toMatchObject({ expected: 65534, actual: 5 });
    });

    it('wraps a read timeout and leaves the connection up', async () => {
      const client = await connected();

      const err = await client.request(Command.GetVersion).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(TimeoutError);
      expect(err).toHaveProperty('message', 'Timeout after 5000ms: CMD_GET_VERSION(1100)');
      expect(err instanceof TimeoutError && err.cause instanceof ReadTimeoutError).toBe(true);
      expect(client.isConnected()).toBe(true);
    });

    it('raises AuthenticationRequiredError on an unauthorized reply', async () => {
      const client = await connected();
      transport.script(ack(Command.AckUnauth, 0x1234));

      await expect(client.request(Command.GetVersion)).rejects.toBeInstanceOf(AuthenticationRequiredError);
    });

    it('returns error acks from request and throws them from requestOk', async () => {
      const client = await connected();
      transport.script(ack(Command.AckError, 0x1234), ack(Command.AckError, 0x1234));

      const response = await client.request(Command.EnableDevice);
      expect(response.command).toBe(Command.AckError);
      await expect(client.requestOk(Command.EnableDevice)).rejects.toBeInstanceOf(DeviceError);
    });
  });

  describe('disconnect', () => {
    it('sends Exit on the session and resets everything', async () => {
      const client = await connected();

      await client.disconnect();

      const exit = transport.sent[1];
      expect(exit).toMatchObject({ command: Command.Exit, sessionId: 0x1234, replyId: 65534 });
      expect(transport.isConnected()).toBe(false);
      expect(client.sessionState).toBe('DISCONNECTED');
      expect(client.sessionId).toBe(0);
      expect(client.state).toBe('DISCONNECTED');
    });

    it('waits for an in-flight request before sending Exit', async () => {
      const client = await connected();
      let release: () => void = () => undefined;
      const held = new Promise<void>((resolve) => {
        release = resolve;
      });
      transport.script(async (request) => {
        await held;
        return encodePacket(createPacket(Command.AckOk, 0x1234, request.replyId, Buffer.from('v1')));
      });

      const pending = client.request(Command.GetVersion);
      const closing = client.disconnect();
      await new Promise((resolve) => setImmediate(resolve));
      expect(transport.sent.map((p) => p.command)).toEqual([Command.Connect, Command.GetVersion]);

      release();
      const response = await pending;
      await closing;

      expect(response.payload.toString()).toBe('v1');
      expect(transport.sent.map((p) => [p.command, p.replyId])).toEqual([
        [Command.Connect, 0],
        [Command.GetVersion, 65534],
        [Command.Exit, 65535],
      ]);
      expect(client.state).toBe('DISCONNECTED');
    });

    it('still disconnects when Exit cannot be sent', async () => {
      const client = await connected();
      transport.failSend = true;

      await expect(client.disconnect()).resolves.toBeUndefined();
      expect(client.isConnected()).toBe(false);
      expect(transport.isConnected()).toBe(false);
    });

    it('is a no-op when never connected', async () => {
      const client = newClient();
      await client.disconnect();
      expect(transport.sent).toHaveLength(0);
    });
  });
});
