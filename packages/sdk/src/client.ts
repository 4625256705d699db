/**
 * ZkClient - connection to one ZKTeco terminal
 * @zklink/sdk
 *
 * Runs the Connect/Auth handshake, then offers a half-duplex
 * request/response primitive: one packet out, one packet back, no pipelining.
 */

import {
  Command,
  Session,
  commandName,
  createPacket,
  decodePacket,
  describeCommand,
  describePacket,
  encodePacket,
  isError,
  isSuccess,
  makeCommKey,
  type Packet,
  type SessionState,
} from '@zklink/protocol';
import { resolveDeviceConfig, type DeviceConfig, type DeviceConfigInput } from '@zklink/config';
import { createTransport, type Transport } from '@zklink/transport';
import {
  AlreadyConnectedError,
  AuthenticationFailedError,
  AuthenticationRequiredError,
  DeviceError,
  InvalidReplyIdError,
  NotConnectedError,
  ReadTimeoutError,
  SessionNotInitializedError,
  TimeoutError,
  UnexpectedResponseError,
} from '@zklink/utils/errors';
import { clientLog } from '@zklink/utils/logger';

export type ClientState = 'DISCONNECTED' | 'CONNECTING' | 'HANDSHAKING' | 'AUTHENTICATING' | 'READY';

export interface ClientOptions {
  /** Use this transport instead of building one from the config */
  transport?: Transport;
  /** Share an existing session handle, e.g. with a status reader */
  session?: Session;
}

const EMPTY_PAYLOAD = new Uint8Array(0);

export class ZkClient {
  readonly config: DeviceConfig;
  readonly session: Session;
  private readonly transport: Transport;
  private _state: ClientState = 'DISCONNECTED';
  private inFlight: Promise<unknown> = Promise.resolve();

  /** Called on every client state transition */
  onStateChange?: (state: ClientState, previous: ClientState) => void;

  constructor(config: DeviceConfigInput, options: ClientOptions = {}) {
    this.config = resolveDeviceConfig(config);
    this.transport = options.transport ?? createTransport(this.config);
    this.session = options.session ?? new Session();
  }

  get state(): ClientState {
    return this._state;
  }

  get sessionId(): number {
    return this.session.sessionId;
  }

  get sessionState(): SessionState {
    return this.session.state;
  }

  remoteAddress(): string {
    return this.transport.remoteAddress();
  }

  isConnected(): boolean {
    return this.session.isConnected && this.transport.isConnected();
  }

  /**
   * Open the transport and complete the handshake. On failure the transport
   * is closed again and the session left DISCONNECTED.
   */
  async connect(): Promise<void> {
    if (this._state !== 'DISCONNECTED') {
      throw new AlreadyConnectedError();
    }

    clientLog.info('Connecting', { remote: this.transport.remoteAddress(), protocol: this.transport.protocol });
    this.setState('CONNECTING');

    try {
      await this.transport.connect();
    } catch (err) {
      this.setState('DISCONNECTED');
      throw err;
    }

    try {
      await this.handshake();
    } catch (err) {
      clientLog.warn('Handshake failed', { error: err instanceof Error ? err.message : String(err) });
      await this.transport.disconnect();
      this.session.close();
      this.setState('DISCONNECTED');
      throw err;
    }

    this.setState('READY');
    clientLog.info('Connected', { sessionId: this.session.sessionId });
  }

  /**
   * Send Exit best-effort, close the transport and reset the session.
   * Safe to call when not connected.
   */
  async disconnect(): Promise<void> {
    // Queued behind any in-flight exchange
    try {
      await this.serialize(async () => {
        if (!this.session.isConnected || !this.transport.isConnected()) return;
        const exit = createPacket(Command.Exit, this.session.sessionId, this.session.nextReplyId());
        await this.transport.send(encodePacket(exit));
      });
    } catch (err) {
      clientLog.warn('Failed to send exit', { error: err instanceof Error ? err.message : String(err) });
    }

    try {
      await this.transport.disconnect();
    } finally {
      this.session.close();
      this.setState('DISCONNECTED');
    }
    clientLog.info('Disconnected', { remote: this.transport.remoteAddress() });
  }

  /**
   * Send one command on the current session and return the device's reply.
   * Error acks are returned as packets; use {@link requestOk} to have them thrown.
   */
  request(command: Command, payload: Uint8Array = EMPTY_PAYLOAD): Promise<Packet> {
    return this.serialize(async () => {
      const packet = this.nextPacket(command, payload);
      const response = await this.exchange(packet, describeCommand(command));

      if (this.config.strictReplyIds && response.replyId !== packet.replyId) {
        throw new InvalidReplyIdError(packet.replyId, response.replyId);
      }
      if (response.command === Command.AckUnauth) {
        throw new AuthenticationRequiredError();
      }
      return response;
    });
  }

  /**
   * Like {@link request}, but an error ack from the device throws DeviceError.
   */
  async requestOk(command: Command, payload?: Uint8Array): Promise<Packet> {
    const response = await this.request(command, payload);
    if (isError(response.command)) {
      throw new DeviceError(response.command, commandName(response.command));
    }
    return response;
  }

  /**
   * Send a command without waiting for a reply, for commands after which the
   * device drops the link.
   */
  notify(command: Command, payload: Uint8Array = EMPTY_PAYLOAD): Promise<void> {
    return this.serialize(async () => {
      const packet = this.nextPacket(command, payload);
      clientLog.debug('Notify', { packet: describePacket(packet) });
      await this.transport.send(encodePacket(packet));
    });
  }

  /**
   * Forget the session locally without talking to the device.
   */
  closeSession(): void {
    this.session.close();
    this.setState('DISCONNECTED');
  }

  private async handshake(): Promise<void> {
    this.setState('HANDSHAKING');
    const response = await this.exchange(createPacket(Command.Connect, 0, 0), 'connect');

    if (isSuccess(response.command)) {
      this.session.initialize(response.sessionId);
      return;
    }
    if (response.command === Command.AckUnauth) {
      await this.authenticate(response.sessionId);
      return;
    }
    if (isError(response.command)) {
      throw new DeviceError(response.command, commandName(response.command));
    }
    throw new UnexpectedResponseError(response.command, commandName(response.command), 'connect');
  }

  private async authenticate(sessionId: number): Promise<void> {
    this.setState('AUTHENTICATING');
    clientLog.info('Device requires authentication', { sessionId });

    const key = makeCommKey(this.config.password, sessionId, this.config.ticks);
    const response = await this.exchange(createPacket(Command.Auth, sessionId, 0, key), 'auth');

    if (isSuccess(response.command)) {
      this.session.initialize(response.sessionId);
      return;
    }
    if (isError(response.command)) {
      throw new AuthenticationFailedError();
    }
    throw new UnexpectedResponseError(response.command, commandName(response.command), 'auth');
  }

  private nextPacket(command: Command, payload: Uint8Array): Packet {
    if (!this.session.isConnected) {
      throw new SessionNotInitializedError();
    }
    if (!this.transport.isConnected()) {
      throw new NotConnectedError();
    }
    return createPacket(command, this.session.sessionId, this.session.nextReplyId(), payload);
  }

  private async exchange(packet: Packet, operation: string): Promise<Packet> {
    clientLog.debug('Send', { packet: describePacket(packet) });
    await this.transport.send(encodePacket(packet));

    let data: Buffer;
    try {
      data = await this.transport.receive(this.config.readTimeoutMs);
    } catch (err) {
      if (err instanceof ReadTimeoutError) {
        throw new TimeoutError(operation, this.config.readTimeoutMs, { cause: err });
      }
      throw err;
    }

    const response = decodePacket(data);
    clientLog.debug('Recv', { packet: describePacket(response) });
    return response;
  }

  /** Run one exchange at a time on this connection. */
  private serialize<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.inFlight.then(fn, fn);
    this.inFlight = run.catch(() => undefined);
    return run;
  }

  private setState(state: ClientState): void {
    const previous = this._state;
    if (previous === state) return;
    this._state = state;
    this.onStateChange?.(state, previous);
  }
}
