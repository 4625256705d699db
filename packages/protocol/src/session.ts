/**
 * Per-connection session state: device-assigned session id, reply-id
 * counter and coarse connection state.
 *
 * A Session is a handle. Pass the same instance to the client and to any
 * status readers; they all observe one underlying state. Every mutator runs
 * to completion synchronously, so no transition can interleave with another,
 * and none of them is held across an await.
 */

import { InvalidSessionStateError } from '@zklink/utils/errors';
import { INITIAL_REPLY_ID } from './constants.js';

export type SessionState = 'DISCONNECTED' | 'CONNECTED' | 'AUTHENTICATED';

const MAX_REPLY_ID = 0xffff;

export class Session {
  private _sessionId = 0;
  private replyCounter = INITIAL_REPLY_ID;
  private _state: SessionState = 'DISCONNECTED';

  onStateChange?: (state: SessionState, previous: SessionState) => void;

  get sessionId(): number {
    return this._sessionId;
  }

  get state(): SessionState {
    return this._state;
  }

  get isConnected(): boolean {
    return this._state !== 'DISCONNECTED';
  }

  get isAuthenticated(): boolean {
    return this._state === 'AUTHENTICATED';
  }

  /**
   * Adopt the device-assigned session id. Only valid from DISCONNECTED.
   * Id 0 means "no session" and is rejected.
   */
  initialize(sessionId: number): void {
    if (this._state !== 'DISCONNECTED') {
      throw new InvalidSessionStateError(`Cannot initialize from state: ${this._state}`);
    }
    const id = sessionId & 0xffff;
    if (id === 0) {
      throw new InvalidSessionStateError('Cannot initialize with session id 0');
    }

    this._sessionId = id;
    this.replyCounter = INITIAL_REPLY_ID;
    this.setState('CONNECTED');
  }

  /**
   * Mark the session authenticated. Only valid from CONNECTED.
   */
  authenticate(): void {
    if (this._state !== 'CONNECTED') {
      throw new InvalidSessionStateError(`Cannot authenticate from state: ${this._state}`);
    }

    this.setState('AUTHENTICATED');
  }

  /**
   * Reset to DISCONNECTED from any state. Idempotent.
   */
  close(): void {
    this._sessionId = 0;
    this.replyCounter = INITIAL_REPLY_ID;
    this.setState('DISCONNECTED');
  }

  /**
   * Return the current reply id and advance the counter.
   * 65535 is emitted as-is; the call after it yields 0.
   */
  nextReplyId(): number {
    const current = this.replyCounter;
    this.replyCounter = current >= MAX_REPLY_ID ? 0 : current + 1;
    return current;
  }

  private setState(state: SessionState): void {
    const previous = this._state;
    if (previous === state) return;
    this._state = state;
    this.onStateChange?.(state, previous);
  }
}
