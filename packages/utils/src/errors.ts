/**
 * Error Types for zklink
 *
 * Single source of truth for typed error classes. Protocol, transport and
 * client layers all throw subclasses of ZkError so callers can branch on
 * `code` or on the classification helpers without string matching.
 */

export type ZkErrorCode =
  | 'PACKET_TOO_SHORT'
  | 'CHECKSUM_MISMATCH'
  | 'UNKNOWN_COMMAND'
  | 'INVALID_SESSION_STATE'
  | 'SESSION_NOT_INITIALIZED'
  | 'AUTHENTICATION_REQUIRED'
  | 'AUTHENTICATION_FAILED'
  | 'DEVICE_ERROR'
  | 'UNEXPECTED_RESPONSE'
  | 'TIMEOUT'
  | 'PAYLOAD_TOO_LARGE'
  | 'INVALID_REPLY_ID'
  | 'NOT_CONNECTED'
  | 'ALREADY_CONNECTED'
  | 'CONNECTION_TIMEOUT'
  | 'READ_TIMEOUT'
  | 'CONNECTION_CLOSED'
  | 'INVALID_ADDRESS'
  | 'IO'
  | 'CONFIG_INVALID';

const RECOVERABLE_CODES: ReadonlySet<ZkErrorCode> = new Set<ZkErrorCode>([
  'TIMEOUT',
  'READ_TIMEOUT',
  'IO',
  'DEVICE_ERROR',
]);

const RECONNECT_CODES: ReadonlySet<ZkErrorCode> = new Set<ZkErrorCode>([
  'SESSION_NOT_INITIALIZED',
  'INVALID_SESSION_STATE',
  'IO',
]);

function hex16(value: number): string {
  return `0x${value.toString(16).toUpperCase().padStart(4, '0')}`;
}

export class ZkError extends Error {
  readonly code: ZkErrorCode;

  constructor(code: ZkErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ZkError';
    this.code = code;
  }

  /** A retry of the same operation might succeed. */
  isRecoverable(): boolean {
    return RECOVERABLE_CODES.has(this.code);
  }

  /** The connection must be torn down and re-established before continuing. */
  requiresReconnect(): boolean {
    return RECONNECT_CODES.has(this.code);
  }
}

export function isZkError(value: unknown): value is ZkError {
  return value instanceof ZkError;
}

// =============================================================================
// Protocol errors
// =============================================================================

export class PacketTooShortError extends ZkError {
  constructor(readonly expected: number, readonly actual: number) {
    super('PACKET_TOO_SHORT', `Packet too short: expected at least ${expected} bytes, got ${actual} bytes`);
    this.name = 'PacketTooShortError';
  }
}

export class ChecksumMismatchError extends ZkError {
  constructor(readonly expected: number, readonly received: number) {
    super('CHECKSUM_MISMATCH', `Checksum mismatch: expected ${hex16(expected)}, received ${hex16(received)}`);
    this.name = 'ChecksumMismatchError';
  }
}

export class UnknownCommandError extends ZkError {
  constructor(readonly commandCode: number) {
    super('UNKNOWN_COMMAND', `Unknown command code: ${commandCode}`);
    this.name = 'UnknownCommandError';
  }
}

export class InvalidSessionStateError extends ZkError {
  constructor(readonly detail: string) {
    super('INVALID_SESSION_STATE', `Invalid session state: ${detail}`);
    this.name = 'InvalidSessionStateError';
  }
}

export class SessionNotInitializedError extends ZkError {
  constructor() {
    super('SESSION_NOT_INITIALIZED', 'Session not initialized - connect to device first');
    this.name = 'SessionNotInitializedError';
  }
}

export class AuthenticationRequiredError extends ZkError {
  constructor() {
    super('AUTHENTICATION_REQUIRED', 'Authentication required - device has CommKey set');
    this.name = 'AuthenticationRequiredError';
  }
}

export class AuthenticationFailedError extends ZkError {
  constructor() {
    super('AUTHENTICATION_FAILED', 'Authentication failed - invalid password');
    this.name = 'AuthenticationFailedError';
  }
}

export class DeviceError extends ZkError {
  constructor(readonly commandCode: number, readonly commandName: string) {
    super('DEVICE_ERROR', `Device returned error: ${commandName}(${commandCode})`);
    this.name = 'DeviceError';
  }
}

export class UnexpectedResponseError extends ZkError {
  constructor(readonly commandCode: number, readonly commandName: string, readonly stage: string) {
    super('UNEXPECTED_RESPONSE', `Unexpected ${stage} response: ${commandName}(${commandCode})`);
    this.name = 'UnexpectedResponseError';
  }
}

export class TimeoutError extends ZkError {
  constructor(readonly operation: string, readonly timeoutMs: number, options?: ErrorOptions) {
    super('TIMEOUT', `Timeout after ${timeoutMs}ms: ${operation}`, options);
    this.name = 'TimeoutError';
  }
}

export class PayloadTooLargeError extends ZkError {
  constructor(readonly size: number, readonly max: number) {
    super('PAYLOAD_TOO_LARGE', `Payload too large: ${size} bytes (max: ${max} bytes)`);
    this.name = 'PayloadTooLargeError';
  }
}

export class InvalidReplyIdError extends ZkError {
  constructor(readonly expected: number, readonly actual: number) {
    super('INVALID_REPLY_ID', `Invalid reply ID: expected ${expected}, got ${actual}`);
    this.name = 'InvalidReplyIdError';
  }
}

// =============================================================================
// Transport errors
// =============================================================================

export class NotConnectedError extends ZkError {
  constructor() {
    super('NOT_CONNECTED', 'Not connected');
    this.name = 'NotConnectedError';
  }
}

export class AlreadyConnectedError extends ZkError {
  constructor() {
    super('ALREADY_CONNECTED', 'Already connected');
    this.name = 'AlreadyConnectedError';
  }
}

export class ConnectionTimeoutError extends ZkError {
  constructor(readonly timeoutMs: number) {
    super('CONNECTION_TIMEOUT', `Connection timeout after ${timeoutMs}ms`);
    this.name = 'ConnectionTimeoutError';
  }
}

export class ReadTimeoutError extends ZkError {
  constructor(readonly timeoutMs: number) {
    super('READ_TIMEOUT', `Read timeout after ${timeoutMs}ms`);
    this.name = 'ReadTimeoutError';
  }
}

export class ConnectionClosedError extends ZkError {
  constructor() {
    super('CONNECTION_CLOSED', 'Connection closed by remote');
    this.name = 'ConnectionClosedError';
  }
}

export class InvalidAddressError extends ZkError {
  constructor(readonly address: string, reason?: string) {
    super('INVALID_ADDRESS', reason ? `Invalid address: ${address}: ${reason}` : `Invalid address: ${address}`);
    this.name = 'InvalidAddressError';
  }
}

export class TransportIoError extends ZkError {
  constructor(cause: unknown) {
    super('IO', `I/O error: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = 'TransportIoError';
  }
}

// =============================================================================
// Configuration errors
// =============================================================================

export class ConfigError extends ZkError {
  constructor(readonly issues: string[]) {
    super('CONFIG_INVALID', `Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}
