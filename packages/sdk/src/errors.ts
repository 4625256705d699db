/**
 * Error Types for zklink
 *
 * Re-exports error classes from @zklink/utils, which is the single source of
 * truth. This module exists so SDK consumers can import errors from either
 * '@zklink/sdk' or '@zklink/sdk/errors'.
 */

export {
  ZkError,
  isZkError,
  type ZkErrorCode,
  PacketTooShortError,
  ChecksumMismatchError,
  UnknownCommandError,
  InvalidSessionStateError,
  SessionNotInitializedError,
  AuthenticationRequiredError,
  AuthenticationFailedError,
  DeviceError,
  UnexpectedResponseError,
  TimeoutError,
  PayloadTooLargeError,
  InvalidReplyIdError,
  NotConnectedError,
  AlreadyConnectedError,
  ConnectionTimeoutError,
  ReadTimeoutError,
  ConnectionClosedError,
  InvalidAddressError,
  TransportIoError,
  ConfigError,
} from '@zklink/utils/errors';
