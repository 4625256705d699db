/**
 * @zklink/protocol
 *
 * Wire-level pieces of the ZKTeco protocol: command registry, checksum,
 * CommKey derivation, packet codec and session state.
 */

export {
  Command,
  UNKNOWN_COMMAND_NAME,
  fromCode,
  toCode,
  isKnownCommand,
  isRequest,
  isResponse,
  isSuccess,
  isError,
  commandName,
  describeCommand,
} from './commands.js';

export { calculateChecksum, verifyChecksum } from './checksum.js';

export { makeCommKey } from './auth-key.js';

export {
  createPacket,
  encodePacket,
  decodePacket,
  packetChecksum,
  isSuccessPacket,
  isErrorPacket,
  describePacket,
  type Packet,
} from './packet.js';

export { Session, type SessionState } from './session.js';

export {
  HEADER_SIZE,
  MAX_PAYLOAD_SIZE,
  INITIAL_REPLY_ID,
  MAX_RETRIES,
  EventFlag,
  DataType,
  VerifyMode,
  PunchType,
  eventMask,
} from './constants.js';
