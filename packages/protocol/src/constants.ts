/**
 * Protocol constants for ZKTeco terminals.
 */

/** Wire header: command, checksum, session id, reply id (u16 LE each) */
export const HEADER_SIZE = 8;

/** Largest payload that still fits a 16-bit frame size */
export const MAX_PAYLOAD_SIZE = 0xffff - HEADER_SIZE;

/** First reply id issued after a session is (re)initialized */
export const INITIAL_REPLY_ID = 65534;

/** Upper bound callers should use for their own retry loops */
export const MAX_RETRIES = 3;

/** Real-time event flags for CMD_REG_EVENT */
export const EventFlag = {
  ATTLOG: 1,
  FINGER: 1 << 1,
  ENROLL_USER: 1 << 2,
  ENROLL_FINGER: 1 << 3,
  BUTTON: 1 << 4,
  UNLOCK: 1 << 5,
  VERIFY: 1 << 7,
  FPFTR: 1 << 8,
  ALARM: 1 << 9,
} as const;

export type EventFlag = (typeof EventFlag)[keyof typeof EventFlag];

/** Table selectors for CMD_DB_RRQ and friends */
export const DataType = {
  ATTLOG: 1,
  FINGERTMP: 2,
  OPLOG: 4,
  USER: 5,
  SMS: 6,
  UDATA: 7,
  WORKCODE: 8,
} as const;

export type DataType = (typeof DataType)[keyof typeof DataType];

export const VerifyMode = {
  PASSWORD: 0,
  FINGERPRINT: 1,
  CARD: 3,
  FACE: 15,
} as const;

export type VerifyMode = (typeof VerifyMode)[keyof typeof VerifyMode];

export const PunchType = {
  CHECK_IN: 0,
  CHECK_OUT: 1,
  OVERTIME_IN: 2,
  OVERTIME_OUT: 3,
} as const;

export type PunchType = (typeof PunchType)[keyof typeof PunchType];

/**
 * Combine event flags into the mask sent with CMD_REG_EVENT.
 */
export function eventMask(...flags: EventFlag[]): number {
  return flags.reduce((mask, flag) => (mask | flag) >>> 0, 0);
}
