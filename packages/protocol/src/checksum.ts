/**
 * Packet checksum for the ZKTeco protocol.
 *
 * The sum runs over the logical header (checksum field zeroed) followed by
 * the payload, as consecutive little-endian 16-bit words. A trailing odd byte
 * is added on its own as the low byte of a word.
 *
 * Overflow is folded by subtracting 0xFFFF, not 0x10000. Device firmware does
 * it this way, so the result differs from RFC 1071 for some inputs.
 */

const WORD_MAX = 0xffff;

function fold(sum: number): number {
  while (sum > WORD_MAX) {
    sum -= WORD_MAX;
  }
  return sum;
}

function addWord(sum: number, lo: number, hi: number): number {
  return fold(sum + (lo | (hi << 8)));
}

/**
 * Compute the 16-bit checksum carried in the packet header.
 */
export function calculateChecksum(
  command: number,
  sessionId: number,
  replyId: number,
  payload: Uint8Array = new Uint8Array(0)
): number {
  // Header words: command, checksum placeholder, session id, reply id
  let sum = 0;
  sum = addWord(sum, command & 0xff, (command >>> 8) & 0xff);
  sum = addWord(sum, 0, 0);
  sum = addWord(sum, sessionId & 0xff, (sessionId >>> 8) & 0xff);
  sum = addWord(sum, replyId & 0xff, (replyId >>> 8) & 0xff);

  const evenLength = payload.length & ~1;
  for (let i = 0; i < evenLength; i += 2) {
    sum = addWord(sum, payload[i], payload[i + 1]);
  }
  if (payload.length !== evenLength) {
    sum = addWord(sum, payload[evenLength], 0);
  }

  return ~fold(sum) & WORD_MAX;
}

/**
 * Recompute the checksum and compare it with the one received.
 */
export function verifyChecksum(
  command: number,
  sessionId: number,
  replyId: number,
  payload: Uint8Array,
  expected: number
): boolean {
  return calculateChecksum(command, sessionId, replyId, payload) === (expected & WORD_MAX);
}
