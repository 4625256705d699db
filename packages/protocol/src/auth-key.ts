/**
 * CommKey scrambling used to answer CMD_ACK_UNAUTH.
 *
 * Steps:
 * 1. reverse the bit order of the 32-bit password
 * 2. add the session id (32-bit wraparound)
 * 3. XOR the little-endian bytes with 'Z','K','S','O'
 * 4. swap the two 16-bit halves
 * 5. XOR bytes 0, 1, 3 with ticks and overwrite byte 2 with ticks
 *
 * Step 5 overwrites byte 2 rather than XOR-ing it. Firmware expects exactly
 * that, so do not "fix" it.
 */

import { DEFAULT_TICKS } from '@zklink/config';

const KEY_MASK = [0x5a, 0x4b, 0x53, 0x4f] as const; // 'Z' 'K' 'S' 'O'

function reverseBits32(value: number): number {
  let reversed = 0;
  for (let i = 0; i < 32; i++) {
    reversed = ((reversed << 1) | ((value >>> i) & 1)) >>> 0;
  }
  return reversed;
}

/**
 * Derive the 4-byte payload of a CMD_AUTH request.
 *
 * @param password - CommKey configured on the device (uint32)
 * @param sessionId - session id from the CMD_ACK_UNAUTH reply
 * @param ticks - protocol ticks byte, 50 on every known firmware
 */
export function makeCommKey(password: number, sessionId: number, ticks: number = DEFAULT_TICKS): Buffer {
  const k = (reverseBits32(password >>> 0) + (sessionId & 0xffff)) >>> 0;

  const scrambled = Buffer.alloc(4);
  scrambled.writeUInt32LE(k, 0);
  for (let i = 0; i < 4; i++) {
    scrambled[i] ^= KEY_MASK[i];
  }

  const low = scrambled.readUInt16LE(0);
  const high = scrambled.readUInt16LE(2);

  const key = Buffer.alloc(4);
  key.writeUInt16LE(high, 0);
  key.writeUInt16LE(low, 2);

  const b = ticks & 0xff;
  key[0] ^= b;
  key[1] ^= b;
  key[2] = b;
  key[3] ^= b;

  return key;
}
