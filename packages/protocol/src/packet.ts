/**
 * Packet encoding/decoding for the ZKTeco protocol.
 *
 * Wire format (all fields little-endian u16):
 * - 2 bytes: command
 * - 2 bytes: checksum
 * - 2 bytes: session id
 * - 2 bytes: reply id
 * - N bytes: payload (N <= 65527)
 */

import {
  ChecksumMismatchError,
  PacketTooShortError,
  PayloadTooLargeError,
} from '@zklink/utils/errors';
import { calculateChecksum } from './checksum.js';
import { type Command, describeCommand, fromCode, isError, isSuccess } from './commands.js';
import { HEADER_SIZE, MAX_PAYLOAD_SIZE } from './constants.js';

export interface Packet {
  command: Command;
  sessionId: number;
  replyId: number;
  payload: Buffer;
}

function assertPayloadSize(payload: Uint8Array): void {
  if (payload.length > MAX_PAYLOAD_SIZE) {
    throw new PayloadTooLargeError(payload.length, MAX_PAYLOAD_SIZE);
  }
}

/**
 * Build a packet value. Ids are truncated to 16 bits.
 * @throws PayloadTooLargeError when the payload exceeds 65527 bytes
 */
export function createPacket(
  command: Command,
  sessionId: number,
  replyId: number,
  payload: Uint8Array = Buffer.alloc(0)
): Packet {
  assertPayloadSize(payload);
  return {
    command,
    sessionId: sessionId & 0xffff,
    replyId: replyId & 0xffff,
    payload: Buffer.from(payload),
  };
}

export function packetChecksum(packet: Packet): number {
  return calculateChecksum(packet.command, packet.sessionId, packet.replyId, packet.payload);
}

/**
 * Encode a packet into wire bytes. The checksum is always computed here,
 * never carried over from a decoded packet.
 */
export function encodePacket(packet: Packet): Buffer {
  assertPayloadSize(packet.payload);

  const buf = Buffer.alloc(HEADER_SIZE + packet.payload.length);
  buf.writeUInt16LE(packet.command, 0);
  buf.writeUInt16LE(packetChecksum(packet), 2);
  buf.writeUInt16LE(packet.sessionId & 0xffff, 4);
  buf.writeUInt16LE(packet.replyId & 0xffff, 6);
  buf.set(packet.payload, HEADER_SIZE);

  return buf;
}

/**
 * Decode wire bytes into a packet.
 *
 * @throws PacketTooShortError if fewer than 8 bytes are supplied
 * @throws UnknownCommandError if the command code is not registered
 * @throws ChecksumMismatchError if the header checksum does not match
 */
export function decodePacket(data: Uint8Array): Packet {
  if (data.length < HEADER_SIZE) {
    throw new PacketTooShortError(HEADER_SIZE, data.length);
  }

  const buf = Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  const commandCode = buf.readUInt16LE(0);
  const received = buf.readUInt16LE(2);
  const sessionId = buf.readUInt16LE(4);
  const replyId = buf.readUInt16LE(6);

  const packet: Packet = {
    command: fromCode(commandCode),
    sessionId,
    replyId,
    payload: Buffer.from(buf.subarray(HEADER_SIZE)),
  };

  const expected = packetChecksum(packet);
  if (expected !== received) {
    throw new ChecksumMismatchError(expected, received);
  }

  return packet;
}

export function isSuccessPacket(packet: Packet): boolean {
  return isSuccess(packet.command);
}

export function isErrorPacket(packet: Packet): boolean {
  return isError(packet.command);
}

/** One-line summary for logs */
export function describePacket(packet: Packet): string {
  return `${describeCommand(packet.command)} session=${packet.sessionId} reply=${packet.replyId} len=${packet.payload.length}`;
}
