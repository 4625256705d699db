/**
 * Transport framing for ZKTeco packets.
 *
 * Raw: packet bytes go on the wire unchanged (UDP, and TCP on devices that
 * do not wrap).
 *
 * Wrapped (TCP on most firmware):
 * - 2 bytes: magic 0x5050 (LE)
 * - 2 bytes: magic 0x8272 (LE)
 * - 4 bytes: little-endian inner length
 * - N bytes: protocol packet
 *
 * Unwrapping tolerates devices that skip the envelope: if the magic is absent
 * the bytes are passed through as-is.
 */

import type { FramingMode } from '@zklink/config';
import { transportLog } from '@zklink/utils/logger';

export const TCP_MAGIC_1 = 0x5050;
export const TCP_MAGIC_2 = 0x8272;
export const WRAPPER_HEADER_SIZE = 8; // magic1 + magic2 + length

export interface UnwrappedFrame {
  payload: Buffer;
  /** The envelope was present and stripped */
  wrapped: boolean;
  /** Length field of the envelope, if there was one. Informational only. */
  declaredLength?: number;
}

export interface FrameCodec {
  readonly mode: FramingMode;
  wrap(packet: Uint8Array): Buffer;
  unwrap(data: Uint8Array): UnwrappedFrame;
}

function toBuffer(data: Uint8Array): Buffer {
  return Buffer.isBuffer(data) ? data : Buffer.from(data.buffer, data.byteOffset, data.byteLength);
}

/**
 * Prefix a packet with the TCP envelope.
 */
export function wrapFrame(packet: Uint8Array): Buffer {
  const header = Buffer.alloc(WRAPPER_HEADER_SIZE);
  header.writeUInt16LE(TCP_MAGIC_1, 0);
  header.writeUInt16LE(TCP_MAGIC_2, 2);
  header.writeUInt32LE(packet.length, 4);

  return Buffer.concat([header, packet]);
}

export function hasWrapperMagic(data: Uint8Array): boolean {
  if (data.length < 4) return false;
  const buf = toBuffer(data);
  return buf.readUInt16LE(0) === TCP_MAGIC_1 && buf.readUInt16LE(2) === TCP_MAGIC_2;
}

/**
 * Strip the TCP envelope if present.
 *
 * The length field is not checked against the bytes actually received; a
 * mismatch is only logged.
 */
export function unwrapFrame(data: Uint8Array): UnwrappedFrame {
  const buf = toBuffer(data);

  if (buf.length < WRAPPER_HEADER_SIZE || !hasWrapperMagic(buf)) {
    return { payload: buf, wrapped: false };
  }

  const declaredLength = buf.readUInt32LE(4);
  const payload = buf.subarray(WRAPPER_HEADER_SIZE);

  if (declaredLength !== payload.length) {
    transportLog.debug('Wrapper length differs from received bytes', {
      declaredLength,
      received: payload.length,
    });
  }

  return { payload, wrapped: true, declaredLength };
}

export const RAW_FRAMING: FrameCodec = {
  mode: 'raw',
  wrap: (packet) => toBuffer(packet),
  unwrap: (data) => ({ payload: toBuffer(data), wrapped: false }),
};

export const WRAPPED_FRAMING: FrameCodec = {
  mode: 'wrapped',
  wrap: wrapFrame,
  unwrap: unwrapFrame,
};

export function createFraming(mode: FramingMode): FrameCodec {
  return mode === 'wrapped' ? WRAPPED_FRAMING : RAW_FRAMING;
}
