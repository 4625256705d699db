import { describe, it, expect } from 'vitest';
import {
  RAW_FRAMING,
  WRAPPED_FRAMING,
  createFraming,
  hasWrapperMagic,
  unwrapFrame,
  wrapFrame,
} from './framing.js';

describe('framing', () => {
  const packet = Buffer.from([0xe8, 0x03, 0x17, 0xfc]);

  it('wraps a packet with magic and little-endian length', () => {
    const frame = wrapFrame(packet);
    expect(frame.length).toBe(12);
    expect([...frame.subarray(0, 8)]).toEqual([0x50, 0x50, 0x72, 0x82, 0x04, 0x00, 0x00, 0x00]);
    expect(frame.subarray(8).equals(packet)).toBe(true);
  });

  it('unwraps what it wrapped', () => {
    const result = unwrapFrame(wrapFrame(packet));
    expect(result.wrapped).toBe(true);
    expect(result.declaredLength).toBe(4);
    expect(result.payload.equals(packet)).toBe(true);
  });

  it('passes bytes through when the magic is absent', () => {
    const result = unwrapFrame(packet);
    expect(result.wrapped).toBe(false);
    expect(result.payload.equals(packet)).toBe(true);
  });

  it('does not enforce the declared length', () => {
    const frame = wrapFrame(packet);
    frame.writeUInt32LE(99, 4);
    const result = unwrapFrame(frame);
    expect(result.declaredLength).toBe(99);
    expect(result.payload.equals(packet)).toBe(true);
  });

  it('treats a bare magic header as unwrapped when shorter than the envelope', () => {
    const short = Buffer.from([0x50, 0x50, 0x72, 0x82, 0x01]);
    expect(hasWrapperMagic(short)).toBe(true);
    expect(unwrapFrame(short).wrapped).toBe(false);
  });

  it('selects a codec by mode', () => {
    expect(createFraming('raw')).toBe(RAW_FRAMING);
    expect(createFraming('wrapped')).toBe(WRAPPED_FRAMING);
    expect(RAW_FRAMING.wrap(packet).equals(packet)).toBe(true);
    expect(WRAPPED_FRAMING.wrap(packet).length).toBe(12);
  });
});
