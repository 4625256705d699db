import { describe, it, expect } from 'vitest';
import { makeCommKey } from './auth-key.js';

describe('makeCommKey', () => {
  it('returns four bytes', () => {
    expect(makeCommKey(0, 0, 50)).toHaveLength(4);
  });

  it('matches known keys', () => {
    expect(makeCommKey(0, 0, 50).toString('hex')).toBe('617d3279');
    expect(makeCommKey(0, 32031, 50).toString('hex')).toBe('617d3204');
    expect(makeCommKey(12345, 100, 50).toString('hex')).toBe('6de13279');
  });

  it('is deterministic', () => {
    expect(makeCommKey(0, 32031, 50)).toEqual(makeCommKey(0, 32031, 50));
  });

  it('defaults ticks to 50', () => {
    expect(makeCommKey(0, 32031)).toEqual(makeCommKey(0, 32031, 50));
  });

  it('changes with the password', () => {
    expect(makeCommKey(0, 100, 50)).not.toEqual(makeCommKey(12345, 100, 50));
  });

  it('changes with the high byte of the session id', () => {
    expect(makeCommKey(0, 100, 50)).not.toEqual(makeCommKey(0, 100 + 0x100, 50));
    expect(makeCommKey(0, 0x1234, 50)).not.toEqual(makeCommKey(0, 0x5634, 50));
  });

  it('overwrites byte 2 with ticks, hiding the low byte of the session id', () => {
    const a = makeCommKey(0, 100, 50);
    const b = makeCommKey(0, 200, 50);

    expect(a[2]).toBe(50);
    expect(a).toEqual(b);
  });

  it('wraps the session addition at 32 bits', () => {
    // bit-reversed 0xFFFFFFFF is 0xFFFFFFFF; adding 1 wraps to 0
    expect(makeCommKey(0xffffffff, 1, 50)).toEqual(makeCommKey(0, 0, 50));
  });

  it('reverses the password bits', () => {
    // bit 0 set lands in bit 31, i.e. byte 3 of the sum, which ends up in byte 1
    expect(makeCommKey(1, 0, 50).toString('hex')).toBe('61fd3279');
  });
});
