/**
 * @bitform/core — bit primitives
 *
 * readBits/writeBits at arbitrary offsets, in both bit orders, plus the
 * byte-order and two's-complement helpers the codec builds on.
 */

import { describe, it, expect } from 'vitest';
import { readBits, writeBits } from '../src/index';
import {
  toValueOrder,
  toStreamOrder,
  signExtend,
  intBounds,
  toTwosComplement,
} from '../src/bits';

// ─── readBits ─────────────────────────────────────────────────────────────────

describe('readBits', () => {
  const byte = new Uint8Array([0xda]); // 1101 1010

  it('reads msb-first runs', () => {
    expect(readBits(byte, 0, 1, 'msb')).toBe(1n);
    expect(readBits(byte, 1, 3, 'msb')).toBe(5n);
    expect(readBits(byte, 4, 4, 'msb')).toBe(10n);
  });

  it('reads lsb-first runs', () => {
    expect(readBits(byte, 0, 4, 'lsb')).toBe(0xan);
    expect(readBits(byte, 4, 4, 'lsb')).toBe(0xdn);
    expect(readBits(byte, 1, 1, 'lsb')).toBe(1n);
  });

  it('crosses byte boundaries', () => {
    const bytes = new Uint8Array([0x0f, 0xf0]);
    expect(readBits(bytes, 4, 8, 'msb')).toBe(0xffn);
    expect(readBits(bytes, 0, 16, 'msb')).toBe(0x0ff0n);
    expect(readBits(bytes, 0, 16, 'lsb')).toBe(0xf00fn);
  });

  it('reads widths beyond 53 bits exactly', () => {
    const bytes = new Uint8Array(8).fill(0xff);
    expect(readBits(bytes, 0, 64, 'msb')).toBe((1n << 64n) - 1n);
  });
});

// ─── writeBits ────────────────────────────────────────────────────────────────

describe('writeBits', () => {
  it('preserves bits outside the field', () => {
    const bytes = new Uint8Array([0xff]);
    writeBits(bytes, 2, 3, 0n, 'msb');
    expect(bytes[0]).toBe(0xc7);
  });

  it('writes spanning fields in lsb order', () => {
    const bytes = new Uint8Array(2);
    writeBits(bytes, 4, 8, 0xabn, 'lsb');
    expect([...bytes]).toEqual([0xb0, 0x0a]);
    expect(readBits(bytes, 4, 8, 'lsb')).toBe(0xabn);
  });

  it('composes the three-field header byte', () => {
    const bytes = new Uint8Array(1);
    writeBits(bytes, 0, 1, 1n, 'msb');
    writeBits(bytes, 1, 3, 5n, 'msb');
    writeBits(bytes, 4, 4, 10n, 'msb');
    expect(bytes[0]).toBe(0xda);
  });
});

// ─── Byte order ───────────────────────────────────────────────────────────────

describe('toValueOrder / toStreamOrder', () => {
  it('is the identity when the orders agree or the field fits a byte', () => {
    expect(toValueOrder(0x1234n, 16, 'msb', 'big')).toBe(0x1234n);
    expect(toValueOrder(0x1234n, 16, 'lsb', 'little')).toBe(0x1234n);
    expect(toValueOrder(0x5n, 3, 'msb', 'little')).toBe(0x5n);
  });

  it('swaps whole bytes for msb + little', () => {
    expect(toValueOrder(0x1234n, 16, 'msb', 'little')).toBe(0x3412n);
    expect(toStreamOrder(0x3412n, 16, 'msb', 'little')).toBe(0x1234n);
  });

  it('keeps the short chunk last for widths that are not byte multiples', () => {
    expect(toValueOrder(0xabcn, 12, 'msb', 'little')).toBe(0xcabn);
    expect(toStreamOrder(0xcabn, 12, 'msb', 'little')).toBe(0xabcn);
  });
});

// ─── Two's complement ─────────────────────────────────────────────────────────

describe("two's complement helpers", () => {
  it('sign-extends on the top bit', () => {
    expect(signExtend(0b111n, 3)).toBe(-1n);
    expect(signExtend(0b100n, 3)).toBe(-4n);
    expect(signExtend(0b011n, 3)).toBe(3n);
  });

  it('computes inclusive bounds', () => {
    expect(intBounds(4, false)).toEqual({ min: 0n, max: 15n });
    expect(intBounds(4, true)).toEqual({ min: -8n, max: 7n });
    expect(intBounds(1, true)).toEqual({ min: -1n, max: 0n });
  });

  it('masks negatives to their bit pattern', () => {
    expect(toTwosComplement(-1n, 4)).toBe(15n);
    expect(toTwosComplement(-2n, 16)).toBe(0xfffen);
    expect(toTwosComplement(5n, 4)).toBe(5n);
  });
});
