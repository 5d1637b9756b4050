/**
 * @bitform/core — packed samples
 *
 * The block tests use a 16-bit stream of two packets, each a 4-bit header
 * followed by two 2-bit samples:
 *
 *   0xA6  1010 01 10   header 10, samples 1 2
 *   0x5B  0101 10 11   header  5, samples 2 3
 */

import { describe, it, expect, vi } from 'vitest';
import { unpackBits, packBits, ValueOutOfRangeError } from '../src/index';
import type { LayoutWarning } from '../src/index';

const packets = new Uint8Array([0xa6, 0x5b]);

describe('unpackBits', () => {
  it('reads contiguous samples msb-first', () => {
    expect(unpackBits(new Uint8Array([0b10110100]), 2)).toEqual([2, 3, 1, 0]);
  });

  it('reads only whole samples', () => {
    expect(unpackBits(new Uint8Array([0x29, 0x80]), 3)).toEqual([1, 2, 3, 0, 0]);
  });

  it('skips headers between sample blocks', () => {
    expect(unpackBits(packets, 2, { bitOffset: 4, samplesPerBlock: 2, blockStride: 8 })).toEqual([1, 2, 2, 3]);
  });

  it('reads the headers as one-sample blocks', () => {
    expect(unpackBits(packets, 4, { samplesPerBlock: 1, blockStride: 8 })).toEqual([10, 5]);
  });

  it('sign-extends signed samples', () => {
    expect(unpackBits(new Uint8Array([0xf0]), 4, { signed: true })).toEqual([-1, 0]);
  });

  it('reads 32-bit samples as unsigned numbers', () => {
    expect(unpackBits(new Uint8Array([0xff, 0xff, 0xff, 0xff]), 32)).toEqual([4294967295]);
  });

  it('rejects impossible geometry', () => {
    expect(() => unpackBits(packets, 0)).toThrow(RangeError);
    expect(() => unpackBits(packets, 33)).toThrow(RangeError);
    expect(() => unpackBits(packets, 2, { blockStride: 8 })).toThrow('blockStride needs samplesPerBlock.');
    expect(() => unpackBits(packets, 2, { samplesPerBlock: 4, blockStride: 4 })).toThrow(
      'blockStride (4) is shorter than a block of 4 × 2 bits.',
    );
  });
});

describe('packBits', () => {
  it('writes contiguous samples msb-first', () => {
    expect(packBits([2, 3, 1, 0], 2)).toEqual(new Uint8Array([0xb4]));
  });

  it('pads the last byte with zeros', () => {
    expect(packBits([1, 2, 3], 3)).toEqual(new Uint8Array([0x29, 0x80]));
  });

  it('reports zero padding in the last byte', () => {
    const seen: LayoutWarning[] = [];
    const onWarning = vi.fn((w: LayoutWarning) => { seen.push(w); });
    packBits([1, 2, 3], 3, { onWarning });
    expect(seen).toEqual([{
      code:    'not-byte-aligned',
      message: 'Packed samples end at bit 9; the trailing 7 bits of the last byte are zero padding.',
    }]);

    packBits([2, 3, 1, 0], 2, { onWarning });
    expect(onWarning).toHaveBeenCalledTimes(1);
  });

  it('leaves header bits zero in block layouts', () => {
    expect(packBits([1, 2, 2, 3], 2, { bitOffset: 4, samplesPerBlock: 2, blockStride: 8 }))
      .toEqual(new Uint8Array([0x06, 0x0b]));
  });

  it("writes signed samples in two's complement", () => {
    expect(packBits([-1, 0], 4, { signed: true })).toEqual(new Uint8Array([0xf0]));
  });

  it('rejects values that do not fit', () => {
    expect(() => packBits([1, 8], 3)).toThrow(ValueOutOfRangeError);
    expect(() => packBits([1, 8], 3)).toThrow(
      "Value for field '[1]' is out of range: 8 does not fit in 3 unsigned bits [0, 7].",
    );
    expect(() => packBits([-9], 4, { signed: true })).toThrow(ValueOutOfRangeError);
  });
});
