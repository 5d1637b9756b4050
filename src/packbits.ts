/**
 * @bitform/core — packed samples
 *
 * Runs of equal-width integers stored MSB-first with no padding between
 * them, as instrument data streams carry them. Blocks of samples may be
 * interleaved with headers:
 *
 *   bitOffset                 blockStride
 *   ├──────────┬──────────────┼──────────┬──────────────┤
 *   │ header   │ s0 s1 … sN-1 │ header   │ sN … s2N-1   │
 *
 * unpackBits() with `samplesPerBlock: N`, `bitOffset` = header width and
 * `blockStride` = packet width reads only the samples; with
 * `samplesPerBlock: 1` and `bitsPerSample` = header width it reads the
 * headers instead.
 */

import { readBits, writeBits, signExtend, intBounds, toTwosComplement } from './bits';
import { ValueOutOfRangeError } from './errors';
import type { LayoutWarning } from './types';

export interface PackedSampleOptions {
  /** Bit position of the first sample. Default 0. */
  readonly bitOffset?:       number;
  /** Samples per block. Default: one block holding every sample. */
  readonly samplesPerBlock?: number;
  /** Distance in bits between block starts. Default: samplesPerBlock × bitsPerSample. */
  readonly blockStride?:     number;
  /** Two's-complement samples. Default false. */
  readonly signed?:          boolean;
}

export interface PackOptions extends PackedSampleOptions {
  /** Called when the samples end inside a byte and the rest of it is zero padding. */
  readonly onWarning?: (warning: LayoutWarning) => void;
}

const MAX_BITS_PER_SAMPLE = 32;

interface Geometry {
  readonly bitOffset:       number;
  readonly samplesPerBlock: number | null;
  readonly blockStride:     number;
}

function checkNonNegative(name: string, value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`${name} must be a non-negative integer, got ${value}.`);
  }
}

function geometry(bitsPerSample: number, options: PackedSampleOptions): Geometry {
  if (!Number.isSafeInteger(bitsPerSample) || bitsPerSample < 1 || bitsPerSample > MAX_BITS_PER_SAMPLE) {
    throw new RangeError(`bitsPerSample must be an integer in [1, ${MAX_BITS_PER_SAMPLE}], got ${bitsPerSample}.`);
  }

  const bitOffset = options.bitOffset ?? 0;
  checkNonNegative('bitOffset', bitOffset);

  const { samplesPerBlock } = options;
  if (samplesPerBlock === undefined) {
    if (options.blockStride !== undefined) {
      throw new RangeError('blockStride needs samplesPerBlock.');
    }
    return { bitOffset, samplesPerBlock: null, blockStride: 0 };
  }
  if (!Number.isSafeInteger(samplesPerBlock) || samplesPerBlock < 1) {
    throw new RangeError(`samplesPerBlock must be a positive integer, got ${samplesPerBlock}.`);
  }

  const blockBits   = samplesPerBlock * bitsPerSample;
  const blockStride = options.blockStride ?? blockBits;
  checkNonNegative('blockStride', blockStride);
  if (blockStride < blockBits) {
    throw new RangeError(
      `blockStride (${blockStride}) is shorter than a block of ${samplesPerBlock} × ${bitsPerSample} bits.`,
    );
  }
  return { bitOffset, samplesPerBlock, blockStride };
}

/** Bit position of sample `i`. */
function samplePosition(g: Geometry, bitsPerSample: number, i: number): number {
  if (g.samplesPerBlock === null) return g.bitOffset + i * bitsPerSample;
  const block = Math.floor(i / g.samplesPerBlock);
  const index = i % g.samplesPerBlock;
  return g.bitOffset + block * g.blockStride + index * bitsPerSample;
}

/** Number of whole samples that fit in `totalBits`. */
function sampleCount(g: Geometry, bitsPerSample: number, totalBits: number): number {
  const available = totalBits - g.bitOffset;
  if (available < bitsPerSample) return 0;
  if (g.samplesPerBlock === null) return Math.floor(available / bitsPerSample);

  const blockBits  = g.samplesPerBlock * bitsPerSample;
  const fullBlocks = available >= blockBits ? Math.floor((available - blockBits) / g.blockStride) + 1 : 0;
  // A trailing partial block contributes whatever samples fit.
  const tailStart  = fullBlocks * g.blockStride;
  const tail       = tailStart < available
    ? Math.min(g.samplesPerBlock, Math.floor((available - tailStart) / bitsPerSample))
    : 0;
  return fullBlocks * g.samplesPerBlock + tail;
}

/**
 * Read every whole sample `data` holds.
 *
 *   unpackBits(new Uint8Array([0b10110100]), 2)   // [2, 3, 1, 0]
 */
export function unpackBits(
  data: Uint8Array,
  bitsPerSample: number,
  options: PackedSampleOptions = {},
): number[] {
  const g      = geometry(bitsPerSample, options);
  const signed = options.signed ?? false;
  const count  = sampleCount(g, bitsPerSample, data.byteLength * 8);

  const out: number[] = new Array<number>(count);
  for (let i = 0; i < count; i++) {
    const raw = readBits(data, samplePosition(g, bitsPerSample, i), bitsPerSample, 'msb');
    out[i] = Number(signed ? signExtend(raw, bitsPerSample) : raw);
  }
  return out;
}

/**
 * Pack `values` into the smallest buffer that holds them. Bits not covered
 * by a sample (headers, the tail of the last byte) are zero; a padded tail
 * is reported to `onWarning`.
 *
 * @throws ValueOutOfRangeError for a value that does not fit `bitsPerSample`.
 */
export function packBits(
  values: readonly number[],
  bitsPerSample: number,
  options: PackOptions = {},
): Uint8Array {
  const g      = geometry(bitsPerSample, options);
  const signed = options.signed ?? false;
  const { min, max } = intBounds(bitsPerSample, signed);

  const endBits = values.length === 0
    ? g.bitOffset
    : samplePosition(g, bitsPerSample, values.length - 1) + bitsPerSample;
  const out = new Uint8Array(Math.ceil(endBits / 8));

  values.forEach((value, i) => {
    if (!Number.isSafeInteger(value)) {
      throw new ValueOutOfRangeError(`[${i}]`, `expected an integer, got ${value}`);
    }
    const v = BigInt(value);
    if (v < min || v > max) {
      throw new ValueOutOfRangeError(
        `[${i}]`,
        `${value} does not fit in ${bitsPerSample} ${signed ? 'signed' : 'unsigned'} bits [${min}, ${max}]`,
      );
    }
    writeBits(out, samplePosition(g, bitsPerSample, i), bitsPerSample, toTwosComplement(v, bitsPerSample), 'msb');
  });

  if (endBits % 8 !== 0 && options.onWarning !== undefined) {
    options.onWarning({
      code:    'not-byte-aligned',
      message: `Packed samples end at bit ${endBits}; the trailing ${8 - (endBits % 8)} bits of the last byte are zero padding.`,
    });
  }
  return out;
}
