/**
 * @bitform/core — bit primitives
 *
 * Fields are addressed by absolute bit offset and bit width and may start
 * and end anywhere inside a byte. Reading walks the bytes the field touches
 * and takes, from each, the run of bits that belongs to the field:
 *
 *   msb   position p in a byte is bit (7 - p)   →  take = (byte >> (8 - p - n)) & mask(n)
 *   lsb   position p in a byte is bit p         →  take = (byte >> p) & mask(n)
 *
 * The result is the field's *stream value*: for msb the first bit read is
 * the most significant, for lsb it is the least significant.
 *
 * Byte order is applied on top of that by toValueOrder()/toStreamOrder().
 * The stream is cut into 8-bit chunks in stream order (the last may be
 * shorter); byte order decides whether the first chunk is the most
 * significant ('big') or the least significant ('little'). When bit order
 * and byte order agree (msb+big, lsb+little) the two are the same number.
 */

import type { ResolvedByteOrder } from './types';

/** Bit order actually used to address bits; byte records behave as msb. */
export type StreamBitOrder = 'msb' | 'lsb';

function mask(n: number): number {
  return n >= 8 ? 0xff : (1 << n) - 1;
}

/**
 * Read `bitWidth` bits starting at `bitOffset` as an unsigned stream value.
 * The caller guarantees the range lies inside `bytes`.
 */
export function readBits(
  bytes:     Uint8Array,
  bitOffset: number,
  bitWidth:  number,
  bitorder:  StreamBitOrder,
): bigint {
  let raw      = 0n;
  let pos      = bitOffset;
  let consumed = 0;

  while (consumed < bitWidth) {
    const byte  = bytes[pos >>> 3] ?? 0;
    const inPos = pos & 7;
    const n     = Math.min(8 - inPos, bitWidth - consumed);

    if (bitorder === 'msb') {
      const take = (byte >>> (8 - inPos - n)) & mask(n);
      raw = (raw << BigInt(n)) | BigInt(take);
    } else {
      const take = (byte >>> inPos) & mask(n);
      raw |= BigInt(take) << BigInt(consumed);
    }

    pos      += n;
    consumed += n;
  }

  return raw;
}

/**
 * Write the low `bitWidth` bits of the stream value `raw` starting at
 * `bitOffset`. Bits outside the field are preserved.
 */
export function writeBits(
  bytes:     Uint8Array,
  bitOffset: number,
  bitWidth:  number,
  raw:       bigint,
  bitorder:  StreamBitOrder,
): void {
  let pos      = bitOffset;
  let consumed = 0;

  while (consumed < bitWidth) {
    const index = pos >>> 3;
    const byte  = bytes[index] ?? 0;
    const inPos = pos & 7;
    const n     = Math.min(8 - inPos, bitWidth - consumed);
    const m     = mask(n);

    let shift: number;
    let take:  number;
    if (bitorder === 'msb') {
      shift = 8 - inPos - n;
      take  = Number((raw >> BigInt(bitWidth - consumed - n)) & BigInt(m));
    } else {
      shift = inPos;
      take  = Number((raw >> BigInt(consumed)) & BigInt(m));
    }
    bytes[index] = (byte & ~(m << shift) & 0xff) | (take << shift);

    pos      += n;
    consumed += n;
  }
}

// ─── Byte order ───────────────────────────────────────────────────────────────

/** Chunk widths of a `bitWidth`-bit stream: 8, 8, …, remainder. */
function chunkWidths(bitWidth: number): number[] {
  const widths: number[] = [];
  for (let left = bitWidth; left > 0; left -= 8) widths.push(Math.min(8, left));
  return widths;
}

function split(value: bigint, widths: readonly number[], firstHigh: boolean): bigint[] {
  const chunks: bigint[] = [];
  let shift = firstHigh ? widths.reduce((a, b) => a + b, 0) : 0;
  for (const w of widths) {
    if (firstHigh) shift -= w;
    chunks.push((value >> BigInt(shift)) & ((1n << BigInt(w)) - 1n));
    if (!firstHigh) shift += w;
  }
  return chunks;
}

function join(chunks: readonly bigint[], widths: readonly number[], firstHigh: boolean): bigint {
  let value = 0n;
  let shift = firstHigh ? widths.reduce((a, b) => a + b, 0) : 0;
  widths.forEach((w, i) => {
    if (firstHigh) shift -= w;
    value |= (chunks[i] ?? 0n) << BigInt(shift);
    if (!firstHigh) shift += w;
  });
  return value;
}

function ordersAgree(bitorder: StreamBitOrder, byteorder: ResolvedByteOrder): boolean {
  return (bitorder === 'msb') === (byteorder === 'big');
}

/** Stream value read by readBits() → numeric value of the field. */
export function toValueOrder(
  raw:       bigint,
  bitWidth:  number,
  bitorder:  StreamBitOrder,
  byteorder: ResolvedByteOrder,
): bigint {
  if (bitWidth <= 8 || ordersAgree(bitorder, byteorder)) return raw;
  const widths = chunkWidths(bitWidth);
  return join(split(raw, widths, bitorder === 'msb'), widths, byteorder === 'big');
}

/** Numeric value of the field → stream value for writeBits(). */
export function toStreamOrder(
  value:     bigint,
  bitWidth:  number,
  bitorder:  StreamBitOrder,
  byteorder: ResolvedByteOrder,
): bigint {
  if (bitWidth <= 8 || ordersAgree(bitorder, byteorder)) return value;
  const widths = chunkWidths(bitWidth);
  return join(split(value, widths, byteorder === 'big'), widths, bitorder === 'msb');
}

// ─── Two's complement ─────────────────────────────────────────────────────────

/** Interpret the low `bitWidth` bits of `raw` as a two's-complement integer. */
export function signExtend(raw: bigint, bitWidth: number): bigint {
  const signBit = 1n << BigInt(bitWidth - 1);
  return raw & signBit ? raw - (1n << BigInt(bitWidth)) : raw;
}

/** Inclusive bounds of a `bitWidth`-bit integer. */
export function intBounds(bitWidth: number, signed: boolean): { min: bigint; max: bigint } {
  const w = BigInt(bitWidth);
  return signed
    ? { min: -(1n << (w - 1n)), max: (1n << (w - 1n)) - 1n }
    : { min: 0n, max: (1n << w) - 1n };
}

/** Bit pattern of an in-range integer, masked to `bitWidth` bits. */
export function toTwosComplement(value: bigint, bitWidth: number): bigint {
  return value & ((1n << BigInt(bitWidth)) - 1n);
}
