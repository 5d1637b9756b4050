/**
 * @bitform/core — RecordCodec
 *
 * Converts between RecordValue objects and their exact binary form.
 *
 * The constructor compiles the descriptor's flat layout into one plan entry
 * per leaf field (absolute bit offset, bit width, orders). decode() and
 * encode() walk that plan; nested records are rebuilt, and read, through
 * each entry's property path.
 *
 *   const codec = new RecordCodec(Header);
 *   const bytes = codec.encode({ flag: true, version: 5, length: 10 });
 *   codec.decode(bytes);   // { flag: true, version: 5, length: 10 }
 *
 * Both calls are all-or-nothing: encode writes into a private buffer that
 * is only returned on success, decode builds a fresh object.
 */

import {
  readBits,
  writeBits,
  toValueOrder,
  toStreamOrder,
  signExtend,
  intBounds,
  toTwosComplement,
  type StreamBitOrder,
} from './bits';
import { EnumTable } from './enums';
import {
  BufferSizeMismatchError,
  InvalidTextError,
  MissingFieldValueError,
  UnknownEnumValueError,
  UnsupportedTypeError,
  ValueOutOfRangeError,
} from './errors';
import { createRecord, isRecordValue, ownValue, setOwn } from './record';
import type { RecordDescriptor } from './descriptor';
import {
  UNIT_BITS,
  type EnumValue,
  type FieldValue,
  type ItemKind,
  type RecordValue,
  type ResolvedByteOrder,
} from './types';

// ─── Module-level shared state ────────────────────────────────────────────────

const utf8Encoder = new TextEncoder();
// A leading BOM is part of the text, and malformed bytes are an error, so
// decode followed by encode gives back the original bytes.
const utf8Decoder = new TextDecoder('utf-8', { ignoreBOM: true, fatal: true });

// Float <-> bit pattern conversion. Calls are synchronous and never re-enter.
const floatScratch = new DataView(new ArrayBuffer(8));

/** Integers up to this width decode to number; wider ones to bigint. */
const MAX_NUMBER_BITS = 32;

// ─── Plan ─────────────────────────────────────────────────────────────────────

type LeafKind = Exclude<ItemKind, { tag: 'record' }>;

interface FieldPlan {
  readonly path:      string;
  readonly segments:  readonly (string | number)[];
  readonly item:      LeafKind;
  /** Item count for repeated fields, null for scalars. */
  readonly count:     number | null;
  readonly bitOffset: number;
  /** Width of one item; items follow each other at this stride. */
  readonly bitWidth:  number;
  readonly signed:    boolean;
  readonly byteorder: ResolvedByteOrder;
  readonly bitorder:  StreamBitOrder;
}

function compilePlan(descriptor: RecordDescriptor): FieldPlan[] {
  const unit = UNIT_BITS[descriptor.baseunit];
  const plan: FieldPlan[] = [];

  for (const f of descriptor.flatFields) {
    const { kind } = f;
    const item = kind.tag === 'sequence' ? kind.item : kind;
    // flatten() never leaves a record behind; this narrows the type.
    if (item.tag === 'record') continue;

    plan.push({
      path:      f.path,
      segments:  f.segments,
      item,
      count:     kind.tag === 'sequence' ? kind.count : null,
      bitOffset: f.offset * unit,
      bitWidth:  f.size * unit,
      signed:    f.signed,
      byteorder: f.byteorder,
      bitorder:  f.bitorder === 'lsb' ? 'lsb' : 'msb',
    });
  }
  return plan;
}

// ─── Item decoding ────────────────────────────────────────────────────────────

function readInt(bytes: Uint8Array, p: FieldPlan, bitOffset: number): bigint {
  const raw   = readBits(bytes, bitOffset, p.bitWidth, p.bitorder);
  const value = toValueOrder(raw, p.bitWidth, p.bitorder, p.byteorder);
  return p.signed ? signExtend(value, p.bitWidth) : value;
}

function readBlob(bytes: Uint8Array, p: FieldPlan, path: string, bitOffset: number): Uint8Array {
  if (p.bitWidth % 8 !== 0) {
    throw new UnsupportedTypeError(path, `${p.item.tag} fields must be a whole number of bytes wide, got ${p.bitWidth} bits`);
  }
  const length = p.bitWidth / 8;
  if (bitOffset % 8 === 0) {
    // Aligned: in both bit orders an 8-bit stream read returns the byte unchanged.
    return bytes.slice(bitOffset / 8, bitOffset / 8 + length);
  }
  const out = new Uint8Array(length);
  for (let j = 0; j < length; j++) {
    out[j] = Number(readBits(bytes, bitOffset + j * 8, 8, p.bitorder));
  }
  return out;
}

function decodeText(data: Uint8Array, path: string): string {
  try {
    return utf8Decoder.decode(data);
  } catch (e) {
    if (e instanceof TypeError) throw new InvalidTextError(path);
    throw e;
  }
}

function decodeItem(bytes: Uint8Array, p: FieldPlan, path: string, bitOffset: number): FieldValue {
  const { item } = p;
  switch (item.tag) {
    case 'bool':
      return readBits(bytes, bitOffset, p.bitWidth, p.bitorder) !== 0n;

    case 'int': {
      const value = readInt(bytes, p, bitOffset);
      return p.bitWidth <= MAX_NUMBER_BITS ? Number(value) : value;
    }

    case 'float': {
      const raw  = readBits(bytes, bitOffset, p.bitWidth, p.bitorder);
      const bits = toValueOrder(raw, p.bitWidth, p.bitorder, p.byteorder);
      if (p.bitWidth === 32) {
        floatScratch.setUint32(0, Number(bits));
        return floatScratch.getFloat32(0);
      }
      if (p.bitWidth === 64) {
        floatScratch.setBigUint64(0, bits);
        return floatScratch.getFloat64(0);
      }
      throw new UnsupportedTypeError(path, `floats must be 32 or 64 bits wide, got ${p.bitWidth}`);
    }

    case 'complex':
      throw new UnsupportedTypeError(path, 'complex numbers are not supported');

    case 'bytes':
      return readBlob(bytes, p, path, bitOffset);

    case 'text':
      return decodeText(readBlob(bytes, p, path, bitOffset), path);

    case 'enum': {
      const underlying = readEnumValue(bytes, p, path, bitOffset, item.table);
      const name = item.table.nameFor(underlying);
      if (name === undefined) throw new UnknownEnumValueError(path, EnumTable.describe(underlying));
      return name;
    }
  }
}

function readEnumValue(
  bytes: Uint8Array,
  p: FieldPlan,
  path: string,
  bitOffset: number,
  table: EnumTable,
): EnumValue {
  switch (table.base) {
    case 'int':   return readInt(bytes, p, bitOffset);
    case 'text':  return decodeText(readBlob(bytes, p, path, bitOffset), path);
    case 'bytes': return readBlob(bytes, p, path, bitOffset);
  }
}

// ─── Item encoding ────────────────────────────────────────────────────────────

function writeInt(out: Uint8Array, p: FieldPlan, path: string, bitOffset: number, value: FieldValue): void {
  let v: bigint;
  if (typeof value === 'bigint') {
    v = value;
  } else if (typeof value === 'number' && Number.isSafeInteger(value)) {
    v = BigInt(value);
  } else {
    throw new ValueOutOfRangeError(path, `expected an integer, got ${describeValue(value)}`);
  }

  const { min, max } = intBounds(p.bitWidth, p.signed);
  if (v < min || v > max) {
    throw new ValueOutOfRangeError(
      path,
      `${v} does not fit in ${p.bitWidth} ${p.signed ? 'signed' : 'unsigned'} bits [${min}, ${max}]`,
    );
  }
  const stream = toStreamOrder(toTwosComplement(v, p.bitWidth), p.bitWidth, p.bitorder, p.byteorder);
  writeBits(out, bitOffset, p.bitWidth, stream, p.bitorder);
}

function writeBlob(out: Uint8Array, p: FieldPlan, path: string, bitOffset: number, data: Uint8Array): void {
  if (p.bitWidth % 8 !== 0) {
    throw new UnsupportedTypeError(path, `${p.item.tag} fields must be a whole number of bytes wide, got ${p.bitWidth} bits`);
  }
  const length = p.bitWidth / 8;
  if (data.length !== length) {
    throw new ValueOutOfRangeError(path, `expected exactly ${length} bytes, got ${data.length}`);
  }
  if (bitOffset % 8 === 0) {
    out.set(data, bitOffset / 8);
    return;
  }
  data.forEach((byte, j) => writeBits(out, bitOffset + j * 8, 8, BigInt(byte), p.bitorder));
}

function writeText(out: Uint8Array, p: FieldPlan, path: string, bitOffset: number, value: FieldValue): void {
  if (typeof value !== 'string') {
    throw new ValueOutOfRangeError(path, `expected a string, got ${describeValue(value)}`);
  }
  writeBlob(out, p, path, bitOffset, utf8Encoder.encode(value));
}

function encodeItem(out: Uint8Array, p: FieldPlan, path: string, bitOffset: number, value: FieldValue): void {
  const { item } = p;
  switch (item.tag) {
    case 'bool': {
      if (typeof value !== 'boolean') {
        throw new ValueOutOfRangeError(path, `expected a boolean, got ${describeValue(value)}`);
      }
      writeBits(out, bitOffset, p.bitWidth, value ? 1n : 0n, p.bitorder);
      return;
    }

    case 'int':
      writeInt(out, p, path, bitOffset, value);
      return;

    case 'float': {
      if (typeof value !== 'number') {
        throw new ValueOutOfRangeError(path, `expected a number, got ${describeValue(value)}`);
      }
      let bits: bigint;
      if (p.bitWidth === 32) {
        if (Number.isFinite(value) && !Number.isFinite(Math.fround(value))) {
          throw new ValueOutOfRangeError(path, `${value} overflows a 32-bit float`);
        }
        floatScratch.setFloat32(0, value);
        bits = BigInt(floatScratch.getUint32(0));
      } else if (p.bitWidth === 64) {
        floatScratch.setFloat64(0, value);
        bits = floatScratch.getBigUint64(0);
      } else {
        throw new UnsupportedTypeError(path, `floats must be 32 or 64 bits wide, got ${p.bitWidth}`);
      }
      writeBits(out, bitOffset, p.bitWidth, toStreamOrder(bits, p.bitWidth, p.bitorder, p.byteorder), p.bitorder);
      return;
    }

    case 'complex':
      throw new UnsupportedTypeError(path, 'complex numbers are not supported');

    case 'bytes': {
      if (!(value instanceof Uint8Array)) {
        throw new ValueOutOfRangeError(path, `expected a Uint8Array, got ${describeValue(value)}`);
      }
      writeBlob(out, p, path, bitOffset, value);
      return;
    }

    case 'text':
      writeText(out, p, path, bitOffset, value);
      return;

    case 'enum': {
      const table = item.table;
      if (typeof value !== 'string') {
        throw new ValueOutOfRangeError(path, `expected an enum member name, got ${describeValue(value)}`);
      }
      const underlying = table.valueFor(value);
      if (underlying === undefined) throw new UnknownEnumValueError(path, JSON.stringify(value));

      if (underlying instanceof Uint8Array) writeBlob(out, p, path, bitOffset, underlying);
      else if (typeof underlying === 'string') writeText(out, p, path, bitOffset, underlying);
      else writeInt(out, p, path, bitOffset, underlying);
      return;
    }
  }
}

function describeValue(value: unknown): string {
  if (value instanceof Uint8Array) return `Uint8Array(${value.length})`;
  if (Array.isArray(value)) return `array(${value.length})`;
  if (typeof value === 'string') return JSON.stringify(value);
  if (typeof value === 'object' && value !== null) return 'object';
  return String(value);
}

// ─── Path helpers ─────────────────────────────────────────────────────────────

function lookup(root: RecordValue, p: FieldPlan): FieldValue {
  let current: FieldValue = root;
  let path = '';

  for (const seg of p.segments) {
    if (typeof seg === 'number') {
      if (!Array.isArray(current)) {
        throw new ValueOutOfRangeError(path, `expected a list, got ${describeValue(current)}`);
      }
      const list: readonly FieldValue[] = current;
      path = `${path}[${seg}]`;
      const next = list[seg];
      if (next === undefined) throw new MissingFieldValueError(path);
      current = next;
    } else {
      if (!isRecordValue(current)) {
        throw new ValueOutOfRangeError(path, `expected a record, got ${describeValue(current)}`);
      }
      path = path === '' ? seg : `${path}.${seg}`;
      const next = ownValue(current, seg);
      if (next === undefined) throw new MissingFieldValueError(path);
      current = next;
    }
  }
  return current;
}

type Container = RecordValue | FieldValue[];

function isContainer(value: FieldValue | undefined): value is Container {
  return Array.isArray(value) || isRecordValue(value);
}

function getSlot(container: Container, seg: string | number): FieldValue | undefined {
  if (Array.isArray(container)) return typeof seg === 'number' ? container[seg] : undefined;
  return typeof seg === 'string' ? ownValue(container, seg) : undefined;
}

function setSlot(container: Container, seg: string | number, value: FieldValue): void {
  if (Array.isArray(container)) {
    if (typeof seg === 'number') container[seg] = value;
  } else if (typeof seg === 'string') {
    setOwn(container, seg, value);
  }
}

/** Store `value` under `segments`, creating the records and lists on the way. */
function assign(root: RecordValue, segments: readonly (string | number)[], value: FieldValue): void {
  let container: Container = root;

  for (let i = 0; i < segments.length; i++) {
    const seg = segments[i];
    if (seg === undefined) return;
    if (i === segments.length - 1) {
      setSlot(container, seg, value);
      return;
    }

    const existing = getSlot(container, seg);
    let next: Container;
    if (isContainer(existing)) {
      next = existing;
    } else {
      next = typeof segments[i + 1] === 'number' ? [] : {};
      setSlot(container, seg, next);
    }
    container = next;
  }
}

// ─── RecordCodec ──────────────────────────────────────────────────────────────

export class RecordCodec {
  readonly descriptor: RecordDescriptor;
  /** Encoded size in bytes. */
  readonly byteLength: number;

  private readonly _plan: readonly FieldPlan[];

  constructor(descriptor: RecordDescriptor) {
    this.descriptor = descriptor;
    this.byteLength = descriptor.byteLength;
    this._plan      = compilePlan(descriptor);
  }

  /**
   * Decode one record. The buffer must be exactly `byteLength` bytes; in
   * bit-based records the unused bits of the last byte are ignored.
   *
   * @throws BufferSizeMismatchError, UnknownEnumValueError, UnsupportedTypeError
   */
  decode(buffer: Uint8Array): RecordValue {
    if (buffer.byteLength !== this.byteLength) {
      throw new BufferSizeMismatchError(this.byteLength, buffer.byteLength);
    }
    return this._decodeAt(buffer, 0);
  }

  /**
   * Decode `count` consecutive records from the start of `buffer`. Without
   * `count`, the buffer must hold a whole number of records.
   */
  decodeMany(buffer: Uint8Array, count?: number): RecordValue[] {
    const stride = this.byteLength;
    let n: number;
    if (count === undefined) {
      if (buffer.byteLength % stride !== 0) {
        throw new BufferSizeMismatchError(Math.ceil(buffer.byteLength / stride) * stride, buffer.byteLength);
      }
      n = buffer.byteLength / stride;
    } else {
      if (!Number.isSafeInteger(count) || count < 0) {
        throw new RangeError(`decodeMany: count must be a non-negative integer, got ${count}.`);
      }
      if (buffer.byteLength < count * stride) {
        throw new BufferSizeMismatchError(count * stride, buffer.byteLength);
      }
      n = count;
    }

    const records: RecordValue[] = [];
    for (let i = 0; i < n; i++) {
      records.push(this._decodeAt(buffer.subarray(i * stride, (i + 1) * stride), 0));
    }
    return records;
  }

  /**
   * Encode one record into a new buffer of exactly `byteLength` bytes.
   * Fields missing from `record` take their declared defaults.
   *
   * @throws ValueOutOfRangeError, UnknownEnumValueError,
   *         UnsupportedTypeError, MissingFieldValueError
   */
  encode(record: Readonly<Partial<RecordValue>>): Uint8Array {
    const full = createRecord(this.descriptor, record);
    const out  = new Uint8Array(this.byteLength);

    for (const p of this._plan) {
      const value = lookup(full, p);
      if (p.count === null) {
        encodeItem(out, p, p.path, p.bitOffset, value);
        continue;
      }
      if (!Array.isArray(value) || value.length !== p.count) {
        throw new ValueOutOfRangeError(p.path, `expected a list of ${p.count} items, got ${describeValue(value)}`);
      }
      const items: readonly FieldValue[] = value;
      items.forEach((item, i) => {
        encodeItem(out, p, `${p.path}[${i}]`, p.bitOffset + i * p.bitWidth, item);
      });
    }
    return out;
  }

  private _decodeAt(buffer: Uint8Array, baseBit: number): RecordValue {
    const record: RecordValue = {};
    for (const p of this._plan) {
      const start = baseBit + p.bitOffset;
      let value: FieldValue;
      if (p.count === null) {
        value = decodeItem(buffer, p, p.path, start);
      } else {
        const items: FieldValue[] = [];
        for (let i = 0; i < p.count; i++) {
          items.push(decodeItem(buffer, p, `${p.path}[${i}]`, start + i * p.bitWidth));
        }
        value = items;
      }
      assign(record, p.segments, value);
    }
    return record;
  }
}

// ─── Shared codecs ────────────────────────────────────────────────────────────

const codecs = new WeakMap<RecordDescriptor, RecordCodec>();

/** The codec of `descriptor`, compiled on first use and reused afterwards. */
export function getCodec(descriptor: RecordDescriptor): RecordCodec {
  let codec = codecs.get(descriptor);
  if (codec === undefined) {
    codec = new RecordCodec(descriptor);
    codecs.set(descriptor, codec);
  }
  return codec;
}

export function encode(descriptor: RecordDescriptor, record: Readonly<Partial<RecordValue>>): Uint8Array {
  return getCodec(descriptor).encode(record);
}

export function decode(descriptor: RecordDescriptor, buffer: Uint8Array): RecordValue {
  return getCodec(descriptor).decode(buffer);
}
