// ─── Types ────────────────────────────────────────────────────────────────────
export type {
  BaseUnit,
  ByteOrder,
  ResolvedByteOrder,
  BitOrder,
  TypeKeyword,
  ItemKind,
  TypeKind,
  EnumValue,
  FieldValue,
  RecordValue,
  FieldTypeDecl,
  FieldDeclaration,
  ResolvedField,
  FlatField,
  LayoutWarningCode,
  LayoutWarning,
} from './types';

export { UNIT_BITS } from './types';

// ─── Type strings ─────────────────────────────────────────────────────────────
export type { TypeParams, TypeParamsTag } from './typestr';
export { parseTypeSpec, formatTypeSpec } from './typestr';

// ─── Enums ────────────────────────────────────────────────────────────────────
export type { EnumBase } from './enums';
export { EnumTable, defineEnum } from './enums';

// ─── Layout ───────────────────────────────────────────────────────────────────
export type { LayoutOptions, NormalizedLayoutOptions, ResolvedLayout } from './layout';
export { NATIVE_BYTEORDER, normalizeLayoutOptions, resolveLayout } from './layout';

// ─── Descriptors ──────────────────────────────────────────────────────────────
export type { RecordOptions, FieldOptions, LayoutEntry } from './descriptor';
export {
  RecordDescriptor,
  RecordBuilder,
  defineRecord,
  calcsize,
  fieldDescriptors,
} from './descriptor';

// ─── Codec ────────────────────────────────────────────────────────────────────
export { RecordCodec, getCodec, encode, decode } from './codec';

export type { StreamBitOrder } from './bits';
export { readBits, writeBits } from './bits';

// ─── Records ──────────────────────────────────────────────────────────────────
export type { RecordTuple } from './record';
export { createRecord, asTuple, isRecordValue } from './record';

// ─── Packed samples ───────────────────────────────────────────────────────────
export type { PackedSampleOptions, PackOptions } from './packbits';
export { unpackBits, packBits } from './packbits';

// ─── Errors ───────────────────────────────────────────────────────────────────
export {
  DescriptorError,
  TypeSpecParseError,
  InvalidFieldSpecError,
  MissingFieldSizeError,
  ConflictingFieldSpecError,
  UnresolvedNestedDescriptorError,
  IncompatibleBaseUnitsError,
  SizeTooSmallError,
  OverlappingOffsetError,
  LayoutGapError,
  InvalidEnumError,
  CodecError,
  BufferSizeMismatchError,
  ValueOutOfRangeError,
  UnknownEnumValueError,
  UnsupportedTypeError,
  InvalidTextError,
  MissingFieldValueError,
} from './errors';
