/**
 * @bitform/core — type definitions
 *
 * Every size and offset in a descriptor is a count of base units (bits or
 * bytes). A field's footprint is `size × (repeat ?? 1)` units.
 */

import type { EnumTable } from './enums';
import type { RecordDescriptor, RecordBuilder } from './descriptor';

// ─── Units & Ordering ─────────────────────────────────────────────────────────

export type BaseUnit = 'bits' | 'bytes';

/**
 * 'native' is resolved once per process to the platform byte order; resolved
 * fields only ever carry 'big' or 'little'.
 */
export type ByteOrder         = 'big' | 'little' | 'native';
export type ResolvedByteOrder = 'big' | 'little';

/**
 * msb:  bit 0 of a record is the most significant bit of byte 0.
 * lsb:  bit 0 of a record is the least significant bit of byte 0.
 * none: byte-based records, where bits are never addressed individually.
 */
export type BitOrder = 'msb' | 'lsb' | 'none';

/** Number of bits in one base unit. */
export const UNIT_BITS: Readonly<Record<BaseUnit, number>> = {
  bits:  1,
  bytes: 8,
};

// ─── Type Kinds ───────────────────────────────────────────────────────────────

/** Keywords accepted as a field `type` in addition to type strings. */
export type TypeKeyword = 'bool' | 'int' | 'float' | 'complex' | 'bytes' | 'text';

/**
 * Kind of a single item. `int` covers both signed and unsigned integers;
 * signedness lives on the field (`ResolvedField.signed`).
 */
export type ItemKind =
  | { readonly tag: 'bool' }
  | { readonly tag: 'int' }
  | { readonly tag: 'float' }
  | { readonly tag: 'complex' }
  | { readonly tag: 'bytes' }
  | { readonly tag: 'text' }
  | { readonly tag: 'enum';   readonly table: EnumTable }
  | { readonly tag: 'record'; readonly descriptor: RecordDescriptor };

/** A repeated field is a sequence of `count` items, each `size` units wide. */
export type TypeKind =
  | ItemKind
  | { readonly tag: 'sequence'; readonly item: ItemKind; readonly count: number };

// ─── Values ───────────────────────────────────────────────────────────────────

/** Underlying value of an enum member. Members of one enum share a kind. */
export type EnumValue = number | bigint | string | Uint8Array;

/**
 * Decoded value of a field.
 *
 *   bool            boolean
 *   int ≤ 32 bits   number
 *   int > 32 bits   bigint   (encode accepts number or bigint at any width)
 *   float           number
 *   bytes           Uint8Array
 *   text            string
 *   enum            member name
 *   record          RecordValue
 *   sequence        array of the item values
 */
export type FieldValue =
  | boolean
  | number
  | bigint
  | string
  | Uint8Array
  | RecordValue
  | readonly FieldValue[];

export interface RecordValue {
  [name: string]: FieldValue;
}

// ─── Declarations ─────────────────────────────────────────────────────────────

/**
 * Field type as written in a declaration: a keyword, a type string such as
 * `'<i4'`, an enum table, or another record descriptor.
 */
export type FieldTypeDecl =
  | TypeKeyword
  | (string & {})
  | EnumTable
  | RecordDescriptor
  | RecordBuilder;

export interface FieldDeclaration {
  readonly name:     string;
  readonly type:     FieldTypeDecl;
  readonly size?:    number;
  readonly offset?:  number;
  readonly signed?:  boolean;
  readonly repeat?:  number;
  /** Used when a record is built or encoded without a value for this field. Not validated. */
  readonly default?: FieldValue;
}

// ─── Resolved Layout ──────────────────────────────────────────────────────────

export interface ResolvedField {
  readonly name:      string;
  readonly kind:      TypeKind;
  /** Offset from the start of the owning record, in base units. */
  readonly offset:    number;
  /** Size of one item, in base units. */
  readonly size:      number;
  readonly repeat:    number | null;
  readonly signed:    boolean;
  readonly byteorder: ResolvedByteOrder;
  readonly bitorder:  BitOrder;
  readonly default?:  FieldValue;
}

/**
 * A leaf of the flattened layout. Nested records are replaced by their own
 * fields; `segments` is the property path from the root record value
 * (numbers index repeated records).
 */
export interface FlatField {
  readonly path:      string;
  readonly segments:  readonly (string | number)[];
  /** Never a record, or a sequence of records. */
  readonly kind:      TypeKind;
  /** Offset from the start of the root record, in base units. */
  readonly offset:    number;
  readonly size:      number;
  readonly repeat:    number | null;
  readonly signed:    boolean;
  readonly byteorder: ResolvedByteOrder;
  readonly bitorder:  BitOrder;
}

// ─── Diagnostics ──────────────────────────────────────────────────────────────

/**
 * overlapping-offset     explicit offset before the end of the preceding field
 * non-contiguous-layout  fields do not tile [0, size) (debug builds only)
 * not-byte-aligned       bit-based record whose size is not a multiple of 8
 * signed-ignored         `signed` given for a non-integer field
 */
export type LayoutWarningCode =
  | 'overlapping-offset'
  | 'non-contiguous-layout'
  | 'not-byte-aligned'
  | 'signed-ignored';

export interface LayoutWarning {
  readonly code:    LayoutWarningCode;
  readonly message: string;
  readonly field?:  string;
}
