/**
 * @bitform/core — field declarations
 *
 * resolveFieldSpec() turns one FieldDeclaration into a FieldSpec: the item
 * kind, the item size and signedness settled, the offset still optional.
 * Offsets are assigned by the layout resolver, which sees the whole list.
 *
 * Size rules, first match wins:
 *   bool without size             → 1
 *   record without size           → the nested record's size
 *   type string ('u4', '<f8', …)  → its embedded width, unless overridden
 *   anything else                 → size is mandatory
 */

import {
  ConflictingFieldSpecError,
  InvalidFieldSpecError,
  MissingFieldSizeError,
  UnresolvedNestedDescriptorError,
} from './errors';
import { intBounds } from './bits';
import type { EnumTable } from './enums';
import { parseTypeSpec } from './typestr';
import {
  UNIT_BITS,
  type BaseUnit,
  type FieldDeclaration,
  type FieldValue,
  type ItemKind,
  type LayoutWarning,
  type ResolvedByteOrder,
  type TypeKeyword,
} from './types';

/** A declaration after type and size resolution; offset not yet assigned. */
export interface FieldSpec {
  readonly name:     string;
  readonly kind:     ItemKind;
  readonly size:     number;
  readonly offset:   number | null;
  readonly signed:   boolean;
  readonly repeat:   number | null;
  readonly default?: FieldValue;
}

/** Record-level settings a field is resolved against. */
export interface FieldContext {
  readonly baseunit:  BaseUnit;
  /** The record's effective byte order ('native' already resolved). */
  readonly byteorder: ResolvedByteOrder;
  readonly warn:      (warning: LayoutWarning) => void;
}

const KEYWORD_KINDS: Readonly<Record<TypeKeyword, ItemKind>> = {
  bool:    { tag: 'bool' },
  int:     { tag: 'int' },
  float:   { tag: 'float' },
  complex: { tag: 'complex' },
  bytes:   { tag: 'bytes' },
  text:    { tag: 'text' },
};

function isKeyword(type: string): type is TypeKeyword {
  return Object.prototype.hasOwnProperty.call(KEYWORD_KINDS, type);
}

const utf8Encoder = new TextEncoder();

/** Every member of an enum field must be encodable in the field's width. */
function checkEnumMembers(name: string, table: EnumTable, bitWidth: number, signed: boolean): void {
  const { min, max } = intBounds(bitWidth, signed);

  for (const member of table.names) {
    const value = table.valueFor(member);
    if (value === undefined) continue;

    if (typeof value === 'number' || typeof value === 'bigint') {
      const v = BigInt(value);
      if (v < min || v > max) {
        throw new ConflictingFieldSpecError(
          name,
          `enum member '${member}' (${v}) does not fit in ${bitWidth} ${signed ? 'signed' : 'unsigned'} bits`,
        );
      }
      continue;
    }

    const length = typeof value === 'string' ? utf8Encoder.encode(value).length : value.length;
    if (length * 8 !== bitWidth) {
      throw new ConflictingFieldSpecError(
        name,
        `enum member '${member}' is ${length} bytes long but the field is ${bitWidth} bits wide`,
      );
    }
  }
}

function checkPositiveInt(name: string, what: string, value: number): void {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new InvalidFieldSpecError(
      `Field '${name}': ${what} must be a positive integer, got ${value}.`,
    );
  }
}

/**
 * Resolve type, size and signedness of a single declaration.
 *
 * @throws MissingFieldSizeError, ConflictingFieldSpecError,
 *         UnresolvedNestedDescriptorError, InvalidFieldSpecError,
 *         TypeSpecParseError
 */
export function resolveFieldSpec(decl: FieldDeclaration, ctx: FieldContext): FieldSpec {
  const { name, type } = decl;

  if (typeof name !== 'string' || name === '') {
    throw new InvalidFieldSpecError('Every field needs a non-empty name.');
  }
  if (decl.size !== undefined) checkPositiveInt(name, 'size', decl.size);
  if (decl.repeat !== undefined) checkPositiveInt(name, 'repeat', decl.repeat);
  if (decl.offset !== undefined && (!Number.isSafeInteger(decl.offset) || decl.offset < 0)) {
    throw new InvalidFieldSpecError(
      `Field '${name}': offset must be a non-negative integer, got ${decl.offset}.`,
    );
  }

  let kind:   ItemKind;
  let size:   number | undefined = decl.size;
  let signed: boolean | undefined = decl.signed;

  if (typeof type === 'string') {
    if (isKeyword(type)) {
      kind = KEYWORD_KINDS[type];
      if (kind.tag === 'bool' && size === undefined) size = 1;
    } else {
      const params = parseTypeSpec(type);
      if (size !== undefined && size !== params.size) {
        throw new ConflictingFieldSpecError(
          name, `size ${size} contradicts the width of type '${type}' (${params.size})`,
        );
      }
      if (signed !== undefined && params.signed !== null && signed !== params.signed) {
        throw new ConflictingFieldSpecError(
          name, `signed=${signed} contradicts type '${type}'`,
        );
      }
      if (params.byteorder !== null && params.byteorder !== ctx.byteorder) {
        throw new ConflictingFieldSpecError(
          name, `type '${type}' is ${params.byteorder}-endian but the record is ${ctx.byteorder}-endian`,
        );
      }
      kind   = KEYWORD_KINDS[params.tag];
      size   = params.size;
      signed = signed ?? params.signed ?? undefined;
    }
  } else {
    switch (type.kind) {
      case 'builder':
        throw new UnresolvedNestedDescriptorError(name);
      case 'enum':
        kind = { tag: 'enum', table: type };
        break;
      case 'record':
        kind = { tag: 'record', descriptor: type };
        if (size === undefined) {
          size = type.size;
        } else if (size !== type.size) {
          throw new ConflictingFieldSpecError(
            name, `size ${size} differs from the size of the nested record (${type.size})`,
          );
        }
        break;
    }
  }

  if (size === undefined) throw new MissingFieldSizeError(name);

  const isInt = kind.tag === 'int' || (kind.tag === 'enum' && kind.table.base === 'int');
  if (!isInt && signed !== undefined) {
    if (signed) {
      ctx.warn({
        code:    'signed-ignored',
        field:   name,
        message: `Field '${name}': 'signed' is ignored for ${kind.tag} fields.`,
      });
    }
    signed = false;
  }

  if (kind.tag === 'enum') {
    checkEnumMembers(name, kind.table, size * UNIT_BITS[ctx.baseunit], signed ?? false);
  }

  const spec: FieldSpec = {
    name,
    kind,
    size,
    offset: decl.offset ?? null,
    signed: signed ?? false,
    repeat: decl.repeat ?? null,
  };
  return decl.default !== undefined ? { ...spec, default: decl.default } : spec;
}
