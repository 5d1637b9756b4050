/**
 * @bitform/core — type strings
 *
 * A compact notation for numeric and blob field types:
 *
 *   [order] kind width
 *
 *   order  '<' little-endian, '>' big-endian, '|' not relevant (optional)
 *   kind   'i' signed int, 'u' unsigned int, 'f' float, 'c' complex,
 *          'S' fixed-length bytes
 *   width  field size in the record's base unit (bits or bytes)
 *
 * Examples: 'u3' (3-bit unsigned in a bit record), '<i4' (little-endian
 * 32-bit signed in a byte record), 'S10' (ten raw bytes).
 *
 * 'c' parses so that schemas can name it, but the codec rejects it.
 */

import { TypeSpecParseError } from './errors';
import type { ResolvedByteOrder } from './types';

export type TypeParamsTag = 'int' | 'float' | 'complex' | 'bytes';

export interface TypeParams {
  /** null when the string carries no order character or uses '|'. */
  readonly byteorder: ResolvedByteOrder | null;
  readonly tag:       TypeParamsTag;
  readonly size:      number;
  /** Set for 'i' and 'u'; null for every other kind. */
  readonly signed:    boolean | null;
}

const ORDER_CHARS: Readonly<Record<string, ResolvedByteOrder | null>> = {
  '<': 'little',
  '>': 'big',
  '|': null,
};

const KIND_CHARS: Readonly<Record<string, { tag: TypeParamsTag; signed: boolean | null }>> = {
  i: { tag: 'int',     signed: true  },
  u: { tag: 'int',     signed: false },
  f: { tag: 'float',   signed: null  },
  c: { tag: 'complex', signed: null  },
  S: { tag: 'bytes',   signed: null  },
};

const TYPESTR_RE = /^([<>|])?([A-Za-z])(.*)$/;

// Parsed strings never change meaning; schemas tend to repeat the same few.
const cache = new Map<string, TypeParams>();

/**
 * Parse a type string into its parameters.
 *
 * @throws TypeSpecParseError on an unknown order or kind character, or a
 *         missing, non-numeric or zero width.
 */
export function parseTypeSpec(spec: string): TypeParams {
  const cached = cache.get(spec);
  if (cached !== undefined) return cached;

  const m = TYPESTR_RE.exec(spec);
  if (m === null) {
    if (spec === '') throw new TypeSpecParseError(spec, 'empty string');
    const hasOrder = ORDER_CHARS[spec.charAt(0)] !== undefined;
    const bad      = hasOrder ? spec.charAt(1) : spec.charAt(0);
    if (bad === '') throw new TypeSpecParseError(spec, 'missing kind character');
    throw new TypeSpecParseError(spec, `unknown ${hasOrder ? 'kind' : 'order or kind'} character '${bad}'`);
  }

  const [, orderChar, kindChar = '', width = ''] = m;
  const kind = KIND_CHARS[kindChar];
  if (kind === undefined) {
    throw new TypeSpecParseError(spec, `unknown kind character '${kindChar}'`);
  }
  if (width === '') {
    throw new TypeSpecParseError(spec, 'missing width');
  }
  if (!/^\d+$/.test(width)) {
    throw new TypeSpecParseError(spec, `width '${width}' is not a number`);
  }
  const size = Number(width);
  if (size === 0 || !Number.isSafeInteger(size)) {
    throw new TypeSpecParseError(spec, `width must be a positive integer, got ${width}`);
  }

  const params: TypeParams = Object.freeze({
    byteorder: orderChar === undefined ? null : (ORDER_CHARS[orderChar] ?? null),
    tag:       kind.tag,
    size,
    signed:    kind.signed,
  });
  cache.set(spec, params);
  return params;
}

/** Inverse of parseTypeSpec. `formatTypeSpec(parseTypeSpec(s))` omits a '|' order. */
export function formatTypeSpec(params: TypeParams): string {
  const order = params.byteorder === 'little' ? '<'
              : params.byteorder === 'big'    ? '>'
              : '';
  let kind: string;
  switch (params.tag) {
    case 'int':     kind = params.signed ? 'i' : 'u'; break;
    case 'float':   kind = 'f'; break;
    case 'complex': kind = 'c'; break;
    case 'bytes':   kind = 'S'; break;
  }
  return `${order}${kind}${params.size}`;
}
