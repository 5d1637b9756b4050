/**
 * @bitform/core — layout resolver
 *
 * Walks the declarations in order with a cursor that starts at 0:
 *
 *   offset = field.offset ?? cursor
 *   cursor = offset + size × (repeat ?? 1)
 *
 * An explicit offset is taken as given. That is the only way to skip over
 * a span of the binary layout that has no declared field: without it, the
 * next field lands right after the last *declared* one. The resolver
 * cannot know a gap exists, so it does not try to detect one. With the
 * `debug` option set, a layout that does not tile [0, size) is reported as
 * a `non-contiguous-layout` warning; with `strict` it is an error.
 *
 * Nested records are flattened into `flatFields` with offsets shifted into
 * the parent's address space. They keep their own byte and bit order but
 * must share the parent's base unit.
 */

import {
  ConflictingFieldSpecError,
  IncompatibleBaseUnitsError,
  InvalidFieldSpecError,
  LayoutGapError,
  OverlappingOffsetError,
  SizeTooSmallError,
} from './errors';
import { resolveFieldSpec, type FieldSpec } from './field';
import type {
  BaseUnit,
  BitOrder,
  ByteOrder,
  FieldDeclaration,
  FlatField,
  LayoutWarning,
  ResolvedByteOrder,
  ResolvedField,
  TypeKind,
} from './types';

// ─── Native byte order ────────────────────────────────────────────────────────

// [0x01, 0x00] reads as 0x0001 on a little-endian host and 0x0100 on a
// big-endian one. Evaluated once, so every codec in the process agrees.
export const NATIVE_BYTEORDER: ResolvedByteOrder =
  new Uint16Array(new Uint8Array([0x01, 0x00]).buffer)[0] === 1 ? 'little' : 'big';

// ─── Options ──────────────────────────────────────────────────────────────────

export interface LayoutOptions {
  /** Default 'bytes'. */
  readonly baseunit?:  BaseUnit;
  /** Default 'big' for bit records, 'native' for byte records. */
  readonly byteorder?: ByteOrder;
  /** Default 'msb' for bit records; must be 'none' (or omitted) for byte records. */
  readonly bitorder?:  BitOrder;
  /** Total size in base units. Default: end of the furthest field. */
  readonly size?:      number;
  /** Turn overlapping offsets and uncovered spans into errors. Default false. */
  readonly strict?:    boolean;
  /** Report layouts that do not tile [0, size) as warnings. Default false. */
  readonly debug?:     boolean;
}

export interface NormalizedLayoutOptions {
  readonly baseunit:           BaseUnit;
  readonly byteorder:          ByteOrder;
  readonly effectiveByteorder: ResolvedByteOrder;
  readonly bitorder:           BitOrder;
}

export function normalizeLayoutOptions(options: LayoutOptions): NormalizedLayoutOptions {
  const baseunit = options.baseunit ?? 'bytes';
  if (baseunit !== 'bits' && baseunit !== 'bytes') {
    throw new InvalidFieldSpecError(`Unknown base unit '${String(baseunit)}'.`);
  }

  const byteorder = options.byteorder ?? (baseunit === 'bits' ? 'big' : 'native');
  if (byteorder !== 'big' && byteorder !== 'little' && byteorder !== 'native') {
    throw new InvalidFieldSpecError(`Unknown byte order '${String(byteorder)}'.`);
  }

  let bitorder: BitOrder;
  if (baseunit === 'bytes') {
    if (options.bitorder !== undefined && options.bitorder !== 'none') {
      throw new InvalidFieldSpecError(
        `Bit order '${options.bitorder}' cannot be set on a record measured in bytes.`,
      );
    }
    bitorder = 'none';
  } else {
    bitorder = options.bitorder ?? 'msb';
    if (bitorder !== 'msb' && bitorder !== 'lsb') {
      throw new InvalidFieldSpecError(
        `Records measured in bits need bit order 'msb' or 'lsb', got '${String(bitorder)}'.`,
      );
    }
  }

  return {
    baseunit,
    byteorder,
    effectiveByteorder: byteorder === 'native' ? NATIVE_BYTEORDER : byteorder,
    bitorder,
  };
}

// ─── Resolution ───────────────────────────────────────────────────────────────

export interface ResolvedLayout {
  readonly options:    NormalizedLayoutOptions;
  readonly fields:     readonly ResolvedField[];
  readonly flatFields: readonly FlatField[];
  readonly size:       number;
  readonly warnings:   readonly LayoutWarning[];
}

function footprint(f: { size: number; repeat: number | null }): number {
  return f.size * (f.repeat ?? 1);
}

function kindOf(spec: FieldSpec): TypeKind {
  return spec.repeat === null
    ? spec.kind
    : { tag: 'sequence', item: spec.kind, count: spec.repeat };
}

/**
 * Resolve a list of declarations into an absolute layout.
 *
 * @throws DescriptorError subclasses; see errors.ts. Nothing is returned on
 *         failure.
 */
export function resolveLayout(
  options: LayoutOptions,
  declarations: readonly FieldDeclaration[],
): ResolvedLayout {
  const normalized = normalizeLayoutOptions(options);
  const { baseunit, effectiveByteorder, bitorder } = normalized;

  if (declarations.length === 0) {
    throw new InvalidFieldSpecError('A record must declare at least one field.');
  }

  const warnings: LayoutWarning[] = [];
  const warn = (w: LayoutWarning): void => { warnings.push(w); };
  const ctx  = { baseunit, byteorder: effectiveByteorder, warn };

  const seen       = new Set<string>();
  const fields:     ResolvedField[] = [];
  const flatFields: FlatField[]     = [];

  let cursor   = 0;
  let highMark = 0;

  for (const decl of declarations) {
    const spec = resolveFieldSpec(decl, ctx);

    if (seen.has(spec.name)) {
      throw new InvalidFieldSpecError(
        `Duplicate field name '${spec.name}'. Field names must be unique within a record.`,
      );
    }
    seen.add(spec.name);

    if (spec.kind.tag === 'record' && spec.kind.descriptor.baseunit !== baseunit) {
      throw new IncompatibleBaseUnitsError(spec.name, baseunit, spec.kind.descriptor.baseunit);
    }

    let offset: number;
    if (spec.offset === null) {
      offset = cursor;
    } else {
      offset = spec.offset;
      if (offset < cursor) {
        if (options.strict) throw new OverlappingOffsetError(spec.name, offset, cursor);
        warn({
          code:    'overlapping-offset',
          field:   spec.name,
          message: `Field '${spec.name}' starts at ${offset}, before the end of the preceding field (${cursor}).`,
        });
      }
    }

    checkNestedBitorder(spec, offset, bitorder);

    cursor   = offset + footprint(spec);
    highMark = Math.max(highMark, cursor);

    const resolved: ResolvedField = {
      name:      spec.name,
      kind:      kindOf(spec),
      offset,
      size:      spec.size,
      repeat:    spec.repeat,
      signed:    spec.signed,
      byteorder: effectiveByteorder,
      bitorder,
      ...(spec.default !== undefined ? { default: spec.default } : {}),
    };
    fields.push(Object.freeze(resolved));
    flatten(resolved, flatFields);
  }

  let size = highMark;
  if (options.size !== undefined) {
    if (!Number.isSafeInteger(options.size) || options.size <= 0) {
      throw new InvalidFieldSpecError(`Record size must be a positive integer, got ${options.size}.`);
    }
    if (options.size < highMark) throw new SizeTooSmallError(options.size, highMark);
    size = options.size;
  }

  if (options.debug || options.strict) {
    const hole = findUncoveredSpan(fields, size);
    if (hole !== null) {
      if (options.strict) throw new LayoutGapError(hole.start, hole.end);
      warn({
        code:    'non-contiguous-layout',
        message: `Units [${hole.start}, ${hole.end}) are not covered by any field. ` +
                 `If the binary layout has a field there, declare it or give the next field an explicit offset.`,
      });
    }
  }

  if (baseunit === 'bits' && size % 8 !== 0) {
    warn({
      code:    'not-byte-aligned',
      message: `Record size ${size} bits is not a whole number of bytes; ` +
               `the trailing ${8 - (size % 8)} bits of the last byte are unused.`,
    });
  }

  return {
    options:    normalized,
    fields:     Object.freeze(fields),
    flatFields: Object.freeze(flatFields),
    size,
    warnings:   Object.freeze(warnings),
  };
}

/**
 * Append the leaves of `field` to `out`. Records are spliced in with their
 * already-flattened fields shifted by the field's offset (and, when
 * repeated, by `size` per item).
 */
function flatten(field: ResolvedField, out: FlatField[]): void {
  const { kind } = field;
  const item = kind.tag === 'sequence' ? kind.item : kind;

  if (item.tag !== 'record') {
    out.push(Object.freeze({
      path:      field.name,
      segments:  Object.freeze([field.name]),
      kind,
      offset:    field.offset,
      size:      field.size,
      repeat:    field.repeat,
      signed:    field.signed,
      byteorder: field.byteorder,
      bitorder:  field.bitorder,
    }));
    return;
  }

  const count = field.repeat ?? 1;
  for (let i = 0; i < count; i++) {
    const base     = field.offset + i * field.size;
    const prefix   = field.repeat === null ? field.name : `${field.name}[${i}]`;
    const segments = field.repeat === null ? [field.name] : [field.name, i];
    for (const nested of item.descriptor.flatFields) {
      out.push(Object.freeze({
        ...nested,
        path:     `${prefix}.${nested.path}`,
        segments: Object.freeze([...segments, ...nested.segments]),
        offset:   base + nested.offset,
      }));
    }
  }
}

/**
 * msb and lsb number the bits of a byte from opposite ends, so a nested
 * record with the other bit order must own whole bytes.
 */
function checkNestedBitorder(spec: FieldSpec, offset: number, bitorder: BitOrder): void {
  if (spec.kind.tag !== 'record') return;
  const nested = spec.kind.descriptor.bitorder;
  if (nested === bitorder) return;

  const size = footprint(spec);
  if (offset % 8 !== 0 || size % 8 !== 0) {
    throw new ConflictingFieldSpecError(
      spec.name,
      `a record with bit order '${nested}' inside a '${bitorder}' record must start and end ` +
      `on a byte boundary (offset ${offset}, size ${size} bits)`,
    );
  }
}

/** First span of [0, size) not covered by any field, or null. */
function findUncoveredSpan(
  fields: readonly ResolvedField[],
  size: number,
): { start: number; end: number } | null {
  const spans = fields
    .map(f => ({ start: f.offset, end: f.offset + footprint(f) }))
    .sort((a, b) => a.start - b.start);

  let covered = 0;
  for (const span of spans) {
    if (span.start > covered) return { start: covered, end: span.start };
    covered = Math.max(covered, span.end);
  }
  return covered < size ? { start: covered, end: size } : null;
}
