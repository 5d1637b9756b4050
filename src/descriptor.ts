/**
 * @bitform/core — record descriptors
 *
 * A RecordDescriptor is the resolved, immutable schema of one record type.
 * It is built once and shared by every encode/decode over that type.
 *
 *   const Header = defineRecord({ baseunit: 'bits' }, [
 *     { name: 'flag',    type: 'bool' },
 *     { name: 'version', type: 'u3' },
 *     { name: 'length',  type: 'u4' },
 *   ]);
 *
 *   const Version = defineRecord({}, [
 *     { name: 'major', type: 'u1' },
 *     { name: 'minor', type: 'u1' },
 *   ]);
 *
 *   const Packet = new RecordBuilder({ byteorder: 'big' })
 *     .field('id',      '>u4')
 *     .field('version', Version)
 *     .field('crc',     'u2', { offset: 12 })
 *     .build();
 *
 * A descriptor can only reference descriptors that already exist, so nested
 * records always form an acyclic graph.
 */

import { resolveLayout, type LayoutOptions } from './layout';
import type {
  BaseUnit,
  BitOrder,
  ByteOrder,
  FieldDeclaration,
  FieldTypeDecl,
  FlatField,
  LayoutWarning,
  ResolvedField,
} from './types';

export interface RecordOptions extends LayoutOptions {
  /** Used in diagnostics only. */
  readonly name?:      string;
  /** Called once per warning, after the layout has been resolved. */
  readonly onWarning?: (warning: LayoutWarning) => void;
}

// ─── RecordDescriptor ─────────────────────────────────────────────────────────

export class RecordDescriptor {
  readonly kind = 'record' as const;

  readonly name:       string;
  readonly baseunit:   BaseUnit;
  /** As declared; 'native' is resolved per field in `fields` and `flatFields`. */
  readonly byteorder:  ByteOrder;
  readonly bitorder:   BitOrder;
  /** Total size in base units. */
  readonly size:       number;
  /** Declared fields in order, offsets relative to this record. */
  readonly fields:     readonly ResolvedField[];
  /** Leaf fields with nested records spliced in, offsets relative to this record. */
  readonly flatFields: readonly FlatField[];
  readonly warnings:   readonly LayoutWarning[];

  private readonly _fieldIndex: ReadonlyMap<string, ResolvedField>;

  /**
   * @throws DescriptorError subclasses when the declaration is inconsistent.
   */
  constructor(options: RecordOptions, declarations: readonly FieldDeclaration[]) {
    const layout = resolveLayout(options, declarations);

    this.name        = options.name ?? 'record';
    this.baseunit    = layout.options.baseunit;
    this.byteorder   = layout.options.byteorder;
    this.bitorder    = layout.options.bitorder;
    this.size        = layout.size;
    this.fields      = layout.fields;
    this.flatFields  = layout.flatFields;
    this.warnings    = layout.warnings;
    this._fieldIndex = new Map(layout.fields.map(f => [f.name, f]));
    Object.freeze(this);

    if (options.onWarning !== undefined) {
      for (const w of layout.warnings) options.onWarning(w);
    }
  }

  /** Size of an encoded record in bytes (bit sizes rounded up). */
  get byteLength(): number {
    return calcsize(this, 'bytes');
  }

  field(name: string): ResolvedField | undefined {
    return this._fieldIndex.get(name);
  }
}

// ─── RecordBuilder ────────────────────────────────────────────────────────────

export type FieldOptions = Omit<FieldDeclaration, 'name' | 'type'>;

/**
 * Chained alternative to defineRecord(). A builder is not a descriptor:
 * using one as a field type before build() is a structural error.
 */
export class RecordBuilder {
  readonly kind = 'builder' as const;

  private readonly _declarations: FieldDeclaration[] = [];

  constructor(private readonly _options: RecordOptions = {}) {}

  field(name: string, type: FieldTypeDecl, options: FieldOptions = {}): this {
    this._declarations.push({ ...options, name, type });
    return this;
  }

  /** Padding: an unsigned integer field that exists only to occupy `size` units. */
  pad(name: string, size: number): this {
    return this.field(name, 'int', { size, default: 0 });
  }

  build(): RecordDescriptor {
    return new RecordDescriptor(this._options, this._declarations);
  }
}

export function defineRecord(
  options: RecordOptions,
  fields: readonly FieldDeclaration[],
): RecordDescriptor {
  return new RecordDescriptor(options, fields);
}

// ─── Introspection ────────────────────────────────────────────────────────────

/**
 * Total size of a record, in its own base unit or in `units`.
 * Bits convert to bytes rounding up.
 */
export function calcsize(descriptor: RecordDescriptor, units?: BaseUnit): number {
  const { size, baseunit } = descriptor;
  if (units === undefined || units === baseunit) return size;
  return units === 'bytes' ? Math.ceil(size / 8) : size * 8;
}

/** A declared field, or a span no field covers (`padding: true`). */
export type LayoutEntry =
  | { readonly padding: false; readonly field: ResolvedField; readonly offset: number; readonly size: number }
  | { readonly padding: true;  readonly offset: number; readonly size: number };

/**
 * The declared fields in order. With `pad`, spans between fields and after
 * the last one are yielded as padding entries, so the entries tile the
 * whole record (overlapping fields are yielded as declared).
 */
export function* fieldDescriptors(
  descriptor: RecordDescriptor,
  options: { readonly pad?: boolean } = {},
): Generator<LayoutEntry> {
  let end = 0;
  for (const field of descriptor.fields) {
    if (options.pad && field.offset > end) {
      yield { padding: true, offset: end, size: field.offset - end };
    }
    const size = field.size * (field.repeat ?? 1);
    yield { padding: false, field, offset: field.offset, size };
    end = Math.max(end, field.offset + size);
  }
  if (options.pad && end < descriptor.size) {
    yield { padding: true, offset: end, size: descriptor.size - end };
  }
}
