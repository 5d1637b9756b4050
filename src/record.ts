/**
 * @bitform/core — record values
 *
 * Records are plain objects keyed by field name. createRecord() fills in
 * whatever the caller left out from declared defaults, recursing into
 * nested records; encode() runs every input through it.
 */

import { MissingFieldValueError } from './errors';
import type { RecordDescriptor } from './descriptor';
import type { FieldValue, RecordValue, ResolvedField } from './types';

/** True for a nested record value: a plain object, not a list or a byte array. */
export function isRecordValue(value: unknown): value is RecordValue {
  return typeof value === 'object'
    && value !== null
    && !Array.isArray(value)
    && !(value instanceof Uint8Array);
}

/**
 * Own property `key` of `record`. Inherited names such as `valueOf` or
 * `constructor` are not field values.
 */
export function ownValue(record: Readonly<Partial<RecordValue>>, key: string): FieldValue | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}

/** Store `value` as an own property, including under `__proto__`. */
export function setOwn(record: RecordValue, key: string, value: FieldValue): void {
  Object.defineProperty(record, key, { value, writable: true, enumerable: true, configurable: true });
}

// Defaults are shared by every record built from a descriptor; hand out copies
// of the mutable ones.
function copyDefault(value: FieldValue): FieldValue {
  if (value instanceof Uint8Array) return value.slice();
  if (Array.isArray(value)) return value.map(copyDefault);
  if (isRecordValue(value)) {
    const out: RecordValue = {};
    for (const [k, v] of Object.entries(value)) setOwn(out, k, copyDefault(v));
    return out;
  }
  return value;
}

function fillField(field: ResolvedField, supplied: FieldValue | undefined, path: string): FieldValue {
  const { kind } = field;

  if (supplied !== undefined) {
    if (kind.tag === 'record' && isRecordValue(supplied)) {
      return fill(kind.descriptor, supplied, `${path}.`);
    }
    if (kind.tag === 'sequence' && kind.item.tag === 'record' && Array.isArray(supplied)) {
      const nested = kind.item.descriptor;
      return supplied.map((item: FieldValue, i) =>
        isRecordValue(item) ? fill(nested, item, `${path}[${i}].`) : item,
      );
    }
    return supplied;
  }

  if (field.default !== undefined) return copyDefault(field.default);

  if (kind.tag === 'record') return fill(kind.descriptor, {}, `${path}.`);
  if (kind.tag === 'sequence' && kind.item.tag === 'record') {
    const nested = kind.item.descriptor;
    return Array.from({ length: kind.count }, (_, i) => fill(nested, {}, `${path}[${i}].`));
  }

  throw new MissingFieldValueError(path);
}

function fill(descriptor: RecordDescriptor, values: Readonly<Partial<RecordValue>>, prefix: string): RecordValue {
  const out: RecordValue = {};
  for (const field of descriptor.fields) {
    setOwn(out, field.name, fillField(field, ownValue(values, field.name), `${prefix}${field.name}`));
  }
  return out;
}

/**
 * Build a record of `descriptor` from `values`, falling back to each field's
 * declared default, and for nested records to a record built from their own
 * defaults. Keys that name no field are dropped.
 *
 * @throws MissingFieldValueError for a field with neither a value nor a default.
 */
export function createRecord(
  descriptor: RecordDescriptor,
  values: Readonly<Partial<RecordValue>> = {},
): RecordValue {
  return fill(descriptor, values, '');
}

/** A record's values in declaration order; nested records become nested tuples. */
export type RecordTuple = readonly (FieldValue | RecordTuple)[];

export function asTuple(descriptor: RecordDescriptor, record: RecordValue): RecordTuple {
  return descriptor.fields.map((field): FieldValue | RecordTuple => {
    const value = ownValue(record, field.name);
    if (value === undefined) throw new MissingFieldValueError(field.name);

    const { kind } = field;
    if (kind.tag === 'record' && isRecordValue(value)) {
      return asTuple(kind.descriptor, value);
    }
    if (kind.tag === 'sequence' && kind.item.tag === 'record' && Array.isArray(value)) {
      const nested = kind.item.descriptor;
      return value.map((item: FieldValue) => (isRecordValue(item) ? asTuple(nested, item) : item));
    }
    return value;
  });
}
