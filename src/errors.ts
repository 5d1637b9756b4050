/**
 * @bitform/core — error hierarchy
 *
 * Two families, matching when they can occur:
 *
 *   DescriptorError  structural; thrown once while a RecordDescriptor is
 *                    being built. The descriptor is never produced.
 *
 *   CodecError       data; thrown by a single encode/decode call. The
 *                    descriptor stays valid and the call can be retried
 *                    with corrected input.
 */

// ─── Structural ───────────────────────────────────────────────────────────────

export class DescriptorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DescriptorError';
  }
}

/** Malformed type string such as `'i'`, `'x4'` or `'<u0'`. */
export class TypeSpecParseError extends DescriptorError {
  constructor(readonly spec: string, reason: string) {
    super(`Invalid type specifier '${spec}': ${reason}.`);
    this.name = 'TypeSpecParseError';
  }
}

/** A field declaration argument has an impossible value (size 0, offset -1, …). */
export class InvalidFieldSpecError extends DescriptorError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidFieldSpecError';
  }
}

export class MissingFieldSizeError extends DescriptorError {
  constructor(readonly field: string) {
    super(
      `Field '${field}' has no size. ` +
      `Declare 'size' explicitly or use a type that carries one ('u4', a record descriptor, 'bool').`,
    );
    this.name = 'MissingFieldSizeError';
  }
}

export class ConflictingFieldSpecError extends DescriptorError {
  constructor(readonly field: string, detail: string) {
    super(`Field '${field}': ${detail}.`);
    this.name = 'ConflictingFieldSpecError';
  }
}

/** A record builder was used as a field type before build() was called on it. */
export class UnresolvedNestedDescriptorError extends DescriptorError {
  constructor(readonly field: string) {
    super(
      `Field '${field}' refers to a record that has not been built yet. ` +
      `Call build() on the nested RecordBuilder before using it as a field type.`,
    );
    this.name = 'UnresolvedNestedDescriptorError';
  }
}

export class IncompatibleBaseUnitsError extends DescriptorError {
  constructor(readonly field: string, outer: string, inner: string) {
    super(
      `Field '${field}' nests a record measured in ${inner} ` +
      `inside a record measured in ${outer}. Base units must match.`,
    );
    this.name = 'IncompatibleBaseUnitsError';
  }
}

export class SizeTooSmallError extends DescriptorError {
  constructor(readonly declared: number, readonly required: number) {
    super(
      `Declared record size ${declared} is smaller than the ${required} ` +
      `units occupied by its fields.`,
    );
    this.name = 'SizeTooSmallError';
  }
}

/** Strict mode only; outside strict mode an overlap is recorded as a warning. */
export class OverlappingOffsetError extends DescriptorError {
  constructor(readonly field: string, readonly offset: number, readonly previousEnd: number) {
    super(
      `Field '${field}' starts at offset ${offset}, ` +
      `before the end of the preceding field (${previousEnd}).`,
    );
    this.name = 'OverlappingOffsetError';
  }
}

/** Strict mode only: a span of the record is not covered by any field. */
export class LayoutGapError extends DescriptorError {
  constructor(readonly start: number, readonly end: number) {
    super(
      `Units [${start}, ${end}) are not covered by any field. ` +
      `Declare the span as a field, or build the record without strict mode.`,
    );
    this.name = 'LayoutGapError';
  }
}

export class InvalidEnumError extends DescriptorError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidEnumError';
  }
}

// ─── Data ─────────────────────────────────────────────────────────────────────

export class CodecError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CodecError';
  }
}

export class BufferSizeMismatchError extends CodecError {
  constructor(readonly expected: number, readonly actual: number) {
    super(`Buffer size mismatch: expected ${expected} bytes, got ${actual}.`);
    this.name = 'BufferSizeMismatchError';
  }
}

export class ValueOutOfRangeError extends CodecError {
  constructor(readonly path: string, detail: string) {
    super(`Value for field '${path}' is out of range: ${detail}.`);
    this.name = 'ValueOutOfRangeError';
  }
}

export class UnknownEnumValueError extends CodecError {
  constructor(readonly path: string, readonly value: string) {
    super(`Field '${path}': ${value} is not a member of the enum.`);
    this.name = 'UnknownEnumValueError';
  }
}

export class UnsupportedTypeError extends CodecError {
  constructor(readonly path: string, detail: string) {
    super(`Field '${path}': ${detail}.`);
    this.name = 'UnsupportedTypeError';
  }
}

/** Bytes of a text field (or text enum) that are not valid UTF-8. */
export class InvalidTextError extends CodecError {
  constructor(readonly path: string) {
    super(`Field '${path}' does not hold valid UTF-8 text.`);
    this.name = 'InvalidTextError';
  }
}

export class MissingFieldValueError extends CodecError {
  constructor(readonly path: string) {
    super(`No value supplied for field '${path}' and the field declares no default.`);
    this.name = 'MissingFieldValueError';
  }
}
