/**
 * @bitform/core — type string parsing
 */

import { describe, it, expect } from 'vitest';
import { parseTypeSpec, formatTypeSpec, TypeSpecParseError } from '../src/index';

describe('parseTypeSpec', () => {
  it('parses order, kind and width', () => {
    expect(parseTypeSpec('<i4')).toEqual({ byteorder: 'little', tag: 'int', size: 4, signed: true });
    expect(parseTypeSpec('>u2')).toEqual({ byteorder: 'big', tag: 'int', size: 2, signed: false });
    expect(parseTypeSpec('f8')).toEqual({ byteorder: null, tag: 'float', size: 8, signed: null });
    expect(parseTypeSpec('|S10')).toEqual({ byteorder: null, tag: 'bytes', size: 10, signed: null });
    expect(parseTypeSpec('c16')).toEqual({ byteorder: null, tag: 'complex', size: 16, signed: null });
  });

  it('accepts widths that are not powers of two', () => {
    expect(parseTypeSpec('u3').size).toBe(3);
    expect(parseTypeSpec('i12').size).toBe(12);
  });

  it('returns the same frozen object for a repeated string', () => {
    const a = parseTypeSpec('u7');
    expect(parseTypeSpec('u7')).toBe(a);
    expect(Object.isFrozen(a)).toBe(true);
  });

  it.each([
    ['',     "Invalid type specifier '': empty string."],
    ['i',    "Invalid type specifier 'i': missing width."],
    ['x4',   "Invalid type specifier 'x4': unknown kind character 'x'."],
    ['<',    "Invalid type specifier '<': missing kind character."],
    ['<4',   "Invalid type specifier '<4': unknown kind character '4'."],
    ['#u4',  "Invalid type specifier '#u4': unknown order or kind character '#'."],
    ['u4x',  "Invalid type specifier 'u4x': width '4x' is not a number."],
    ['<u0',  "Invalid type specifier '<u0': width must be a positive integer, got 0."],
  ])('rejects %j', (spec, message) => {
    expect(() => parseTypeSpec(spec)).toThrow(TypeSpecParseError);
    expect(() => parseTypeSpec(spec)).toThrow(message);
  });

  it('keeps the offending string on the error', () => {
    try {
      parseTypeSpec('q2');
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(TypeSpecParseError);
      if (e instanceof TypeSpecParseError) expect(e.spec).toBe('q2');
    }
  });
});

describe('formatTypeSpec', () => {
  it('is the inverse of parseTypeSpec', () => {
    for (const spec of ['<i4', '>u2', 'f8', 'S10', 'c16', 'u3']) {
      expect(formatTypeSpec(parseTypeSpec(spec))).toBe(spec);
    }
  });

  it("drops the '|' order character", () => {
    expect(formatTypeSpec(parseTypeSpec('|S10'))).toBe('S10');
  });
});
