/**
 * @bitform/core — enum tables
 */

import { describe, it, expect } from 'vitest';
import { defineEnum, EnumTable, InvalidEnumError } from '../src/index';

describe('defineEnum', () => {
  const Color = defineEnum({ RED: 1, GREEN: 2, BLUE: 4 });

  it('maps names to values and back', () => {
    expect(Color.base).toBe('int');
    expect(Color.names).toEqual(['RED', 'GREEN', 'BLUE']);
    expect(Color.valueFor('GREEN')).toBe(2);
    expect(Color.nameFor(4)).toBe('BLUE');
    expect(Color.nameFor(3)).toBeUndefined();
    expect(Color.valueFor('PINK')).toBeUndefined();
  });

  it('treats number and bigint values as the same integer', () => {
    expect(Color.nameFor(4n)).toBe('BLUE');
    const Wide = defineEnum({ HUGE: 1n << 40n });
    expect(Wide.nameFor(2 ** 40)).toBe('HUGE');
  });

  it('narrows names with has()', () => {
    expect(Color.has('RED')).toBe(true);
    expect(Color.has('red')).toBe(false);
  });

  it('resolves an aliased value to the first name', () => {
    const Mode = defineEnum({ OFF: 0, DISABLED: 0, ON: 1 });
    expect(Mode.nameFor(0)).toBe('OFF');
    expect(Mode.valueFor('DISABLED')).toBe(0);
  });

  it('supports text and byte members', () => {
    const Tag = defineEnum({ ALPHA: 'AA', BETA: 'BB' });
    expect(Tag.base).toBe('text');
    expect(Tag.nameFor('BB')).toBe('BETA');

    const Magic = defineEnum({ PNG: new Uint8Array([0x89, 0x50]), GIF: new Uint8Array([0x47, 0x49]) });
    expect(Magic.base).toBe('bytes');
    expect(Magic.nameFor(new Uint8Array([0x47, 0x49]))).toBe('GIF');
  });

  it('is frozen', () => {
    expect(Object.isFrozen(Color)).toBe(true);
  });

  it('rejects mixed member kinds', () => {
    expect(() => defineEnum({ A: 1, B: 'x' })).toThrow(InvalidEnumError);
    expect(() => defineEnum({ A: 1, B: 'x' })).toThrow(
      "Enum member 'B' is text but earlier members are int. All members of an enum must share one underlying kind.",
    );
  });

  it('rejects an empty member list', () => {
    expect(() => defineEnum({})).toThrow('An enum must declare at least one member.');
  });

  it('rejects non-integer numbers', () => {
    expect(() => defineEnum({ HALF: 1.5 })).toThrow(InvalidEnumError);
  });
});

describe('EnumTable.describe', () => {
  it('renders values for messages', () => {
    expect(EnumTable.describe(7)).toBe('7');
    expect(EnumTable.describe('ab')).toBe('"ab"');
    expect(EnumTable.describe(new Uint8Array([0x0a, 0xff]))).toBe('bytes(0aff)');
  });
});
