/**
 * @bitform/core — enum tables
 *
 * An enum field stores an underlying primitive (integer, text or bytes) and
 * exposes a member name. The table is built once from an explicit member
 * list and is read-only afterwards.
 *
 *   const Color = defineEnum({ RED: 1, GREEN: 2, BLUE: 4 });
 *   defineRecord({}, [{ name: 'color', type: Color, size: 1 }]);
 *
 * Two names may share a value (an alias); decoding yields the first one.
 */

import { InvalidEnumError } from './errors';
import type { EnumValue } from './types';

/** Underlying kind shared by every member of a table. */
export type EnumBase = 'int' | 'text' | 'bytes';

function baseOf(value: EnumValue): EnumBase | null {
  if (typeof value === 'bigint') return 'int';
  if (typeof value === 'number') return Number.isSafeInteger(value) ? 'int' : null;
  if (typeof value === 'string') return 'text';
  if (value instanceof Uint8Array) return 'bytes';
  return null;
}

/**
 * Map key for an underlying value. number 1 and bigint 1n share a key so an
 * integer decodes to the same member whichever representation was declared.
 */
function valueKey(value: EnumValue): string {
  if (typeof value === 'number' || typeof value === 'bigint') return `i:${BigInt(value)}`;
  if (typeof value === 'string') return `t:${value}`;
  let hex = '';
  for (const byte of value) hex += byte.toString(16).padStart(2, '0');
  return `b:${hex}`;
}

function describe(value: EnumValue): string {
  if (typeof value === 'string') return JSON.stringify(value);
  if (value instanceof Uint8Array) return `bytes(${valueKey(value).slice(2)})`;
  return String(value);
}

export class EnumTable<K extends string = string> {
  readonly kind = 'enum' as const;
  readonly base:  EnumBase;
  readonly names: readonly K[];

  private readonly _byName:  ReadonlyMap<string, EnumValue>;
  private readonly _byValue: ReadonlyMap<string, K>;

  constructor(members: Readonly<Record<K, EnumValue>>) {
    const entries = Object.entries(members) as [K, EnumValue][];
    if (entries.length === 0) {
      throw new InvalidEnumError('An enum must declare at least one member.');
    }

    let base: EnumBase | null = null;
    const byName  = new Map<string, EnumValue>();
    const byValue = new Map<string, K>();

    for (const [name, value] of entries) {
      const b = baseOf(value);
      if (b === null) {
        throw new InvalidEnumError(
          `Enum member '${name}' has unsupported value ${String(value)}. ` +
          `Members must be integers, strings or Uint8Arrays.`,
        );
      }
      if (base !== null && b !== base) {
        throw new InvalidEnumError(
          `Enum member '${name}' is ${b} but earlier members are ${base}. ` +
          `All members of an enum must share one underlying kind.`,
        );
      }
      base = b;
      byName.set(name, value instanceof Uint8Array ? value.slice() : value);
      const key = valueKey(value);
      if (!byValue.has(key)) byValue.set(key, name);
    }

    this.base     = base ?? 'int';
    this.names    = Object.freeze(entries.map(([name]) => name));
    this._byName  = byName;
    this._byValue = byValue;
    Object.freeze(this);
  }

  has(name: string): name is K {
    return this._byName.has(name);
  }

  /** Underlying value of `name`, or undefined when it is not a member. */
  valueFor(name: string): EnumValue | undefined {
    return this._byName.get(name);
  }

  /** Member name for an underlying value, or undefined when unmapped. */
  nameFor(value: EnumValue): K | undefined {
    return this._byValue.get(valueKey(value));
  }

  /** Human-readable rendering of an underlying value, for error messages. */
  static describe(value: EnumValue): string {
    return describe(value);
  }
}

export function defineEnum<K extends string>(members: Readonly<Record<K, EnumValue>>): EnumTable<K> {
  return new EnumTable(members);
}
