/**
 * The value tree produced by the parser.
 *
 * Every value is immutable and knows its kind and, when it came from a
 * document, where it started. The `as*` accessors narrow a value to a host
 * type and throw a typed error instead of truncating or guessing.
 */

import { BigDecimal } from './decimal';
import {
  LocalDate,
  LocalDateTime,
  LocalTime,
  OffsetDateTime,
  OffsetTime,
  ZoneOffset,
  systemOffsetAt,
} from './datetime';
import {
  TomlMissingKeyError,
  TomlOverflowError,
  TomlUnexpectedDateError,
  TomlUnexpectedTypeError,
} from './errors';
import { quoteJsonString } from './escape';
import { TomlKey } from './key';
import { IntegerRepr, effectiveBitCount, fitsExactlyInDouble, narrowInteger, widenInteger } from './numeric';
import { TomlLocation } from './source';

export type TomlKind = 'table' | 'array' | 'string' | 'integer' | 'decimal' | 'boolean' | 'datetime';

export type DecimalRepr = { exact: false; value: number } | { exact: true; value: BigDecimal };

export type DateTimeShape =
  | { kind: 'local-date'; date: LocalDate }
  | { kind: 'local-time'; time: LocalTime }
  | { kind: 'local-date-time'; date: LocalDate; time: LocalTime }
  | { kind: 'offset-date-time'; date: LocalDate; time: LocalTime; offset: ZoneOffset }
  | { kind: 'offset-time'; time: LocalTime; offset: ZoneOffset };

export type Lookup = { present: true; value: TomlValue } | { present: false };

export type PlainValue =
  | string
  | number
  | bigint
  | boolean
  | BigDecimal
  | LocalDate
  | LocalTime
  | LocalDateTime
  | OffsetDateTime
  | OffsetTime
  | PlainValue[]
  | { [key: string]: PlainValue };

// Longer literals are left out of overflow messages
const MAX_QUOTED_LITERAL = 32;

export abstract class TomlValue {
  abstract readonly kind: TomlKind;
  readonly location?: TomlLocation | undefined;

  protected constructor(location?: TomlLocation) {
    this.location = location;
  }

  protected unexpected(expected: string): TomlUnexpectedTypeError {
    return new TomlUnexpectedTypeError(expected, this.kind, this.location);
  }

  asTable(): TomlTable {
    if (this instanceof TomlTable) {
      return this;
    }
    throw this.unexpected('table');
  }

  asArray(): TomlArray {
    if (this instanceof TomlArray) {
      return this;
    }
    throw this.unexpected('array');
  }

  asString(): string {
    if (this instanceof TomlString) {
      return this.value;
    }
    throw this.unexpected('string');
  }

  asBoolean(): boolean {
    if (this instanceof TomlBoolean) {
      return this.value;
    }
    throw this.unexpected('boolean');
  }

  /**
   * @throws TomlOverflowError if the integer needs more than 32 bits
   */
  asInteger32(): number {
    const integer = this.asIntegerValue();
    if (integer.repr.width === 'int32') {
      return integer.repr.value;
    }
    throw integer.overflow('int32');
  }

  /**
   * @throws TomlOverflowError if the integer needs more than 64 bits
   */
  asInteger64(): bigint {
    const integer = this.asIntegerValue();
    if (integer.repr.width === 'bigint') {
      throw integer.overflow('int64');
    }
    return widenInteger(integer.repr);
  }

  asBigInteger(): bigint {
    return widenInteger(this.asIntegerValue().repr);
  }

  /**
   * Decimals come back as the nearest double. Integers are only accepted
   * when a double holds them exactly.
   */
  asDouble(): number {
    if (this instanceof TomlDecimal) {
      return this.repr.exact ? this.repr.value.toNumber() : this.repr.value;
    }
    if (this instanceof TomlInteger) {
      if (this.repr.width === 'int32') {
        return this.repr.value;
      }
      if (fitsExactlyInDouble(this.repr.value)) {
        return Number(this.repr.value);
      }
      throw this.overflow('double');
    }
    throw this.unexpected('number');
  }

  asBigDecimal(): BigDecimal {
    if (this instanceof TomlDecimal) {
      if (this.repr.exact) {
        return this.repr.value;
      }
      if (!Number.isFinite(this.repr.value)) {
        throw new TomlOverflowError(`Cannot represent ${this.toString()} as an exact decimal`, this.location);
      }
      return BigDecimal.fromNumber(this.repr.value);
    }
    if (this instanceof TomlInteger) {
      return BigDecimal.fromBigInt(widenInteger(this.repr));
    }
    throw this.unexpected('number');
  }

  asDateTime(): TomlDateTime {
    if (this instanceof TomlDateTime) {
      return this;
    }
    throw this.unexpected('datetime');
  }

  asLocalDate(): LocalDate {
    return this.asDateTime().localDate();
  }

  asLocalTime(): LocalTime {
    return this.asDateTime().localTime();
  }

  asLocalDateTime(): LocalDateTime {
    return this.asDateTime().localDateTime();
  }

  resolveDateTime(): OffsetDateTime {
    return this.asDateTime().resolveDateTime();
  }

  resolveTime(fallbackOffset: ZoneOffset): OffsetTime {
    return this.asDateTime().resolveTime(fallbackOffset);
  }

  private asIntegerValue(): TomlInteger {
    if (this instanceof TomlInteger) {
      return this;
    }
    throw this.unexpected('integer');
  }

  /**
   * Compact JSON rendering. Equivalent in value to the source, not in form.
   */
  abstract toJson(): string;

  /**
   * The value as plain JavaScript data.
   */
  abstract toPlain(): PlainValue;

  abstract toString(): string;
}

export class TomlString extends TomlValue {
  readonly kind = 'string';
  readonly value: string;

  constructor(value: string, location?: TomlLocation) {
    super(location);
    this.value = value;
  }

  toJson(): string {
    return quoteJsonString(this.value);
  }

  toPlain(): string {
    return this.value;
  }

  toString(): string {
    return this.value;
  }
}

export class TomlBoolean extends TomlValue {
  readonly kind = 'boolean';
  readonly value: boolean;

  constructor(value: boolean, location?: TomlLocation) {
    super(location);
    this.value = value;
  }

  toJson(): string {
    return String(this.value);
  }

  toPlain(): boolean {
    return this.value;
  }

  toString(): string {
    return String(this.value);
  }
}

export class TomlInteger extends TomlValue {
  readonly kind = 'integer';
  readonly repr: IntegerRepr;

  /**
   * The value is stored in the narrowest representation that holds it.
   */
  constructor(value: bigint | number, location?: TomlLocation) {
    super(location);
    if (typeof value === 'number' && !Number.isSafeInteger(value)) {
      throw new RangeError(`Not a safe integer: ${value}`);
    }
    this.repr = narrowInteger(BigInt(value));
  }

  /**
   * @internal
   */
  overflow(target: 'int32' | 'int64' | 'double'): TomlOverflowError {
    const value = widenInteger(this.repr);
    const bits = effectiveBitCount(value);
    const text = value.toString();
    let message = `Cannot fit a ${bits} bit integer into ${target === 'int32' ? 'an' : 'a'} ${target}`;
    if (text.length <= MAX_QUOTED_LITERAL && !(target === 'double' && this.repr.width === 'bigint')) {
      message += `: ${text}`;
    }
    return new TomlOverflowError(message, this.location);
  }

  toJson(): string {
    return this.toString();
  }

  toPlain(): number | bigint {
    return this.repr.value;
  }

  toString(): string {
    return String(this.repr.value);
  }
}

export class TomlDecimal extends TomlValue {
  readonly kind = 'decimal';
  readonly repr: DecimalRepr;

  constructor(repr: DecimalRepr, location?: TomlLocation) {
    super(location);
    this.repr = repr;
  }

  static fromNumber(value: number, location?: TomlLocation): TomlDecimal {
    return new TomlDecimal({ exact: false, value }, location);
  }

  static fromBigDecimal(value: BigDecimal, location?: TomlLocation): TomlDecimal {
    return new TomlDecimal({ exact: true, value }, location);
  }

  toJson(): string {
    if (!this.repr.exact && !Number.isFinite(this.repr.value)) {
      return quoteJsonString(this.toString());
    }
    return this.toString();
  }

  toPlain(): number | BigDecimal {
    return this.repr.value;
  }

  /**
   * Always reads back as a decimal: `nan`, `inf`, `-inf`, and integral
   * values keep a `.0`.
   */
  toString(): string {
    if (this.repr.exact) {
      const text = this.repr.value.toString();
      return /[.e]/.test(text) ? text : `${text}.0`;
    }
    const value = this.repr.value;
    if (Number.isNaN(value)) {
      return 'nan';
    }
    if (!Number.isFinite(value)) {
      return value > 0 ? 'inf' : '-inf';
    }
    const text = Object.is(value, -0) ? '-0' : String(value);
    return /[.eE]/.test(text) ? text : `${text}.0`;
  }
}

export class TomlDateTime extends TomlValue {
  readonly kind = 'datetime';
  readonly shape: DateTimeShape;

  constructor(shape: DateTimeShape, location?: TomlLocation) {
    super(location);
    this.shape = shape;
  }

  get hasDate(): boolean {
    return 'date' in this.shape;
  }

  get hasTime(): boolean {
    return 'time' in this.shape;
  }

  /**
   * The offset written in the document, if any.
   */
  get offset(): ZoneOffset | undefined {
    return 'offset' in this.shape ? this.shape.offset : undefined;
  }

  localDate(): LocalDate {
    if ('date' in this.shape) {
      return this.shape.date;
    }
    throw new TomlUnexpectedDateError(this, 'missing date information', this.location);
  }

  localTime(): LocalTime {
    if ('time' in this.shape) {
      return this.shape.time;
    }
    throw new TomlUnexpectedDateError(this, 'missing time information', this.location);
  }

  /**
   * Date and time with any offset discarded.
   */
  localDateTime(): LocalDateTime {
    return new LocalDateTime(this.localDate(), this.localTime());
  }

  /**
   * Date and time at the written offset, or at the host's offset for that
   * date when none was written.
   */
  resolveDateTime(): OffsetDateTime {
    const date = this.localDate();
    const time = this.localTime();
    return new OffsetDateTime(date, time, this.offset ?? systemOffsetAt(date, time));
  }

  /**
   * Time at the written offset, or at `fallbackOffset` when none was written.
   */
  resolveTime(fallbackOffset: ZoneOffset): OffsetTime {
    return new OffsetTime(this.localTime(), this.offset ?? fallbackOffset);
  }

  toJson(): string {
    return quoteJsonString(this.toString());
  }

  toPlain(): LocalDate | LocalTime | LocalDateTime | OffsetDateTime | OffsetTime {
    const shape = this.shape;
    switch (shape.kind) {
      case 'local-date':
        return shape.date;
      case 'local-time':
        return shape.time;
      case 'local-date-time':
        return new LocalDateTime(shape.date, shape.time);
      case 'offset-date-time':
        return new OffsetDateTime(shape.date, shape.time, shape.offset);
      case 'offset-time':
        return new OffsetTime(shape.time, shape.offset);
    }
  }

  toString(): string {
    return this.toPlain().toString();
  }
}

export class TomlArray extends TomlValue {
  readonly kind = 'array';
  readonly elements: readonly TomlValue[];

  constructor(elements: readonly TomlValue[], location?: TomlLocation) {
    super(location);
    this.elements = Object.freeze([...elements]);
  }

  static of(...elements: TomlValue[]): TomlArray {
    return new TomlArray(elements);
  }

  get length(): number {
    return this.elements.length;
  }

  at(index: number): TomlValue | undefined {
    return this.elements[index];
  }

  [Symbol.iterator](): Iterator<TomlValue> {
    return this.elements[Symbol.iterator]();
  }

  toJson(): string {
    return `[${this.elements.map((element) => element.toJson()).join(',')}]`;
  }

  toPlain(): PlainValue[] {
    return this.elements.map((element) => element.toPlain());
  }

  toString(): string {
    return this.toJson();
  }
}

/**
 * A mapping from single key parts to values. Nested tables are ordinary
 * values; dotted lookups walk through them.
 */
export class TomlTable extends TomlValue {
  readonly kind = 'table';
  private readonly shallow: ReadonlyMap<string, TomlValue>;

  constructor(entries: Iterable<readonly [string, TomlValue]>, location?: TomlLocation) {
    super(location);
    this.shallow = new Map(entries);
  }

  static fromEntries(entries: Iterable<readonly [string, TomlValue]>, location?: TomlLocation): TomlTable {
    return new TomlTable(entries, location);
  }

  get size(): number {
    return this.shallow.size;
  }

  keys(): IterableIterator<string> {
    return this.shallow.keys();
  }

  entries(): IterableIterator<[string, TomlValue]> {
    return this.shallow.entries();
  }

  /**
   * Look up a key, walking intermediate tables. A string is read as a simple
   * dotted key. Absent when any part of the path is missing or a hop is not
   * a table.
   */
  get(key: string | TomlKey): Lookup {
    if (typeof key === 'string') {
      const direct = this.shallow.get(key);
      if (direct !== undefined) {
        return { present: true, value: direct };
      }
      return this.get(TomlKey.parseSimple(key));
    }
    let table: TomlTable = this;
    for (let i = 0; i < key.length - 1; i += 1) {
      const next = table.shallow.get(key.part(i));
      if (!(next instanceof TomlTable)) {
        return { present: false };
      }
      table = next;
    }
    const value = table.shallow.get(key.last);
    return value === undefined ? { present: false } : { present: true, value };
  }

  has(key: string | TomlKey): boolean {
    return this.get(key).present;
  }

  /**
   * @throws TomlMissingKeyError if nothing is stored under `key`
   */
  require(key: string | TomlKey): TomlValue {
    const found = this.get(key);
    if (found.present) {
      return found.value;
    }
    const missing = typeof key === 'string' ? TomlKey.parseSimple(key) : key;
    throw new TomlMissingKeyError(missing, this.location);
  }

  toJson(): string {
    const members: string[] = [];
    for (const [key, value] of this.shallow) {
      members.push(`${quoteJsonString(key)}:${value.toJson()}`);
    }
    return `{${members.join(',')}}`;
  }

  toPlain(): { [key: string]: PlainValue } {
    const result: { [key: string]: PlainValue } = {};
    for (const [key, value] of this.shallow) {
      Object.defineProperty(result, key, { value: value.toPlain(), enumerable: true, writable: true, configurable: true });
    }
    return result;
  }

  toString(): string {
    return this.toJson();
  }
}
