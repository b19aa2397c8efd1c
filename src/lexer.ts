/**
 * Lexer - classifies the next token and reads numeric, string and date/time
 * literals off the scanner.
 */

import { BigDecimal } from './decimal';
import { LocalDate, LocalTime, ZoneOffset } from './datetime';
import { TomlOverflowError, TomlSyntaxError, TomlUnsupportedError } from './errors';
import { SIMPLE_ESCAPES, isControlChar } from './escape';
import { isBareKeyChar } from './key';
import { IntegerRepr, effectiveBitCount, narrowInteger } from './numeric';
import { END_OF_FILE, END_OF_LINE, ScannedChar, Scanner } from './scanner';
import { LineSource, TomlLocation } from './source';
import { ResolvedParserOptions } from './types';
import { DateTimeShape, DecimalRepr } from './values';

export type TokenType =
  | 'comment'
  | 'basic-string'
  | 'literal-string'
  | 'dot'
  | 'plus'
  | 'minus'
  | 'digit'
  | 'equals'
  | 'comma'
  | 'open-bracket'
  | 'close-bracket'
  | 'open-brace'
  | 'close-brace'
  | 'identifier'
  | 'end-of-line'
  | 'end-of-file';

// Tokens that are exactly one character and carry no further content
const SIMPLE_TOKENS: ReadonlySet<TokenType> = new Set<TokenType>([
  'dot',
  'equals',
  'comma',
  'open-bracket',
  'close-bracket',
  'open-brace',
  'close-brace',
]);

const PUNCTUATION = new Map<string, TokenType>([
  ['#', 'comment'],
  ['"', 'basic-string'],
  ["'", 'literal-string'],
  ['.', 'dot'],
  ['+', 'plus'],
  ['-', 'minus'],
  ['=', 'equals'],
  [',', 'comma'],
  ['[', 'open-bracket'],
  [']', 'close-bracket'],
  ['{', 'open-brace'],
  ['}', 'close-brace'],
]);

export function describeToken(token: TokenType): string {
  return token.replace(/-/g, ' ');
}

export type LexedNumber = { type: 'integer'; repr: IntegerRepr } | { type: 'decimal'; repr: DecimalRepr };

type NumberMode = 'hexadecimal' | 'octal' | 'binary' | 'decimal' | 'float';

const RADIX_PREFIXES: Record<string, NumberMode> = { x: 'hexadecimal', o: 'octal', b: 'binary' };

const DIGIT_PATTERNS: Record<Exclude<NumberMode, 'float'>, RegExp> = {
  hexadecimal: /^[0-9A-Fa-f]$/,
  octal: /^[0-7]$/,
  binary: /^[01]$/,
  decimal: /^[0-9]$/,
};

const LITERAL_PREFIXES: Record<Exclude<NumberMode, 'float'>, string> = {
  hexadecimal: '0x',
  octal: '0o',
  binary: '0b',
  decimal: '',
};

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})/;
const TIME_PATTERN = /^(\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?/;
const OFFSET_PATTERN = /^(?:[Zz]|([+-])(\d{2}):(\d{2}))/;

function isDigit(ch: ScannedChar): boolean {
  return typeof ch === 'string' && ch >= '0' && ch <= '9';
}

function isLetter(ch: string): boolean {
  return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z');
}

export class TomlLexer {
  private readonly scanner: Scanner;
  private readonly options: ResolvedParserOptions;

  constructor(source: LineSource, options: ResolvedParserOptions) {
    this.scanner = new Scanner(source);
    this.options = options;
  }

  location(): TomlLocation {
    return this.scanner.location();
  }

  syntaxError(reason: string, location: TomlLocation = this.location()): TomlSyntaxError {
    return new TomlSyntaxError(reason, location, this.errorContext());
  }

  unsupported(feature: string, location: TomlLocation = this.location()): TomlUnsupportedError {
    return new TomlUnsupportedError(feature, location, this.errorContext());
  }

  private errorContext(): { sourceName?: string | undefined; lineText?: string | undefined } {
    return { sourceName: this.options.sourceName, lineText: this.scanner.lineText };
  }

  /**
   * Skip spaces and tabs, then classify the next character without
   * consuming it. `+`, `-` and digits may start either a number or a bare
   * key; the caller decides which.
   */
  peekToken(): TokenType {
    this.scanner.takeWhile((ch) => ch === ' ' || ch === '\t');
    const ch = this.scanner.peek();
    if (ch === END_OF_FILE) {
      return 'end-of-file';
    }
    if (ch === END_OF_LINE) {
      return 'end-of-line';
    }
    const punctuation = PUNCTUATION.get(ch);
    if (punctuation !== undefined) {
      return punctuation;
    }
    if (isDigit(ch)) {
      return 'digit';
    }
    if (ch === '_' || isLetter(ch)) {
      return 'identifier';
    }
    throw this.syntaxError(`Unexpected character ${JSON.stringify(ch)}`);
  }

  /**
   * Consume a single-character token.
   */
  skipToken(): TokenType {
    const token = this.peekToken();
    if (!SIMPLE_TOKENS.has(token)) {
      throw new RangeError(`Token is not simple: ${token}`);
    }
    this.scanner.skip(1);
    return token;
  }

  skipChars(count: number): void {
    this.scanner.skip(count);
  }

  /**
   * Consume a comment, if one starts here, up to the end of the line.
   */
  skipComment(): void {
    if (this.peekToken() !== 'comment') {
      return;
    }
    const start = this.location();
    const text = this.scanner.rest();
    this.checkControlChars(text, start.offset);
    this.scanner.skip(text.length);
  }

  nextLine(): void {
    this.scanner.nextLine();
  }

  /**
   * The run of bare-key characters at the cursor, left unconsumed.
   */
  peekBareWord(): string {
    const rest = this.scanner.rest();
    let end = 0;
    while (end < rest.length && isBareKeyChar(rest.charAt(end))) {
      end += 1;
    }
    return rest.slice(0, end);
  }

  takeBareWord(): string {
    return this.scanner.takeWhile(isBareKeyChar);
  }

  /**
   * Whether a date or time literal starts at the cursor.
   */
  atDateTime(): boolean {
    const rest = this.scanner.rest();
    return DATE_PATTERN.test(rest) || TIME_PATTERN.test(rest);
  }

  // ==========================================================================
  // Numbers
  // ==========================================================================

  /**
   * Read an integer or float literal. Integers come back in the narrowest
   * representation that holds them; floats as doubles or exact decimals
   * depending on `useExactDecimals`.
   */
  parseNumber(): LexedNumber {
    this.peekToken();
    const start = this.location();
    let sign = '';
    const first = this.scanner.peek();
    if (first === '+' || first === '-') {
      sign = first;
      this.scanner.skip(1);
    }
    const mode = this.numberMode();
    if (mode === 'float') {
      return this.parseFloat(sign, start);
    }
    if (mode !== 'decimal') {
      if (sign) {
        throw this.syntaxError(`Signs are not allowed on ${mode} integers`, start);
      }
      this.scanner.skip(2);
    }
    const digits = this.scanDigits(mode);
    const next = this.scanner.peek();
    if (mode === 'decimal') {
      if (next === '.' || next === 'e' || next === 'E') {
        // Restart from the top, sign included
        this.scanner.seek(start.offset);
        return this.parseFloat(this.takeSign(), start);
      }
      this.checkLeadingZero(digits, start);
    } else if (next === '.') {
      throw this.syntaxError(`Unexpected decimal point after ${mode} integer`);
    }
    let value = BigInt(`${LITERAL_PREFIXES[mode]}${digits}`);
    if (sign === '-') {
      value = -value;
    }
    const repr = narrowInteger(value);
    if (repr.width === 'bigint' && !this.options.useBigIntegers) {
      throw new TomlOverflowError(
        `Cannot fit a ${effectiveBitCount(value)} bit integer into an int64`,
        start,
        this.errorContext(),
      );
    }
    return { type: 'integer', repr };
  }

  private takeSign(): string {
    const ch = this.scanner.peek();
    if (ch === '+' || ch === '-') {
      this.scanner.skip(1);
      return ch;
    }
    return '';
  }

  private numberMode(): NumberMode {
    const first = this.scanner.peek(0);
    const second = this.scanner.peek(1);
    if (first === '0' && typeof second === 'string') {
      const radix = RADIX_PREFIXES[second];
      if (radix !== undefined) {
        return radix;
      }
      if (second === '.') {
        return 'float';
      }
    }
    if (first === 'n' || first === 'i') {
      return 'float';
    }
    return 'decimal';
  }

  /**
   * Read a run of digits valid for `mode`, with `_` separators that must sit
   * between two digits. Returns the digits with separators removed.
   */
  private scanDigits(mode: Exclude<NumberMode, 'float'>): string {
    const start = this.location();
    const pattern = DIGIT_PATTERNS[mode];
    const raw = this.scanner.takeWhile((ch) => ch === '_' || pattern.test(ch));
    if (raw.length === 0) {
      throw this.syntaxError(`Expected ${mode} digits`, start);
    }
    if (raw.startsWith('_') || raw.endsWith('_') || raw.includes('__')) {
      throw this.syntaxError(`Underscores in numbers must be surrounded by digits: ${raw}`, start);
    }
    return raw.replace(/_/g, '');
  }

  private checkLeadingZero(digits: string, location: TomlLocation): void {
    if (digits.length > 1 && digits.startsWith('0')) {
      throw this.syntaxError(`Leading zeros are not allowed: ${digits}`, location);
    }
  }

  private parseFloat(sign: string, start: TomlLocation): LexedNumber {
    if (this.scanner.lookingAt('nan')) {
      this.scanner.skip(3);
      return { type: 'decimal', repr: { exact: false, value: Number.NaN } };
    }
    if (this.scanner.lookingAt('inf')) {
      this.scanner.skip(3);
      const value = sign === '-' ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
      return { type: 'decimal', repr: { exact: false, value } };
    }
    const integerPart = this.scanDigits('decimal');
    this.checkLeadingZero(integerPart, start);
    let text = `${sign}${integerPart}`;
    let hasFraction = false;
    if (this.scanner.peek() === '.') {
      this.scanner.skip(1);
      text += `.${this.scanDigits('decimal')}`;
      hasFraction = true;
    }
    const marker = this.scanner.peek();
    let hasExponent = false;
    if (marker === 'e' || marker === 'E') {
      this.scanner.skip(1);
      const exponentSign = this.takeSign();
      const exponentDigits = this.scanDigits('decimal');
      text += `e${exponentSign}${exponentDigits}`;
      hasExponent = true;
      if (this.options.useExactDecimals && !Number.isSafeInteger(Number(exponentDigits))) {
        throw new TomlOverflowError('Exponent out of range for an exact decimal', start, this.errorContext());
      }
    }
    if (!hasFraction && !hasExponent) {
      throw this.syntaxError('Expected a fraction or an exponent', start);
    }
    if (this.options.useExactDecimals) {
      return { type: 'decimal', repr: { exact: true, value: BigDecimal.parse(text) } };
    }
    return { type: 'decimal', repr: { exact: false, value: Number(text) } };
  }

  // ==========================================================================
  // Strings
  // ==========================================================================

  /**
   * Read a single-line basic (`"..."`) or literal (`'...'`) string.
   * Multiline forms are recognised and rejected.
   */
  parseString(allowMultiline: boolean): string {
    const token = this.peekToken();
    if (token !== 'basic-string' && token !== 'literal-string') {
      throw new RangeError(`Not at the start of a string: ${token}`);
    }
    const quote = token === 'literal-string' ? "'" : '"';
    const start = this.location();
    if (this.scanner.peek(1) === quote && this.scanner.peek(2) === quote) {
      if (!allowMultiline) {
        throw this.syntaxError('Multiline strings are not allowed here', start);
      }
      throw this.unsupported('Multiline strings', start);
    }
    this.scanner.skip(1);
    return token === 'literal-string' ? this.parseLiteralBody(start) : this.parseBasicBody(start);
  }

  private parseLiteralBody(start: TomlLocation): string {
    const rest = this.scanner.rest();
    const end = rest.indexOf("'");
    if (end < 0) {
      throw this.syntaxError("Unable to find closing quote ' for literal string", start);
    }
    const text = rest.slice(0, end);
    this.checkControlChars(text, start.offset + 1);
    this.scanner.skip(end + 1);
    return text;
  }

  private parseBasicBody(start: TomlLocation): string {
    let result = '';
    for (;;) {
      const ch = this.scanner.peek();
      if (ch === END_OF_LINE || ch === END_OF_FILE) {
        throw this.syntaxError('Unable to find closing quote " for basic string', start);
      }
      if (ch === '"') {
        this.scanner.skip(1);
        return result;
      }
      if (ch === '\\') {
        result += this.parseEscape();
      } else {
        if (ch !== '\t' && isControlChar(ch)) {
          throw this.syntaxError(`Control character U+${ch.charCodeAt(0).toString(16).padStart(4, '0')} in string`);
        }
        result += ch;
        this.scanner.skip(1);
      }
    }
  }

  private parseEscape(): string {
    const escapeStart = this.location();
    const letter = this.scanner.peek(1);
    if (typeof letter !== 'string') {
      throw this.syntaxError('Unexpected end of line after string escape', escapeStart);
    }
    this.scanner.skip(2);
    if (letter === 'u' || letter === 'U') {
      const needed = letter === 'u' ? 4 : 8;
      const rest = this.scanner.rest();
      if (rest.length < needed) {
        throw this.syntaxError(`A unicode escape \\${letter} must be followed by ${needed} hex digits`, escapeStart);
      }
      const hex = rest.slice(0, needed);
      if (!/^[0-9A-Fa-f]+$/.test(hex)) {
        throw this.syntaxError(`Invalid hex digits for unicode escape \\${letter}: ${hex}`, escapeStart);
      }
      const codePoint = Number.parseInt(hex, 16);
      if (codePoint > 0x10ffff || (codePoint >= 0xd800 && codePoint <= 0xdfff)) {
        throw this.syntaxError(`Not a valid unicode scalar value: \\${letter}${hex}`, escapeStart);
      }
      this.scanner.skip(needed);
      return String.fromCodePoint(codePoint);
    }
    const escaped = SIMPLE_ESCAPES.get(letter);
    if (escaped === undefined) {
      throw this.syntaxError(`Invalid escape sequence \\${letter}`, escapeStart);
    }
    return escaped;
  }

  private checkControlChars(text: string, offset: number): void {
    for (let i = 0; i < text.length; i += 1) {
      const ch = text.charAt(i);
      if (ch !== '\t' && isControlChar(ch)) {
        throw this.syntaxError(
          `Control character U+${ch.charCodeAt(0).toString(16).padStart(4, '0')} is not allowed`,
          new TomlLocation(this.location().line, offset + i),
        );
      }
    }
  }

  // ==========================================================================
  // Dates and times
  // ==========================================================================

  /**
   * Read a local date, local time, local date-time or offset date-time.
   */
  parseDateTime(): DateTimeShape {
    this.peekToken();
    const start = this.location();
    const rest = this.scanner.rest();
    let consumed = 0;
    let date: LocalDate | undefined;
    let timeStart: number | undefined = 0;

    const dateMatch = DATE_PATTERN.exec(rest);
    if (dateMatch) {
      const [, year, month, day] = dateMatch;
      date = this.checked(start, () => new LocalDate(Number(year), Number(month), Number(day)));
      consumed = dateMatch[0].length;
      const separator = rest.charAt(consumed);
      if (separator === 'T' || separator === 't') {
        timeStart = consumed + 1;
      } else if (separator === ' ' && TIME_PATTERN.test(rest.slice(consumed + 1))) {
        timeStart = consumed + 1;
      } else {
        timeStart = undefined;
      }
    }

    if (timeStart === undefined) {
      this.scanner.skip(consumed);
      if (date === undefined) {
        throw this.syntaxError('Expected a date or time', start);
      }
      return { kind: 'local-date', date };
    }

    const timeMatch = TIME_PATTERN.exec(rest.slice(timeStart));
    if (!timeMatch) {
      throw this.syntaxError('Expected a time in HH:MM:SS form', new TomlLocation(start.line, start.offset + timeStart));
    }
    const [, hour, minute, second, fraction] = timeMatch;
    // Fractions finer than a nanosecond are truncated
    const nanosecond = fraction === undefined ? 0 : Number(fraction.slice(0, 9).padEnd(9, '0'));
    const time = this.checked(start, () => new LocalTime(Number(hour), Number(minute), Number(second), nanosecond));
    consumed = timeStart + timeMatch[0].length;

    if (date === undefined) {
      this.scanner.skip(consumed);
      return { kind: 'local-time', time };
    }

    const offsetMatch = OFFSET_PATTERN.exec(rest.slice(consumed));
    if (!offsetMatch) {
      this.scanner.skip(consumed);
      return { kind: 'local-date-time', date, time };
    }
    const [, sign, offsetHours, offsetMinutes] = offsetMatch;
    const offset = this.checked(start, () => {
      if (sign === undefined) {
        return ZoneOffset.UTC;
      }
      const hours = Number(offsetHours);
      const minutes = Number(offsetMinutes);
      if (hours > 23 || minutes > 59) {
        throw new RangeError(`Offset out of range: ${sign}${offsetHours}:${offsetMinutes}`);
      }
      return new ZoneOffset((sign === '-' ? -1 : 1) * (hours * 60 + minutes));
    });
    this.scanner.skip(consumed + offsetMatch[0].length);
    return { kind: 'offset-date-time', date, time, offset };
  }

  private checked<T>(location: TomlLocation, make: () => T): T {
    try {
      return make();
    } catch (error) {
      if (error instanceof RangeError) {
        throw this.syntaxError(`Invalid date/time: ${error.message}`, location);
      }
      throw error;
    }
  }
}
