/**
 * strict-toml
 * Strict TOML parser producing an immutable, typed value tree
 */

export { TomlParser, parse, load, loads } from './parser';
export { TomlLexer } from './lexer';
export type { TokenType, LexedNumber } from './lexer';
export { Scanner, END_OF_FILE, END_OF_LINE } from './scanner';
export type { ScannedChar } from './scanner';
export { TomlLocation, StringSource, linesOf } from './source';
export type { LineSource } from './source';
export { TomlKey, TomlKeyBuilder, isBareKey } from './key';
export { TomlTableBuilder } from './builder';
export type { TableBuilderOptions } from './builder';
export {
  TomlValue,
  TomlTable,
  TomlArray,
  TomlString,
  TomlInteger,
  TomlDecimal,
  TomlBoolean,
  TomlDateTime,
} from './values';
export type { TomlKind, Lookup, DecimalRepr, DateTimeShape, PlainValue } from './values';
export { BigDecimal } from './decimal';
export { LocalDate, LocalTime, LocalDateTime, OffsetDateTime, OffsetTime, ZoneOffset } from './datetime';
export { effectiveBitCount } from './numeric';
export type { IntegerRepr, IntegerWidth } from './numeric';
export {
  TomlError,
  TomlSyntaxError,
  TomlUnsupportedError,
  TomlOverflowError,
  TomlMissingKeyError,
  TomlUnexpectedTypeError,
  TomlUnexpectedDateError,
} from './errors';
export { DEFAULT_PARSER_OPTIONS } from './types';
export type { TomlParserOptions } from './types';

// Default export for convenience
export { loads as default } from './parser';
