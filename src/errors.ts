import type { TomlKey } from './key';
import type { TomlLocation } from './source';
import type { TomlDateTime, TomlKind } from './values';

export interface ErrorContext {
  sourceName?: string | undefined;
  lineText?: string | undefined;
}

export class TomlError extends Error {
  readonly location?: TomlLocation | undefined;
  readonly reason: string;
  readonly sourceName?: string | undefined;
  readonly lineText?: string | undefined;

  constructor(reason: string, location?: TomlLocation, context: ErrorContext = {}) {
    super(formatTomlErrorMessage(reason, location, context));
    this.name = 'TomlError';
    this.reason = reason;
    this.location = location;
    this.sourceName = context.sourceName;
    this.lineText = context.lineText;
  }
}

function formatTomlErrorMessage(reason: string, location: TomlLocation | undefined, context: ErrorContext): string {
  const parts: string[] = [];
  if (context.sourceName) {
    parts.push(context.sourceName);
  }
  if (location) {
    parts.push(location.toString());
  }
  const locationPrefix = parts.length > 0 ? `${parts.join(':')} - ` : '';
  const decorated = `${locationPrefix}${reason}`;
  if (context.lineText) {
    return `${decorated}\n    ${context.lineText}`;
  }
  return decorated;
}

/**
 * Malformed input. Unlike the other kinds, always located.
 */
export class TomlSyntaxError extends TomlError {
  declare readonly location: TomlLocation;

  constructor(reason: string, location: TomlLocation, context?: ErrorContext) {
    super(reason, location, context);
    this.name = 'TomlSyntaxError';
  }
}

/**
 * Grammar that is recognised but not implemented yet (arrays, inline
 * tables, multiline strings, arrays of tables).
 */
export class TomlUnsupportedError extends TomlSyntaxError {
  readonly feature: string;

  constructor(feature: string, location: TomlLocation, context?: ErrorContext) {
    super(`${feature} are not yet supported`, location, context);
    this.name = 'TomlUnsupportedError';
    this.feature = feature;
  }
}

/**
 * A value does not fit its requested representation, or a key nests too deep.
 */
export class TomlOverflowError extends TomlError {
  constructor(reason: string, location?: TomlLocation, context?: ErrorContext) {
    super(reason, location, context);
    this.name = 'TomlOverflowError';
  }
}

export class TomlMissingKeyError extends TomlError {
  readonly key: TomlKey;

  constructor(key: TomlKey, location?: TomlLocation) {
    super(`Missing required key: ${key.toString()}`, location);
    this.name = 'TomlMissingKeyError';
    this.key = key;
  }
}

export class TomlUnexpectedTypeError extends TomlError {
  readonly expected: string;
  readonly actual: TomlKind;

  constructor(expected: string, actual: TomlKind, location?: TomlLocation) {
    super(`Expected ${expected}, but got ${actual}`, location);
    this.name = 'TomlUnexpectedTypeError';
    this.expected = expected;
    this.actual = actual;
  }
}

export class TomlUnexpectedDateError extends TomlError {
  readonly value: TomlDateTime;
  readonly detail: string;

  constructor(value: TomlDateTime, detail: string, location?: TomlLocation) {
    super(`Invalid value, ${detail}: ${value.toString()}`, location);
    this.name = 'TomlUnexpectedDateError';
    this.value = value;
    this.detail = detail;
  }
}
