/**
 * Keys: non-empty, immutable sequences of parts. `a."b.c".d` has the three
 * parts `a`, `b.c` and `d`.
 */

import { quoteTomlString } from './escape';
import { TomlLocation } from './source';

export function isBareKeyChar(ch: string): boolean {
  return /^[A-Za-z0-9_-]$/.test(ch);
}

export function isBareKey(part: string): boolean {
  return /^[A-Za-z0-9_-]+$/.test(part);
}

export class TomlKey {
  readonly parts: readonly string[];
  readonly location?: TomlLocation | undefined;

  constructor(parts: readonly string[], location?: TomlLocation) {
    if (parts.length === 0) {
      throw new RangeError('Key may not be empty');
    }
    this.parts = Object.freeze([...parts]);
    this.location = location;
  }

  static of(first: string, ...rest: string[]): TomlKey {
    return new TomlKey([first, ...rest]);
  }

  /**
   * Split a dotted string such as `server.http.port` into a key. Every part
   * must be a bare key; quoted parts are only understood by the parser.
   */
  static parseSimple(text: string, location?: TomlLocation): TomlKey {
    const parts = text.split('.');
    for (const part of parts) {
      if (!isBareKey(part)) {
        throw new TypeError(`Not a simple key: ${JSON.stringify(text)}`);
      }
    }
    return new TomlKey(parts, location);
  }

  static builder(location?: TomlLocation): TomlKeyBuilder {
    return new TomlKeyBuilder(location);
  }

  get length(): number {
    return this.parts.length;
  }

  get first(): string {
    return this.part(0);
  }

  get last(): string {
    return this.part(this.parts.length - 1);
  }

  part(index: number): string {
    const part = this.parts[index];
    if (part === undefined) {
      throw new RangeError(`Index ${index} out of bounds for key of length ${this.parts.length}`);
    }
    return part;
  }

  /**
   * Parts `[start, end)` as a new key. The location is kept only when the
   * slice starts at the first part.
   */
  slice(start: number, end: number = this.parts.length): TomlKey {
    if (start < 0 || end > this.parts.length || start >= end) {
      throw new RangeError(`Invalid slice [${start}, ${end}) of key with length ${this.parts.length}`);
    }
    return new TomlKey(this.parts.slice(start, end), start === 0 ? this.location : undefined);
  }

  concat(other: TomlKey): TomlKey {
    return new TomlKey([...this.parts, ...other.parts], this.location ?? other.location);
  }

  withLocation(location: TomlLocation | undefined): TomlKey {
    return new TomlKey(this.parts, location);
  }

  equals(other: TomlKey): boolean {
    return this.parts.length === other.parts.length && this.parts.every((part, i) => part === other.parts[i]);
  }

  toString(): string {
    return this.parts.map((part) => (isBareKey(part) ? part : quoteTomlString(part))).join('.');
  }
}

export class TomlKeyBuilder {
  private readonly parts: string[] = [];
  private readonly location?: TomlLocation | undefined;

  constructor(location?: TomlLocation) {
    this.location = location;
  }

  add(part: string): this {
    this.parts.push(part);
    return this;
  }

  get length(): number {
    return this.parts.length;
  }

  build(): TomlKey {
    return new TomlKey(this.parts, this.location);
  }
}
