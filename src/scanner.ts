/**
 * Line-buffered character scanner.
 *
 * Holds exactly one line of the input at a time. Lookahead and skipping
 * never cross a line boundary; moving on to the next line is an explicit
 * step taken by the lexer.
 */

import { LineSource, TomlLocation } from './source';

export const END_OF_LINE: unique symbol = Symbol('end of line');
export const END_OF_FILE: unique symbol = Symbol('end of file');

export type ScannedChar = string | typeof END_OF_LINE | typeof END_OF_FILE;

export class Scanner {
  private readonly source: LineSource;
  private line: string | null = null;
  private lineNumber = 0;
  private cursor = 0;
  private exhausted = false;

  constructor(source: LineSource) {
    this.source = source;
  }

  /**
   * The character `ahead` positions past the cursor on the current line.
   */
  peek(ahead = 0): ScannedChar {
    if (!Number.isInteger(ahead) || ahead < 0) {
      throw new RangeError(`Invalid lookahead: ${ahead}`);
    }
    const line = this.currentLine();
    if (line === null) {
      return END_OF_FILE;
    }
    const index = this.cursor + ahead;
    if (index >= line.length) {
      return END_OF_LINE;
    }
    return line.charAt(index);
  }

  /**
   * Whether the text at the cursor starts with `prefix`.
   */
  lookingAt(prefix: string): boolean {
    const line = this.currentLine();
    return line !== null && line.startsWith(prefix, this.cursor);
  }

  /**
   * The rest of the current line, from the cursor onwards.
   */
  rest(): string {
    const line = this.currentLine();
    return line === null ? '' : line.slice(this.cursor);
  }

  remaining(): number {
    const line = this.currentLine();
    if (line === null) {
      throw new RangeError('No characters remain at the end of the input');
    }
    return line.length - this.cursor;
  }

  skip(count = 1): void {
    if (!Number.isInteger(count) || count < 0) {
      throw new RangeError(`Invalid skip count: ${count}`);
    }
    const remaining = this.remaining();
    if (count > remaining) {
      throw new RangeError(`Tried to skip ${count} chars with only ${remaining} chars remaining`);
    }
    this.cursor += count;
  }

  /**
   * Move the cursor to `offset` on the current line, forwards or back.
   */
  seek(offset: number): void {
    const line = this.currentLine();
    if (line === null || !Number.isInteger(offset) || offset < 0 || offset > line.length) {
      throw new RangeError(`Cannot seek to offset ${offset}`);
    }
    this.cursor = offset;
  }

  /**
   * Consume characters while `predicate` holds, returning them.
   */
  takeWhile(predicate: (ch: string) => boolean): string {
    const line = this.currentLine();
    if (line === null) {
      return '';
    }
    const start = this.cursor;
    let end = start;
    while (end < line.length && predicate(line.charAt(end))) {
      end += 1;
    }
    this.cursor = end;
    return line.slice(start, end);
  }

  /**
   * Drop whatever is left of the current line. The next read pulls a fresh
   * line from the source.
   */
  nextLine(): void {
    if (this.currentLine() === null) {
      throw new RangeError('Cannot advance past the end of the input');
    }
    this.line = null;
  }

  get atEnd(): boolean {
    return this.currentLine() === null;
  }

  location(): TomlLocation {
    if (this.lineNumber < 1) {
      throw new RangeError('No line has been read yet');
    }
    return new TomlLocation(this.lineNumber, this.cursor);
  }

  get lineText(): string | undefined {
    return this.line ?? undefined;
  }

  private currentLine(): string | null {
    if (this.line === null && !this.exhausted) {
      const next = this.source.readLine();
      if (next === null) {
        this.exhausted = true;
      } else {
        this.line = next;
        this.lineNumber += 1;
        this.cursor = 0;
      }
    }
    return this.line;
  }
}
