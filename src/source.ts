/**
 * Input sources and source locations.
 *
 * The parser never opens files itself; it pulls one line at a time from a
 * {@link LineSource}, which callers build from a string, an iterable of
 * lines, or anything else that can hand out text line by line.
 */

/**
 * A position within the input: a 1-based line number and a 0-based
 * character offset into that line.
 */
export class TomlLocation {
  readonly line: number;
  readonly offset: number;

  constructor(line: number, offset: number) {
    if (!Number.isInteger(line) || line < 1) {
      throw new RangeError(`Line must be a positive integer: ${line}`);
    }
    if (!Number.isInteger(offset) || offset < 0) {
      throw new RangeError(`Offset must be a non-negative integer: ${offset}`);
    }
    this.line = line;
    this.offset = offset;
  }

  equals(other: TomlLocation): boolean {
    return this.line === other.line && this.offset === other.offset;
  }

  toString(): string {
    return `${this.line}:${this.offset}`;
  }
}

/**
 * A line-readable character source.
 *
 * `readLine` returns the next line without its terminator, or `null` once
 * the input is exhausted.
 */
export interface LineSource {
  readLine(): string | null;
}

export class StringSource implements LineSource {
  private readonly lines: string[];
  private index = 0;

  constructor(content: string) {
    if (!content) {
      this.lines = [];
      return;
    }
    const normalized = content.replace(/\r\n/g, '\n');
    this.lines = normalized.split('\n');
    // A trailing newline terminates the last line rather than opening a new one
    if (normalized.endsWith('\n')) {
      this.lines.pop();
    }
  }

  readLine(): string | null {
    const line = this.lines[this.index];
    if (line === undefined) {
      return null;
    }
    this.index += 1;
    return line;
  }
}

export function linesOf(lines: Iterable<string>): LineSource {
  const iterator = lines[Symbol.iterator]();
  return {
    readLine(): string | null {
      const next = iterator.next();
      return next.done ? null : next.value.replace(/\r?\n$/, '');
    },
  };
}
