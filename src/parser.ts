/**
 * Recursive-descent parser over the lexer's token stream.
 *
 * Main entry points: load(path), loads(content) and parse(source)
 */

import * as fs from 'fs';
import { TomlTableBuilder } from './builder';
import { TomlError } from './errors';
import { TomlKey } from './key';
import { LexedNumber, TokenType, TomlLexer, describeToken } from './lexer';
import { widenInteger } from './numeric';
import { LineSource, StringSource, TomlLocation } from './source';
import { ResolvedParserOptions, TomlParserOptions, resolveParserOptions } from './types';
import { TomlBoolean, TomlDateTime, TomlDecimal, TomlInteger, TomlString, TomlTable, TomlValue } from './values';

export class TomlParser {
  private readonly lexer: TomlLexer;
  private readonly options: ResolvedParserOptions;

  constructor(source: LineSource, options: TomlParserOptions = {}) {
    this.options = resolveParserOptions(options);
    this.lexer = new TomlLexer(source, this.options);
  }

  /**
   * Parse the whole input into its root table.
   */
  parseDocument(): TomlTable {
    const root = new TomlTableBuilder({ maxDepth: this.options.maxKeyDepth });
    let header: TomlKey | undefined;
    for (;;) {
      const token = this.lexer.peekToken();
      if (token === 'end-of-file') {
        return root.build();
      }
      if (token === 'end-of-line') {
        this.lexer.nextLine();
        continue;
      }
      if (token === 'comment') {
        this.lexer.skipComment();
        continue;
      }
      if (token === 'open-bracket') {
        header = this.parseTableHeader();
        root.ensureTable(header);
      } else {
        const key = this.parseKey();
        this.expect('equals', 'Expected = after key');
        const value = this.parseValue();
        root.put(header ? header.concat(key) : key, value);
      }
      this.expectLineEnd();
    }
  }

  /**
   * One or more key parts separated by dots: `a`, `a.b`, `a."b.c"`.
   */
  parseKey(): TomlKey {
    this.lexer.peekToken();
    const builder = TomlKey.builder(this.lexer.location());
    builder.add(this.parseKeyPart());
    while (this.lexer.peekToken() === 'dot') {
      this.lexer.skipToken();
      builder.add(this.parseKeyPart());
    }
    return builder.build();
  }

  private parseKeyPart(): string {
    const token = this.lexer.peekToken();
    switch (token) {
      case 'basic-string':
      case 'literal-string':
        return this.lexer.parseString(false);
      // Bare keys: ASCII letters, digits, underscores and dashes
      case 'digit':
      case 'minus':
      case 'identifier':
        return this.lexer.takeBareWord();
      default:
        throw this.lexer.syntaxError(`Expected part of a key, but got ${describeToken(token)}`);
    }
  }

  parseValue(): TomlValue {
    this.lexer.skipComment();
    const token = this.lexer.peekToken();
    const start = this.lexer.location();
    switch (token) {
      case 'basic-string':
      case 'literal-string':
        return new TomlString(this.lexer.parseString(true), start);
      case 'digit':
        if (this.lexer.atDateTime()) {
          return new TomlDateTime(this.lexer.parseDateTime(), start);
        }
        return this.numberValue(this.lexer.parseNumber(), start);
      case 'plus':
      case 'minus':
        return this.numberValue(this.lexer.parseNumber(), start);
      case 'identifier':
        return this.parseKeyword(start);
      case 'open-bracket':
        throw this.lexer.unsupported('Arrays', start);
      case 'open-brace':
        throw this.lexer.unsupported('Inline tables', start);
      case 'comment':
      case 'dot':
      case 'equals':
      case 'comma':
      case 'close-bracket':
      case 'close-brace':
      case 'end-of-line':
      case 'end-of-file':
        throw this.lexer.syntaxError(`Expected a value, but got ${describeToken(token)}`, start);
    }
  }

  private parseKeyword(start: TomlLocation): TomlValue {
    const word = this.lexer.peekBareWord();
    switch (word) {
      case 'true':
      case 'false':
        this.lexer.skipChars(word.length);
        return new TomlBoolean(word === 'true', start);
      case 'inf':
      case 'nan':
        return this.numberValue(this.lexer.parseNumber(), start);
      default:
        throw this.lexer.syntaxError(`Expected a value, but got ${JSON.stringify(word)}`, start);
    }
  }

  private numberValue(number: LexedNumber, start: TomlLocation): TomlValue {
    if (number.type === 'integer') {
      return new TomlInteger(widenInteger(number.repr), start);
    }
    return new TomlDecimal(number.repr, start);
  }

  private parseTableHeader(): TomlKey {
    const start = this.lexer.location();
    this.lexer.skipToken();
    if (this.lexer.peekToken() === 'open-bracket') {
      throw this.lexer.unsupported('Arrays of tables', start);
    }
    const key = this.parseKey();
    this.expect('close-bracket', 'Expected ] after table header');
    return key.withLocation(start);
  }

  private expect(expected: TokenType, reason: string): void {
    const token = this.lexer.peekToken();
    if (token !== expected) {
      throw this.lexer.syntaxError(`${reason}, but got ${describeToken(token)}`);
    }
    this.lexer.skipToken();
  }

  private expectLineEnd(): void {
    const token = this.lexer.peekToken();
    if (token === 'comment') {
      this.lexer.skipComment();
    } else if (token !== 'end-of-line' && token !== 'end-of-file') {
      throw this.lexer.syntaxError(`Expected end of line, but got ${describeToken(token)}`);
    }
  }
}

// ============================================================================
// Public API
// ============================================================================

export function parse(source: LineSource, options?: TomlParserOptions): TomlTable {
  return new TomlParser(source, options).parseDocument();
}

export function loads(content: string, options?: TomlParserOptions): TomlTable {
  return parse(new StringSource(content), options);
}

/**
 * Read and parse a UTF-8 file. Error messages name the file unless
 * `sourceName` says otherwise.
 */
export function load(filePath: string, options: TomlParserOptions = {}): TomlTable {
  if (!fs.existsSync(filePath) || !fs.statSync(filePath).isFile()) {
    throw new TomlError(`Can only load a regular file: ${filePath}`);
  }
  const content = fs.readFileSync(filePath, 'utf-8');
  return loads(content, { ...options, sourceName: options.sourceName ?? filePath });
}
