import { StringSource } from '../src/source';
import { TomlLexer } from '../src/lexer';
import { TomlParserOptions, resolveParserOptions } from '../src/types';

/**
 * Run `fn` and return what it throws, which must be an instance of `type`.
 */
export function catchError<T extends Error>(type: new (...args: never[]) => T, fn: () => unknown): T {
  try {
    fn();
  } catch (error) {
    if (error instanceof type) {
      return error;
    }
    throw error;
  }
  throw new Error(`Expected ${type.name} to be thrown`);
}

export function lexerFor(content: string, options: TomlParserOptions = {}): TomlLexer {
  return new TomlLexer(new StringSource(content), resolveParserOptions(options));
}
