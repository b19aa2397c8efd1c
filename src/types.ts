/**
 * Parser configuration.
 */

export interface TomlParserOptions {
  /**
   * Keep integers beyond the signed 64-bit range as `bigint` instead of
   * failing with an overflow error.
   */
  useBigIntegers?: boolean;
  /**
   * Store decimals as exact {@link BigDecimal}s instead of IEEE-754 doubles.
   */
  useExactDecimals?: boolean;
  /** Deepest nesting a key may reach, counted in key parts. */
  maxKeyDepth?: number;
  /** File name or label prefixed to error messages. */
  sourceName?: string;
}

export interface ResolvedParserOptions {
  useBigIntegers: boolean;
  useExactDecimals: boolean;
  maxKeyDepth: number;
  sourceName: string | undefined;
}

export const DEFAULT_PARSER_OPTIONS: Readonly<ResolvedParserOptions> = Object.freeze({
  useBigIntegers: true,
  useExactDecimals: false,
  maxKeyDepth: 512,
  sourceName: undefined,
});

export function resolveParserOptions(options: TomlParserOptions = {}): ResolvedParserOptions {
  const resolved: ResolvedParserOptions = {
    useBigIntegers: options.useBigIntegers ?? DEFAULT_PARSER_OPTIONS.useBigIntegers,
    useExactDecimals: options.useExactDecimals ?? DEFAULT_PARSER_OPTIONS.useExactDecimals,
    maxKeyDepth: options.maxKeyDepth ?? DEFAULT_PARSER_OPTIONS.maxKeyDepth,
    sourceName: options.sourceName,
  };
  if (!Number.isInteger(resolved.maxKeyDepth) || resolved.maxKeyDepth < 1) {
    throw new RangeError(`maxKeyDepth must be a positive integer: ${resolved.maxKeyDepth}`);
  }
  return resolved;
}
