const TOML_ESCAPES = new Map<string, string>([
  ['\b', '\\b'],
  ['\t', '\\t'],
  ['\n', '\\n'],
  ['\f', '\\f'],
  ['\r', '\\r'],
  ['"', '\\"'],
  ['\\', '\\\\'],
]);

// Inverse of TOML_ESCAPES, keyed by the letter after the backslash
export const SIMPLE_ESCAPES = new Map<string, string>([
  ['b', '\b'],
  ['t', '\t'],
  ['n', '\n'],
  ['f', '\f'],
  ['r', '\r'],
  ['"', '"'],
  ['\\', '\\'],
]);

function unicodeEscape(unit: number): string {
  return `\\u${unit.toString(16).toUpperCase().padStart(4, '0')}`;
}

export function isControlChar(ch: string): boolean {
  const code = ch.charCodeAt(0);
  return code < 0x20 || code === 0x7f;
}

/**
 * Quote as a basic string, escaping what a basic string cannot hold verbatim.
 */
export function quoteTomlString(value: string): string {
  let result = '"';
  for (const ch of value) {
    const escape = TOML_ESCAPES.get(ch);
    if (escape !== undefined) {
      result += escape;
    } else if (isControlChar(ch)) {
      result += unicodeEscape(ch.charCodeAt(0));
    } else {
      result += ch;
    }
  }
  return `${result}"`;
}

/**
 * Quote as an ASCII-only JSON string.
 */
export function quoteJsonString(value: string): string {
  let result = '"';
  for (let i = 0; i < value.length; i += 1) {
    const ch = value.charAt(i);
    const escape = TOML_ESCAPES.get(ch);
    if (escape !== undefined) {
      result += escape;
    } else {
      const code = value.charCodeAt(i);
      result += code >= 0x20 && code < 0x7f ? ch : unicodeEscape(code);
    }
  }
  return `${result}"`;
}
