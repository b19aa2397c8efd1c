import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  TomlKey,
  TomlLocation,
  TomlMissingKeyError,
  TomlOverflowError,
  TomlParser,
  TomlSyntaxError,
  TomlUnexpectedTypeError,
  TomlUnsupportedError,
  StringSource,
  linesOf,
  load,
  loads,
  parse,
} from '../src/index';
import { catchError } from './helpers';

describe('TomlParser', () => {
  describe('Basic Parsing', () => {
    test('should parse key/value pairs', () => {
      const content = `
environment = "production"
debug = false
port = 8080
timeout = 30.5
`;

      const result = loads(content);

      expect(result.require('environment').asString()).toBe('production');
      expect(result.require('debug').asBoolean()).toBe(false);
      expect(result.require('port').asInteger32()).toBe(8080);
      expect(result.require('timeout').asDouble()).toBe(30.5);
    });

    test('should parse basic types', () => {
      const content = `
basic = "hello world"
literal = 'C:\\Users\\config'
integer = 42
negative = -100
float = 3.14159
negative_float = -2.5
exponent = 5e+22
true_value = true
false_value = false
`;

      const result = loads(content);

      expect(result.require('basic').asString()).toBe('hello world');
      expect(result.require('literal').asString()).toBe('C:\\Users\\config');
      expect(result.require('integer').asInteger32()).toBe(42);
      expect(result.require('negative').asInteger32()).toBe(-100);
      expect(result.require('float').asDouble()).toBe(3.14159);
      expect(result.require('negative_float').asDouble()).toBe(-2.5);
      expect(result.require('exponent').asDouble()).toBe(5e22);
      expect(result.require('true_value').asBoolean()).toBe(true);
      expect(result.require('false_value').asBoolean()).toBe(false);
    });

    test('should handle hex, octal, and binary numbers', () => {
      const content = `
hex_value = 0xFF
octal_value = 0o17
binary_value = 0b101
`;

      const result = loads(content);

      expect(result.require('hex_value').asInteger32()).toBe(255);
      expect(result.require('octal_value').asInteger32()).toBe(15);
      expect(result.require('binary_value').asInteger32()).toBe(5);
    });

    test('should strip underscores from numbers', () => {
      const result = loads('a = 1_000_000\nb = 1000000\nc = 1_0.0_1\nd = 10.01');

      expect(result.require('a').asInteger32()).toBe(result.require('b').asInteger32());
      expect(result.require('c').asDouble()).toBe(result.require('d').asDouble());
    });

    test('should parse special floats', () => {
      const result = loads('a = inf\nb = -inf\nc = nan\nd = +nan');

      expect(result.require('a').asDouble()).toBe(Number.POSITIVE_INFINITY);
      expect(result.require('b').asDouble()).toBe(Number.NEGATIVE_INFINITY);
      expect(result.require('c').asDouble()).toBeNaN();
      expect(result.require('d').asDouble()).toBeNaN();
    });

    test('should decode escapes in basic strings only', () => {
      const result = loads(`basic = "a\\tb\\u0041"\nliteral = 'a\\tb'`);

      expect(result.require('basic').asString()).toBe('a\tbA');
      expect(result.require('literal').asString()).toBe('a\\tb');
    });

    test('should parse dates and times', () => {
      const content = `
odt1 = 1979-05-27T07:32:00Z
odt2 = 1979-05-27 00:32:00.999999-07:00
ldt = 1979-05-27t07:32:00
ld = 1979-05-27
lt = 00:32:00.5
`;

      const result = loads(content);

      expect(result.require('odt1').toString()).toBe('1979-05-27T07:32:00Z');
      expect(result.require('odt2').toString()).toBe('1979-05-27T00:32:00.999999-07:00');
      expect(result.require('ldt').toString()).toBe('1979-05-27T07:32:00');
      expect(result.require('ld').asLocalDate().toString()).toBe('1979-05-27');
      expect(result.require('lt').asLocalTime().toString()).toBe('00:32:00.5');
      expect(result.require('odt2').resolveDateTime().toDate().toISOString()).toBe('1979-05-27T07:32:00.999Z');
    });

    test('should keep the location of every value', () => {
      const result = loads('\n  key = "v"');

      expect(result.require('key').location).toEqual(new TomlLocation(2, 8));
    });

    test('should skip comments and blank lines', () => {
      const content = `# leading comment

a = 1 # trailing comment
   # indented comment
b = "# not a comment"
`;

      const result = loads(content);

      expect(result.toJson()).toBe('{"a":1,"b":"# not a comment"}');
    });

    test('should parse an empty document', () => {
      expect(loads('').size).toBe(0);
      expect(loads('\n\n# only a comment\n').size).toBe(0);
    });

    test('should read from any line source', () => {
      const result = parse(linesOf(['a = 1\r\n', 'b = 2']));

      expect(result.toJson()).toBe('{"a":1,"b":2}');
    });
  });

  describe('Keys', () => {
    test('should parse dotted and quoted keys', () => {
      const parser = new TomlParser(new StringSource(`a."b.c".'d' = 1`));

      const key = parser.parseKey();

      expect(key.parts).toEqual(['a', 'b.c', 'd']);
      expect(key.location).toEqual(new TomlLocation(1, 0));
      expect(key.toString()).toBe('a."b.c".d');
    });

    test('should accept digits and dashes in bare keys', () => {
      const result = loads('1234 = "numeric"\n-dash = 1\nunder_score = 2');

      expect(result.toJson()).toBe('{"1234":"numeric","-dash":1,"under_score":2}');
    });

    test('should merge dotted keys into nested tables', () => {
      const result = loads('a.b = 1\na.c = 2');

      expect(result.toJson()).toBe('{"a":{"b":1,"c":2}}');
      expect(result.require('a').asTable().size).toBe(2);
    });

    test('should keep separate tables for different first parts', () => {
      const result = loads('a.x = 1\nb.y = 2\na.z = 3');

      expect(result.toJson()).toBe('{"a":{"x":1,"z":3},"b":{"y":2}}');
    });

    test('should replace a scalar crossed by a dotted key', () => {
      expect(loads('a = 1\na.b = 2').toJson()).toBe('{"a":{"b":2}}');
      expect(loads('a.b = 1\na.b.c = 2').toJson()).toBe('{"a":{"b":{"c":2}}}');
    });

    test('should let a later plain key replace a table', () => {
      expect(loads('a.b = 1\na = 5').toJson()).toBe('{"a":5}');
    });

    test('should treat quoted dots as part of the key', () => {
      const result = loads('site."example.com".enabled = true');

      expect(result.toJson()).toBe('{"site":{"example.com":{"enabled":true}}}');
      expect(result.require(TomlKey.of('site', 'example.com', 'enabled')).asBoolean()).toBe(true);
    });
  });

  describe('Tables', () => {
    test('should place keys under table headers', () => {
      const content = `
title = "config"

[server]
host = "localhost"
port = 8080

[server.tls]
enabled = true
`;

      const result = loads(content);

      expect(result.toJson()).toBe(
        '{"title":"config","server":{"host":"localhost","port":8080,"tls":{"enabled":true}}}',
      );
      expect(result.require('server.tls.enabled').asBoolean()).toBe(true);
      expect(result.require('server').location).toEqual(new TomlLocation(4, 0));
    });

    test('should create empty tables for bare headers', () => {
      expect(loads('[empty]').toJson()).toBe('{"empty":{}}');
    });

    test('should look up missing keys without throwing', () => {
      const result = loads('a = 1');

      expect(result.get('x.y')).toEqual({ present: false });
      expect(result.get('a.b')).toEqual({ present: false });
      expect(result.has('a')).toBe(true);
    });

    test('should report missing required keys', () => {
      const error = catchError(TomlMissingKeyError, () => loads('a = 1').require('x.y'));

      expect(error).toBeInstanceOf(TomlMissingKeyError);
      expect(error.key.toString()).toBe('x.y');
      expect(error.message).toBe('Missing required key: x.y');
    });
  });

  describe('Options', () => {
    test('should fall back to big integers by default', () => {
      const result = loads('big = 9223372036854775808');

      expect(result.require('big').asBigInteger()).toBe(9223372036854775808n);
    });

    test('should reject big integers when disabled', () => {
      const error = catchError(TomlOverflowError, () => loads('big = 9223372036854775808', { useBigIntegers: false }));

      expect(error).toBeInstanceOf(TomlOverflowError);
      expect(error.reason).toBe('Cannot fit a 65 bit integer into an int64');
      expect(error.location).toEqual(new TomlLocation(1, 6));
    });

    test('should keep exact decimals when enabled', () => {
      const result = loads('a = 0.1\nb = 1_0.0_1', { useExactDecimals: true });

      expect(result.require('a').asBigDecimal().toString()).toBe('0.1');
      expect(result.require('b').asBigDecimal().toString()).toBe('10.01');
      expect(result.require('a').toString()).toBe('0.1');
    });

    test('should enforce the key depth limit', () => {
      expect(loads('a.b.c = 1', { maxKeyDepth: 3 }).toJson()).toBe('{"a":{"b":{"c":1}}}');
      expect(() => loads('a.b.c.d = 1', { maxKeyDepth: 3 })).toThrow(TomlOverflowError);
      expect(() => loads('[a.b]\nc = 1', { maxKeyDepth: 2 })).toThrow(TomlOverflowError);
    });

    test('should fail deterministically on absurdly deep keys', () => {
      const key = Array.from({ length: 100_000 }, () => 'a').join('.');

      expect(() => loads(`${key} = 1`)).toThrow(TomlOverflowError);
    });

    test('should reject an invalid depth limit', () => {
      expect(() => loads('a = 1', { maxKeyDepth: 0 })).toThrow(RangeError);
    });
  });

  describe('Error Handling', () => {
    test('should throw error for invalid syntax', () => {
      expect(() => loads('invalid syntax here')).toThrow(TomlSyntaxError);
    });

    test('should decorate messages with the location and line', () => {
      const error = catchError(TomlSyntaxError, () => loads('a = @'));

      expect(error).toBeInstanceOf(TomlSyntaxError);
      expect(error.message).toBe('1:4 - Unexpected character "@"\n    a = @');
      expect(error.reason).toBe('Unexpected character "@"');
    });

    test('should prefix the source name', () => {
      const error = catchError(TomlSyntaxError, () => loads('ok = 1\nbad = ', { sourceName: 'app.toml' }));

      expect(error.message).toBe('app.toml:2:6 - Expected a value, but got end of line\n    bad = ');
    });

    test('should name unexpected bare words', () => {
      const error = catchError(TomlSyntaxError, () => loads('a = yes'));

      expect(error.reason).toBe('Expected a value, but got "yes"');
    });

    test('should reject trailing content after a value', () => {
      const error = catchError(TomlSyntaxError, () => loads('a = 1 2'));

      expect(error.reason).toBe('Expected end of line, but got digit');
      expect(error.location).toEqual(new TomlLocation(1, 6));
    });

    test('should require an equals sign after a key', () => {
      const error = catchError(TomlSyntaxError, () => loads('a b = 1'));

      expect(error.reason).toBe('Expected = after key, but got identifier');
    });

    test('should report unsupported grammar distinctly', () => {
      const cases: Array<[string, string]> = [
        ['a = [1, 2]', 'Arrays'],
        ['a = { x = 1 }', 'Inline tables'],
        ['[[products]]', 'Arrays of tables'],
        ['a = """text"""', 'Multiline strings'],
        ["a = '''text'''", 'Multiline strings'],
      ];
      for (const [content, feature] of cases) {
        const error = catchError(TomlUnsupportedError, () => loads(content));
        expect(error).toBeInstanceOf(TomlUnsupportedError);
        expect(error.feature).toBe(feature);
      }
    });

    test('should reject multiline strings in keys as plain syntax errors', () => {
      const error = catchError(TomlSyntaxError, () => loads('"""a""" = 1'));

      expect(error).toBeInstanceOf(TomlSyntaxError);
      expect(error).not.toBeInstanceOf(TomlUnsupportedError);
    });

    test('should reject control characters in comments', () => {
      expect(() => loads('a = 1 # bell \u0007')).toThrow(TomlSyntaxError);
    });

    test('should reject invalid dates', () => {
      expect(() => loads('d = 1979-02-30')).toThrow(TomlSyntaxError);
      expect(() => loads('t = 24:00:00')).toThrow(TomlSyntaxError);
      expect(() => loads('d = 1979-05-27T07:32')).toThrow(TomlSyntaxError);
    });

    test('should raise type errors from accessors', () => {
      const error = catchError(TomlUnexpectedTypeError, () => loads('n = 5').require('n').asString());

      expect(error).toBeInstanceOf(TomlUnexpectedTypeError);
      expect(error.expected).toBe('string');
      expect(error.actual).toBe('integer');
    });
  });

  describe('Files', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'strict-toml-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    test('should load a file', () => {
      const file = path.join(dir, 'config.toml');
      fs.writeFileSync(file, '[database]\nhost = "db.internal"\nport = 5432\n');

      const result = load(file);

      expect(result.require('database.port').asInteger32()).toBe(5432);
    });

    test('should name the file in errors', () => {
      const file = path.join(dir, 'broken.toml');
      fs.writeFileSync(file, 'a = \n');

      const error = catchError(TomlSyntaxError, () => load(file));

      expect(error.message).toBe(`${file}:1:4 - Expected a value, but got end of line\n    a = `);
    });

    test('should refuse paths that are not regular files', () => {
      expect(() => load(dir)).toThrow('Can only load a regular file');
    });
  });

  describe('Integration', () => {
    test('should parse complex configuration', () => {
      const content = `
# Service configuration
name = "inventory"
debug = false

[database]
host = "primary.db"
port = 5432
pool.min = 2
pool.max = 0x10

[server]
listen = "0.0.0.0"
started = 2024-03-01T09:00:00+01:00
ratio = 0.75
`;

      const result = loads(content);

      expect(result.require('database.pool.max').asInteger32()).toBe(16);
      expect(result.require('server.ratio').asDouble()).toBe(0.75);
      expect(result.require('server.started').resolveDateTime().offset.toString()).toBe('+01:00');
      expect(result.toPlain()).toEqual({
        name: 'inventory',
        debug: false,
        database: { host: 'primary.db', port: 5432, pool: { min: 2, max: 16 } },
        server: {
          listen: '0.0.0.0',
          started: result.require('server.started').toPlain(),
          ratio: 0.75,
        },
      });
    });
  });
});
