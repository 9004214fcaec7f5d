import { compareCodePoints } from './compare';
import { type Diagnostic, JsonNumber, type JsonValue } from '../types';

type Serializable = JsonValue | readonly Serializable[] | Diagnostic | { [key: string]: Serializable };

function isSerializableArray(value: Serializable): value is readonly Serializable[] {
  return Array.isArray(value);
}

/**
 * Compact JSON with object keys sorted by code point at every depth.
 * Numbers read from a document keep their source text.
 */
export function stableStringify(value: Serializable): string {
  if (value instanceof JsonNumber) {
    return value.source;
  }
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value);
  }
  if (isSerializableArray(value)) {
    return `[${value.map((item) => stableStringify(item)).join(',')}]`;
  }
  const entries = Object.entries(value)
    .filter((entry): entry is [string, Serializable] => entry[1] !== undefined)
    .sort(([a], [b]) => compareCodePoints(a, b));
  return `{${entries.map(([key, item]) => `${JSON.stringify(key)}:${stableStringify(item)}`).join(',')}}`;
}

export class JsonSyntaxError extends Error {
  constructor(
    message: string,
    readonly position: number,
  ) {
    super(`${message} at position ${position}`);
    this.name = 'JsonSyntaxError';
  }
}

const NUMBER_PATTERN = /-?(?:0|[1-9][0-9]*)(?:\.[0-9]+)?(?:[eE][+-]?[0-9]+)?/y;
const HEX4_PATTERN = /^[0-9a-fA-F]{4}$/;

const ESCAPES: Record<string, string> = {
  '"': '"',
  '\\': '\\',
  '/': '/',
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
};

/**
 * Strict JSON reader with the same grammar as `JSON.parse`.
 *
 * Numbers come back as JsonNumber. Object members are defined as own
 * properties, so a `"__proto__"` key stays an ordinary member; a repeated
 * key keeps its first position and takes the last value.
 */
export function parseJson(text: string): JsonValue {
  let pos = 0;

  function fail(message: string): never {
    throw new JsonSyntaxError(message, pos);
  }

  function unexpected(): never {
    if (pos >= text.length) {
      fail('Unexpected end of JSON input');
    }
    fail(`Unexpected token ${JSON.stringify(text.charAt(pos))}`);
  }

  const skipWhitespace = () => {
    while (pos < text.length) {
      const c = text.charCodeAt(pos);
      if (c !== 0x20 && c !== 0x09 && c !== 0x0a && c !== 0x0d) break;
      pos++;
    }
  };

  const expect = (char: string) => {
    if (text.charAt(pos) !== char) unexpected();
    pos++;
  };

  const parseLiteral = <T extends JsonValue>(word: string, value: T): T => {
    if (!text.startsWith(word, pos)) unexpected();
    pos += word.length;
    return value;
  };

  const parseString = (): string => {
    expect('"');
    let out = '';
    let start = pos;
    while (true) {
      if (pos >= text.length) fail('Unterminated string in JSON');
      const c = text.charCodeAt(pos);
      if (c === 0x22) {
        out += text.slice(start, pos);
        pos++;
        return out;
      }
      if (c < 0x20) {
        fail('Bad control character in string literal');
      }
      if (c !== 0x5c) {
        pos++;
        continue;
      }
      out += text.slice(start, pos);
      const code = text.charAt(pos + 1);
      if (code === 'u') {
        const hex = text.slice(pos + 2, pos + 6);
        if (!HEX4_PATTERN.test(hex)) {
          pos += 2;
          fail('Bad Unicode escape in JSON');
        }
        out += String.fromCharCode(Number.parseInt(hex, 16));
        pos += 6;
      } else {
        const escaped = ESCAPES[code];
        if (escaped === undefined) {
          pos++;
          fail('Bad escaped character in JSON');
        }
        out += escaped;
        pos += 2;
      }
      start = pos;
    }
  };

  const parseNumber = (): JsonNumber => {
    NUMBER_PATTERN.lastIndex = pos;
    const match = NUMBER_PATTERN.exec(text);
    if (!match) return unexpected();
    pos += match[0].length;
    return new JsonNumber(match[0]);
  };

  const parseArray = (): JsonValue[] => {
    expect('[');
    const items: JsonValue[] = [];
    skipWhitespace();
    if (text.charAt(pos) === ']') {
      pos++;
      return items;
    }
    while (true) {
      items.push(parseValue());
      skipWhitespace();
      if (text.charAt(pos) === ']') {
        pos++;
        return items;
      }
      expect(',');
    }
  };

  const parseObject = (): { [key: string]: JsonValue } => {
    expect('{');
    const members: { [key: string]: JsonValue } = {};
    skipWhitespace();
    if (text.charAt(pos) === '}') {
      pos++;
      return members;
    }
    while (true) {
      skipWhitespace();
      if (text.charAt(pos) !== '"') unexpected();
      const key = parseString();
      skipWhitespace();
      expect(':');
      const value = parseValue();
      Object.defineProperty(members, key, {
        value,
        enumerable: true,
        writable: true,
        configurable: true,
      });
      skipWhitespace();
      if (text.charAt(pos) === '}') {
        pos++;
        return members;
      }
      expect(',');
    }
  };

  function parseValue(): JsonValue {
    skipWhitespace();
    const char = text.charAt(pos);
    switch (char) {
      case '{':
        return parseObject();
      case '[':
        return parseArray();
      case '"':
        return parseString();
      case 't':
        return parseLiteral('true', true);
      case 'f':
        return parseLiteral('false', false);
      case 'n':
        return parseLiteral('null', null);
      default:
        return parseNumber();
    }
  }

  const value = parseValue();
  skipWhitespace();
  if (pos < text.length) unexpected();
  return value;
}
