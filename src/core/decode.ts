import { TextDecoder } from 'node:util';
import { isJsonObject } from './rows';
import { JsonSyntaxError, parseJson } from './json';
import type { JsonValue, SpecDocument } from '../types';

/**
 * Raised when a document cannot be reasoned about at all:
 * bytes that are not UTF-8, unparseable JSON, a non-object root,
 * or a non-array `rows`.
 */
export class SpecDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SpecDecodeError';
  }
}

/**
 * Check the top level of an already-parsed document.
 * The returned fields are the parsed members themselves, not a rebuilt copy.
 */
export function toSpecDocument(parsed: JsonValue): SpecDocument {
  if (!isJsonObject(parsed)) {
    throw new SpecDecodeError('document root must be a JSON object');
  }
  const rows = parsed.rows;
  if (!Array.isArray(rows)) {
    throw new SpecDecodeError('rows must be an array');
  }
  return { fields: parsed, rows };
}

/**
 * Decode document text. Any failure is fatal: no partial recovery.
 */
export function decodeSpecDocument(text: string): SpecDocument {
  let parsed: JsonValue;
  try {
    parsed = parseJson(text);
  } catch (e) {
    if (e instanceof JsonSyntaxError) {
      throw new SpecDecodeError(`Invalid JSON: ${e.message}`);
    }
    throw e;
  }
  return toSpecDocument(parsed);
}

/**
 * Decode raw file contents. Bytes that are not valid UTF-8 are fatal;
 * a byte order mark is kept and rejected by the JSON reader.
 */
export function decodeSpecBytes(bytes: Uint8Array): SpecDocument {
  let text: string;
  try {
    text = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(bytes);
  } catch (e) {
    throw new SpecDecodeError(
      `Invalid UTF-8: ${e instanceof Error ? e.message : String(e)}`,
    );
  }
  return decodeSpecDocument(text);
}
