/**
 * Positional row arrays → typed row variants.
 *
 * Field layout after [scope, kind]:
 *   about   text
 *   help    shortOpt longOpt desc
 *   version shortOpt longOpt desc
 *   flag    shortOpt longOpt key desc meta?
 *   opt     shortOpt longOpt key valueKind desc meta?
 *   arg     posName key desc meta?
 */

import { stableStringify } from './json';
import {
  JsonNumber,
  type JsonValue,
  ROW_KINDS,
  type RawRow,
  type RowKind,
  type RowMeta,
  type SpecRow,
  VALUE_KINDS,
  type ValueKind,
} from '../types';

export function isRowKind(value: string): value is RowKind {
  return ROW_KINDS.some((kind) => kind === value);
}

export function isValueKind(value: string): value is ValueKind {
  return VALUE_KINDS.some((kind) => kind === value);
}

export function isJsonObject(value: JsonValue | undefined): value is { [key: string]: JsonValue } {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof JsonNumber)
  );
}

/**
 * Read a field as text. Missing and null fields read as "";
 * other non-strings read as their compact JSON.
 */
export function fieldText(value: JsonValue | undefined): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'string') return value;
  return stableStringify(value);
}

function jsonTruthy(value: JsonValue): boolean {
  if (value instanceof JsonNumber) return value.valueOf() !== 0;
  if (Array.isArray(value)) return value.length > 0;
  if (isJsonObject(value)) return Object.keys(value).length > 0;
  return Boolean(value);
}

export function readMeta(value: JsonValue | undefined): RowMeta | undefined {
  if (!isJsonObject(value)) return undefined;

  const meta: RowMeta = {};
  const { key, required, multiple } = value;
  if (key !== undefined) {
    meta.key = fieldText(key);
  }
  if ('default' in value) {
    const literal = value.default;
    meta.default = typeof literal === 'string' ? literal : null;
  }
  if (required !== undefined) {
    meta.required = jsonTruthy(required);
  }
  if (multiple !== undefined) {
    meta.multiple = jsonTruthy(multiple);
  }
  return meta;
}

/**
 * Build the typed variant for a row whose kind is already known.
 */
export function toSpecRow(index: number, scope: string, kind: RowKind, raw: RawRow): SpecRow {
  const text = (pos: number) => fieldText(raw[pos]);
  const base = { index, scope, raw: [...raw] };

  switch (kind) {
    case 'about':
      return { ...base, kind, text: text(2) };
    case 'help':
      return { ...base, kind, shortOpt: text(2), longOpt: text(3), desc: text(4) };
    case 'version':
      return { ...base, kind, shortOpt: text(2), longOpt: text(3), desc: text(4) };
    case 'flag':
      return {
        ...base,
        kind,
        shortOpt: text(2),
        longOpt: text(3),
        key: text(4),
        desc: text(5),
        meta: readMeta(raw[6]),
      };
    case 'opt':
      return {
        ...base,
        kind,
        shortOpt: text(2),
        longOpt: text(3),
        key: text(4),
        valueKind: text(5),
        desc: text(6),
        meta: readMeta(raw[7]),
      };
    case 'arg': {
      const meta = readMeta(raw[5]);
      return {
        ...base,
        kind,
        posName: text(2),
        key: text(3),
        desc: text(4),
        meta,
        required: meta?.required ?? true,
        multiple: meta?.multiple ?? false,
      };
    }
  }
}
