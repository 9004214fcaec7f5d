import { validateAndCanon } from '@/core/engine';
import { type CanonResult, type JsonValue, SCHEMA_VERSION, type SpecDocument } from '@/types';

/**
 * Build a document with the current schema version around the given rows.
 */
export function specDoc(rows: JsonValue[], extra: Record<string, JsonValue> = {}): SpecDocument {
  const fields: Record<string, JsonValue> = { schema_version: SCHEMA_VERSION, ...extra, rows };
  return { fields, rows };
}

export function check(rows: JsonValue[]): CanonResult {
  return validateAndCanon(specDoc(rows));
}

/** Diagnostic codes in output order */
export function codes(result: CanonResult): string[] {
  return result.diagnostics.map((d) => d.code);
}

export function canonRows(result: CanonResult): JsonValue {
  return result.canon.rows;
}

/**
 * Capture console.log and console.error output during a function call.
 */
export function captureConsole<T>(fn: () => T): { result: T; stdout: string; stderr: string } {
  const originalLog = console.log;
  const originalError = console.error;
  let stdout = '';
  let stderr = '';
  console.log = (...args: unknown[]) => {
    stdout += `${args.map(String).join(' ')}\n`;
  };
  console.error = (...args: unknown[]) => {
    stderr += `${args.map(String).join(' ')}\n`;
  };
  try {
    const result = fn();
    return { result, stdout, stderr };
  } finally {
    console.log = originalLog;
    console.error = originalError;
  }
}

export function withEnv<T>(env: Record<string, string | undefined>, fn: () => T): T {
  const original: Record<string, string | undefined> = {};
  for (const key of Object.keys(env)) {
    original[key] = process.env[key];
    const value = env[key];
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
  try {
    return fn();
  } finally {
    for (const key of Object.keys(env)) {
      if (original[key] === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = original[key];
      }
    }
  }
}
