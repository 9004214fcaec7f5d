export { canonicalizeScope, compareOptionRows, scopeOrder } from './core/canonicalize';
export { classifyRows } from './core/classify';
export { compareCodePoints } from './core/compare';
export { decodeSpecBytes, decodeSpecDocument, SpecDecodeError, toSpecDocument } from './core/decode';
export { isValidDefault } from './core/default-value';
export { hasErrors, sortDiagnostics } from './core/diagnostics';
export { validateAndCanon } from './core/engine';
export { JsonSyntaxError, parseJson, stableStringify } from './core/json';
export { validateScope } from './core/validate-scope';
export * from './types';
