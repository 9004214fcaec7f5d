import { compareCodePoints } from './compare';
import type { Diagnostic, DiagnosticCode, EngineOptions, Severity } from '../types';

interface DiagnosticLocation {
  scope?: string;
  rowIndex?: number;
  severity?: Severity;
}

export function diag(
  code: DiagnosticCode,
  message: string,
  { scope = '', rowIndex = -1, severity = 'error' }: DiagnosticLocation = {},
): Diagnostic {
  return { severity, code, scope, row_index: rowIndex, message };
}

function severityRank(severity: Severity): number {
  return severity === 'error' ? 0 : 1;
}

/**
 * Stable total order: severity (errors first), code, scope, row index.
 * Returns a new array.
 */
export function sortDiagnostics(diagnostics: readonly Diagnostic[]): Diagnostic[] {
  return [...diagnostics].sort(
    (a, b) =>
      severityRank(a.severity) - severityRank(b.severity) ||
      compareCodePoints(a.code, b.code) ||
      compareCodePoints(a.scope, b.scope) ||
      a.row_index - b.row_index,
  );
}

/**
 * Apply configured severity overrides, then strict promotion.
 */
export function applySeverity(
  diagnostics: readonly Diagnostic[],
  options: Pick<EngineOptions, 'severity' | 'strict'>,
): Diagnostic[] {
  return diagnostics.map((d) => {
    let severity = options.severity?.[d.code] ?? d.severity;
    if (options.strict && severity === 'warn') {
      severity = 'error';
    }
    return severity === d.severity ? d : { ...d, severity };
  });
}

export function hasErrors(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some((d) => d.severity === 'error');
}
