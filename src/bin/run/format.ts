/**
 * Human-readable diagnostics report for --summary, written to stderr.
 */

import { errorColors } from '../utils/colors';
import type { Diagnostic } from '../../types';

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? '' : 's'}`;
}

/**
 * "scope#row", "scope" when not row-specific, "-" for document-level.
 */
export function formatLocation(d: Diagnostic): string {
  const scope = d.scope || '-';
  return d.row_index >= 0 ? `${scope}#${d.row_index}` : scope;
}

export function formatDiagnosticsHuman(path: string, diagnostics: readonly Diagnostic[]): string {
  const lines: string[] = [errorColors.bold(path)];

  const codeWidth = Math.max(0, ...diagnostics.map((d) => d.code.length));
  const locationWidth = Math.max(0, ...diagnostics.map((d) => formatLocation(d).length));

  for (const d of diagnostics) {
    const severity =
      d.severity === 'error' ? errorColors.red('error') : errorColors.yellow('warn ');
    const location = errorColors.dim(formatLocation(d).padEnd(locationWidth));
    lines.push(`  ${severity}  ${d.code.padEnd(codeWidth)}  ${location}  ${d.message}`);
  }

  const errors = diagnostics.filter((d) => d.severity === 'error').length;
  const warnings = diagnostics.length - errors;
  if (diagnostics.length === 0) {
    lines.push(errorColors.green('  No problems found'));
  } else {
    lines.push('');
    lines.push(`${plural(errors, 'error')}, ${plural(warnings, 'warning')}`);
  }

  return lines.join('\n');
}
