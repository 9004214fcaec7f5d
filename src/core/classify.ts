import { diag } from './diagnostics';
import { fieldText, isRowKind, toSpecRow } from './rows';
import type { Diagnostic, JsonValue, SpecRow } from '../types';

export interface Classification {
  /** Scope → rows in first-seen order. A scope is present once any of its rows is seen. */
  scopes: Map<string, SpecRow[]>;
  diagnostics: Diagnostic[];
}

/**
 * Group rows by scope. Malformed rows are reported and dropped; the pass never aborts.
 */
export function classifyRows(rows: readonly JsonValue[]): Classification {
  const scopes = new Map<string, SpecRow[]>();
  const diagnostics: Diagnostic[] = [];

  rows.forEach((row, index) => {
    if (!Array.isArray(row) || row.length < 2) {
      diagnostics.push(
        diag('ROW_SHAPE', 'row must be an array with at least [scope, kind, ...]', {
          rowIndex: index,
        }),
      );
      return;
    }

    const scope = fieldText(row[0]);
    const kind = fieldText(row[1]);

    let bucket = scopes.get(scope);
    if (!bucket) {
      bucket = [];
      scopes.set(scope, bucket);
    }

    if (!isRowKind(kind)) {
      diagnostics.push(
        diag('ROW_KIND_UNKNOWN', `unknown row kind ${JSON.stringify(kind)}`, {
          scope,
          rowIndex: index,
        }),
      );
      return;
    }

    bucket.push(toSpecRow(index, scope, kind, row));
  });

  return { scopes, diagnostics };
}
