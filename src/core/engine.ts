import { canonicalizeScope, scopeOrder } from './canonicalize';
import { classifyRows } from './classify';
import { applySeverity, diag, hasErrors, sortDiagnostics } from './diagnostics';
import { stableStringify } from './json';
import { validateScope } from './validate-scope';
import {
  type CanonResult,
  type Diagnostic,
  type EngineOptions,
  type JsonValue,
  SCHEMA_VERSION,
  type SpecDocument,
} from '../types';

/**
 * Validate a document and build its canonical form.
 *
 * The canonical document is produced even when errors are reported;
 * detected conflicts are left as they are.
 */
export function validateAndCanon(document: SpecDocument, options: EngineOptions = {}): CanonResult {
  const expectedVersion = options.schemaVersion ?? SCHEMA_VERSION;
  const diagnostics: Diagnostic[] = [];

  const schemaVersion = document.fields.schema_version;
  if (schemaVersion !== expectedVersion) {
    diagnostics.push(
      diag(
        'SCHEMA_VERSION',
        `schema_version must be ${JSON.stringify(expectedVersion)} (got ${
          schemaVersion === undefined ? 'nothing' : stableStringify(schemaVersion)
        })`,
      ),
    );
  }

  const classification = classifyRows(document.rows);
  diagnostics.push(...classification.diagnostics);

  const canonRows: JsonValue[] = [];
  for (const scope of scopeOrder(classification.scopes.keys())) {
    const validation = validateScope(scope, classification.scopes.get(scope) ?? []);
    diagnostics.push(...validation.diagnostics);
    canonRows.push(...canonicalizeScope(validation));
  }

  const sorted = sortDiagnostics(applySeverity(diagnostics, options));
  return {
    diagnostics: sorted,
    ok: !hasErrors(sorted),
    canon: { ...document.fields, schema_version: expectedVersion, rows: canonRows },
  };
}
