/**
 * Per-scope rule engine: uniqueness, reservation and ordering invariants.
 *
 * Claims are recorded in an explicit accumulator (ScopeClaims) that is
 * returned with the diagnostics; the canonicalizer reads it to decide
 * whether implied help/version rows can be inserted.
 */

import { isValidDefault } from './default-value';
import { diag } from './diagnostics';
import { isValueKind } from './rows';
import {
  type ArgRow,
  type Diagnostic,
  type DiagnosticCode,
  type FlagRow,
  type NamedRow,
  type OptRow,
  RESERVED_LONG_HELP,
  RESERVED_LONG_VERSION,
  RESERVED_SHORT_HELP,
  RESERVED_SHORT_VERSION,
  type ScopeClaims,
  type ScopeGroups,
  type ScopeValidation,
  type SpecRow,
} from '../types';

// Help and version rows share the opt code.
const NO_NAMES_CODES: Record<NamedRow['kind'], DiagnosticCode> = {
  help: 'OPT_NO_NAMES',
  version: 'OPT_NO_NAMES',
  flag: 'FLAG_NO_NAMES',
  opt: 'OPT_NO_NAMES',
};

export function groupRows(rows: readonly SpecRow[]): ScopeGroups {
  const groups: ScopeGroups = { about: [], help: [], version: [], flag: [], opt: [], arg: [] };
  for (const row of rows) {
    switch (row.kind) {
      case 'about':
        groups.about.push(row);
        break;
      case 'help':
        groups.help.push(row);
        break;
      case 'version':
        groups.version.push(row);
        break;
      case 'flag':
        groups.flag.push(row);
        break;
      case 'opt':
        groups.opt.push(row);
        break;
      case 'arg':
        groups.arg.push(row);
        break;
    }
  }
  return groups;
}

function emptyClaims(): ScopeClaims {
  return { shorts: new Map(), longs: new Map(), keys: new Map() };
}

function checkSingletons(scope: string, groups: ScopeGroups, out: Diagnostic[]): void {
  const singletons: Array<[DiagnosticCode, string, readonly SpecRow[]]> = [
    ['ABOUT_DUP', 'about', groups.about],
    ['HELP_DUP', 'help', groups.help],
    ['VERSION_DUP', 'version', groups.version],
  ];
  for (const [code, kind, rows] of singletons) {
    for (const row of rows.slice(1)) {
      out.push(diag(code, `more than one ${kind} row in scope`, { scope, rowIndex: row.index }));
    }
  }
}

/**
 * Name presence, reserved names and short/long uniqueness for one row.
 */
export function checkNames(row: NamedRow, claims: ScopeClaims, out: Diagnostic[]): void {
  const { scope, index: rowIndex, kind, shortOpt, longOpt } = row;

  if (shortOpt === '' && longOpt === '') {
    out.push(
      diag(NO_NAMES_CODES[kind], `${kind} row must provide at least one of shortOpt or longOpt`, {
        scope,
        rowIndex,
      }),
    );
    return;
  }

  if (kind !== 'help' && kind !== 'version') {
    if (longOpt === RESERVED_LONG_HELP || shortOpt === RESERVED_SHORT_HELP) {
      out.push(
        diag('RESERVED_HELP_USED', `${kind} row uses reserved help option`, { scope, rowIndex }),
      );
    }
    if (longOpt === RESERVED_LONG_VERSION || shortOpt === RESERVED_SHORT_VERSION) {
      out.push(
        diag('RESERVED_VERSION_USED', `${kind} row uses reserved version option`, {
          scope,
          rowIndex,
        }),
      );
    }
  }

  if (shortOpt !== '') {
    if (claims.shorts.has(shortOpt)) {
      out.push(diag('DUP_SHORT', `duplicate short option ${shortOpt}`, { scope, rowIndex }));
    } else {
      claims.shorts.set(shortOpt, rowIndex);
    }
  }

  if (longOpt !== '') {
    if (claims.longs.has(longOpt)) {
      out.push(diag('DUP_LONG', `duplicate long option ${longOpt}`, { scope, rowIndex }));
    } else {
      claims.longs.set(longOpt, rowIndex);
    }
  }
}

function checkKey(row: FlagRow | OptRow | ArgRow, claims: ScopeClaims, out: Diagnostic[]): void {
  if (claims.keys.has(row.key)) {
    out.push(
      diag('DUP_KEY', `duplicate key ${row.key}`, { scope: row.scope, rowIndex: row.index }),
    );
  } else {
    claims.keys.set(row.key, row.index);
  }
}

function checkMetaKey(row: FlagRow | OptRow, out: Diagnostic[]): void {
  const metaKey = row.meta?.key;
  if (metaKey !== undefined && metaKey !== row.key) {
    out.push(
      diag(
        'META_KEY_MISMATCH',
        `meta.key ${JSON.stringify(metaKey)} does not match key ${JSON.stringify(row.key)}`,
        { scope: row.scope, rowIndex: row.index },
      ),
    );
  }
}

function checkOptValue(row: OptRow, out: Diagnostic[]): void {
  const location = { scope: row.scope, rowIndex: row.index };
  if (!isValueKind(row.valueKind)) {
    out.push(
      diag(
        'OPT_VALUE_KIND_UNKNOWN',
        `unknown value_kind ${JSON.stringify(row.valueKind)}`,
        location,
      ),
    );
    return;
  }
  if (row.meta && 'default' in row.meta && !isValidDefault(row.valueKind, row.meta.default)) {
    out.push(
      diag('OPT_DEFAULT_INVALID', `default is not valid for ${row.valueKind}`, location),
    );
  }
}

function checkArgs(args: readonly ArgRow[], claims: ScopeClaims, out: Diagnostic[]): void {
  let sawOptional = false;
  let sawMultiple = false;

  args.forEach((row, pos) => {
    const location = { scope: row.scope, rowIndex: row.index };
    checkKey(row, claims, out);

    if (!row.required) {
      sawOptional = true;
    } else if (sawOptional) {
      out.push(
        diag('ARG_REQUIRED_AFTER_OPTIONAL', 'required arg appears after optional arg', location),
      );
    }

    if (row.multiple) {
      if (sawMultiple) {
        out.push(diag('ARG_MULTI_DUP', 'more than one arg has multiple=true', location));
      }
      sawMultiple = true;
      if (pos !== args.length - 1) {
        out.push(diag('ARG_MULTI_NOT_LAST', 'arg with multiple=true must be last', location));
      }
    }
  });
}

/**
 * Validate one scope. Every violation is reported once per offending row;
 * no check stops the others.
 */
export function validateScope(scope: string, rows: readonly SpecRow[]): ScopeValidation {
  const groups = groupRows(rows);
  const claims = emptyClaims();
  const diagnostics: Diagnostic[] = [];

  checkSingletons(scope, groups, diagnostics);

  for (const row of groups.help) checkNames(row, claims, diagnostics);
  for (const row of groups.version) checkNames(row, claims, diagnostics);

  for (const row of groups.flag) {
    checkNames(row, claims, diagnostics);
    checkKey(row, claims, diagnostics);
    checkMetaKey(row, diagnostics);
  }

  for (const row of groups.opt) {
    checkNames(row, claims, diagnostics);
    checkKey(row, claims, diagnostics);
    checkMetaKey(row, diagnostics);
    checkOptValue(row, diagnostics);
  }

  checkArgs(groups.arg, claims, diagnostics);

  return { scope, groups, claims, diagnostics };
}
