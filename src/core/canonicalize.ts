import { compareCodePoints } from './compare';
import {
  type FlagRow,
  type JsonValue,
  type OptRow,
  RESERVED_LONG_HELP,
  RESERVED_LONG_VERSION,
  RESERVED_SHORT_HELP,
  RESERVED_SHORT_VERSION,
  ROOT_SCOPE,
  type ScopeClaims,
  type ScopeValidation,
} from '../types';

/** Empty strings sort after every non-empty string */
function compareEmptyLast(a: string, b: string): number {
  if (a === b) return 0;
  if (a === '') return 1;
  if (b === '') return -1;
  return compareCodePoints(a, b);
}

/**
 * Canonical flag/opt order: long name, then short name (both empty-last), then key.
 */
export function compareOptionRows(a: FlagRow | OptRow, b: FlagRow | OptRow): number {
  return (
    compareEmptyLast(a.longOpt, b.longOpt) ||
    compareEmptyLast(a.shortOpt, b.shortOpt) ||
    compareCodePoints(a.key, b.key)
  );
}

/**
 * Scope visit order: root first, then by code point.
 */
export function scopeOrder(scopes: Iterable<string>): string[] {
  const sorted = [...scopes].sort(compareCodePoints);
  return sorted.includes(ROOT_SCOPE)
    ? [ROOT_SCOPE, ...sorted.filter((s) => s !== ROOT_SCOPE)]
    : sorted;
}

function impliedRow(
  scope: string,
  kind: 'help' | 'version',
  shortName: string,
  longName: string,
  desc: string,
  claims: ScopeClaims,
): JsonValue[] | null {
  // A conflicting claim on the long name was already reported; never insert a second owner.
  if (claims.longs.has(longName)) {
    return null;
  }
  const short = claims.shorts.has(shortName) ? '' : shortName;
  return [scope, kind, short, longName, desc];
}

/**
 * Canonical rows for one validated scope, as fresh arrays.
 */
export function canonicalizeScope({ scope, groups, claims }: ScopeValidation): JsonValue[][] {
  const out: JsonValue[][] = [];
  const copy = (row: { raw: readonly JsonValue[] }) => out.push([...row.raw]);

  const [about] = groups.about;
  if (about) copy(about);

  const [help] = groups.help;
  if (help) {
    copy(help);
  } else {
    const implied = impliedRow(
      scope,
      'help',
      RESERVED_SHORT_HELP,
      RESERVED_LONG_HELP,
      'Show help',
      claims,
    );
    if (implied) out.push(implied);
  }

  const [version] = groups.version;
  if (version) {
    copy(version);
  } else if (scope === ROOT_SCOPE) {
    const implied = impliedRow(
      scope,
      'version',
      RESERVED_SHORT_VERSION,
      RESERVED_LONG_VERSION,
      'Show version',
      claims,
    );
    if (implied) out.push(implied);
  }

  for (const row of [...groups.flag].sort(compareOptionRows)) copy(row);
  for (const row of [...groups.opt].sort(compareOptionRows)) copy(row);
  for (const row of groups.arg) copy(row);

  return out;
}
