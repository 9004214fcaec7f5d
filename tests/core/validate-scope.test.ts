import { describe, expect, test } from 'vitest';
import { classifyRows } from '@/core/classify';
import { validateScope } from '@/core/validate-scope';
import type { JsonValue, ScopeValidation } from '@/types';

function validate(rows: JsonValue[], scope = 'root'): ScopeValidation {
  const { scopes } = classifyRows(rows);
  return validateScope(scope, scopes.get(scope) ?? []);
}

function found(validation: ScopeValidation): Array<[string, number]> {
  return validation.diagnostics.map((d) => [d.code, d.row_index]);
}

describe('validateScope', () => {
  test('clean scope produces no diagnostics', () => {
    const v = validate([
      ['root', 'about', 'tool'],
      ['root', 'help', '-h', '--help', 'Show help'],
      ['root', 'flag', '-v', '--verbose', 'verbose', 'more output'],
      ['root', 'opt', '-o', '--out', 'out', 'PATH', 'output file', { default: 'a.out' }],
      ['root', 'arg', 'INPUT', 'input', 'input file'],
    ]);
    expect(v.diagnostics).toEqual([]);
  });

  test('reports every duplicate about/help/version row beyond the first', () => {
    const v = validate([
      ['root', 'about', 'a'],
      ['root', 'about', 'b'],
      ['root', 'about', 'c'],
      ['root', 'version', '-V', '--version', 'v'],
      ['root', 'version', '', '', 'v'],
    ]);
    expect(found(v)).toEqual([
      ['ABOUT_DUP', 1],
      ['ABOUT_DUP', 2],
      ['VERSION_DUP', 4],
      ['OPT_NO_NAMES', 4],
    ]);
  });

  test('duplicate short option is reported once at the later row', () => {
    const v = validate([
      ['root', 'flag', '-v', '--verbose', 'verbose', 'd'],
      ['root', 'flag', '-v', '--quiet', 'quiet', 'd'],
    ]);
    expect(v.diagnostics).toEqual([
      {
        severity: 'error',
        code: 'DUP_SHORT',
        scope: 'root',
        row_index: 1,
        message: 'duplicate short option -v',
      },
    ]);
  });

  test('every later duplicate is reported; the first keeps the claim', () => {
    const v = validate([
      ['root', 'flag', '', '--same', 'a', 'd'],
      ['root', 'flag', '', '--same', 'b', 'd'],
      ['root', 'opt', '', '--same', 'c', 'STR', 'd'],
    ]);
    expect(found(v)).toEqual([
      ['DUP_LONG', 1],
      ['DUP_LONG', 2],
    ]);
    expect(v.claims.longs.get('--same')).toBe(0);
  });

  test('rows without names are reported and claim nothing', () => {
    const v = validate([
      ['root', 'flag', '', '', 'a', 'd'],
      ['root', 'opt', '', '', 'b', 'STR', 'd'],
      ['root', 'help', '', '', 'd'],
    ]);
    expect(found(v)).toEqual([
      ['OPT_NO_NAMES', 2],
      ['FLAG_NO_NAMES', 0],
      ['OPT_NO_NAMES', 1],
    ]);
    expect(v.claims.shorts.size).toBe(0);
    expect(v.claims.longs.size).toBe(0);
    expect([...v.claims.keys.keys()]).toEqual(['a', 'b']);
  });

  test('help and version rows without names use the opt code', () => {
    const v = validate([
      ['root', 'help', '', '', 'd'],
      ['root', 'version', '', '', 'd'],
    ]);
    expect(v.diagnostics).toEqual([
      {
        severity: 'error',
        code: 'OPT_NO_NAMES',
        scope: 'root',
        row_index: 0,
        message: 'help row must provide at least one of shortOpt or longOpt',
      },
      {
        severity: 'error',
        code: 'OPT_NO_NAMES',
        scope: 'root',
        row_index: 1,
        message: 'version row must provide at least one of shortOpt or longOpt',
      },
    ]);
  });

  test('reserved help and version names are only for help/version rows', () => {
    const v = validate([
      ['root', 'flag', '-h', '--loud', 'loud', 'd'],
      ['root', 'opt', '-V', '--help', 'x', 'STR', 'd'],
      ['root', 'help', '', '--assist', 'd'],
    ]);
    expect(found(v)).toEqual([
      ['RESERVED_HELP_USED', 0],
      ['RESERVED_HELP_USED', 1],
      ['RESERVED_VERSION_USED', 1],
    ]);
  });

  test('help and version rows claim names before flags', () => {
    const v = validate([
      ['root', 'flag', '-q', '--quiet', 'quiet', 'd'],
      ['root', 'help', '-q', '--help', 'd'],
    ]);
    expect(found(v)).toEqual([['DUP_SHORT', 0]]);
    expect(v.claims.shorts.get('-q')).toBe(1);
  });

  test('keys are unique across flag, opt and arg rows', () => {
    const v = validate([
      ['root', 'arg', 'NAME', 'name', 'd'],
      ['root', 'flag', '-n', '--name', 'name', 'd'],
      ['root', 'opt', '-m', '--mode', 'name', 'STR', 'd'],
    ]);
    expect(found(v)).toEqual([
      ['DUP_KEY', 2],
      ['DUP_KEY', 0],
    ]);
  });

  test('meta.key must echo the row key', () => {
    const v = validate([
      ['root', 'flag', '-a', '--all', 'all', 'd', { key: 'everything' }],
      ['root', 'opt', '-b', '--base', 'base', 'STR', 'd', { key: 'base' }],
    ]);
    expect(v.diagnostics).toEqual([
      {
        severity: 'error',
        code: 'META_KEY_MISMATCH',
        scope: 'root',
        row_index: 0,
        message: 'meta.key "everything" does not match key "all"',
      },
    ]);
  });

  test('unknown value kinds skip the default check', () => {
    const v = validate([['root', 'opt', '-n', '--num', 'n', 'FLOAT', 'd', { default: 'x' }]]);
    expect(v.diagnostics).toEqual([
      {
        severity: 'error',
        code: 'OPT_VALUE_KIND_UNKNOWN',
        scope: 'root',
        row_index: 0,
        message: 'unknown value_kind "FLOAT"',
      },
    ]);
  });

  test('defaults are checked against the value kind', () => {
    const v = validate([
      ['root', 'opt', '-n', '--num', 'n', 'U32', 'd', { default: '12x' }],
      ['root', 'opt', '-o', '--offset', 'o', 'I32', 'd', { default: '-4' }],
      ['root', 'opt', '-k', '--key', 'k', 'BYTES_HEX', 'd', { default: 'abc' }],
      ['root', 'opt', '-c', '--count', 'c', 'U32', 'd', { default: 12 }],
    ]);
    expect(found(v)).toEqual([
      ['OPT_DEFAULT_INVALID', 0],
      ['OPT_DEFAULT_INVALID', 2],
      ['OPT_DEFAULT_INVALID', 3],
    ]);
    expect(v.diagnostics[0]?.message).toBe('default is not valid for U32');
  });

  test('required arg after optional arg', () => {
    const v = validate([
      ['root', 'arg', 'A', 'a', 'd', { required: false }],
      ['root', 'arg', 'B', 'b', 'd', { required: true }],
      ['root', 'arg', 'C', 'c', 'd'],
    ]);
    expect(found(v)).toEqual([
      ['ARG_REQUIRED_AFTER_OPTIONAL', 1],
      ['ARG_REQUIRED_AFTER_OPTIONAL', 2],
    ]);
  });

  test('multiple args must be single and last', () => {
    const v = validate([
      ['root', 'arg', 'A', 'a', 'd', { multiple: true }],
      ['root', 'arg', 'B', 'b', 'd', { multiple: true }],
      ['root', 'arg', 'C', 'c', 'd'],
    ]);
    expect(found(v)).toEqual([
      ['ARG_MULTI_NOT_LAST', 0],
      ['ARG_MULTI_DUP', 1],
      ['ARG_MULTI_NOT_LAST', 1],
    ]);
  });

  test('a trailing multiple arg after optional args is valid', () => {
    const v = validate([
      ['root', 'arg', 'A', 'a', 'd'],
      ['root', 'arg', 'B', 'b', 'd', { required: false }],
      ['root', 'arg', 'REST', 'rest', 'd', { required: false, multiple: true }],
    ]);
    expect(v.diagnostics).toEqual([]);
  });

  test('groups keep first-seen order per kind', () => {
    const v = validate([
      ['root', 'flag', '-b', '--bravo', 'b', 'd'],
      ['root', 'arg', 'X', 'x', 'd'],
      ['root', 'flag', '-a', '--alpha', 'a', 'd'],
    ]);
    expect(v.groups.flag.map((r) => r.index)).toEqual([0, 2]);
    expect(v.groups.arg.map((r) => r.index)).toEqual([1]);
  });
});
