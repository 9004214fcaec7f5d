import { describe, expect, test } from 'vitest';
import { diag } from '@/core/diagnostics';
import { formatDiagnosticsHuman, formatLocation } from '@/bin/run/format';
import { withEnv } from '../helpers';

describe('formatLocation', () => {
  test('scope and row', () => {
    expect(formatLocation(diag('DUP_KEY', 'm', { scope: 'build', rowIndex: 4 }))).toBe('build#4');
  });

  test('document-level diagnostics', () => {
    expect(formatLocation(diag('SCHEMA_VERSION', 'm'))).toBe('-');
    expect(formatLocation(diag('ROW_SHAPE', 'm', { rowIndex: 2 }))).toBe('-#2');
  });
});

describe('formatDiagnosticsHuman', () => {
  test('no diagnostics', () => {
    const output = withEnv({ NO_COLOR: '1' }, () => formatDiagnosticsHuman('cli.json', []));
    expect(output).toBe('cli.json\n  No problems found');
  });

  test('aligned rows and totals', () => {
    const output = withEnv({ NO_COLOR: '1' }, () =>
      formatDiagnosticsHuman('cli.json', [
        diag('DUP_KEY', 'duplicate key k', { scope: 'root', rowIndex: 12 }),
        diag('ABOUT_DUP', 'more than one about row in scope', {
          scope: 'sub',
          rowIndex: 3,
          severity: 'warn',
        }),
      ]),
    );
    expect(output.split('\n')).toEqual([
      'cli.json',
      '  error  DUP_KEY    root#12  duplicate key k',
      '  warn   ABOUT_DUP  sub#3    more than one about row in scope',
      '',
      '1 error, 1 warning',
    ]);
  });

  test('pluralizes counts', () => {
    const output = withEnv({ NO_COLOR: '1' }, () =>
      formatDiagnosticsHuman('cli.json', [
        diag('DUP_KEY', 'a', { scope: 'root', rowIndex: 1 }),
        diag('DUP_KEY', 'b', { scope: 'root', rowIndex: 2 }),
      ]),
    );
    expect(output.endsWith('\n2 errors, 0 warnings')).toBe(true);
  });
});
