import { describe, expect, test } from 'vitest';
import { parseRunFlags } from '@/bin/run/flags';
import { captureConsole } from '../helpers';

describe('parseRunFlags', () => {
  test('defaults', () => {
    const { result } = captureConsole(() => parseRunFlags('check', ['cli.json']));
    expect(result).toEqual({
      mode: 'check',
      specPath: 'cli.json',
      diagOut: '-',
      out: '-',
      inPlace: false,
      summary: false,
      configPath: undefined,
    });
  });

  test('all fmt options', () => {
    const { result } = captureConsole(() =>
      parseRunFlags('fmt', [
        '--diag-out',
        'diags.json',
        '--out=canon.json',
        '--summary',
        '--config',
        'conf.json',
        'cli.json',
      ]),
    );
    expect(result).toEqual({
      mode: 'fmt',
      specPath: 'cli.json',
      diagOut: 'diags.json',
      out: 'canon.json',
      inPlace: false,
      summary: true,
      configPath: 'conf.json',
    });
  });

  test('--in-place', () => {
    const { result } = captureConsole(() => parseRunFlags('fmt', ['cli.json', '--in-place']));
    expect(result?.inPlace).toBe(true);
  });

  test('"--" ends option parsing', () => {
    const { result } = captureConsole(() => parseRunFlags('check', ['--', '--odd-name.json']));
    expect(result?.specPath).toBe('--odd-name.json');
  });

  test('value flag without a value', () => {
    const { result, stderr } = captureConsole(() => parseRunFlags('check', ['cli.json', '--diag-out']));
    expect(result).toBeNull();
    expect(stderr).toBe('Error: --diag-out requires a path\n');
  });

  test('value flag followed by another flag', () => {
    const { result, stderr } = captureConsole(() =>
      parseRunFlags('fmt', ['--out', '--summary', 'cli.json']),
    );
    expect(result).toBeNull();
    expect(stderr).toBe('Error: --out requires a path\n');
  });

  test('unknown option', () => {
    const { result, stderr } = captureConsole(() => parseRunFlags('check', ['--fast', 'cli.json']));
    expect(result).toBeNull();
    expect(stderr).toBe('Error: Unknown option: --fast\n');
  });

  test('fmt-only options are rejected by check', () => {
    const { result, stderr } = captureConsole(() =>
      parseRunFlags('check', ['--in-place', 'cli.json']),
    );
    expect(result).toBeNull();
    expect(stderr).toBe('Error: --out and --in-place are only valid with fmt\n');
  });

  test('--in-place conflicts with --out', () => {
    const { result, stderr } = captureConsole(() =>
      parseRunFlags('fmt', ['--in-place', '--out', 'x.json', 'cli.json']),
    );
    expect(result).toBeNull();
    expect(stderr).toBe('Error: --in-place cannot be combined with --out\n');
  });

  test('missing spec path', () => {
    const { result, stderr } = captureConsole(() => parseRunFlags('fmt', ['--summary']));
    expect(result).toBeNull();
    expect(stderr).toBe(
      'Error: No spec file provided\nUsage: cli-specrows fmt [options] <spec>\n',
    );
  });

  test('extra positional argument', () => {
    const { result, stderr } = captureConsole(() => parseRunFlags('check', ['a.json', 'b.json']));
    expect(result).toBeNull();
    expect(stderr).toBe('Error: Unexpected argument: b.json\n');
  });
});
