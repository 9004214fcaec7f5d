/**
 * Entry point for the check and fmt commands.
 */

import { readFileSync, writeFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { formatDiagnosticsHuman } from './format';
import type { RunFlags } from './flags';
import { type LoadConfigOptions, loadConfig, loadConfigFile } from '../../core/config';
import { decodeSpecBytes } from '../../core/decode';
import { validateAndCanon } from '../../core/engine';
import { envTruthy } from '../../core/env';
import { stableStringify } from '../../core/json';
import type { Config } from '../../types';

export { parseRunFlags } from './flags';

/** Exit code for documents that cannot be read or decoded, bad usage and invalid config */
export const EXIT_FATAL = 2;

export interface RunOptions {
  /** Base directory for relative paths and the project config */
  cwd?: string;
  loadOptions?: LoadConfigOptions;
}

function writeOutput(target: string, text: string, cwd: string): void {
  if (target === '-') {
    console.log(text);
  } else {
    writeFileSync(resolve(cwd, target), `${text}\n`, 'utf-8');
  }
}

function resolveConfig(flags: RunFlags, options: RunOptions, cwd: string): Config {
  return flags.configPath
    ? loadConfigFile(resolve(cwd, flags.configPath))
    : loadConfig(cwd, options.loadOptions);
}

/**
 * Run check or fmt. Returns the process exit code:
 * 0 without error diagnostics, 1 with, EXIT_FATAL when the run could not happen.
 */
export function runSpecCommand(flags: RunFlags, options: RunOptions = {}): number {
  const cwd = options.cwd ?? process.cwd();

  try {
    const config = resolveConfig(flags, options, cwd);
    const specPath = resolve(cwd, flags.specPath);
    const document = decodeSpecBytes(readFileSync(specPath));

    const result = validateAndCanon(document, {
      schemaVersion: config.schema_version,
      severity: config.severity,
      strict: envTruthy('SPECROWS_STRICT'),
    });

    // Diagnostics are written on every outcome.
    writeOutput(flags.diagOut, stableStringify({ diagnostics: result.diagnostics }), cwd);

    if (flags.summary) {
      console.error(formatDiagnosticsHuman(flags.specPath, result.diagnostics));
    }

    if (flags.mode === 'fmt') {
      writeOutput(flags.inPlace ? specPath : flags.out, stableStringify(result.canon), cwd);
    }

    return result.ok ? 0 : 1;
  } catch (e) {
    console.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
    return EXIT_FATAL;
  }
}
