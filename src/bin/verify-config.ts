/**
 * Validate the user and project config files and report the result.
 */

import { existsSync } from 'node:fs';
import { colors, errorColors } from './utils/colors';
import { getProjectConfigPath, getUserConfigPath, validateConfigFile } from '../core/config';

export interface VerifyConfigOptions {
  userConfigPath?: string;
  projectConfigPath?: string;
}

/**
 * Returns 0 when every existing config file is valid, 1 otherwise.
 */
export function verifyConfig(options: VerifyConfigOptions = {}): number {
  const sources = [
    { label: 'User config', path: options.userConfigPath ?? getUserConfigPath() },
    { label: 'Project config', path: options.projectConfigPath ?? getProjectConfigPath() },
  ];

  let hasErrors = false;
  let found = 0;

  for (const { label, path } of sources) {
    if (!existsSync(path)) {
      console.log(`${label}: ${colors.dim('not found')} (${path})`);
      continue;
    }
    found++;

    const result = validateConfigFile(path);
    if (result.errors.length === 0) {
      console.log(`${label}: ${colors.green('valid')} (${path})`);
      continue;
    }

    hasErrors = true;
    console.error(`${label}: ${errorColors.red('invalid')} (${path})`);
    for (const error of result.errors) {
      console.error(`  - ${error}`);
    }
  }

  if (found === 0) {
    console.log('No config files found. Defaults apply.');
  }

  return hasErrors ? 1 : 0;
}
