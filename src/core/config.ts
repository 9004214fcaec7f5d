import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import {
  type Config,
  DIAGNOSTIC_CODES,
  type DiagnosticCode,
  type Severity,
  type ValidationResult,
} from '../types';

const DEFAULT_CONFIG: Config = {
  version: 1,
};

const PROJECT_CONFIG_NAME = '.cli-specrows.json';
const USER_CONFIG_DIR_NAME = '.cli-specrows';

export interface LoadConfigOptions {
  /** Override user config directory (for testing) */
  userConfigDir?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isDiagnosticCode(value: string): value is DiagnosticCode {
  return DIAGNOSTIC_CODES.some((code) => code === value);
}

function isSeverity(value: unknown): value is Severity {
  return value === 'error' || value === 'warn';
}

export function loadConfig(cwd?: string, options?: LoadConfigOptions): Config {
  const safeCwd = typeof cwd === 'string' ? cwd : process.cwd();
  const userConfigDir = options?.userConfigDir ?? join(homedir(), USER_CONFIG_DIR_NAME);
  const userConfigPath = join(userConfigDir, 'config.json');
  const projectConfigPath = join(safeCwd, PROJECT_CONFIG_NAME);

  const userConfig = loadSingleConfig(userConfigPath);
  const projectConfig = loadSingleConfig(projectConfigPath);

  return mergeConfigs(userConfig, projectConfig);
}

function loadSingleConfig(path: string): Config | null {
  if (!existsSync(path)) {
    return null;
  }

  try {
    const content = readFileSync(path, 'utf-8');
    if (!content.trim()) {
      return null;
    }

    const parsed: unknown = JSON.parse(content);
    return toConfig(parsed);
  } catch {
    // Unreadable or invalid configs are ignored here; verify-config reports them.
    return null;
  }
}

/**
 * Narrow a parsed value to a Config, or null when it fails validation.
 */
function toConfig(parsed: unknown): Config | null {
  if (validateConfig(parsed).errors.length > 0 || !isRecord(parsed)) {
    return null;
  }

  const config: Config = { version: 1 };
  if (typeof parsed.schema_version === 'string') {
    config.schema_version = parsed.schema_version;
  }
  if (isRecord(parsed.severity)) {
    const severity: Partial<Record<DiagnosticCode, Severity>> = {};
    for (const [code, level] of Object.entries(parsed.severity)) {
      if (isDiagnosticCode(code) && isSeverity(level)) {
        severity[code] = level;
      }
    }
    config.severity = severity;
  }
  return config;
}

/**
 * Project settings override user settings field by field; severity
 * overrides are merged per code.
 */
function mergeConfigs(userConfig: Config | null, projectConfig: Config | null): Config {
  if (!userConfig && !projectConfig) {
    return DEFAULT_CONFIG;
  }

  if (!userConfig) {
    return projectConfig ?? DEFAULT_CONFIG;
  }

  if (!projectConfig) {
    return userConfig;
  }

  const merged: Config = { version: 1 };
  const schemaVersion = projectConfig.schema_version ?? userConfig.schema_version;
  if (schemaVersion !== undefined) {
    merged.schema_version = schemaVersion;
  }
  if (userConfig.severity || projectConfig.severity) {
    merged.severity = { ...userConfig.severity, ...projectConfig.severity };
  }
  return merged;
}

/** @internal Exported for testing */
export function validateConfig(config: unknown): ValidationResult {
  const errors: string[] = [];

  if (!isRecord(config)) {
    errors.push('Config must be an object');
    return { errors };
  }

  if (config.version !== 1) {
    errors.push('version must be 1');
  }

  for (const key of Object.keys(config)) {
    if (key !== '$schema' && key !== 'version' && key !== 'schema_version' && key !== 'severity') {
      errors.push(`${key}: unknown field`);
    }
  }

  if (config.schema_version !== undefined) {
    if (typeof config.schema_version !== 'string') {
      errors.push('schema_version: must be a string if provided');
    } else if (config.schema_version === '') {
      errors.push('schema_version: must not be empty');
    }
  }

  if (config.severity !== undefined) {
    if (!isRecord(config.severity)) {
      errors.push('severity: must be an object');
    } else {
      for (const [code, level] of Object.entries(config.severity)) {
        if (!isDiagnosticCode(code)) {
          errors.push(`severity.${code}: unknown diagnostic code`);
        } else if (!isSeverity(level)) {
          errors.push(`severity.${code}: must be "error" or "warn"`);
        }
      }
    }
  }

  return { errors };
}

export function validateConfigFile(path: string): ValidationResult {
  const errors: string[] = [];

  if (!existsSync(path)) {
    errors.push(`File not found: ${path}`);
    return { errors };
  }

  try {
    const content = readFileSync(path, 'utf-8');
    if (!content.trim()) {
      errors.push('Config file is empty');
      return { errors };
    }

    const parsed: unknown = JSON.parse(content);
    return validateConfig(parsed);
  } catch (e) {
    errors.push(`Invalid JSON: ${e instanceof Error ? e.message : String(e)}`);
    return { errors };
  }
}

/**
 * Load one explicitly named config file. Throws when it is missing or invalid.
 */
export function loadConfigFile(path: string): Config {
  const result = validateConfigFile(path);
  if (result.errors.length > 0) {
    throw new Error(`Invalid config ${path}: ${result.errors.join('; ')}`);
  }
  const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  return toConfig(parsed) ?? DEFAULT_CONFIG;
}

export function getUserConfigPath(): string {
  return join(homedir(), USER_CONFIG_DIR_NAME, 'config.json');
}

export function getProjectConfigPath(cwd?: string): string {
  return resolve(cwd ?? process.cwd(), PROJECT_CONFIG_NAME);
}

export type { ValidationResult };
