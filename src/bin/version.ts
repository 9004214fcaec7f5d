import { readFileSync } from 'node:fs';

const PACKAGE_JSON_URL = new URL('../../package.json', import.meta.url);

let cachedVersion: string | undefined;

/**
 * Package version from package.json, or "dev" when it cannot be read.
 */
export function getPackageVersion(): string {
  if (cachedVersion !== undefined) {
    return cachedVersion;
  }
  cachedVersion = 'dev';
  try {
    const pkg: unknown = JSON.parse(readFileSync(PACKAGE_JSON_URL, 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      cachedVersion = pkg.version;
    }
  } catch (e) {
    console.error(`Could not read package version: ${e instanceof Error ? e.message : String(e)}`);
  }
  return cachedVersion;
}
