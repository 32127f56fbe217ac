import { readFileSync } from 'fs';
import { join } from 'path';

export interface PackageInfo {
  name: string;
  version: string;
}

let cachedPkg: PackageInfo | null = null;

/**
 * Load and cache package.json metadata (best-effort).
 * Tries several relative paths because this file runs both from src/ and from dist/.
 */
export function getPackageInfo(): PackageInfo {
  if (cachedPkg) return cachedPkg;

  const defaults: PackageInfo = {
    name: 'retryhttp',
    version: '0.0.0-dev',
  };

  const candidates = [
    '../../../package.json', // from src/lib/utils/ or dist/lib/utils/
    '../../package.json',
    '../package.json',
  ];

  for (const rel of candidates) {
    let raw: { name?: unknown; version?: unknown };
    try {
      raw = JSON.parse(readFileSync(join(__dirname, rel), 'utf-8'));
    } catch {
      continue; // try next
    }
    cachedPkg = {
      name: typeof raw.name === 'string' && raw.name !== '' ? raw.name : defaults.name,
      version: typeof raw.version === 'string' && raw.version !== '' ? raw.version : defaults.version,
    };
    return cachedPkg;
  }

  cachedPkg = defaults;
  return cachedPkg;
}

/** Build the User-Agent sent with requests that do not set one. */
export function buildUserAgent(): string {
  const { name, version } = getPackageInfo();
  return `${name}/${version} (Node/${process.version.replace(/^v/, '')})`;
}
