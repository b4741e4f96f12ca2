import { readFileSync } from 'fs';
import { join } from 'path';

export interface PackageInfo {
  name: string;
  version: string;
}

let cachedPkg: PackageInfo | null = null;

/**
 * Load and cache package.json metadata (best-effort).
 * Tries several relative paths because this file runs both from src/ and dist/.
 */
export function getPackageInfo(): PackageInfo {
  if (cachedPkg) return cachedPkg;

  const defaults: PackageInfo = { name: 'dvcert', version: '0.0.0-dev' };

  const candidates = ['../../..', '../../../..'];

  for (const rel of candidates) {
    try {
      const raw: unknown = JSON.parse(readFileSync(join(__dirname, rel, 'package.json'), 'utf-8'));
      if (typeof raw !== 'object' || raw === null) continue;
      const name = 'name' in raw && typeof raw.name === 'string' ? raw.name : defaults.name;
      const version =
        'version' in raw && typeof raw.version === 'string' ? raw.version : defaults.version;
      if (name !== defaults.name) continue;
      cachedPkg = { name, version };
      return cachedPkg;
    } catch {
      // try next
    }
  }

  cachedPkg = defaults;
  return cachedPkg;
}

/** Build a standardized User-Agent string for outbound CertCenter HTTP calls */
export function buildUserAgent(): string {
  const { name, version } = getPackageInfo();
  return `${name}/${version} (Node/${process.version.replace(/^v/, '')})`;
}
