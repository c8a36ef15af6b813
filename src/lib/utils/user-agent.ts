import { readFileSync } from 'fs';
import { join } from 'path';

export interface PackageInfo {
  name: string;
  version: string;
}

const PACKAGE_NAME = 'acme-bootstrap';

let cachedPkg: PackageInfo | null = null;

/**
 * Load and cache package.json metadata (best-effort).
 * src/lib/utils and dist/lib/utils both sit three levels below the package root.
 */
export function getPackageInfo(): PackageInfo {
  if (cachedPkg) return cachedPkg;

  cachedPkg = { name: PACKAGE_NAME, version: '0.0.0-dev' };
  try {
    const raw: unknown = JSON.parse(
      readFileSync(join(__dirname, '..', '..', '..', 'package.json'), 'utf-8'),
    );
    if (
      typeof raw === 'object' &&
      raw !== null &&
      'name' in raw &&
      raw.name === PACKAGE_NAME &&
      'version' in raw &&
      typeof raw.version === 'string'
    ) {
      cachedPkg = { name: PACKAGE_NAME, version: raw.version };
    }
  } catch {
    // keep the development defaults
  }
  return cachedPkg;
}

/** Build the User-Agent string sent with every outbound ACME call (RFC 8555 Section 6.1) */
export function buildUserAgent(): string {
  const { name, version } = getPackageInfo();
  return `${name}/${version} Node/${process.version.replace(/^v/, '')}`;
}
