import { findProvider, provider, type AcmeDirectoryEntry } from '../../directory.js';

export interface DirectoryFlags {
  staging?: boolean;
  production?: boolean;
  /** Directory URL, or a bundled `<provider>/<environment>` id */
  directory?: string;
}

/**
 * Resolve the directory from CLI flags. Without flags, Let's Encrypt staging
 * is used so that a bare invocation never touches production.
 */
export function resolveDirectory(flags: DirectoryFlags): AcmeDirectoryEntry | string {
  if (flags.staging && flags.production) {
    throw new Error('--staging and --production are mutually exclusive');
  }
  if (flags.production) return provider.letsencrypt.production;
  if (flags.staging) return provider.letsencrypt.staging;
  if (flags.directory) {
    if (/^https?:\/\//.test(flags.directory)) return flags.directory;
    const entry = findProvider(flags.directory);
    if (!entry) {
      throw new Error(
        `Unknown directory "${flags.directory}" (use a URL or e.g. letsencrypt/staging)`,
      );
    }
    return entry;
  }
  return provider.letsencrypt.staging;
}

export function describeDirectory(location: AcmeDirectoryEntry | string): string {
  return typeof location === 'string' ? location : `${location.name} (${location.directoryUrl})`;
}
