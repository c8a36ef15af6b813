/**
 * acme-bootstrap - ACME (RFC 8555) client bootstrap core
 *
 * Main entry point
 */

// Well-known authorities
export {
  provider,
  findProvider,
  listProviders,
  resolveDirectoryUrl,
  type AcmeDirectoryEntry,
  type AcmeDirectoryLocation,
  type AcmeProviderTable,
} from './directory.js';

export * from './lib/index.js';
