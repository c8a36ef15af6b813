import type { AcmePersist } from '../persist/types.js';
import type { AcmeTransport } from '../transport/acme-transport.js';
import type { AcmeDirectory } from '../types/directory.js';

/**
 * What an account needs from the client that created it
 */
export interface AcmeSession {
  readonly directoryUrl: string;
  readonly directory: AcmeDirectory;
  readonly persist: AcmePersist;
  readonly transport: AcmeTransport;
}
