/**
 * ACME account key handling (RFC 8555 Section 6.2)
 */

export { AccountKey } from './account-key.js';
