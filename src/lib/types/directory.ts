/**
 * RFC 8555 ACME Directory Types
 *
 * Type definitions for ACME directory discovery according to RFC 8555 Section 7.1.1
 */

/**
 * ACME Directory structure as defined in RFC 8555
 *
 * newNonce, newAccount and newOrder are required. Anything else the
 * authority publishes is kept as-is and reachable by name.
 */
export interface AcmeDirectory {
  /** URL for new nonce requests (RFC 8555 Section 7.2) */
  readonly newNonce: string;

  /** URL for new account registration (RFC 8555 Section 7.3) */
  readonly newAccount: string;

  /** URL for new order creation (RFC 8555 Section 7.4) */
  readonly newOrder: string;

  /** Optional metadata about the ACME server */
  readonly meta?: AcmeDirectoryMeta;

  /** Entries this client does not model */
  readonly [entry: string]: unknown;
}

/**
 * ACME Directory metadata as defined in RFC 8555
 */
export interface AcmeDirectoryMeta {
  /** URL of the terms of service */
  termsOfService?: string;

  /** Website URL for the ACME server */
  website?: string;

  /** CAA identities for this ACME server */
  caaIdentities?: string[];

  /** Whether external account binding is required */
  externalAccountRequired?: boolean;
}
