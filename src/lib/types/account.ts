/**
 * RFC 8555 ACME Account Types
 *
 * Type definitions for ACME account management according to RFC 8555
 */

/**
 * ACME Account Status
 */
export type AcmeAccountStatus = 'valid' | 'deactivated' | 'revoked';

/**
 * ACME Account object according to RFC 8555 Section 7.1.2
 *
 * Fields the authority adds beyond the RFC are kept.
 */
export interface AcmeAccountObject {
  /** Account status */
  status?: AcmeAccountStatus;
  /** Contact information */
  contact?: string[];
  /** Terms of service agreement */
  termsOfServiceAgreed?: boolean;
  /** Account orders URL */
  orders?: string;
  [field: string]: unknown;
}

/**
 * Payload sent to the newAccount endpoint
 *
 * @see https://datatracker.ietf.org/doc/html/rfc8555#section-7.3
 */
export interface AcmeAccountRegistrationPayload {
  contact: string[];
  termsOfServiceAgreed: true;
}

/**
 * ACME Problem Details according to RFC 7807
 */
export interface AcmeProblemDetails {
  /** Problem type URI */
  type: string;
  /** Human-readable problem description */
  detail?: string;
  /** HTTP status code */
  status?: number;
  /** Problem instance URI */
  instance?: string;
  [field: string]: unknown;
}
