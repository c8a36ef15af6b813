import type { JWK } from 'jose';

/**
 * Protected header of an ACME request (RFC 8555 Section 6.2)
 *
 * Exactly one of `jwk` and `kid` is present.
 */
export type AcmeProtectedHeader =
  | { alg: string; nonce: string; url: string; jwk: JWK; kid?: never }
  | { alg: string; nonce: string; url: string; kid: string; jwk?: never };

/**
 * Flattened JWS JSON serialization sent as the body of every signed request
 */
export interface SignedEnvelope {
  /** base64url of the JSON protected header */
  protected: string;
  /** base64url of the payload, empty for POST-as-GET */
  payload: string;
  /** base64url of the raw signature */
  signature: string;
}
