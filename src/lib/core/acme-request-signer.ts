/**
 * ACME Request Signer
 *
 * Builds the flattened JWS that authenticates every ACME POST, per RFC 8555
 * Section 6.2. The protected header carries the nonce and target URL, and
 * identifies the account either by its public key (`jwk`, before registration)
 * or by its account URL (`kid`, afterwards).
 *
 * @see https://datatracker.ietf.org/doc/html/rfc8555#section-6.2
 * @see https://datatracker.ietf.org/doc/html/rfc7515
 */

import * as jose from 'jose';

import type { AccountKey } from '../crypto/account-key.js';
import type { AcmeProtectedHeader, SignedEnvelope } from '../types/envelope.js';

/**
 * Request payload. `null` and `undefined` produce the empty payload of a
 * POST-as-GET; strings are sent verbatim; anything else is JSON-serialized.
 */
export type AcmePayload = string | object | null | undefined;

export function buildProtectedHeader(
  url: string,
  nonce: string,
  key: AccountKey,
): AcmeProtectedHeader {
  const kid = key.keyId;
  if (kid) {
    return { alg: key.algorithm, nonce, url, kid };
  }
  return { alg: key.algorithm, nonce, url, jwk: key.publicJwk() };
}

export function encodePayload(payload: AcmePayload): Uint8Array {
  if (payload === null || payload === undefined) {
    return new Uint8Array(0);
  }
  return new TextEncoder().encode(typeof payload === 'string' ? payload : JSON.stringify(payload));
}

/**
 * Sign one request. The nonce must be fresh; an envelope is never re-sent.
 */
export async function signRequest(
  url: string,
  nonce: string,
  key: AccountKey,
  payload: AcmePayload,
): Promise<SignedEnvelope> {
  const protectedHeader = buildProtectedHeader(url, nonce, key);

  const jws = await new jose.FlattenedSign(encodePayload(payload))
    .setProtectedHeader(protectedHeader)
    .sign(key.signingKey);

  if (jws.protected === undefined) {
    throw new Error('JWS signing produced no protected header');
  }

  return { protected: jws.protected, payload: jws.payload, signature: jws.signature };
}
