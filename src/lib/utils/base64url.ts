import { base64url } from 'jose';
import { DecodeError } from '../errors/acme-errors.js';

const BASE64URL_ALPHABET = /^[A-Za-z0-9_-]*$/;

/**
 * URL-safe, unpadded base64 (RFC 4648 Section 5)
 */
export function base64urlEncode(input: Uint8Array | string): string {
  return base64url.encode(input);
}

/**
 * Strict inverse of {@link base64urlEncode}.
 *
 * Padding, characters from the standard alphabet and lengths no encoder can
 * produce are rejected instead of being silently skipped.
 */
export function base64urlDecode(input: string): Uint8Array {
  if (!BASE64URL_ALPHABET.test(input)) {
    throw new DecodeError('base64url', 'input contains characters outside the base64url alphabet');
  }
  if (input.length % 4 === 1) {
    throw new DecodeError('base64url', `invalid length ${input.length}`);
  }
  try {
    return base64url.decode(input);
  } catch (err) {
    throw DecodeError.from('base64url', err);
  }
}
