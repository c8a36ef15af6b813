/**
 * Default configuration constants for acme-bootstrap
 *
 * Fallbacks used when no explicit configuration is provided.
 */

// Per-attempt HTTP timeouts
export const HTTP_CONNECT_TIMEOUT_MS = 30_000;
export const HTTP_HEADERS_TIMEOUT_MS = 30_000;
export const HTTP_BODY_TIMEOUT_MS = 30_000;

// Call engine
export const CALL_MAX_ATTEMPTS = 3;
export const TERMINAL_STATUS_CODES: readonly number[] = [400];

// Persistence
export const ACCOUNT_KEY_REALM = 'acme_account';

// Protocol
export const REPLAY_NONCE_HEADER = 'replay-nonce';
export const LOCATION_HEADER = 'location';
export const JOSE_CONTENT_TYPE = 'application/jose+json';
