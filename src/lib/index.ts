/**
 * acme-bootstrap library - core exports
 *
 * Directory discovery, account keys, signed requests and the nonce-safe call engine.
 */

// Session and accounts
export { AcmeClient, type AcmeClientOptions } from './core/acme-client.js';
export { AcmeAccount } from './core/acme-account.js';
export { bootstrapAccount, accountKeyHandle } from './core/account-bootstrap.js';
export { parseAccountObject, registrationPayload } from './core/account-object.js';
export { fetchDirectory, parseDirectory } from './core/directory-client.js';
export {
  signRequest,
  buildProtectedHeader,
  encodePayload,
  type AcmePayload,
} from './core/acme-request-signer.js';
export type { AcmeSession } from './core/session.js';

// Error handling
export {
  AcmeBootstrapError,
  NetworkError,
  TerminalCallError,
  MissingFieldError,
  DecodeError,
  PersistenceError,
  AccountStateError,
  isAcmeBootstrapError,
  isNetworkError,
  isTerminalCallError,
  isMissingFieldError,
  isDecodeError,
  isPersistenceError,
  isAccountStateError,
  type AcmeBootstrapErrorKind,
  type AcmeBootstrapErrorType,
  type DecodeFormat,
} from './errors/acme-errors.js';

// Types
export type { AcmeDirectory, AcmeDirectoryMeta } from './types/directory.js';
export type {
  AcmeAccountObject,
  AcmeAccountStatus,
  AcmeAccountRegistrationPayload,
  AcmeProblemDetails,
} from './types/account.js';
export type { AcmeProtectedHeader, SignedEnvelope } from './types/envelope.js';

// Managers
export { NonceSource } from './managers/nonce-source.js';

// Persistence
export {
  MemoryPersist,
  FilePersist,
  persistKeyToString,
  type AcmePersist,
  type PersistKey,
  type PersistKind,
} from './persist/index.js';

// Transport layer
export {
  AcmeHttpClient,
  RetryingCaller,
  isSuccessStatus,
  DEFAULT_RETRY_CONFIG,
  type AcmeHttpClientOptions,
  type AcmeHttpMethod,
  type AcmeHttpRequest,
  type AcmeHttpResponse,
  type AttemptBuilder,
  type RetryConfig,
} from './transport/index.js';
export { AcmeTransport } from './transport/acme-transport.js';

// Cryptographic operations
export { AccountKey } from './crypto/index.js';

// Utils
export { base64urlEncode, base64urlDecode } from './utils/base64url.js';
export { expectHeader, readHeader, readJson } from './utils/index.js';
export { buildUserAgent, getPackageInfo, type PackageInfo } from './utils/user-agent.js';
