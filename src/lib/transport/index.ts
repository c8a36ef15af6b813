/**
 * ACME transport layer
 *
 * undici-based HTTP client with per-attempt timeouts, and the call engine that
 * retries transient failures with a freshly built request each time.
 */

export {
  AcmeHttpClient,
  type AcmeHttpClientOptions,
  type AcmeHttpMethod,
  type AcmeHttpRequest,
  type AcmeHttpResponse,
} from './http-client.js';

export {
  RetryingCaller,
  isSuccessStatus,
  DEFAULT_RETRY_CONFIG,
  type AttemptBuilder,
  type RetryConfig,
} from './retry.js';
