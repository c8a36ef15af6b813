import { CALL_MAX_ATTEMPTS, TERMINAL_STATUS_CODES } from '../constants/defaults.js';
import { NetworkError, TerminalCallError } from '../errors/acme-errors.js';
import { debugRetry } from '../utils/debug.js';
import { parseProblem } from '../utils/index.js';
import type { AcmeHttpClient, AcmeHttpRequest, AcmeHttpResponse } from './http-client.js';

/**
 * Retry configuration for ACME calls
 */
export interface RetryConfig {
  /** Total attempts including the first (default: 3) */
  maxAttempts: number;
  /** Statuses that fail at once without retry (default: [400]) */
  terminalStatusCodes: readonly number[];
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: CALL_MAX_ATTEMPTS,
  terminalStatusCodes: TERMINAL_STATUS_CODES,
};

/**
 * Produces the request for one attempt. Called again for every retry, so a
 * nonce drawn inside it is never sent twice.
 */
export type AttemptBuilder = () => Promise<AcmeHttpRequest>;

export function isSuccessStatus(statusCode: number): boolean {
  return statusCode >= 200 && statusCode < 300;
}

/**
 * Bounded, immediate retry of ACME calls
 *
 * Every attempt starts by invoking the attempt builder. A 2xx response is
 * returned; a terminal status fails with {@link TerminalCallError}; any other
 * status or a transport failure is retried until `maxAttempts` is reached, then
 * fails with {@link NetworkError}. Errors thrown by the builder itself are not
 * retried.
 */
export class RetryingCaller {
  private readonly config: RetryConfig;

  constructor(
    private readonly http: AcmeHttpClient,
    config: Partial<RetryConfig> = {},
  ) {
    const merged = { ...DEFAULT_RETRY_CONFIG, ...config };
    this.config = { ...merged, maxAttempts: Math.max(1, Math.floor(merged.maxAttempts)) };
  }

  async execute(buildAttempt: AttemptBuilder, context = 'call'): Promise<AcmeHttpResponse> {
    const { maxAttempts, terminalStatusCodes } = this.config;

    for (let attempt = 1; ; attempt++) {
      const req = await buildAttempt();

      let res: AcmeHttpResponse;
      try {
        res = await this.http.send(req);
      } catch (err) {
        if (attempt >= maxAttempts) {
          debugRetry('%s: transport failure on final attempt %d', context, attempt);
          throw NetworkError.transport(attempt, err);
        }
        debugRetry(
          '%s: attempt %d/%d transport failure, retrying: %s',
          context,
          attempt,
          maxAttempts,
          err instanceof Error ? err.message : String(err),
        );
        continue;
      }

      if (isSuccessStatus(res.statusCode)) {
        if (attempt > 1) {
          debugRetry('%s: succeeded on attempt %d/%d', context, attempt, maxAttempts);
        }
        return res;
      }

      if (terminalStatusCodes.includes(res.statusCode)) {
        debugRetry('%s: terminal status %d, no retry', context, res.statusCode);
        throw new TerminalCallError(res.statusCode, res.body, parseProblem(res.body));
      }

      if (attempt >= maxAttempts) {
        debugRetry('%s: status %d on final attempt %d', context, res.statusCode, attempt);
        throw NetworkError.exhausted(attempt, res.statusCode, res.body, parseProblem(res.body));
      }

      debugRetry(
        '%s: attempt %d/%d got status %d, retrying',
        context,
        attempt,
        maxAttempts,
        res.statusCode,
      );
    }
  }
}
