import { JOSE_CONTENT_TYPE } from '../constants/defaults.js';
import { signRequest, type AcmePayload } from '../core/acme-request-signer.js';
import type { AccountKey } from '../crypto/account-key.js';
import type { NonceSource } from '../managers/nonce-source.js';
import type { AcmeDirectory } from '../types/directory.js';
import type { AcmeHttpResponse } from './http-client.js';
import type { RetryingCaller } from './retry.js';

/**
 * Signed ACME calls.
 * Combines RetryingCaller, NonceSource and the request signer so that every
 * attempt, retries included, draws its own nonce and is signed anew with the
 * key's current state.
 */
export class AcmeTransport {
  constructor(
    private readonly directory: AcmeDirectory,
    readonly caller: RetryingCaller,
    readonly nonces: NonceSource,
  ) {}

  /** ACME signed POST (JSON payload, or empty for POST-as-GET). */
  async post(
    url: string,
    key: AccountKey,
    payload?: AcmePayload,
    context = 'signed POST',
  ): Promise<AcmeHttpResponse> {
    return this.caller.execute(async () => {
      const nonce = await this.nonces.next(this.directory);
      const envelope = await signRequest(url, nonce, key, payload);
      return {
        method: 'POST',
        url,
        headers: {
          'Content-Type': JOSE_CONTENT_TYPE,
          Accept: '*/*',
        },
        body: JSON.stringify(envelope),
      };
    }, context);
  }

  async postAsGet(url: string, key: AccountKey, context?: string): Promise<AcmeHttpResponse> {
    return this.post(url, key, null, context);
  }
}
