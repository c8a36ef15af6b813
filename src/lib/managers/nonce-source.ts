/**
 * RFC 8555 ACME Nonce Source
 *
 * Draws anti-replay nonces from the authority's newNonce endpoint (RFC 8555
 * Section 7.2). Nothing is pooled: each call is one HEAD request and yields a
 * nonce no other envelope has used.
 */

import { REPLAY_NONCE_HEADER } from '../constants/defaults.js';
import type { RetryingCaller } from '../transport/retry.js';
import type { AcmeDirectory } from '../types/directory.js';
import { debugNonce } from '../utils/debug.js';
import { expectHeader } from '../utils/index.js';

export class NonceSource {
  constructor(private readonly caller: RetryingCaller) {}

  /**
   * Fetch one fresh nonce
   *
   * @throws {MissingFieldError} When a successful response has no Replay-Nonce header
   * @throws {NetworkError} When the endpoint keeps failing
   */
  async next(directory: AcmeDirectory): Promise<string> {
    debugNonce('requesting nonce from %s', directory.newNonce);
    const res = await this.caller.execute(
      async () => ({ method: 'HEAD', url: directory.newNonce }),
      'newNonce',
    );
    const nonce = expectHeader(res, REPLAY_NONCE_HEADER);
    debugNonce('received nonce %s', nonce);
    return nonce;
  }
}
