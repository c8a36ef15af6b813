/**
 * RFC 8555 ACME Account
 *
 * A registered account: the contact it was created for, its key (with the key
 * id set), and the account object the authority returned. Produced only by a
 * successful bootstrap and never changed afterwards.
 *
 * @see https://datatracker.ietf.org/doc/html/rfc8555#section-7.1.2
 */

import type { AccountKey } from '../crypto/account-key.js';
import { AccountStateError } from '../errors/acme-errors.js';
import type { AcmeHttpResponse } from '../transport/http-client.js';
import type { AcmeAccountObject } from '../types/account.js';
import type { AcmeDirectory } from '../types/directory.js';
import { readJson } from '../utils/index.js';
import type { AcmePayload } from './acme-request-signer.js';
import { parseAccountObject } from './account-object.js';
import type { AcmeSession } from './session.js';

export class AcmeAccount {
  /** Account URL, also the `kid` of every request this account signs */
  readonly accountUrl: string;

  constructor(
    private readonly session: AcmeSession,
    readonly contactEmail: string,
    readonly key: AccountKey,
    readonly apiAccount: Readonly<AcmeAccountObject>,
  ) {
    const kid = key.keyId;
    if (!kid) {
      throw new AccountStateError('AcmeAccount requires a registered key');
    }
    this.accountUrl = kid;
  }

  get directory(): AcmeDirectory {
    return this.session.directory;
  }

  /** PKCS#8 PEM of the account private key */
  async privateKeyPem(): Promise<string> {
    return this.key.toPem();
  }

  /**
   * Authenticated, replay-protected POST
   *
   * Signed with the `kid` header. Each attempt draws a fresh nonce; transient
   * failures are retried, a 400 fails at once.
   *
   * @see https://datatracker.ietf.org/doc/html/rfc8555#section-6.2
   */
  async signedPost(url: string, payload?: AcmePayload): Promise<AcmeHttpResponse> {
    return this.session.transport.post(url, this.key, payload);
  }

  /**
   * POST-as-GET of the account object (RFC 8555 Section 7.3.3)
   */
  async fetchAccount(): Promise<AcmeAccountObject> {
    const res = await this.session.transport.postAsGet(this.accountUrl, this.key, 'account');
    return parseAccountObject(readJson(res));
  }
}
