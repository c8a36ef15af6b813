/**
 * Account bootstrap: get-or-create an ACME account for a contact email
 *
 * Key state across one call only moves forward:
 * unregistered (no key id) -> registered (key id set) -> persisted (new keys only).
 *
 * @see https://datatracker.ietf.org/doc/html/rfc8555#section-7.3
 */

import { ACCOUNT_KEY_REALM, LOCATION_HEADER } from '../constants/defaults.js';
import { AccountKey } from '../crypto/account-key.js';
import { PersistenceError } from '../errors/acme-errors.js';
import { persistKeyToString, type AcmePersist, type PersistKey } from '../persist/types.js';
import { debugAccount } from '../utils/debug.js';
import { expectHeader, readJson } from '../utils/index.js';
import { parseAccountObject, registrationPayload } from './account-object.js';
import { AcmeAccount } from './acme-account.js';
import type { AcmeSession } from './session.js';

export function accountKeyHandle(contactEmail: string): PersistKey {
  return { realm: ACCOUNT_KEY_REALM, kind: 'private_key', key: contactEmail };
}

async function readStoredKey(
  persist: AcmePersist,
  handle: PersistKey,
): Promise<Uint8Array | undefined> {
  try {
    return await persist.get(handle);
  } catch (err) {
    throw new PersistenceError('get', persistKeyToString(handle), err);
  }
}

async function storeKey(persist: AcmePersist, handle: PersistKey, key: AccountKey): Promise<void> {
  const pem = new TextEncoder().encode(await key.toPem());
  try {
    await persist.put(handle, pem);
  } catch (err) {
    throw new PersistenceError('put', persistKeyToString(handle), err);
  }
}

/**
 * Load or generate the account key, register it, and persist it if new
 *
 * @throws {NetworkError | TerminalCallError} When newAccount fails
 * @throws {MissingFieldError} When the response has no Location header
 * @throws {DecodeError} On a malformed stored key or account body
 * @throws {PersistenceError} When the store fails
 */
export async function bootstrapAccount(
  session: AcmeSession,
  contactEmail: string,
): Promise<AcmeAccount> {
  const handle = accountKeyHandle(contactEmail);

  const stored = await readStoredKey(session.persist, handle);
  let isNew = false;
  let key: AccountKey;
  if (stored) {
    debugAccount('read persisted account key for %s', contactEmail);
    key = await AccountKey.fromPem(stored);
  } else {
    debugAccount('creating new account key for %s', contactEmail);
    key = await AccountKey.generate();
    isNew = true;
  }

  // newAccount is called for stored keys too: the authority answers with the
  // existing account and its URL, which becomes the key id.
  const url = session.directory.newAccount;
  debugAccount('calling newAccount endpoint %s', url);
  const payload = registrationPayload(contactEmail);
  const res = await session.transport.post(url, key, payload, 'newAccount');

  const kid = expectHeader(res, LOCATION_HEADER);
  const apiAccount = parseAccountObject(readJson(res));
  debugAccount('key id is %s', kid);
  key.setKeyId(kid);

  if (isNew) {
    debugAccount('persisting account key for %s', contactEmail);
    await storeKey(session.persist, handle, key);
  }

  return new AcmeAccount(session, contactEmail, key, apiAccount);
}
