/**
 * ACME directory discovery (RFC 8555 Section 7.1.1)
 */

import { DecodeError } from '../errors/acme-errors.js';
import type { RetryingCaller } from '../transport/retry.js';
import type { AcmeDirectory, AcmeDirectoryMeta } from '../types/directory.js';
import { debugDirectory } from '../utils/debug.js';
import { isRecord, readJson } from '../utils/index.js';

function readString(doc: Record<string, unknown>, field: string): string {
  const value = doc[field];
  if (typeof value !== 'string' || value === '') {
    throw new DecodeError('directory', `"${field}" must be a non-empty string`);
  }
  return value;
}

function readMeta(value: unknown): AcmeDirectoryMeta | undefined {
  if (!isRecord(value)) return undefined;
  const { termsOfService, website, caaIdentities, externalAccountRequired } = value;
  return {
    termsOfService: typeof termsOfService === 'string' ? termsOfService : undefined,
    website: typeof website === 'string' ? website : undefined,
    caaIdentities:
      Array.isArray(caaIdentities) && caaIdentities.every((v) => typeof v === 'string')
        ? caaIdentities
        : undefined,
    externalAccountRequired:
      typeof externalAccountRequired === 'boolean' ? externalAccountRequired : undefined,
  };
}

/**
 * Validate a decoded directory body. Unknown entries pass through untouched.
 *
 * @throws {DecodeError} When a required endpoint is missing
 */
export function parseDirectory(body: unknown): AcmeDirectory {
  if (!isRecord(body)) {
    throw new DecodeError('directory', 'expected a JSON object');
  }
  return Object.freeze({
    ...body,
    newNonce: readString(body, 'newNonce'),
    newAccount: readString(body, 'newAccount'),
    newOrder: readString(body, 'newOrder'),
    meta: readMeta(body.meta),
  });
}

/**
 * GET and parse the directory document
 *
 * @throws {NetworkError} When every attempt fails
 * @throws {DecodeError} When the body is not JSON or lacks a required endpoint
 */
export async function fetchDirectory(url: string, caller: RetryingCaller): Promise<AcmeDirectory> {
  debugDirectory('fetching directory %s', url);
  const res = await caller.execute(async () => ({ method: 'GET', url }), 'directory');
  const directory = parseDirectory(readJson(res));
  debugDirectory(
    'directory %s newNonce=%s newAccount=%s',
    url,
    directory.newNonce,
    directory.newAccount,
  );
  return directory;
}
