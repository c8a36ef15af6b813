import { resolveDirectoryUrl, type AcmeDirectoryLocation } from '../../directory.js';
import { NonceSource } from '../managers/nonce-source.js';
import type { AcmePersist } from '../persist/types.js';
import { AcmeTransport } from '../transport/acme-transport.js';
import { AcmeHttpClient, type AcmeHttpClientOptions } from '../transport/http-client.js';
import { RetryingCaller, type RetryConfig } from '../transport/retry.js';
import type { AcmeDirectory } from '../types/directory.js';
import { bootstrapAccount } from './account-bootstrap.js';
import type { AcmeAccount } from './acme-account.js';
import { fetchDirectory } from './directory-client.js';
import type { AcmeSession } from './session.js';

/**
 * Configuration options for AcmeClient
 */
export interface AcmeClientOptions {
  /** Transport settings: timeouts, User-Agent, custom undici dispatcher */
  http?: AcmeHttpClientOptions;
  /** Retry settings for every call the client makes */
  retry?: Partial<RetryConfig>;
}

/**
 * RFC 8555 ACME client session
 *
 * Entry point for talking to one authority. Connecting fetches the directory
 * once; the client then hands out nonces and bootstraps accounts whose keys
 * live in the given persistence backend.
 *
 * @example
 * ```typescript
 * const client = await AcmeClient.connect(new FilePersist('./acme'), provider.letsencrypt.staging);
 * const account = await client.account('admin@example.com');
 * console.log(account.accountUrl);
 * await client.close();
 * ```
 *
 * @see {@link https://datatracker.ietf.org/doc/html/rfc8555#section-7.1.1 | RFC 8555 Section 7.1.1 - Directory}
 */
export class AcmeClient implements AcmeSession {
  readonly transport: AcmeTransport;

  private constructor(
    readonly directoryUrl: string,
    readonly directory: AcmeDirectory,
    readonly persist: AcmePersist,
    private readonly http: AcmeHttpClient,
    caller: RetryingCaller,
  ) {
    this.transport = new AcmeTransport(directory, caller, new NonceSource(caller));
  }

  /**
   * Fetch the directory and open a session
   *
   * @param persist - Where account keys are stored
   * @param location - Directory URL or a bundled {@link provider} entry
   * @throws {NetworkError} When the directory cannot be fetched
   * @throws {DecodeError} When the directory document is malformed
   */
  static async connect(
    persist: AcmePersist,
    location: AcmeDirectoryLocation,
    opts: AcmeClientOptions = {},
  ): Promise<AcmeClient> {
    const directoryUrl = resolveDirectoryUrl(location);
    const http = new AcmeHttpClient(opts.http);
    const caller = new RetryingCaller(http, opts.retry);

    let directory: AcmeDirectory;
    try {
      directory = await fetchDirectory(directoryUrl, caller);
    } catch (err) {
      await http.close();
      throw err;
    }
    return new AcmeClient(directoryUrl, directory, persist, http, caller);
  }

  /**
   * Draw one fresh anti-replay nonce
   *
   * @see {@link https://datatracker.ietf.org/doc/html/rfc8555#section-7.2 | RFC 8555 Section 7.2 - Getting a Nonce}
   */
  async newNonce(): Promise<string> {
    return this.transport.nonces.next(this.directory);
  }

  /**
   * Get or create the account for a contact email
   *
   * A key persisted for this contact is reused; otherwise a new key is
   * generated. Either way newAccount is called, which registers a new key or
   * returns the existing account for a known one. A new key is persisted only
   * after the authority has accepted it.
   */
  async account(contactEmail: string): Promise<AcmeAccount> {
    return bootstrapAccount(this, contactEmail);
  }

  /** Release pooled connections */
  async close(): Promise<void> {
    await this.http.close();
  }
}
