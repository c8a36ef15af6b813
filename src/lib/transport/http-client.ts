import { Agent, request, type Dispatcher } from 'undici';
import {
  HTTP_BODY_TIMEOUT_MS,
  HTTP_CONNECT_TIMEOUT_MS,
  HTTP_HEADERS_TIMEOUT_MS,
} from '../constants/defaults.js';
import { debugHttp } from '../utils/debug.js';
import { buildUserAgent } from '../utils/user-agent.js';

export type AcmeHttpMethod = 'GET' | 'HEAD' | 'POST';

/**
 * Description of one outgoing request. Built fresh for every attempt.
 */
export interface AcmeHttpRequest {
  method: AcmeHttpMethod;
  url: string;
  headers?: Record<string, string>;
  body?: string;
}

/**
 * Response with the body fully read as text
 */
export interface AcmeHttpResponse {
  statusCode: number;
  /** Lower-cased header names, as undici delivers them */
  headers: Record<string, string | string[] | undefined>;
  body: string;
}

export interface AcmeHttpClientOptions {
  /**
   * undici dispatcher to send through (proxy agent, MockAgent in tests).
   * Defaults to a private Agent configured with the connect timeout.
   */
  dispatcher?: Dispatcher;
  connectTimeoutMs?: number;
  headersTimeoutMs?: number;
  bodyTimeoutMs?: number;
  userAgent?: string;
}

/**
 * RFC 8555 HTTP transport
 *
 * Thin undici wrapper: injects the User-Agent, bounds every attempt with
 * connect/headers/body timeouts, reads the whole body as text, and traces
 * requests on the `acme-bootstrap:http` debug namespace.
 */
export class AcmeHttpClient {
  private readonly dispatcher: Dispatcher;
  private readonly ownsDispatcher: boolean;
  private readonly headersTimeout: number;
  private readonly bodyTimeout: number;
  private readonly userAgent: string;

  constructor(opts: AcmeHttpClientOptions = {}) {
    this.headersTimeout = opts.headersTimeoutMs ?? HTTP_HEADERS_TIMEOUT_MS;
    this.bodyTimeout = opts.bodyTimeoutMs ?? HTTP_BODY_TIMEOUT_MS;
    this.userAgent = opts.userAgent ?? buildUserAgent();

    if (opts.dispatcher) {
      this.dispatcher = opts.dispatcher;
      this.ownsDispatcher = false;
    } else {
      this.dispatcher = new Agent({
        connect: { timeout: opts.connectTimeoutMs ?? HTTP_CONNECT_TIMEOUT_MS },
        headersTimeout: this.headersTimeout,
        bodyTimeout: this.bodyTimeout,
      });
      this.ownsDispatcher = true;
    }
  }

  private ensureUserAgent(headers: Record<string, string>): Record<string, string> {
    const hasUA = Object.keys(headers).some((k) => k.toLowerCase() === 'user-agent');
    if (!hasUA) {
      headers['User-Agent'] = this.userAgent;
    }
    return headers;
  }

  async send(req: AcmeHttpRequest): Promise<AcmeHttpResponse> {
    const headers = this.ensureUserAgent({ ...req.headers });
    debugHttp(
      '%s %s init headers=%j bodyLength=%d',
      req.method,
      req.url,
      headers,
      req.body?.length ?? 0,
    );
    const start = Date.now();

    try {
      const res = await request(req.url, {
        method: req.method,
        headers,
        body: req.body,
        dispatcher: this.dispatcher,
        headersTimeout: this.headersTimeout,
        bodyTimeout: this.bodyTimeout,
      });
      const body = await res.body.text();
      debugHttp(
        '%s %s response status=%d durationMs=%d headers=%j',
        req.method,
        req.url,
        res.statusCode,
        Date.now() - start,
        res.headers,
      );
      if (body) {
        debugHttp('%s %s response body=%s', req.method, req.url, body);
      }

      return { statusCode: res.statusCode, headers: res.headers, body };
    } catch (err) {
      debugHttp(
        '%s %s network error: %s',
        req.method,
        req.url,
        err instanceof Error ? err.message : String(err),
      );
      throw err;
    }
  }

  async get(url: string, headers: Record<string, string> = {}): Promise<AcmeHttpResponse> {
    return this.send({ method: 'GET', url, headers });
  }

  async head(url: string, headers: Record<string, string> = {}): Promise<AcmeHttpResponse> {
    return this.send({ method: 'HEAD', url, headers });
  }

  async post(
    url: string,
    body: string,
    headers: Record<string, string> = {},
  ): Promise<AcmeHttpResponse> {
    return this.send({ method: 'POST', url, headers, body });
  }

  /** Close the private Agent. A dispatcher passed in by the caller is left open. */
  async close(): Promise<void> {
    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }
}
