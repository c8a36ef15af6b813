import { DecodeError, MissingFieldError } from '../errors/acme-errors.js';
import type { AcmeHttpResponse } from '../transport/http-client.js';
import type { AcmeProblemDetails } from '../types/account.js';

/**
 * Read a single response header (case-insensitive)
 *
 * @returns The first header value, or undefined when absent or empty
 */
export function readHeader(res: AcmeHttpResponse, name: string): string | undefined {
  const raw = res.headers[name.toLowerCase()];
  const value = Array.isArray(raw) ? raw[0] : raw;
  return value ? value : undefined;
}

/**
 * Read a header the protocol requires
 *
 * @throws {MissingFieldError} When the header is absent
 */
export function expectHeader(res: AcmeHttpResponse, name: string): string {
  const value = readHeader(res, name);
  if (value === undefined) {
    throw new MissingFieldError(name, 'header');
  }
  return value;
}

/**
 * Parse the response body as JSON
 *
 * @throws {DecodeError} When the body is not well-formed JSON
 */
export function readJson(res: AcmeHttpResponse): unknown {
  try {
    return JSON.parse(res.body);
  } catch (err) {
    throw DecodeError.from('json', err);
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Best-effort RFC 7807 problem document extraction from an error body
 */
export function parseProblem(body: string): AcmeProblemDetails | undefined {
  try {
    const parsed: unknown = JSON.parse(body);
    if (isRecord(parsed) && typeof parsed.type === 'string') {
      return { ...parsed, type: parsed.type };
    }
  } catch {
    // not JSON; the raw body is still reported
  }
  return undefined;
}
