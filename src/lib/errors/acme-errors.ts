/**
 * Errors raised by the acme-bootstrap core
 *
 * A closed set of error classes, one per failure stage. Every class carries a
 * `kind` discriminator and only the structured data that stage produces, so
 * callers can branch on the kind instead of parsing messages.
 */

import type { AcmeProblemDetails } from '../types/account.js';

export type AcmeBootstrapErrorKind =
  | 'network'
  | 'terminal-call'
  | 'missing-field'
  | 'decode'
  | 'persistence'
  | 'account-state';

/**
 * Base class for all acme-bootstrap errors
 */
export abstract class AcmeBootstrapError extends Error {
  abstract readonly kind: AcmeBootstrapErrorKind;

  constructor(
    message: string,
    public readonly context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = this.constructor.name;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Transport failure, or a transient status that outlived the retry budget
 */
export class NetworkError extends AcmeBootstrapError {
  readonly kind = 'network';

  constructor(
    message: string,
    public readonly attempts: number,
    public readonly status?: number,
    public readonly body?: string,
    public readonly problem?: AcmeProblemDetails,
    options?: { cause?: unknown },
  ) {
    super(message, { attempts, status }, options);
  }

  static exhausted(
    attempts: number,
    status: number,
    body: string,
    problem?: AcmeProblemDetails,
  ): NetworkError {
    return new NetworkError(
      `Call failed (${status}) after ${attempts} attempts: ${body}`,
      attempts,
      status,
      body,
      problem,
    );
  }

  static transport(attempts: number, cause: unknown): NetworkError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new NetworkError(
      `Transport failure after ${attempts} attempts: ${reason}`,
      attempts,
      undefined,
      undefined,
      undefined,
      { cause },
    );
  }
}

/**
 * The authority rejected the request with a status that a retry cannot fix
 */
export class TerminalCallError extends AcmeBootstrapError {
  readonly kind = 'terminal-call';

  constructor(
    public readonly status: number,
    public readonly body: string,
    public readonly problem?: AcmeProblemDetails,
  ) {
    super(`Call failed (${status}): ${body}`, { status, problemType: problem?.type });
  }
}

/**
 * A header or body field the protocol requires was not present
 */
export class MissingFieldError extends AcmeBootstrapError {
  readonly kind = 'missing-field';

  constructor(
    public readonly field: string,
    public readonly location: 'header' | 'body',
  ) {
    super(`Missing ${location === 'header' ? 'header' : 'field'}: ${field}`, { field, location });
  }
}

export type DecodeFormat = 'json' | 'pem' | 'base64url' | 'directory' | 'account';

/**
 * Input could not be decoded: JSON, PEM, base64url, or a document of the wrong shape
 */
export class DecodeError extends AcmeBootstrapError {
  readonly kind = 'decode';

  constructor(
    public readonly format: DecodeFormat,
    detail: string,
    options?: { cause?: unknown },
  ) {
    super(`Failed to decode ${format}: ${detail}`, { format }, options);
  }

  static from(format: DecodeFormat, cause: unknown): DecodeError {
    const detail = cause instanceof Error ? cause.message : String(cause);
    return new DecodeError(format, detail, { cause });
  }
}

/**
 * The persistence backend failed; the backend's own error is kept as `cause`
 */
export class PersistenceError extends AcmeBootstrapError {
  readonly kind = 'persistence';

  constructor(
    public readonly operation: 'get' | 'put',
    public readonly key: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Persistence ${operation} failed for ${key}: ${reason}`, { operation, key }, { cause });
  }
}

/**
 * An account key was used in a state it cannot be in: a second, different key
 * id, or an account built from a key that was never registered
 */
export class AccountStateError extends AcmeBootstrapError {
  readonly kind = 'account-state';

  constructor(message: string, context?: Record<string, unknown>) {
    super(message, context);
  }
}

/**
 * Union type for all acme-bootstrap errors
 */
export type AcmeBootstrapErrorType =
  | NetworkError
  | TerminalCallError
  | MissingFieldError
  | DecodeError
  | PersistenceError
  | AccountStateError;

/**
 * Type guards for error type checking
 */
export function isNetworkError(error: unknown): error is NetworkError {
  return error instanceof NetworkError;
}

export function isTerminalCallError(error: unknown): error is TerminalCallError {
  return error instanceof TerminalCallError;
}

export function isMissingFieldError(error: unknown): error is MissingFieldError {
  return error instanceof MissingFieldError;
}

export function isDecodeError(error: unknown): error is DecodeError {
  return error instanceof DecodeError;
}

export function isPersistenceError(error: unknown): error is PersistenceError {
  return error instanceof PersistenceError;
}

export function isAccountStateError(error: unknown): error is AccountStateError {
  return error instanceof AccountStateError;
}

export function isAcmeBootstrapError(error: unknown): error is AcmeBootstrapErrorType {
  return error instanceof AcmeBootstrapError;
}
