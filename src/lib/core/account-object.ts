import { DecodeError } from '../errors/acme-errors.js';
import type {
  AcmeAccountObject,
  AcmeAccountRegistrationPayload,
  AcmeAccountStatus,
} from '../types/account.js';
import { isRecord } from '../utils/index.js';

const ACCOUNT_STATUSES: readonly AcmeAccountStatus[] = ['valid', 'deactivated', 'revoked'];

export function registrationPayload(contactEmail: string): AcmeAccountRegistrationPayload {
  const contact = contactEmail.startsWith('mailto:') ? contactEmail : `mailto:${contactEmail}`;
  return { contact: [contact], termsOfServiceAgreed: true };
}

/**
 * Decode an account object body
 *
 * @throws {DecodeError} When the body is not a JSON object
 */
export function parseAccountObject(body: unknown): AcmeAccountObject {
  if (!isRecord(body)) {
    throw new DecodeError('account', 'expected a JSON object');
  }
  const { status, contact, termsOfServiceAgreed, orders, ...rest } = body;
  return {
    ...rest,
    status: ACCOUNT_STATUSES.find((s) => s === status),
    contact:
      Array.isArray(contact) && contact.every((c) => typeof c === 'string') ? contact : undefined,
    termsOfServiceAgreed:
      typeof termsOfServiceAgreed === 'boolean' ? termsOfServiceAgreed : undefined,
    orders: typeof orders === 'string' ? orders : undefined,
  };
}
