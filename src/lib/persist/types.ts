/**
 * Persistence contract
 *
 * The core reads and writes raw bytes by key and nothing else: it never lists
 * or deletes entries. Backends provide their own atomicity.
 */

export type PersistKind = 'private_key' | 'certificate' | 'account';

/**
 * Address of one stored value
 */
export interface PersistKey {
  /** Category of the value, e.g. `acme_account` */
  realm: string;
  kind: PersistKind;
  /** Discriminator within the realm, e.g. the contact email */
  key: string;
}

export interface AcmePersist {
  get(key: PersistKey): Promise<Uint8Array | undefined>;
  put(key: PersistKey, value: Uint8Array): Promise<void>;
}

const EXTRA_ESCAPES = /[!'()*~]/g;

const percentEncode = (c: string): string => `%${c.charCodeAt(0).toString(16).toUpperCase()}`;

// Percent-encodes everything but [A-Za-z0-9._@-], plus `_` when `underscore` is set
function escapeSegment(segment: string, underscore: boolean): string {
  const encoded = encodeURIComponent(segment)
    .replace(EXTRA_ESCAPES, percentEncode)
    .replace(/%40/g, '@');
  return underscore ? encoded.replace(/_/g, percentEncode) : encoded;
}

/**
 * Flat string form `<realm>_<kind>_<key>`, safe to use as a file name.
 *
 * Distinct keys never share a string: the key segment carries no `_`, and no
 * kind is a `_`-suffix of another, so the last two separators are unambiguous.
 */
export function persistKeyToString(key: PersistKey): string {
  return `${escapeSegment(key.realm, false)}_${key.kind}_${escapeSegment(key.key, true)}`;
}
