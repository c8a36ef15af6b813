import { describe, test, expect, beforeEach, afterEach } from '@jest/globals';
import { MockAgent } from 'undici';
import { fetchDirectory, parseDirectory } from '../../src/lib/core/directory-client.js';
import { DecodeError, NetworkError } from '../../src/lib/errors/acme-errors.js';
import { AcmeHttpClient } from '../../src/lib/transport/http-client.js';
import { RetryingCaller } from '../../src/lib/transport/retry.js';

const ORIGIN = 'https://acme.test';
const DIRECTORY_URL = `${ORIGIN}/directory`;

const document = {
  newNonce: `${ORIGIN}/new-nonce`,
  newAccount: `${ORIGIN}/new-acct`,
  newOrder: `${ORIGIN}/new-order`,
  revokeCert: `${ORIGIN}/revoke-cert`,
  meta: {
    termsOfService: `${ORIGIN}/terms.pdf`,
    caaIdentities: ['acme.test'],
    externalAccountRequired: false,
  },
};

describe('parseDirectory', () => {
  test('keeps the required endpoints', () => {
    const directory = parseDirectory(document);

    expect(directory.newNonce).toBe(`${ORIGIN}/new-nonce`);
    expect(directory.newAccount).toBe(`${ORIGIN}/new-acct`);
    expect(directory.newOrder).toBe(`${ORIGIN}/new-order`);
  });

  test('passes unknown entries through', () => {
    expect(parseDirectory(document).revokeCert).toBe(`${ORIGIN}/revoke-cert`);
  });

  test('reads meta', () => {
    expect(parseDirectory(document).meta).toEqual({
      termsOfService: `${ORIGIN}/terms.pdf`,
      website: undefined,
      caaIdentities: ['acme.test'],
      externalAccountRequired: false,
    });
  });

  test('a directory without meta has none', () => {
    const { meta: _meta, ...bare } = document;
    expect(parseDirectory(bare).meta).toBeUndefined();
  });

  test('returns a frozen document', () => {
    expect(Object.isFrozen(parseDirectory(document))).toBe(true);
  });

  test('rejects a missing endpoint', () => {
    const { newAccount: _newAccount, ...partial } = document;

    expect(() => parseDirectory(partial)).toThrow(
      'Failed to decode directory: "newAccount" must be a non-empty string',
    );
  });

  test('rejects an endpoint of the wrong type', () => {
    expect(() => parseDirectory({ ...document, newNonce: 42 })).toThrow(DecodeError);
  });

  test('rejects a body that is not an object', () => {
    expect(() => parseDirectory(['newNonce'])).toThrow(
      'Failed to decode directory: expected a JSON object',
    );
  });
});

describe('fetchDirectory', () => {
  let agent: MockAgent;
  let caller: RetryingCaller;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
    caller = new RetryingCaller(new AcmeHttpClient({ dispatcher: agent }));
  });

  afterEach(async () => {
    await agent.close();
  });

  test('fetches and parses the document', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: '/directory', method: 'GET' })
      .reply(200, JSON.stringify(document));

    const directory = await fetchDirectory(DIRECTORY_URL, caller);

    expect(directory.newAccount).toBe(`${ORIGIN}/new-acct`);
  });

  test('a body that is not JSON is a decode error', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: '/directory', method: 'GET' })
      .reply(200, '<html>maintenance</html>');

    await expect(fetchDirectory(DIRECTORY_URL, caller)).rejects.toMatchObject({
      kind: 'decode',
      format: 'json',
    });
  });

  test('a persistently failing endpoint is a network error', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: '/directory', method: 'GET' })
      .reply(500, 'unavailable')
      .times(3);

    await expect(fetchDirectory(DIRECTORY_URL, caller)).rejects.toBeInstanceOf(NetworkError);
  });
});
