import { describe, test, expect, beforeEach, afterEach } from '@jest/globals';
import { MockAgent } from 'undici';
import { parseDirectory } from '../../src/lib/core/directory-client.js';
import { MissingFieldError, NetworkError } from '../../src/lib/errors/acme-errors.js';
import { NonceSource } from '../../src/lib/managers/nonce-source.js';
import { AcmeHttpClient } from '../../src/lib/transport/http-client.js';
import { RetryingCaller } from '../../src/lib/transport/retry.js';

const ORIGIN = 'https://acme.test';

const directory = parseDirectory({
  newNonce: `${ORIGIN}/new-nonce`,
  newAccount: `${ORIGIN}/new-acct`,
  newOrder: `${ORIGIN}/new-order`,
});

describe('NonceSource', () => {
  let agent: MockAgent;
  let nonces: NonceSource;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
    nonces = new NonceSource(new RetryingCaller(new AcmeHttpClient({ dispatcher: agent })));
  });

  afterEach(async () => {
    await agent.close();
  });

  test('reads the Replay-Nonce header of a HEAD to newNonce', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: '/new-nonce', method: 'HEAD' })
      .reply(200, '', { headers: { 'replay-nonce': 'oFvnlFP1wIhRlYS2jTaXbA' } });

    await expect(nonces.next(directory)).resolves.toBe('oFvnlFP1wIhRlYS2jTaXbA');
  });

  test('every call is a new request', async () => {
    const pool = agent.get(ORIGIN);
    pool
      .intercept({ path: '/new-nonce', method: 'HEAD' })
      .reply(200, '', { headers: { 'replay-nonce': 'first' } });
    pool
      .intercept({ path: '/new-nonce', method: 'HEAD' })
      .reply(200, '', { headers: { 'replay-nonce': 'second' } });

    expect(await nonces.next(directory)).toBe('first');
    expect(await nonces.next(directory)).toBe('second');
  });

  test('a successful response without the header is a missing field', async () => {
    agent.get(ORIGIN).intercept({ path: '/new-nonce', method: 'HEAD' }).reply(200, '');

    const err = await nonces.next(directory).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(MissingFieldError);
    expect(err).toMatchObject({ field: 'replay-nonce', location: 'header' });
  });

  test('retries a failing endpoint', async () => {
    const pool = agent.get(ORIGIN);
    pool.intercept({ path: '/new-nonce', method: 'HEAD' }).reply(503, '');
    pool
      .intercept({ path: '/new-nonce', method: 'HEAD' })
      .reply(200, '', { headers: { 'replay-nonce': 'after-retry' } });

    await expect(nonces.next(directory)).resolves.toBe('after-retry');
  });

  test('fails once the attempt budget is spent', async () => {
    agent.get(ORIGIN).intercept({ path: '/new-nonce', method: 'HEAD' }).reply(500, '').times(3);

    await expect(nonces.next(directory)).rejects.toBeInstanceOf(NetworkError);
  });
});
