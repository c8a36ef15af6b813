import { describe, test, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { mkdtemp, readdir, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { createCli } from '../../src/cli/program.js';
import { DIRECTORY_URL, MockAuthority } from '../utils/mock-authority.js';

const stripAnsi = (text: string): string => text.replace(/\u001b\[[0-9;]*m/g, '');

describe('acme-bootstrap CLI', () => {
  let authority: MockAuthority;
  let store: string;
  let logSpy: jest.SpiedFunction<typeof console.log>;
  let errSpy: jest.SpiedFunction<typeof console.error>;

  const output = (spy: jest.SpiedFunction<typeof console.log>): string[] =>
    spy.mock.calls.map((c) => stripAnsi(c.map(String).join(' ')));

  async function run(...args: string[]): Promise<void> {
    const cli = createCli({ http: { dispatcher: authority.agent } });
    await cli.parseAsync(['node', 'acme-bootstrap', ...args]);
  }

  beforeEach(async () => {
    store = await mkdtemp(join(tmpdir(), 'acme-bootstrap-cli-'));
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => {});
    errSpy = jest.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    logSpy.mockRestore();
    errSpy.mockRestore();
    process.exitCode = undefined;
    await authority.close();
    await rm(store, { recursive: true, force: true });
  });

  test('directory prints the published endpoints', async () => {
    authority = new MockAuthority();

    await run('directory', '--directory', DIRECTORY_URL);

    const lines = output(logSpy);
    expect(lines).toContain('  newNonce: https://acme.test/new-nonce');
    expect(lines).toContain('  newAccount: https://acme.test/new-acct');
    expect(lines).toContain('  revokeCert: https://acme.test/revoke-cert');
    expect(lines).toContain('  termsOfService: https://acme.test/terms.pdf');
    expect(process.exitCode).toBeUndefined();
  });

  test('account registers once and reuses the stored key', async () => {
    authority = new MockAuthority();

    await run('account', '--directory', DIRECTORY_URL, '-e', 'admin@example.com', '-s', store);
    await run('account', '--directory', DIRECTORY_URL, '-e', 'admin@example.com', '-s', store);

    const accountLines = output(logSpy).filter((l) => l.startsWith('  Account URL:'));
    expect(accountLines).toEqual([
      '  Account URL: https://acme.test/acct/1',
      '  Account URL: https://acme.test/acct/1',
    ]);
    expect(await readdir(store)).toEqual(['acme_account_private_key_admin@example.com.key']);
  });

  test('a failing command reports the error and sets the exit code', async () => {
    authority = new MockAuthority({ omitLocation: true });

    await run('account', '--directory', DIRECTORY_URL, '-e', 'admin@example.com', '-s', store);

    expect(output(errSpy)).toEqual(['Error: Authority response is missing header "location"']);
    expect(process.exitCode).toBe(1);
    expect(await readdir(store)).toEqual([]);
  });
});
