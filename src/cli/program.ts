import { Command } from 'commander';
import type { AcmeClientOptions } from '../lib/core/acme-client.js';
import { getPackageInfo } from '../lib/utils/user-agent.js';
import { handleAccountCommand } from './commands/account.js';
import { handleDirectoryCommand } from './commands/directory.js';
import { handleError } from './utils/errors.js';

interface DirectoryCliFlags {
  staging?: boolean;
  production?: boolean;
  directory?: string;
}

interface AccountCliFlags extends DirectoryCliFlags {
  email: string;
  store: string;
}

/**
 * Build a Commander program instance for the acme-bootstrap CLI.
 *
 * Failed commands print a summary and set `process.exitCode` instead of
 * exiting, so the program can be driven from tests.
 */
export function createCli(clientOptions: AcmeClientOptions = {}): Command {
  const program = new Command();

  program
    .name('acme-bootstrap')
    .description('Discover an ACME directory and get or create an account')
    .version(getPackageInfo().version);

  const withDirectoryFlags = (cmd: Command): Command =>
    cmd
      .option('--staging', "Use Let's Encrypt staging (default)")
      .option('--production', "Use Let's Encrypt production")
      .option('--directory <url|id>', 'Directory URL or bundled id such as google/staging');

  withDirectoryFlags(
    program.command('directory').description('Print the endpoints published by a directory'),
  ).action(async (opts: DirectoryCliFlags) => {
    try {
      await handleDirectoryCommand(opts, clientOptions);
    } catch (e) {
      handleError(e);
      process.exitCode = 1;
    }
  });

  withDirectoryFlags(
    program
      .command('account')
      .description('Get or create the ACME account for an email address')
      .requiredOption('-e, --email <email>', 'Contact email for the account')
      .option('-s, --store <dir>', 'Directory holding account keys', './acme-keys'),
  ).action(async (opts: AccountCliFlags) => {
    try {
      await handleAccountCommand(opts, clientOptions);
    } catch (e) {
      handleError(e);
      process.exitCode = 1;
    }
  });

  return program;
}
