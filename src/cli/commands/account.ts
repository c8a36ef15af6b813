import { AcmeClient, type AcmeClientOptions } from '../../lib/core/acme-client.js';
import { FilePersist } from '../../lib/persist/file-persist.js';
import { heading, kv, render } from '../logger.js';
import { describeDirectory, resolveDirectory, type DirectoryFlags } from '../utils/directories.js';

/** Options accepted by the account command. */
export interface AccountCommandOptions extends DirectoryFlags {
  email: string;
  store: string;
}

/** Get or create the ACME account for an email, keeping its key under `store`. */
export async function handleAccountCommand(
  options: AccountCommandOptions,
  clientOptions: AcmeClientOptions = {},
): Promise<void> {
  const location = resolveDirectory(options);
  render.info(`Using ${describeDirectory(location)}`);

  const persist = new FilePersist(options.store);
  const client = await AcmeClient.connect(persist, location, clientOptions);
  try {
    const account = await client.account(options.email);
    heading('ACME account');
    kv('Contact', account.contactEmail);
    kv('Account URL', account.accountUrl);
    kv('Status', account.apiAccount.status ?? 'unknown');
    kv('Key thumbprint', await account.key.thumbprint());
    kv('Key store', options.store);
    render.success('Account ready');
  } finally {
    await client.close();
  }
}
