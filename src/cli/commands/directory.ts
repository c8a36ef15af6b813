import { AcmeClient, type AcmeClientOptions } from '../../lib/core/acme-client.js';
import { MemoryPersist } from '../../lib/persist/memory-persist.js';
import { heading, kv } from '../logger.js';
import { describeDirectory, resolveDirectory, type DirectoryFlags } from '../utils/directories.js';

/** Fetch a directory and print its endpoints. */
export async function handleDirectoryCommand(
  options: DirectoryFlags,
  clientOptions: AcmeClientOptions = {},
): Promise<void> {
  const location = resolveDirectory(options);
  const client = await AcmeClient.connect(new MemoryPersist(), location, clientOptions);
  try {
    heading(describeDirectory(location));
    for (const [name, value] of Object.entries(client.directory)) {
      if (typeof value === 'string') {
        kv(name, value);
      }
    }
    const tos = client.directory.meta?.termsOfService;
    if (tos) {
      kv('termsOfService', tos);
    }
  } finally {
    await client.close();
  }
}
