// Well-known ACME certificate authorities

/**
 * ACME directory entry for one environment of an authority
 */
export interface AcmeDirectoryEntry {
  /** The ACME directory URL for this environment */
  directoryUrl: string;
  /** Human-readable name */
  name: string;
  environment: 'staging' | 'production';
}

type StagedProvider = Readonly<{ staging: AcmeDirectoryEntry; production: AcmeDirectoryEntry }>;
type ProductionProvider = Readonly<{ production: AcmeDirectoryEntry }>;

/**
 * Pre-configured authorities. Any other directory URL can be passed as a string.
 */
export interface AcmeProviderTable {
  letsencrypt: StagedProvider;
  google: StagedProvider;
  buypass: StagedProvider;
  zerossl: ProductionProvider;
}

/**
 * @example
 * ```typescript
 * import { AcmeClient, MemoryPersist, provider } from 'acme-bootstrap';
 *
 * const client = await AcmeClient.connect(new MemoryPersist(), provider.letsencrypt.staging);
 * ```
 */
export const provider: AcmeProviderTable = {
  letsencrypt: {
    staging: {
      directoryUrl: 'https://acme-staging-v02.api.letsencrypt.org/directory',
      name: "Let's Encrypt Staging",
      environment: 'staging',
    },
    production: {
      directoryUrl: 'https://acme-v02.api.letsencrypt.org/directory',
      name: "Let's Encrypt Production",
      environment: 'production',
    },
  },
  google: {
    staging: {
      directoryUrl: 'https://dv.acme-v02.test-api.pki.goog/directory',
      name: 'Google Trust Services Staging',
      environment: 'staging',
    },
    production: {
      directoryUrl: 'https://dv.acme-v02.api.pki.goog/directory',
      name: 'Google Trust Services Production',
      environment: 'production',
    },
  },
  buypass: {
    staging: {
      directoryUrl: 'https://api.test4.buypass.no/acme/directory',
      name: 'Buypass Staging',
      environment: 'staging',
    },
    production: {
      directoryUrl: 'https://api.buypass.com/acme/directory',
      name: 'Buypass Production',
      environment: 'production',
    },
  },
  zerossl: {
    production: {
      directoryUrl: 'https://acme.zerossl.com/v2/DV90',
      name: 'ZeroSSL Production',
      environment: 'production',
    },
  },
};

export type AcmeDirectoryLocation = string | AcmeDirectoryEntry;

export function resolveDirectoryUrl(location: AcmeDirectoryLocation): string {
  return typeof location === 'string' ? location : location.directoryUrl;
}

/** All bundled entries, flattened */
export function listProviders(): AcmeDirectoryEntry[] {
  return Object.values(provider).flatMap((envs: Partial<StagedProvider>) =>
    [envs.staging, envs.production].filter(
      (entry): entry is AcmeDirectoryEntry => entry !== undefined,
    ),
  );
}

/**
 * Look up a bundled entry by `<provider>/<environment>`, e.g. `letsencrypt/staging`
 */
export function findProvider(id: string): AcmeDirectoryEntry | undefined {
  const [providerKey, environment = 'production'] = id.split('/');
  const envs: Partial<StagedProvider> | undefined = Object.entries(provider).find(
    ([key]) => key === providerKey,
  )?.[1];
  if (!envs) return undefined;
  if (environment === 'staging') return envs.staging;
  if (environment === 'production') return envs.production;
  return undefined;
}
