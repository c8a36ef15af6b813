import { describe, test, expect } from '@jest/globals';
import {
  findProvider,
  listProviders,
  provider,
  resolveDirectoryUrl,
} from '../src/directory.js';

describe('Directory Configuration', () => {
  test("should have Let's Encrypt staging configuration", () => {
    expect(provider.letsencrypt.staging.directoryUrl).toBe(
      'https://acme-staging-v02.api.letsencrypt.org/directory',
    );
    expect(provider.letsencrypt.staging.name).toBe("Let's Encrypt Staging");
    expect(provider.letsencrypt.staging.environment).toBe('staging');
  });

  test("should have Let's Encrypt production configuration", () => {
    expect(provider.letsencrypt.production.directoryUrl).toBe(
      'https://acme-v02.api.letsencrypt.org/directory',
    );
    expect(provider.letsencrypt.production.environment).toBe('production');
  });

  test('should list every bundled environment', () => {
    const urls = listProviders().map((entry) => entry.directoryUrl);

    expect(urls).toHaveLength(7);
    expect(urls).toContain('https://acme.zerossl.com/v2/DV90');
    expect(urls).toContain('https://dv.acme-v02.test-api.pki.goog/directory');
  });

  test('should find entries by provider and environment', () => {
    expect(findProvider('google/staging')).toBe(provider.google.staging);
    expect(findProvider('buypass/production')).toBe(provider.buypass.production);
  });

  test('should default to production', () => {
    expect(findProvider('zerossl')).toBe(provider.zerossl.production);
  });

  test('should not invent missing entries', () => {
    expect(findProvider('zerossl/staging')).toBeUndefined();
    expect(findProvider('letsencrypt/dev')).toBeUndefined();
    expect(findProvider('unknown/staging')).toBeUndefined();
  });

  test('should resolve a location to its URL', () => {
    expect(resolveDirectoryUrl(provider.letsencrypt.staging)).toBe(
      'https://acme-staging-v02.api.letsencrypt.org/directory',
    );
    expect(resolveDirectoryUrl('https://acme.test/directory')).toBe('https://acme.test/directory');
  });
});
