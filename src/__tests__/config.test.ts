import { describe, it, expect } from 'vitest';
import { DEFAULT_CACHE_PATH, loadConfig } from '../config.js';
import { MisconfiguredError } from '../errors.js';

const REGISTRY_URL = 'https://registry.example.test/cids.json';

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig({ DATASET_REGISTRY_URL: REGISTRY_URL })).toEqual({
      ipfsApiUrl: 'http://127.0.0.1:5001/api/v0',
      registryUrl: REGISTRY_URL,
      cachePath: DEFAULT_CACHE_PATH,
      maxChainHops: 10_000,
      encryptionKey: undefined,
    });
  });

  it('appends the RPC prefix to IPFS_HOST', () => {
    const config = loadConfig({ DATASET_REGISTRY_URL: REGISTRY_URL, IPFS_HOST: 'http://ipfs.internal:5001/' });
    expect(config.ipfsApiUrl).toBe('http://ipfs.internal:5001/api/v0');
  });

  it('treats empty variables as unset', () => {
    const config = loadConfig({ DATASET_REGISTRY_URL: REGISTRY_URL, IPFS_HOST: '', DATASET_MAX_CHAIN_HOPS: '' });
    expect(config.ipfsApiUrl).toBe('http://127.0.0.1:5001/api/v0');
    expect(config.maxChainHops).toBe(10_000);
  });

  it('reads the optional settings', () => {
    const config = loadConfig({
      DATASET_REGISTRY_URL: REGISTRY_URL,
      DATASET_REGISTRY_CACHE: '/var/cache/datasets.json',
      DATASET_MAX_CHAIN_HOPS: '250',
      DATASET_ENCRYPTION_KEY: 'ab'.repeat(32),
    });
    expect(config.cachePath).toBe('/var/cache/datasets.json');
    expect(config.maxChainHops).toBe(250);
    expect(config.encryptionKey).toBe('ab'.repeat(32));
  });

  it('requires the registry URL', () => {
    expect(() => loadConfig({})).toThrow(MisconfiguredError);
    expect(() => loadConfig({})).toThrow(
      'DatasetClient: invalid environment configuration: DATASET_REGISTRY_URL is required',
    );
  });

  it('rejects an invalid hop limit', () => {
    expect(() => loadConfig({ DATASET_REGISTRY_URL: REGISTRY_URL, DATASET_MAX_CHAIN_HOPS: '-3' })).toThrow(
      /DATASET_MAX_CHAIN_HOPS/,
    );
  });

  it('rejects a short encryption key', () => {
    expect(() => loadConfig({ DATASET_REGISTRY_URL: REGISTRY_URL, DATASET_ENCRYPTION_KEY: 'abcd' })).toThrow(
      'DatasetClient: invalid environment configuration: DATASET_ENCRYPTION_KEY must be 64 hex characters',
    );
  });
});
