// ============================================================================
// ipns-dataset-client — Configuration
// ============================================================================

import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { MisconfiguredError } from './errors.js';
import { DEFAULT_IPFS_API_URL } from './kubo.js';
import { DEFAULT_MAX_HOPS } from './versionChain.js';

/** Resolved client configuration. */
export interface DatasetClientConfig {
  /** Kubo RPC base URL, including `/api/v0`. */
  ipfsApiUrl: string;
  /** URL of the dataset key → pointer registry. */
  registryUrl: string;
  /** Path of the local registry cache file. */
  cachePath: string;
  /** Hop limit for version chain walks. */
  maxChainHops: number;
  /** Chunk encryption key, 64 hex characters. Never persisted by this library. */
  encryptionKey?: string;
}

/** Cache location used when `DATASET_REGISTRY_CACHE` is unset. */
export const DEFAULT_CACHE_PATH = join(homedir(), '.cache', 'ipns-dataset-client', 'registry.json');

const emptyToUndefined = (value: unknown) => (value === '' ? undefined : value);

const EnvSchema = z.object({
  IPFS_HOST: z.preprocess(emptyToUndefined, z.string().url().optional()),
  DATASET_REGISTRY_URL: z.preprocess(
    emptyToUndefined,
    z.string({ required_error: 'is required' }).url(),
  ),
  DATASET_REGISTRY_CACHE: z.preprocess(emptyToUndefined, z.string().optional()),
  DATASET_MAX_CHAIN_HOPS: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().optional(),
  ),
  DATASET_ENCRYPTION_KEY: z.preprocess(
    emptyToUndefined,
    z
      .string()
      .regex(/^(0x)?[0-9a-fA-F]{64}$/, 'must be 64 hex characters')
      .optional(),
  ),
});

/**
 * Build the client configuration from environment variables.
 *
 * | Variable                 | Default                                        |
 * |--------------------------|------------------------------------------------|
 * | `IPFS_HOST`              | `http://127.0.0.1:5001` (`/api/v0` is appended) |
 * | `DATASET_REGISTRY_URL`   | required                                       |
 * | `DATASET_REGISTRY_CACHE` | {@link DEFAULT_CACHE_PATH}                     |
 * | `DATASET_MAX_CHAIN_HOPS` | {@link DEFAULT_MAX_HOPS}                       |
 * | `DATASET_ENCRYPTION_KEY` | unset                                          |
 *
 * `LOG_LEVEL` is read by the logger itself.
 *
 * @throws {MisconfiguredError} Listing every invalid or missing variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): DatasetClientConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`);
    throw new MisconfiguredError(`invalid environment configuration: ${problems.join('; ')}`);
  }

  const vars = result.data;
  return {
    ipfsApiUrl: vars.IPFS_HOST ? `${vars.IPFS_HOST.replace(/\/+$/, '')}/api/v0` : DEFAULT_IPFS_API_URL,
    registryUrl: vars.DATASET_REGISTRY_URL,
    cachePath: vars.DATASET_REGISTRY_CACHE ?? DEFAULT_CACHE_PATH,
    maxChainHops: vars.DATASET_MAX_CHAIN_HOPS ?? DEFAULT_MAX_HOPS,
    encryptionKey: vars.DATASET_ENCRYPTION_KEY,
  };
}
