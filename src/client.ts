// ============================================================================
// ipns-dataset-client — Dataset Client
// ============================================================================

import { FileMappingCache } from './cache.js';
import { ChunkCodec } from './chunkCodec.js';
import { ChunkPipeline, createDefaultCodecRegistry, type CodecRegistry } from './codecRegistry.js';
import { loadConfig } from './config.js';
import { EncryptionKeyring } from './keyring.js';
import { KuboRpcClient } from './kubo.js';
import { NameResolver } from './nameResolver.js';
import { HttpDatasetRegistry } from './registry.js';
import { VersionChainWalker } from './versionChain.js';
import type {
  CodecConfig,
  ContentPointer,
  DatasetKey,
  DatasetRegistry,
  ImmutableContentId,
  MappingCache,
  PointerResolver,
  SnapshotStore,
  VersionSnapshot,
} from './types.js';

/**
 * Client options. Each collaborator can be injected directly; otherwise it is
 * built from the matching URL or path.
 */
export interface DatasetClientOptions {
  /** Registry endpoint; required unless `registry` is given. */
  registryUrl?: string;
  /** Local cache file; required unless `cache` is given. */
  cachePath?: string;
  /** Kubo RPC base URL, used unless both `store` and `pointers` are given. */
  ipfsApiUrl?: string;
  /** Hop limit for chain walks. */
  maxChainHops?: number;
  /** Chunk encryption key (32 bytes or 64 hex characters), held by this client's keyring. */
  encryptionKey?: Uint8Array | string;

  registry?: DatasetRegistry;
  cache?: MappingCache;
  store?: SnapshotStore;
  pointers?: PointerResolver;
}

/** Point-in-time selector. Omit `asOf` for the latest version. */
export interface AsOfOptions {
  asOf?: Date;
}

// ---------------------------------------------------------------------------
// DatasetClient
// ---------------------------------------------------------------------------

/**
 * Resolves dataset names to versioned metadata and builds chunk codecs.
 *
 * @example
 * ```ts
 * const client = DatasetClient.fromEnv();
 * const keys = await client.listDatasets();
 * const snapshot = await client.getSnapshot('cpc-precip-conus', {
 *   asOf: new Date('2024-06-01T00:00:00Z'),
 * });
 * openZarr(snapshot.payloadRef);
 * ```
 */
export class DatasetClient {
  readonly names: NameResolver;
  readonly versions: VersionChainWalker;
  readonly keyring: EncryptionKeyring;
  readonly codecs: CodecRegistry;

  constructor(options: DatasetClientOptions) {
    const registry = options.registry ?? (options.registryUrl ? new HttpDatasetRegistry({ url: options.registryUrl }) : undefined);
    if (!registry) throw new Error('DatasetClient: registryUrl or registry is required');

    const cache = options.cache ?? (options.cachePath ? new FileMappingCache(options.cachePath) : undefined);
    if (!cache) throw new Error('DatasetClient: cachePath or cache is required');

    const kubo = options.store && options.pointers ? undefined : new KuboRpcClient({ apiUrl: options.ipfsApiUrl });
    const store = options.store ?? kubo;
    const pointers = options.pointers ?? kubo;
    if (!store || !pointers) throw new Error('DatasetClient: a snapshot store and pointer resolver are required');

    this.names = new NameResolver({ registry, cache });
    this.versions = new VersionChainWalker({ store, pointers, maxHops: options.maxChainHops });
    this.keyring = new EncryptionKeyring(options.encryptionKey);
    this.codecs = createDefaultCodecRegistry(this.keyring);
  }

  /**
   * Build a client from environment variables (see {@link loadConfig}).
   *
   * @throws {MisconfiguredError} If the environment is incomplete or invalid.
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env): DatasetClient {
    const config = loadConfig(env);
    return new DatasetClient({
      registryUrl: config.registryUrl,
      cachePath: config.cachePath,
      ipfsApiUrl: config.ipfsApiUrl,
      maxChainHops: config.maxChainHops,
      encryptionKey: config.encryptionKey,
    });
  }

  // -----------------------------------------------------------------------
  // Names
  // -----------------------------------------------------------------------

  /**
   * List every dataset known to the registry (or, if it is down, the cache).
   * @returns Dataset keys, sorted.
   */
  async listDatasets(): Promise<DatasetKey[]> {
    return [...(await this.names.listAll())].sort();
  }

  async resolvePointer(key: DatasetKey): Promise<ContentPointer> {
    return this.names.resolve(key);
  }

  // -----------------------------------------------------------------------
  // Versions
  // -----------------------------------------------------------------------

  /**
   * Resolve a dataset to the snapshot current at `asOf` (or the latest).
   *
   * @throws {DatasetNotFoundError} If the key is unknown.
   * @throws {NoMetadataFoundError} If `asOf` predates the dataset's history.
   */
  async getSnapshot(key: DatasetKey, options: AsOfOptions = {}): Promise<VersionSnapshot> {
    const pointer = await this.names.resolve(key);
    return this.versions.resolveAsOf(pointer, options.asOf);
  }

  /** Full metadata document of the selected snapshot. */
  async getMetadata(key: DatasetKey, options: AsOfOptions = {}): Promise<Record<string, unknown>> {
    return (await this.getSnapshot(key, options)).document;
  }

  /** CID of the dataset root the selected snapshot describes. */
  async getPayloadId(key: DatasetKey, options: AsOfOptions = {}): Promise<ImmutableContentId> {
    return (await this.getSnapshot(key, options)).payloadRef;
  }

  /** Every retained snapshot of a dataset, newest first. */
  async getLineage(key: DatasetKey): Promise<VersionSnapshot[]> {
    const pointer = await this.names.resolve(key);
    return this.versions.getLineage(pointer);
  }

  // -----------------------------------------------------------------------
  // Chunk codecs
  // -----------------------------------------------------------------------

  /** Encryption codec bound to this client's keyring. */
  createChunkCodec(header?: string): ChunkCodec {
    return new ChunkCodec({ header, keyring: this.keyring });
  }

  /** Chunk pipeline whose codecs resolve against this client's keyring. */
  createPipeline(configs: readonly CodecConfig[]): ChunkPipeline {
    return new ChunkPipeline(configs, this.codecs);
  }
}
