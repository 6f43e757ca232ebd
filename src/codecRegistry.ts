// ============================================================================
// ipns-dataset-client — Codec Registry & Chunk Pipeline
// ============================================================================

import { ChunkCodec, XCHACHA20POLY1305_CODEC_ID } from './chunkCodec.js';
import { MisconfiguredError } from './errors.js';
import type { EncryptionKeyring } from './keyring.js';
import type { ChunkTransform, CodecConfig } from './types.js';

/** Builds a transform from its persisted configuration. */
export type CodecFactory = (config: CodecConfig) => ChunkTransform;

// ---------------------------------------------------------------------------
// CodecRegistry
// ---------------------------------------------------------------------------

/**
 * Maps stable codec ids to factories so a storage layer can pick a transform
 * per chunk from configuration alone.
 *
 * @example
 * ```ts
 * const registry = new CodecRegistry();
 * registry.register('xchacha20poly1305', (config) => ChunkCodec.fromConfig(config));
 * const codec = registry.get({ id: 'xchacha20poly1305', header: 'precip-v2' });
 * ```
 */
export class CodecRegistry {
  private readonly factories = new Map<string, CodecFactory>();

  /**
   * Register (or replace) the factory for a codec id.
   *
   * @param id      - Identifier stored in pipeline configuration.
   * @param factory - Builds the transform from its configuration.
   */
  register(id: string, factory: CodecFactory): void {
    this.factories.set(id, factory);
  }

  has(id: string): boolean {
    return this.factories.has(id);
  }

  /** Registered ids, in registration order. */
  ids(): string[] {
    return [...this.factories.keys()];
  }

  /**
   * Instantiate the codec a configuration names.
   *
   * @throws {MisconfiguredError} If no codec is registered under `config.id`.
   */
  get(config: CodecConfig): ChunkTransform {
    const factory = this.factories.get(config.id);
    if (!factory) {
      throw new MisconfiguredError(`no codec registered under id "${config.id}"`);
    }
    return factory(config);
  }
}

/**
 * Create a registry with the built-in codecs. Pass a keyring to bind the
 * encryption codec to it instead of the process-wide default.
 */
export function createDefaultCodecRegistry(keyring?: EncryptionKeyring): CodecRegistry {
  const registry = new CodecRegistry();
  registry.register(XCHACHA20POLY1305_CODEC_ID, (config) => ChunkCodec.fromConfig(config, keyring));
  return registry;
}

/** Shared registry backed by the process-wide keyring. */
export const codecRegistry = createDefaultCodecRegistry();

// ---------------------------------------------------------------------------
// ChunkPipeline
// ---------------------------------------------------------------------------

/**
 * Ordered chain of chunk transforms. `encode` applies them first to last,
 * `decode` last to first.
 */
export class ChunkPipeline {
  private readonly transforms: ChunkTransform[];

  /**
   * @param configs  - Codec configurations, in encode order.
   * @param registry - Registry resolving each `config.id`. Defaults to {@link codecRegistry}.
   */
  constructor(configs: readonly CodecConfig[], registry: CodecRegistry = codecRegistry) {
    this.transforms = configs.map((config) => registry.get(config));
  }

  encode(chunk: Uint8Array): Uint8Array {
    return this.transforms.reduce((data, transform) => transform.encode(data), chunk);
  }

  decode(chunk: Uint8Array): Uint8Array {
    return this.transforms.reduceRight((data, transform) => transform.decode(data), chunk);
  }

  /** Configuration list that rebuilds this pipeline. */
  getConfig(): CodecConfig[] {
    return this.transforms.map((transform) => transform.getConfig());
  }
}
