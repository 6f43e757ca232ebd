// ============================================================================
// ipns-dataset-client — Name Resolver (registry with local-cache fallback)
// ============================================================================

import _canonicalize from 'canonicalize';
import { DatasetNotFoundError, DatasetsUnavailableError } from './errors.js';
import { createLogger } from './logger.js';
import type {
  ContentPointer,
  DatasetKey,
  DatasetMapping,
  DatasetRegistry,
  MappingCache,
} from './types.js';

const canonicalize: (value: unknown) => string | undefined =
  typeof _canonicalize === 'function'
    ? _canonicalize
    : (_canonicalize as unknown as { default: (value: unknown) => string | undefined }).default;

const log = createLogger('name-resolver');

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Key-order-insensitive equality of two mappings (RFC 8785 canonical form). */
function sameMapping(a: DatasetMapping, b: DatasetMapping): boolean {
  return canonicalize(a) === canonicalize(b);
}

function lookup(mapping: DatasetMapping, key: DatasetKey): ContentPointer | undefined {
  return Object.prototype.hasOwnProperty.call(mapping, key) ? mapping[key] : undefined;
}

// ---------------------------------------------------------------------------
// NameResolver
// ---------------------------------------------------------------------------

/**
 * Maps dataset keys to their mutable pointers.
 *
 * The registry is authoritative. Every successful registry read refreshes the
 * local cache when (and only when) the two disagree. If the registry cannot be
 * read for any reason, lookups fall back to the cache without surfacing the
 * registry failure.
 *
 * @example
 * ```ts
 * const resolver = new NameResolver({
 *   registry: new HttpDatasetRegistry({ url }),
 *   cache: new FileMappingCache(cachePath),
 * });
 * const pointer = await resolver.resolve('cpc-precip-conus');
 * ```
 */
export class NameResolver {
  private readonly registry: DatasetRegistry;
  private readonly cache: MappingCache;

  constructor(options: { registry: DatasetRegistry; cache: MappingCache }) {
    this.registry = options.registry;
    this.cache = options.cache;
  }

  /**
   * Resolve a dataset key to its pointer.
   *
   * @throws {DatasetNotFoundError} If the key is absent from the registry, or
   *         the registry is down and the cache is missing, unreadable or lacks
   *         the key.
   */
  async resolve(key: DatasetKey): Promise<ContentPointer> {
    const fresh = await this.fetchRegistry();

    if (fresh) {
      const pointer = lookup(fresh, key);
      if (pointer === undefined) throw new DatasetNotFoundError(key, 'registry');
      return pointer;
    }

    let cached: DatasetMapping | undefined;
    try {
      cached = await this.cache.read();
    } catch (err) {
      throw new DatasetNotFoundError(key, 'local cache', { cause: err });
    }

    const pointer = cached ? lookup(cached, key) : undefined;
    if (pointer === undefined) throw new DatasetNotFoundError(key, 'local cache');
    return pointer;
  }

  /**
   * List every known dataset key.
   *
   * @throws {DatasetsUnavailableError} If the registry is down and the cache
   *         is missing or unreadable.
   */
  async listAll(): Promise<Set<DatasetKey>> {
    const fresh = await this.fetchRegistry();
    if (fresh) return new Set(Object.keys(fresh));

    let cached: DatasetMapping | undefined;
    try {
      cached = await this.cache.read();
    } catch (err) {
      throw new DatasetsUnavailableError({ cause: err });
    }

    if (!cached) throw new DatasetsUnavailableError();
    return new Set(Object.keys(cached));
  }

  // -----------------------------------------------------------------------
  // Internal helpers
  // -----------------------------------------------------------------------

  /**
   * Fetch the registry mapping and sync the cache.
   * @returns The fresh mapping, or `undefined` if the registry was unusable.
   */
  private async fetchRegistry(): Promise<DatasetMapping | undefined> {
    let fresh: DatasetMapping;
    try {
      fresh = await this.registry.fetchMapping();
    } catch (err) {
      log.warn('registry unavailable, falling back to local cache', { error: errorMessage(err) });
      return undefined;
    }

    await this.syncCache(fresh);
    return fresh;
  }

  /** Overwrite the cache if it differs from `fresh`. A missing or corrupt cache counts as empty. */
  private async syncCache(fresh: DatasetMapping): Promise<void> {
    let cached: DatasetMapping = {};
    try {
      cached = (await this.cache.read()) ?? {};
    } catch (err) {
      log.debug('local cache unreadable, treating as empty', { error: errorMessage(err) });
    }

    if (sameMapping(cached, fresh)) return;

    try {
      await this.cache.write(fresh);
      log.debug('local cache refreshed from registry', { datasets: Object.keys(fresh).length });
    } catch (err) {
      log.warn('failed to refresh local cache', { error: errorMessage(err) });
    }
  }
}
