// ============================================================================
// ipns-dataset-client — Version Chain Walker (point-in-time resolution)
// ============================================================================

import { ChainCorruptError, MisconfiguredError, NoMetadataFoundError } from './errors.js';
import { createLogger } from './logger.js';
import { parseSnapshot } from './snapshot.js';
import type {
  ContentPointer,
  ImmutableContentId,
  PointerResolver,
  SnapshotStore,
  VersionSnapshot,
} from './types.js';

/** Upper bound on snapshots fetched in one walk. */
export const DEFAULT_MAX_HOPS = 10_000;

const log = createLogger('version-chain');

// ---------------------------------------------------------------------------
// VersionChainWalker
// ---------------------------------------------------------------------------

/**
 * Resolves a dataset pointer to the snapshot that was current at a given
 * time by walking `previous` links backward from the head.
 *
 * The walk is a linear scan with one fetch per hop: each snapshot's
 * predecessor is only known once the snapshot itself has been fetched.
 *
 * @example
 * ```ts
 * const walker = new VersionChainWalker({ store: kubo, pointers: kubo });
 * const latest = await walker.resolveAsOf(pointer);
 * const january = await walker.resolveAsOf(pointer, new Date('2024-01-31T23:59:59Z'));
 * ```
 */
export class VersionChainWalker {
  private readonly store: SnapshotStore;
  private readonly pointers: PointerResolver;
  private readonly maxHops: number;

  /**
   * @param options.store    - Fetches snapshot documents by CID.
   * @param options.pointers - Resolves a pointer to its head CID.
   * @param options.maxHops  - Maximum snapshots fetched per walk (default {@link DEFAULT_MAX_HOPS}).
   */
  constructor(options: { store: SnapshotStore; pointers: PointerResolver; maxHops?: number }) {
    const maxHops = options.maxHops ?? DEFAULT_MAX_HOPS;
    if (!Number.isInteger(maxHops) || maxHops < 1) {
      throw new Error(`DatasetClient: maxHops must be a positive integer, got ${maxHops}`);
    }
    this.store = options.store;
    this.pointers = options.pointers;
    this.maxHops = maxHops;
  }

  /** Fetch and parse one snapshot. */
  async fetchSnapshot(id: ImmutableContentId): Promise<VersionSnapshot> {
    return parseSnapshot(id, await this.store.fetchDocument(id));
  }

  /**
   * Resolve a pointer to the snapshot current at `asOf`.
   *
   * @param pointer - Mutable dataset pointer.
   * @param asOf    - Cutoff time; omit for the head snapshot.
   * @returns The most recent snapshot with `createdAt <= asOf`.
   * @throws {NoMetadataFoundError} If every retained snapshot is newer than `asOf`.
   * @throws {ChainCorruptError} If the chain cycles or exceeds the hop limit.
   * @throws {MisconfiguredError} If `asOf` is an invalid date.
   */
  async resolveAsOf(pointer: ContentPointer, asOf?: Date): Promise<VersionSnapshot> {
    const headId = await this.pointers.resolvePointer(pointer);
    return this.resolveFromHead(headId, asOf);
  }

  /**
   * Same as {@link resolveAsOf}, starting from a known head CID.
   */
  async resolveFromHead(headId: ImmutableContentId, asOf?: Date): Promise<VersionSnapshot> {
    if (asOf === undefined) {
      return this.fetchSnapshot(headId);
    }

    const cutoff = asOf.getTime();
    if (Number.isNaN(cutoff)) {
      throw new MisconfiguredError('asOf is not a valid date');
    }

    const visited = new Set<string>();
    let currentId: ImmutableContentId | undefined = headId;

    while (currentId !== undefined) {
      this.recordHop(visited, currentId);
      const snapshot = await this.fetchSnapshot(currentId);
      log.debug('visited snapshot', {
        contentId: snapshot.contentId,
        createdAt: snapshot.createdAt.toISOString(),
        hop: visited.size,
      });

      if (snapshot.createdAt.getTime() <= cutoff) {
        return snapshot;
      }
      currentId = snapshot.previous;
    }

    throw new NoMetadataFoundError(asOf);
  }

  /**
   * Walk the whole chain from a pointer's head back to its root.
   *
   * @param pointer  - Mutable dataset pointer.
   * @param maxDepth - Stop after this many snapshots (default: the hop limit).
   * @returns Snapshots newest first.
   * @throws {ChainCorruptError} If the chain cycles, or `maxDepth` exceeds the hop limit and the chain does too.
   */
  async getLineage(pointer: ContentPointer, maxDepth: number = this.maxHops): Promise<VersionSnapshot[]> {
    const headId = await this.pointers.resolvePointer(pointer);
    const lineage: VersionSnapshot[] = [];
    const visited = new Set<string>();

    let currentId: ImmutableContentId | undefined = headId;
    while (currentId !== undefined && lineage.length < maxDepth) {
      this.recordHop(visited, currentId);
      const snapshot = await this.fetchSnapshot(currentId);
      lineage.push(snapshot);
      currentId = snapshot.previous;
    }

    return lineage;
  }

  private recordHop(visited: Set<string>, id: ImmutableContentId): void {
    if (visited.has(id)) {
      throw new ChainCorruptError(`cycle detected at snapshot ${id} during chain walk`);
    }
    if (visited.size >= this.maxHops) {
      throw new ChainCorruptError(`chain walk exceeded ${this.maxHops} snapshots without reaching a match`);
    }
    visited.add(id);
  }
}
