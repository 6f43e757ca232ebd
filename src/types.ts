// ============================================================================
// ipns-dataset-client — Type Definitions
// ============================================================================

// ---- Identifiers -----------------------------------------------------------

/** Globally-unique, human-readable dataset name (e.g. "cpc-precip-conus"). */
export type DatasetKey = string;

/**
 * Mutable name handle (an IPNS name). Resolving it may yield a different
 * {@link ImmutableContentId} after every publication.
 */
export type ContentPointer = string;

/** Content-derived identifier (CID) of an immutable IPFS/IPLD object. */
export type ImmutableContentId = string;

/** Dataset key → pointer mapping, as served by the registry and kept in the local cache. */
export type DatasetMapping = Readonly<Record<DatasetKey, ContentPointer>>;

// ---- Version Chain ---------------------------------------------------------

/**
 * One immutable metadata snapshot in a dataset's version chain.
 *
 * Snapshots form a singly-linked list, newest → oldest, reachable from the
 * head a {@link ContentPointer} currently resolves to.
 */
export interface VersionSnapshot {
  /** CID of this metadata document. */
  contentId: ImmutableContentId;
  /** UTC creation time, second precision. */
  createdAt: Date;
  /** CID of the predecessor snapshot; absent on the root of the chain. */
  previous?: ImmutableContentId;
  /** CID of the dataset root this snapshot describes. */
  payloadRef: ImmutableContentId;
  /** The raw metadata document, for callers that need the remaining fields. */
  document: Record<string, unknown>;
}

// ---- Collaborator Interfaces -----------------------------------------------

/** Fetches immutable metadata documents by content id (e.g. over IPLD). */
export interface SnapshotStore {
  /** Fetch the raw document stored under `id`. */
  fetchDocument(id: ImmutableContentId): Promise<unknown>;
}

/** Resolves a mutable pointer to the content id it currently designates. */
export interface PointerResolver {
  resolvePointer(pointer: ContentPointer): Promise<ImmutableContentId>;
}

/** Remote source of the authoritative dataset mapping. */
export interface DatasetRegistry {
  /**
   * Fetch the complete key → pointer mapping.
   * @throws On network failure, non-2xx status or a malformed payload.
   */
  fetchMapping(): Promise<DatasetMapping>;
}

/** Local persisted copy of the last registry mapping. */
export interface MappingCache {
  /**
   * Read the cached mapping.
   * @returns The mapping, or `undefined` when no cache exists yet.
   * @throws If the cache exists but cannot be read or parsed.
   */
  read(): Promise<DatasetMapping | undefined>;
  /** Replace the cached mapping wholesale. */
  write(mapping: DatasetMapping): Promise<void>;
}

// ---- Chunk Codecs ----------------------------------------------------------

/** Serializable codec configuration, selected by `id`. */
export interface CodecConfig {
  id: string;
  [option: string]: unknown;
}

/** A reversible byte transform applied to each storage chunk. */
export interface ChunkTransform {
  /** Stable identifier the transform is registered under. */
  readonly codecId: string;
  encode(chunk: Uint8Array): Uint8Array;
  decode(chunk: Uint8Array, out?: Uint8Array): Uint8Array;
  /** Configuration that recreates this transform. Never contains secrets. */
  getConfig(): CodecConfig;
}
