// ============================================================================
// ipns-dataset-client — Error Types
// ============================================================================

/** Discriminant carried by every {@link DatasetClientError}. */
export type DatasetClientErrorKind =
  | 'dataset-not-found'
  | 'no-metadata-found'
  | 'datasets-unavailable'
  | 'chain-corrupt'
  | 'malformed-snapshot'
  | 'integrity'
  | 'misconfigured'
  | 'invalid-key';

/**
 * Base class for all library errors.
 *
 * Branch on `kind` rather than on the class hierarchy:
 *
 * @example
 * ```ts
 * try {
 *   await client.getSnapshot('cpc-precip-conus', { asOf });
 * } catch (err) {
 *   if (isDatasetClientError(err, 'no-metadata-found')) {
 *     // as-of predates the dataset
 *   }
 *   throw err;
 * }
 * ```
 */
export class DatasetClientError extends Error {
  constructor(
    public readonly kind: DatasetClientErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`DatasetClient: ${message}`, options);
    this.name = 'DatasetClientError';
  }
}

/** Where a failed dataset lookup was answered from. */
export type DatasetLookupSource = 'registry' | 'local cache';

/**
 * The dataset key is absent from the source that answered the lookup: the
 * registry when it is reachable, otherwise the local cache.
 */
export class DatasetNotFoundError extends DatasetClientError {
  constructor(
    public readonly key: string,
    public readonly source: DatasetLookupSource,
    options?: { cause?: unknown },
  ) {
    super('dataset-not-found', `dataset "${key}" not found in ${source}`, options);
    this.name = 'DatasetNotFoundError';
  }
}

/** The requested as-of time predates the oldest retained snapshot. */
export class NoMetadataFoundError extends DatasetClientError {
  constructor(public readonly asOf: Date) {
    super('no-metadata-found', `no metadata found at or before as-of ${asOf.toISOString()}`);
    this.name = 'NoMetadataFoundError';
  }
}

/** Neither the registry nor the local cache could produce a dataset list. */
export class DatasetsUnavailableError extends DatasetClientError {
  constructor(options?: { cause?: unknown }) {
    super('datasets-unavailable', 'failed to retrieve dataset list from registry or local cache', options);
    this.name = 'DatasetsUnavailableError';
  }
}

/** The version chain revisits a snapshot or exceeds the hop limit. */
export class ChainCorruptError extends DatasetClientError {
  constructor(message: string) {
    super('chain-corrupt', message);
    this.name = 'ChainCorruptError';
  }
}

/** A snapshot document lacks a field the chain walk depends on. */
export class MalformedSnapshotError extends DatasetClientError {
  constructor(
    public readonly contentId: string,
    detail: string,
  ) {
    super('malformed-snapshot', `snapshot ${contentId} is malformed: ${detail}`);
    this.name = 'MalformedSnapshotError';
  }
}

/** An encrypted chunk failed authentication. Never retried. */
export class IntegrityError extends DatasetClientError {
  constructor(message: string) {
    super('integrity', message);
    this.name = 'IntegrityError';
  }
}

/** Required configuration (such as the encryption key) is missing or invalid. */
export class MisconfiguredError extends DatasetClientError {
  constructor(message: string) {
    super('misconfigured', message);
    this.name = 'MisconfiguredError';
  }
}

/** An encryption key of the wrong length or encoding was supplied. */
export class InvalidKeyError extends DatasetClientError {
  constructor(message: string) {
    super('invalid-key', message);
    this.name = 'InvalidKeyError';
  }
}

/**
 * Narrow an unknown value to a {@link DatasetClientError}, optionally of a
 * specific kind.
 */
export function isDatasetClientError(
  err: unknown,
  kind?: DatasetClientErrorKind,
): err is DatasetClientError {
  return err instanceof DatasetClientError && (kind === undefined || err.kind === kind);
}
