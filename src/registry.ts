// ============================================================================
// ipns-dataset-client — Dataset Registry (HTTP)
// ============================================================================

import { z } from 'zod';
import type { DatasetMapping, DatasetRegistry } from './types.js';

/** Shape shared by the registry response and the local cache file. */
export const DatasetMappingSchema = z.record(z.string(), z.string().min(1));

/**
 * Validate an untrusted value as a {@link DatasetMapping}.
 *
 * @param source - Label used in the error message.
 * @throws If the value is not an object of string → string.
 */
export function parseDatasetMapping(value: unknown, source: string): DatasetMapping {
  const result = DatasetMappingSchema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at "${issue.path.join('.')}"` : '';
    throw new Error(`DatasetClient: malformed dataset mapping from ${source}${where}`);
  }
  return result.data;
}

// ---------------------------------------------------------------------------
// HttpDatasetRegistry
// ---------------------------------------------------------------------------

/**
 * Fetches the dataset mapping from a static JSON endpoint
 * (`{ "<dataset key>": "<ipns name>", ... }`). One request, no pagination.
 *
 * @example
 * ```ts
 * const registry = new HttpDatasetRegistry({ url: 'https://example.org/cids.json' });
 * const mapping = await registry.fetchMapping();
 * ```
 */
export class HttpDatasetRegistry implements DatasetRegistry {
  private readonly url: string;

  constructor(options: { url: string }) {
    if (!options.url) {
      throw new Error('DatasetClient: registry URL is required');
    }
    this.url = options.url;
  }

  /** @inheritdoc */
  async fetchMapping(): Promise<DatasetMapping> {
    const response = await fetch(this.url, { headers: { Accept: 'application/json' } });

    if (!response.ok) {
      const text = await response.text().catch(() => 'unknown error');
      throw new Error(`DatasetClient: registry request failed (${response.status}): ${text}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      throw new Error(
        `DatasetClient: registry returned invalid JSON — ${err instanceof Error ? err.message : String(err)}`,
      );
    }

    return parseDatasetMapping(body, 'registry');
  }
}
