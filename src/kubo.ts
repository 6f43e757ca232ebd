// ============================================================================
// ipns-dataset-client — Kubo RPC Client (IPLD snapshots, IPNS pointers)
// ============================================================================

import { z } from 'zod';
import type { ContentPointer, ImmutableContentId, PointerResolver, SnapshotStore } from './types.js';

/** Kubo RPC base used when no host is configured. */
export const DEFAULT_IPFS_API_URL = 'http://127.0.0.1:5001/api/v0';

const NameResolveResponseSchema = z.object({ Path: z.string().min(1) });

// ---------------------------------------------------------------------------
// KuboRpcClient
// ---------------------------------------------------------------------------

/**
 * Reads snapshot documents (`dag/get`) and resolves IPNS names
 * (`name/resolve`) through a Kubo node's HTTP RPC API.
 *
 * Every call is a single request; there are no retries or timeouts, so a
 * network failure surfaces to the caller immediately.
 *
 * @example
 * ```ts
 * const kubo = new KuboRpcClient({ apiUrl: 'http://127.0.0.1:5001/api/v0' });
 * const headId = await kubo.resolvePointer('k51qzi5uqu5d...');
 * const doc = await kubo.fetchDocument(headId);
 * ```
 */
export class KuboRpcClient implements SnapshotStore, PointerResolver {
  private readonly apiUrl: string;

  /**
   * @param options.apiUrl - Base URL of the RPC API, including `/api/v0`.
   *                         Defaults to {@link DEFAULT_IPFS_API_URL}.
   */
  constructor(options: { apiUrl?: string } = {}) {
    this.apiUrl = (options.apiUrl ?? DEFAULT_IPFS_API_URL).replace(/\/+$/, '');
  }

  private async post(command: string, params: Record<string, string>): Promise<unknown> {
    const query = new URLSearchParams(params).toString();
    const response = await fetch(`${this.apiUrl}/${command}?${query}`, { method: 'POST' });

    if (!response.ok) {
      const text = await response.text().catch(() => 'unknown error');
      throw new Error(`DatasetClient: IPFS ${command} failed (${response.status}): ${text}`);
    }

    return response.json();
  }

  /**
   * Fetch one IPLD document as JSON.
   *
   * @param id - CID of the document (with or without `/ipfs/` prefix).
   * @throws On network failure or a non-2xx response.
   */
  async fetchDocument(id: ImmutableContentId): Promise<unknown> {
    const cid = id.replace(/^\/ipfs\//, '').trim();
    if (!cid) {
      throw new Error('DatasetClient: cannot fetch snapshot — empty CID');
    }
    return this.post('dag/get', { arg: cid });
  }

  /**
   * Resolve an IPNS name to the CID it currently points at. Resolution is
   * offline: the node answers from its own records.
   *
   * @throws On network failure, a non-2xx response, or an unexpected payload.
   */
  async resolvePointer(pointer: ContentPointer): Promise<ImmutableContentId> {
    const body = await this.post('name/resolve', { arg: pointer, offline: 'true' });
    const parsed = NameResolveResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new Error(`DatasetClient: IPFS name/resolve returned no Path for ${pointer}`);
    }

    const head = parsed.data.Path.split('/').filter(Boolean).pop();
    if (!head) {
      throw new Error(`DatasetClient: IPFS name/resolve returned an empty Path for ${pointer}`);
    }
    return head;
  }
}
