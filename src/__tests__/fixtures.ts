import type {
  ContentPointer,
  DatasetMapping,
  DatasetRegistry,
  ImmutableContentId,
  PointerResolver,
  SnapshotStore,
} from '../types.js';

/** Build a STAC-style metadata document as published on IPFS. */
export function stacDocument(
  updated: string,
  options: { previous?: string; rel?: string; payload?: string } = {},
): Record<string, unknown> {
  const links: Array<Record<string, unknown>> = [{ rel: 'self', href: './metadata.json' }];
  if (options.previous) {
    links.push({
      rel: options.rel ?? 'previous',
      'metadata href': { '/': options.previous },
    });
  }
  return {
    stac_version: '1.0.0',
    type: 'Feature',
    properties: { updated, datetime: updated },
    links,
    assets: {
      analytic: { href: { '/': options.payload ?? `payload-of-${updated}` } },
    },
  };
}

/** In-memory snapshot store that counts fetches. */
export function createMemoryStore(documents: Record<string, unknown>): SnapshotStore & { fetched: string[] } {
  const fetched: string[] = [];
  return {
    fetched,
    async fetchDocument(id: ImmutableContentId): Promise<unknown> {
      fetched.push(id);
      if (!(id in documents)) throw new Error(`Not found: ${id}`);
      return documents[id];
    },
  };
}

/** Pointer resolver backed by a fixed table. */
export function createPointerTable(heads: Record<ContentPointer, ImmutableContentId>): PointerResolver {
  return {
    async resolvePointer(pointer: ContentPointer): Promise<ImmutableContentId> {
      const head = heads[pointer];
      if (!head) throw new Error(`Unknown pointer: ${pointer}`);
      return head;
    },
  };
}

/** Registry that serves a fixed mapping, or fails when `mapping` is an Error. */
export function createRegistry(mapping: DatasetMapping | Error): DatasetRegistry {
  return {
    async fetchMapping(): Promise<DatasetMapping> {
      if (mapping instanceof Error) throw mapping;
      return { ...mapping };
    },
  };
}
