import { describe, it, expect } from 'vitest';
import { VersionChainWalker } from '../versionChain.js';
import { ChainCorruptError, MalformedSnapshotError, MisconfiguredError, NoMetadataFoundError } from '../errors.js';
import { createMemoryStore, createPointerTable, stacDocument } from './fixtures.js';

const T_A = '2023-01-01T00:00:00Z';
const T_B = '2023-06-01T00:00:00Z';
const T_C = '2024-01-01T00:00:00Z';

/** A <- B <- C, with the pointer resolving to C. */
function createChain() {
  const store = createMemoryStore({
    'bafy-a': stacDocument(T_A, { payload: 'zarr-a' }),
    'bafy-b': stacDocument(T_B, { previous: 'bafy-a', payload: 'zarr-b' }),
    'bafy-c': stacDocument(T_C, { previous: 'bafy-b', payload: 'zarr-c' }),
  });
  const pointers = createPointerTable({ 'k51-precip': 'bafy-c' });
  return { store, pointers, walker: new VersionChainWalker({ store, pointers }) };
}

describe('VersionChainWalker.resolveAsOf', () => {
  it('returns the head without walking when no time is given', async () => {
    const { store, walker } = createChain();

    const snapshot = await walker.resolveAsOf('k51-precip');

    expect(snapshot.contentId).toBe('bafy-c');
    expect(snapshot.payloadRef).toBe('zarr-c');
    expect(store.fetched).toEqual(['bafy-c']);
  });

  it('returns the head when the time is after it', async () => {
    const { walker } = createChain();
    const snapshot = await walker.resolveAsOf('k51-precip', new Date('2025-01-01T00:00:00Z'));
    expect(snapshot.contentId).toBe('bafy-c');
  });

  it('matches a snapshot created exactly at the requested time', async () => {
    const { store, walker } = createChain();

    const snapshot = await walker.resolveAsOf('k51-precip', new Date(T_B));

    expect(snapshot.contentId).toBe('bafy-b');
    expect(snapshot.payloadRef).toBe('zarr-b');
    expect(store.fetched).toEqual(['bafy-c', 'bafy-b']);
  });

  it('returns the predecessor one second before a snapshot', async () => {
    const { walker } = createChain();
    const snapshot = await walker.resolveAsOf('k51-precip', new Date('2023-05-31T23:59:59Z'));
    expect(snapshot.contentId).toBe('bafy-a');
  });

  it('fails with NoMetadataFoundError before the root', async () => {
    const { walker } = createChain();
    const asOf = new Date('2022-12-31T23:59:59Z');

    await expect(walker.resolveAsOf('k51-precip', asOf)).rejects.toThrow(NoMetadataFoundError);
    await expect(walker.resolveAsOf('k51-precip', asOf)).rejects.toThrow(
      'DatasetClient: no metadata found at or before as-of 2022-12-31T23:59:59.000Z',
    );
  });

  it('rejects an invalid date before fetching anything', async () => {
    const { store, walker } = createChain();

    await expect(walker.resolveAsOf('k51-precip', new Date('not a date'))).rejects.toThrow(
      'DatasetClient: asOf is not a valid date',
    );
    await expect(walker.resolveAsOf('k51-precip', new Date(Number.NaN))).rejects.toThrow(MisconfiguredError);
    expect(store.fetched).toEqual([]);
  });

  it('follows legacy "prev" links', async () => {
    const store = createMemoryStore({
      'bafy-old': stacDocument(T_A),
      'bafy-new': stacDocument(T_C, { previous: 'bafy-old', rel: 'prev' }),
    });
    const walker = new VersionChainWalker({ store, pointers: createPointerTable({ k51: 'bafy-new' }) });

    const snapshot = await walker.resolveAsOf('k51', new Date(T_B));
    expect(snapshot.contentId).toBe('bafy-old');
  });

  it('detects a cycle', async () => {
    const store = createMemoryStore({
      'bafy-x': stacDocument(T_C, { previous: 'bafy-y' }),
      'bafy-y': stacDocument(T_C, { previous: 'bafy-x' }),
    });
    const walker = new VersionChainWalker({ store, pointers: createPointerTable({ k51: 'bafy-x' }) });

    await expect(walker.resolveAsOf('k51', new Date(T_A))).rejects.toThrow(
      'DatasetClient: cycle detected at snapshot bafy-x during chain walk',
    );
  });

  it('stops at the hop limit', async () => {
    const { store, pointers } = createChain();
    const walker = new VersionChainWalker({ store, pointers, maxHops: 2 });

    await expect(walker.resolveAsOf('k51-precip', new Date(T_B))).resolves.toMatchObject({ contentId: 'bafy-b' });
    await expect(walker.resolveAsOf('k51-precip', new Date(T_A))).rejects.toThrow(ChainCorruptError);
  });

  it('rejects a non-positive hop limit', () => {
    const { store, pointers } = createChain();
    expect(() => new VersionChainWalker({ store, pointers, maxHops: 0 })).toThrow(
      'DatasetClient: maxHops must be a positive integer, got 0',
    );
  });

  it('surfaces a malformed snapshot met on the way', async () => {
    const store = createMemoryStore({
      'bafy-c': stacDocument(T_C, { previous: 'bafy-b' }),
      'bafy-b': { properties: { updated: T_B } },
    });
    const walker = new VersionChainWalker({ store, pointers: createPointerTable({ k51: 'bafy-c' }) });

    await expect(walker.resolveAsOf('k51', new Date(T_A))).rejects.toThrow(MalformedSnapshotError);
  });

  it('propagates store failures', async () => {
    const store = createMemoryStore({ 'bafy-c': stacDocument(T_C, { previous: 'bafy-missing' }) });
    const walker = new VersionChainWalker({ store, pointers: createPointerTable({ k51: 'bafy-c' }) });

    await expect(walker.resolveAsOf('k51', new Date(T_A))).rejects.toThrow('Not found: bafy-missing');
  });
});

describe('VersionChainWalker.resolveFromHead', () => {
  it('starts from a known CID without resolving a pointer', async () => {
    const { walker } = createChain();
    const snapshot = await walker.resolveFromHead('bafy-b', new Date(T_C));
    expect(snapshot.contentId).toBe('bafy-b');
  });
});

describe('VersionChainWalker.getLineage', () => {
  it('returns every snapshot newest first', async () => {
    const { walker } = createChain();
    const lineage = await walker.getLineage('k51-precip');
    expect(lineage.map((s) => s.contentId)).toEqual(['bafy-c', 'bafy-b', 'bafy-a']);
    expect(lineage.map((s) => s.createdAt.toISOString())).toEqual([
      '2024-01-01T00:00:00.000Z',
      '2023-06-01T00:00:00.000Z',
      '2023-01-01T00:00:00.000Z',
    ]);
  });

  it('respects maxDepth', async () => {
    const { walker } = createChain();
    const lineage = await walker.getLineage('k51-precip', 2);
    expect(lineage.map((s) => s.contentId)).toEqual(['bafy-c', 'bafy-b']);
  });
});
