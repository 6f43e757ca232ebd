import { describe, it, expect, vi, afterEach } from 'vitest';
import { HttpDatasetRegistry, parseDatasetMapping } from '../registry.js';

const REGISTRY_URL = 'https://registry.example.test/cids.json';

function stubFetch(response: Response) {
  const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(response);
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('HttpDatasetRegistry', () => {
  it('fetches the mapping with a JSON accept header', async () => {
    const fetchMock = stubFetch(new Response(JSON.stringify({ 'era5-temp-2m': 'k51-temp' }), { status: 200 }));

    const mapping = await new HttpDatasetRegistry({ url: REGISTRY_URL }).fetchMapping();

    expect(mapping).toEqual({ 'era5-temp-2m': 'k51-temp' });
    expect(fetchMock).toHaveBeenCalledWith(REGISTRY_URL, { headers: { Accept: 'application/json' } });
  });

  it('fails on a non-2xx status', async () => {
    stubFetch(new Response('maintenance', { status: 503 }));
    await expect(new HttpDatasetRegistry({ url: REGISTRY_URL }).fetchMapping()).rejects.toThrow(
      'DatasetClient: registry request failed (503): maintenance',
    );
  });

  it('fails on invalid JSON', async () => {
    stubFetch(new Response('<html>', { status: 200 }));
    await expect(new HttpDatasetRegistry({ url: REGISTRY_URL }).fetchMapping()).rejects.toThrow(
      'DatasetClient: registry returned invalid JSON',
    );
  });

  it('fails on a payload that is not a string mapping', async () => {
    stubFetch(new Response(JSON.stringify(['k51-temp']), { status: 200 }));
    await expect(new HttpDatasetRegistry({ url: REGISTRY_URL }).fetchMapping()).rejects.toThrow(
      'DatasetClient: malformed dataset mapping from registry',
    );
  });

  it('propagates network errors', async () => {
    vi.stubGlobal('fetch', vi.fn<typeof fetch>().mockRejectedValue(new TypeError('fetch failed')));
    await expect(new HttpDatasetRegistry({ url: REGISTRY_URL }).fetchMapping()).rejects.toThrow('fetch failed');
  });

  it('requires a URL', () => {
    expect(() => new HttpDatasetRegistry({ url: '' })).toThrow('DatasetClient: registry URL is required');
  });
});

describe('parseDatasetMapping', () => {
  it('accepts an empty mapping', () => {
    expect(parseDatasetMapping({}, 'test')).toEqual({});
  });

  it('names the offending key', () => {
    expect(() => parseDatasetMapping({ ok: 'k51-ok', bad: '' }, 'test')).toThrow(
      'DatasetClient: malformed dataset mapping from test at "bad"',
    );
  });
});
