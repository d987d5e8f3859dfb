import { createConnectionDescriptor, type Feature, type LogEntry } from '@geosync/core';
import { describe, expect, it } from 'vitest';
import { FakeHub, point } from './__tests__/fake-hub.js';
import { FeaturePager, type PagerPage } from './feature-pager.js';
import { HubClient, type FetchLike } from './hub-client.js';

const conn = createConnectionDescriptor({ server: 'https://hub.test/hub', spaceId: 'abc' });

function setup(features: Feature[]): { hub: FakeHub; client: HubClient } {
  const hub = new FakeHub();
  hub.addSpace({ id: 'abc', title: 'Roads' }, features);
  return { hub, client: new HubClient({ fetch: hub.fetch, logger: false }) };
}

async function drain(pager: FeaturePager): Promise<PagerPage[]> {
  const pages: PagerPage[] = [];
  for await (const page of pager.pages()) {
    pages.push(page);
  }
  return pages;
}

/** Hub replying with fixed pages, whatever the cursor */
function scriptedFetch(pages: unknown[]): FetchLike {
  let call = 0;
  return () => {
    const body = pages[Math.min(call++, pages.length - 1)];
    return Promise.resolve({ ok: true, status: 200, text: () => Promise.resolve(JSON.stringify(body)) });
  };
}

describe('FeaturePager', () => {
  it('should follow the cursor until the hub stops returning one', async () => {
    const { hub, client } = setup([point('f1', 1, 1), point('f2', 2, 2), point('f3', 3, 3)]);
    const pages = await drain(new FeaturePager(client, conn, { limit: 2, logger: false }));

    expect(pages.map((p) => p.features.map((f) => f.id))).toEqual([['f1', 'f2'], ['f3']]);
    expect(pages.map((p) => p.cursor)).toEqual(['2', undefined]);
    expect(hub.requests.map((r) => r.url)).toEqual([
      'https://hub.test/hub/spaces/abc/iterate?limit=2',
      'https://hub.test/hub/spaces/abc/iterate?limit=2&handle=2',
    ]);
  });

  it('should use the search endpoint with fixed filters', async () => {
    const { hub, client } = setup([point('f1', 1, 1)]);
    const features = await new FeaturePager(client, conn, {
      endpoint: 'search',
      query: { tags: 'roads' },
      logger: false,
    }).collect();

    expect(features.map((f) => f.id)).toEqual(['f1']);
    expect(hub.lastRequest?.url).toBe('https://hub.test/hub/spaces/abc/search?tags=roads');
  });

  it('should stop on an empty page', async () => {
    const { hub, client } = setup([]);
    const pages = await drain(new FeaturePager(client, conn, { logger: false }));
    expect(pages).toEqual([]);
    expect(hub.requests).toHaveLength(1);
  });

  it('should drop ids already yielded on an earlier page', async () => {
    const entries: LogEntry[] = [];
    const fetch = scriptedFetch([
      { type: 'FeatureCollection', features: [point('f1', 1, 1), point('f2', 2, 2)], handle: 'a' },
      { type: 'FeatureCollection', features: [point('f2', 2, 2), point('f3', 3, 3)] },
    ]);
    const client = new HubClient({ fetch, logger: false });
    const pager = new FeaturePager(client, conn, { logger: { handler: (entry) => entries.push(entry) } });

    const pages = await drain(pager);
    expect(pages.map((p) => p.features.map((f) => f.id))).toEqual([['f1', 'f2'], ['f3']]);
    expect(pages[1]?.duplicates).toBe(1);
    expect(entries.map((e) => e.message)).toEqual(['Dropped features already returned on an earlier page']);
  });

  it('should stop when the hub repeats a cursor', async () => {
    const fetch = scriptedFetch([
      { features: [point('f1', 1, 1)], handle: 'same' },
      { features: [point('f2', 2, 2)], handle: 'same' },
      { features: [point('f3', 3, 3)], handle: 'other' },
    ]);
    const pages = await drain(new FeaturePager(new HubClient({ fetch, logger: false }), conn, { logger: false }));

    expect(pages.map((p) => p.features.map((f) => f.id))).toEqual([['f1'], ['f2']]);
    expect(pages[1]?.cursor).toBeUndefined();
  });

  it('should honour maxPages', async () => {
    const { client } = setup([point('f1', 1, 1), point('f2', 2, 2), point('f3', 3, 3)]);
    const features = await new FeaturePager(client, conn, { limit: 1, maxPages: 2, logger: false }).collect();
    expect(features.map((f) => f.id)).toEqual(['f1', 'f2']);
  });

  it('should accept the nextPageToken cursor', async () => {
    const fetch = scriptedFetch([
      { features: [point('f1', 1, 1)], nextPageToken: 't1' },
      { features: [point('f2', 2, 2)] },
    ]);
    const features = await new FeaturePager(new HubClient({ fetch, logger: false }), conn, {
      logger: false,
    }).collect();
    expect(features.map((f) => f.id)).toEqual(['f1', 'f2']);
  });
});
