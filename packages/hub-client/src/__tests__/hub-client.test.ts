import {
  GeoSyncError,
  InvalidEndpointError,
  TransportFailureError,
  ValidationError,
  createConnectionDescriptor,
  type ConnectionDescriptor,
} from '@geosync/core';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { HubClient, type HubCompletion } from '../hub-client.js';
import { FakeHub, point } from './fake-hub.js';

const SERVER = 'https://hub.test/hub';

describe('HubClient', () => {
  let hub: FakeHub;
  let client: HubClient;
  let conn: ConnectionDescriptor;

  beforeEach(() => {
    hub = new FakeHub();
    hub.addSpace({ id: 'abc', title: 'Roads' }, [point('f1', 1, 1), point('f2', 2, 2), point('f3', 3, 3)]);
    client = new HubClient({ fetch: hub.fetch, logger: false });
    conn = createConnectionDescriptor({ server: SERVER, spaceId: 'abc', token: 'test-token' });
  });

  afterEach(() => {
    client.destroy();
    vi.useRealTimers();
  });

  describe('space calls', () => {
    it('should fetch space metadata with a bearer token', async () => {
      const reply = client.fetchMeta(conn);
      expect(reply.context.replyTag).toBe('space_meta');

      const { body } = await reply.result;
      expect(body).toEqual({ id: 'abc', title: 'Roads' });
      expect(hub.lastRequest?.headers.Authorization).toBe('Bearer test-token');
      expect(hub.lastRequest?.url).toBe('https://hub.test/hub/spaces/abc');
      expect(reply.state).toBe('finished');
    });

    it('should count features', async () => {
      const { body } = await client.fetchCount(conn).result;
      expect(body.count).toBe(3);
    });

    it('should list spaces including rights by default', async () => {
      const { body } = await client.listSpaces(conn).result;
      expect(body.map((space) => space.id)).toEqual(['abc']);
      expect(hub.lastRequest?.url).toBe('https://hub.test/hub/spaces?includeRights=true');
    });

    it('should list spaces without the rights flag', async () => {
      await client.listSpaces(conn, false).result;
      expect(hub.lastRequest?.url).toBe('https://hub.test/hub/spaces');
    });

    it('should strip server-assigned fields when adding a space', async () => {
      const { body } = await client.addSpace(conn, { id: 'stale', owner: 'someone', title: 'Copy' }).result;

      expect(hub.lastRequest?.method).toBe('POST');
      expect(hub.lastRequest?.headers['Content-Type']).toBe('application/json');
      expect(hub.lastRequest?.body).toEqual({ title: 'Copy' });
      expect(body).toEqual({ id: 'space-1', title: 'Copy' });
    });

    it('should patch a space', async () => {
      const { body } = await client.editSpace(conn, { description: 'all roads' }).result;
      expect(hub.lastRequest?.method).toBe('PATCH');
      expect(body).toEqual({ id: 'abc', title: 'Roads', description: 'all roads' });
    });

    it('should delete a space', async () => {
      const { status, body } = await client.deleteSpace(conn).result;
      expect(status).toBe(204);
      expect(body).toBeNull();
    });
  });

  describe('feature reads', () => {
    it('should page through iterate with the hub cursor', async () => {
      const first = client.loadFeaturesIterate(conn, { limit: 2 });
      expect(first.context.params).toEqual({ limit: 2 });
      const page1 = await first.result;
      expect(page1.body.features.map((f) => f.id)).toEqual(['f1', 'f2']);
      expect(page1.body.handle).toBe('2');

      const second = client.loadFeaturesIterate(conn, { limit: 2, handle: page1.body.handle });
      expect(hub.lastRequest?.url).toBe('https://hub.test/hub/spaces/abc/iterate?limit=2&handle=2');
      const page2 = await second.result;
      expect(page2.body.features.map((f) => f.id)).toEqual(['f3']);
      expect(page2.body.handle).toBeUndefined();
    });

    it('should let iterate and search override the reply tag without sending it', async () => {
      const reply = client.loadFeaturesSearch(conn, { limit: 1, replyTag: 'preview' });
      expect(reply.context.replyTag).toBe('preview');
      expect(reply.context.params).toEqual({ limit: 1 });
      await reply.result;
      expect(hub.lastRequest?.url).toBe('https://hub.test/hub/spaces/abc/search?limit=1');
    });

    it('should send bbox edges and echo the bbox in the context', async () => {
      const bbox = { west: -10, south: -5, east: 10, north: 5 };
      const reply = client.loadFeaturesByBbox(conn, bbox, { limit: 100 });

      expect(reply.context.params).toEqual({ limit: 100, bbox });
      expect(hub.lastRequest?.url).toBe(
        'https://hub.test/hub/spaces/abc/bbox?west=-10&south=-5&east=10&north=5&limit=100'
      );
      const { body } = await reply.result;
      expect(body.features).toHaveLength(3);
    });

    it('should default tiles to quadkey 0', async () => {
      const reply = client.loadFeaturesByTile(conn);
      expect(reply.context.params).toEqual({ tileId: '0', tileSchema: 'quadkey' });
      expect(hub.lastRequest?.url).toBe('https://hub.test/hub/spaces/abc/tile/quadkey/0');
      await reply.result;
    });
  });

  describe('feature writes', () => {
    it('should send tags as addTags with a geo body', async () => {
      const reply = client.addFeatures(conn, [point('f9', 9, 9)], { tags: ['new', 'roads'] });
      expect(reply.context.params).toEqual({ addTags: ['new', 'roads'] });

      await reply.result;
      const request = hub.lastRequest;
      expect(request?.method).toBe('POST');
      expect(request?.url).toBe('https://hub.test/hub/spaces/abc/features?addTags=new,roads');
      expect(request?.headers['Content-Type']).toBe('application/geo+json');
      expect(request?.body).toEqual({ type: 'FeatureCollection', features: [point('f9', 9, 9)] });
      expect(hub.featuresOf('abc')).toHaveLength(4);
    });

    it('should replace features with PUT', async () => {
      await client.replaceFeatures(conn, [point('f1', 5, 5, { name: 'moved' })]).result;
      expect(hub.lastRequest?.method).toBe('PUT');
      expect(hub.featuresOf('abc')[0]).toEqual(point('f1', 5, 5, { name: 'moved' }));
    });

    it('should delete features by a comma-joined id list', async () => {
      const reply = client.deleteFeatures(conn, ['f1', 'f2']);
      expect(reply.context.replyTag).toBe('del_feat');

      await reply.result;
      expect(hub.lastRequest?.method).toBe('DELETE');
      expect(hub.lastRequest?.url).toBe('https://hub.test/hub/spaces/abc/features?id=f1,f2');
      expect(hub.featuresOf('abc').map((f) => f.id)).toEqual(['f3']);
    });

    it('should refuse an empty delete', () => {
      expect(() => client.deleteFeatures(conn, [])).toThrow(GeoSyncError);
      expect(hub.requests).toHaveLength(0);
    });
  });

  describe('failures', () => {
    it('should throw InvalidEndpointError before any I/O when the space id is missing', () => {
      const bare = createConnectionDescriptor({ server: SERVER });
      expect(() => client.fetchCount(bare)).toThrow(InvalidEndpointError);
      expect(hub.requests).toHaveLength(0);
    });

    it('should abort statistics after the timeout', async () => {
      vi.useFakeTimers();
      hub.stall('/statistics');

      const reply = client.fetchStatistics(conn);
      const outcome = reply.result.catch((error: unknown) => error);
      vi.advanceTimersByTime(1000);

      const error = await outcome;
      expect(error).toBeInstanceOf(TransportFailureError);
      expect(error).toMatchObject({ reason: 'timeout', replyTag: 'statistics' });
      expect(reply.state).toBe('aborted');
    });

    it('should time out statistics when fetch ignores the abort signal', async () => {
      vi.useFakeTimers();
      const deaf = new HubClient({ fetch: () => new Promise<never>(() => undefined), logger: false });

      const reply = deaf.fetchStatistics(conn);
      const outcome = reply.result.catch((error: unknown) => error);
      vi.advanceTimersByTime(1000);

      await expect(outcome).resolves.toMatchObject({ reason: 'timeout', replyTag: 'statistics' });
      expect(reply.state).toBe('aborted');
      expect(deaf.pendingCount()).toBe(0);
      deaf.destroy();
    });

    it('should not time out other calls', async () => {
      vi.useFakeTimers();
      const reply = client.fetchCount(conn);
      vi.advanceTimersByTime(5000);
      await expect(reply.result).resolves.toMatchObject({ status: 200 });
    });

    it('should treat abort as idempotent', async () => {
      hub.stall('/iterate');
      const reply = client.loadFeaturesIterate(conn, { limit: 2 });
      expect(client.pendingCount()).toBe(1);

      reply.abort();
      reply.abort();
      await expect(reply.result).rejects.toMatchObject({ reason: 'aborted' });
      expect(reply.state).toBe('aborted');

      reply.abort('timeout');
      expect(reply.state).toBe('aborted');
      expect(client.pendingCount()).toBe(0);
    });

    it('should report HTTP errors with status code and context', async () => {
      hub.failNext(500);
      const reply = client.fetchCount(conn);

      await expect(reply.result).rejects.toMatchObject({
        reason: 'http',
        statusCode: 500,
        code: 'GEOSYNC_C501',
      });
      expect(reply.state).toBe('failed');
    });

    it('should report network errors', async () => {
      const failing = new HubClient({
        fetch: () => Promise.reject(new TypeError('fetch failed')),
        logger: false,
      });
      await expect(failing.fetchMeta(conn).result).rejects.toMatchObject({
        reason: 'network',
        code: 'GEOSYNC_C500',
      });
    });

    it('should reject unparsable reply bodies', async () => {
      hub.replyRawNext('{not json');
      await expect(client.fetchMeta(conn).result).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('completions', () => {
    it('should deliver every outcome with its context', async () => {
      const completions: HubCompletion[] = [];
      client.completions().subscribe((completion) => completions.push(completion));

      hub.failNext(503);
      const failed = client.fetchCount(conn);
      const ok = client.loadFeaturesIterate(conn, { limit: 1 });
      await failed.result.catch(() => undefined);
      await ok.result;

      expect(completions).toHaveLength(2);
      const [first, second] = completions;
      expect(first?.ok).toBe(false);
      expect(first?.context.replyTag).toBe('count');
      if (first && !first.ok) {
        expect(first.error).toBeInstanceOf(TransportFailureError);
      }
      expect(second?.ok).toBe(true);
      expect(second?.context.params).toEqual({ limit: 1 });
      expect(second?.context).toBe(ok.context);
    });

    it('should abort pending calls on destroy', async () => {
      hub.stall('/iterate');
      const reply = client.loadFeaturesIterate(conn);
      client.destroy();
      await expect(reply.result).rejects.toMatchObject({ reason: 'aborted' });
    });
  });
});
