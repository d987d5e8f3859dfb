import { InvalidEndpointError, createConnectionDescriptor } from '@geosync/core';
import { describe, expect, it } from 'vitest';
import { buildRequest, resolveEndpoint, serializeBody, serializeQuery } from './request-factory.js';

const conn = createConnectionDescriptor({
  server: 'https://hub.example.com/hub/',
  spaceId: 'my space',
  token: 'test-token',
  headers: { 'X-Client': 'geosync-tests' },
});

describe('resolveEndpoint', () => {
  it('should substitute an encoded space id', () => {
    expect(resolveEndpoint(conn, '/spaces/{space_id}/iterate')).toBe('/spaces/my%20space/iterate');
  });

  it('should leave endpoints without placeholders alone', () => {
    expect(resolveEndpoint(conn, '/spaces')).toBe('/spaces');
  });

  it('should reject a missing space id', () => {
    const bare = createConnectionDescriptor({ server: 'https://hub.example.com' });
    expect(() => resolveEndpoint(bare, '/spaces/{space_id}')).toThrow(InvalidEndpointError);
  });

  it('should reject unresolved placeholders', () => {
    expect(() => resolveEndpoint(conn, '/spaces/{space_id}/tile/{tile_id}')).toThrow(
      'Invalid endpoint "/spaces/{space_id}/tile/{tile_id}": unresolved placeholder {tile_id}'
    );
  });

  it('should reject relative endpoints', () => {
    expect(() => resolveEndpoint(conn, 'spaces')).toThrow(InvalidEndpointError);
  });
});

describe('serializeQuery', () => {
  it('should comma-join lists without encoding the comma', () => {
    expect(serializeQuery({ id: ['f1', 'f 2', 'a,b'] })).toBe('id=f1,f%202,a%2Cb');
  });

  it('should skip null and undefined values', () => {
    expect(serializeQuery({ limit: 10, handle: undefined, tags: null, clip: false })).toBe('limit=10&clip=false');
  });

  it('should return an empty string for no parameters', () => {
    expect(serializeQuery()).toBe('');
  });
});

describe('serializeBody', () => {
  it('should wrap features in a collection in geo mode', () => {
    const feature = { type: 'Feature', id: 'f1', geometry: null, properties: {} };
    expect(JSON.parse(serializeBody([feature], 'geo'))).toEqual({
      type: 'FeatureCollection',
      features: [feature],
    });
  });

  it('should send objects as-is in json mode', () => {
    expect(serializeBody({ title: 'Roads' }, 'json')).toBe('{"title":"Roads"}');
  });
});

describe('buildRequest', () => {
  it('should build a GET with headers in order', () => {
    const request = buildRequest(conn, '/spaces/{space_id}/count');
    expect(request).toEqual({
      method: 'GET',
      url: 'https://hub.example.com/hub/spaces/my%20space/count',
      headers: {
        Accept: 'application/json',
        Authorization: 'Bearer test-token',
        'X-Client': 'geosync-tests',
      },
    });
  });

  it('should build a DELETE with an id list', () => {
    const request = buildRequest(conn, '/spaces/{space_id}/features', {
      method: 'DELETE',
      query: { id: ['f1', 'f2'] },
    });
    expect(request.method).toBe('DELETE');
    expect(request.url).toBe('https://hub.example.com/hub/spaces/my%20space/features?id=f1,f2');
    expect(request.body).toBeUndefined();
  });

  it('should set the content type from the body mode', () => {
    const request = buildRequest(conn, '/spaces', {
      method: 'POST',
      body: { title: 'Roads' },
      bodyMode: 'json',
    });
    expect(request.headers['Content-Type']).toBe('application/json');
    expect(request.body).toBe('{"title":"Roads"}');
  });

  it('should require a body mode with a body', () => {
    expect(() => buildRequest(conn, '/spaces', { method: 'POST', body: {} })).toThrow(InvalidEndpointError);
  });

  it('should not mutate its inputs', () => {
    const query = { id: ['f1'] };
    buildRequest(conn, '/spaces/{space_id}/features', { method: 'DELETE', query });
    expect(query).toEqual({ id: ['f1'] });
    expect(conn.headers).toEqual({ 'X-Client': 'geosync-tests' });
  });

  it('should reject a server that is not http(s)', () => {
    const ftp = createConnectionDescriptor({ server: 'ftp://hub.example.com', spaceId: 'abc' });
    expect(() => buildRequest(ftp, '/spaces/{space_id}')).toThrow('unsupported protocol ftp:');
  });
});
