import { createConnectionDescriptor } from '@geosync/core';
import { describe, expect, it } from 'vitest';
import { contextOf, correlate, createRequestContext } from './reply-correlator.js';

const conn = createConnectionDescriptor({ server: 'https://hub.test/hub', spaceId: 'abc' });

describe('reply correlation', () => {
  it('should attach a frozen context to the reply itself', () => {
    const params = { limit: 2 };
    const context = createRequestContext({
      replyTag: 'iterate',
      connection: conn,
      params,
      method: 'GET',
      url: 'https://hub.test/hub/spaces/abc/iterate?limit=2',
    });
    const handle = { result: Promise.resolve(null) };
    const reply = correlate(handle, context);

    expect(reply).toBe(handle);
    expect(contextOf(reply)).toBe(context);
    expect(contextOf(reply)).toEqual({
      replyTag: 'iterate',
      spaceId: 'abc',
      connection: conn,
      params: { limit: 2 },
      method: 'GET',
      url: 'https://hub.test/hub/spaces/abc/iterate?limit=2',
    });
    expect(Object.isFrozen(contextOf(reply))).toBe(true);
    expect(Object.isFrozen(contextOf(reply).params)).toBe(true);

    params.limit = 5;
    expect(contextOf(reply).params).toEqual({ limit: 2 });
  });

  it('should leave out the space id for connections without one', () => {
    const context = createRequestContext({
      replyTag: 'spaces',
      connection: createConnectionDescriptor({ server: 'https://hub.test/hub' }),
      method: 'GET',
      url: 'https://hub.test/hub/spaces',
    });
    expect('spaceId' in context).toBe(false);
    expect(context.params).toEqual({});
  });
});
