import type { ConnectionDescriptor } from '@geosync/core';
import type { HttpMethod } from './request-factory.js';

/**
 * Reply kinds issued by HubClient. Iterate and search calls may carry a
 * caller-chosen tag instead.
 */
export type KnownReplyTag =
  | 'statistics'
  | 'count'
  | 'space_meta'
  | 'spaces'
  | 'add_space'
  | 'edit_space'
  | 'del_space'
  | 'bbox'
  | 'tile'
  | 'iterate'
  | 'search'
  | 'add_feat'
  | 'del_feat';

/**
 * What a reply is for. Created when the request is issued, travels on the
 * reply handle and on its completion event, and is dropped with them.
 */
export interface RequestContext {
  readonly replyTag: KnownReplyTag | (string & Record<never, never>);
  readonly spaceId?: string;
  readonly connection: ConnectionDescriptor;
  /** Call parameters: bbox, tile id/schema, cursor handle, limit, ... */
  readonly params: Readonly<Record<string, unknown>>;
  readonly method: HttpMethod;
  readonly url: string;
}

/** A value with its correlation context attached */
export type Correlated<T extends object, C> = T & { readonly context: Readonly<C> };

/**
 * Attach `context` to `reply` so whoever later holds the reply, or its
 * completion, can tell what it was for.
 */
export function correlate<T extends object, C extends object>(reply: T, context: C): Correlated<T, C> {
  return Object.assign(reply, { context: Object.freeze(context) });
}

export function contextOf<C>(reply: { readonly context: C }): C {
  return reply.context;
}

/**
 * Build the context record for a call.
 */
export function createRequestContext(init: {
  replyTag: RequestContext['replyTag'];
  connection: ConnectionDescriptor;
  params?: Record<string, unknown>;
  method: HttpMethod;
  url: string;
}): RequestContext {
  return {
    replyTag: init.replyTag,
    ...(init.connection.spaceId !== undefined ? { spaceId: init.connection.spaceId } : {}),
    connection: init.connection,
    params: Object.freeze({ ...init.params }),
    method: init.method,
    url: init.url,
  };
}
