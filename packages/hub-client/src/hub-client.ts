import {
  GeoSyncError,
  TransportFailureError,
  ValidationError,
  featurePageSchema,
  parseSpaceMetadata,
  parseWith,
  prepareNewSpaceInfo,
  resolveLogger,
  spaceMetadataSchema,
  type BoundingBox,
  type ConnectionDescriptor,
  type Feature,
  type FeaturePageBody,
  type Logger,
  type LoggerOption,
  type SpaceMetadata,
} from '@geosync/core';
import { Subject, type Observable } from 'rxjs';
import { z } from 'zod';
import { InFlightReply, untilAborted, type ReplyHandle } from './in-flight-reply.js';
import { correlate, createRequestContext, type Correlated, type RequestContext } from './reply-correlator.js';
import {
  buildRequest,
  type HttpMethod,
  type HubRequest,
  type QueryParams,
  type QueryValue,
  type RequestOptions,
} from './request-factory.js';

/** Hard timeout for statistics calls, in ms */
export const STATISTICS_TIMEOUT = 1000;

/**
 * Minimal request init the client hands to its fetch implementation.
 */
export interface FetchInit {
  method: HttpMethod;
  headers: Record<string, string>;
  body?: string;
  signal: AbortSignal;
}

/**
 * Minimal response surface the client reads.
 */
export interface FetchResponse {
  readonly ok: boolean;
  readonly status: number;
  text(): Promise<string>;
}

/**
 * Anything shaped like the global `fetch`. Tests pass an in-process hub.
 * Honouring `init.signal` is optional: the client stops waiting on a call
 * once its signal aborts.
 */
export type FetchLike = (url: string, init: FetchInit) => Promise<FetchResponse>;

/**
 * HubClient configuration
 */
export interface HubClientConfig {
  /** Fetch implementation. @default globalThis.fetch */
  fetch?: FetchLike;
  /** Abort statistics calls after this many ms. @default 1000 */
  statisticsTimeout?: number;
  /** Logger options for structured logging */
  logger?: LoggerOption;
}

/**
 * Outcome of a successful call
 */
export interface HubResult<T> {
  readonly context: RequestContext;
  readonly status: number;
  readonly body: T;
}

/**
 * In-flight call: a ReplyHandle carrying its RequestContext.
 */
export type HubReply<T> = Correlated<ReplyHandle<HubResult<T>>, RequestContext>;

/**
 * Completion event pushed on {@link HubClient.completions}.
 */
export type HubCompletion =
  | { readonly ok: true; readonly context: RequestContext; readonly status: number; readonly body: unknown }
  | { readonly ok: false; readonly context: RequestContext; readonly error: GeoSyncError };

/**
 * Paging and filter parameters for feature reads, merged verbatim into the
 * query string and echoed into the reply context.
 */
export interface FeatureQuery {
  limit?: number;
  /** Cursor returned by the previous page */
  handle?: string;
  tags?: string | readonly string[];
  [param: string]: QueryValue;
}

/**
 * Iterate/search parameters. `replyTag` overrides the context tag and is
 * not sent to the hub.
 */
export interface PagedFeatureQuery extends FeatureQuery {
  replyTag?: string;
}

export type FeaturePage = FeaturePageBody;

export interface SpaceStatistics {
  [key: string]: unknown;
}

export interface SpaceCount {
  count: number;
  estimated?: boolean;
  [key: string]: unknown;
}

const countSchema = z
  .object({ count: z.number(), estimated: z.boolean().optional() })
  .passthrough();

const statisticsSchema = z.record(z.unknown());

const spaceListSchema = z.array(spaceMetadataSchema);

type Decoder<T> = (raw: unknown) => T;

interface CallSpec<T> {
  replyTag: string;
  request: RequestOptions;
  params?: Record<string, unknown>;
  decode: Decoder<T>;
  timeout?: number;
}

const passthrough: Decoder<unknown> = (raw) => raw;

function decodeFeaturePage(raw: unknown): FeaturePage {
  return parseWith(featurePageSchema, raw, 'feature page', 'GEOSYNC_V101');
}

function decodeSpaceList(raw: unknown): SpaceMetadata[] {
  return parseWith(spaceListSchema, raw, 'space list', 'GEOSYNC_V101');
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Client for the feature hub's space and feature endpoints.
 *
 * Every operation returns a {@link HubReply} at once. The reply's
 * `result` settles with the decoded body, and the same outcome is pushed
 * on {@link HubClient.completions} together with the reply's context, so a
 * single handler can serve many concurrent calls.
 *
 * @example
 * ```typescript
 * const client = createHubClient({ logger: { level: 'debug', json: true } });
 * const conn = createConnectionDescriptor({ server: 'https://hub.example.com/hub', spaceId: 'abc', token });
 *
 * client.completions().subscribe((done) => {
 *   if (!done.ok) console.warn(done.context.replyTag, done.context.params, done.error.message);
 * });
 *
 * const { body } = await client.loadFeaturesIterate(conn, { limit: 100 }).result;
 * ```
 */
export class HubClient {
  private readonly fetchImpl: FetchLike;
  private readonly statisticsTimeout: number;
  private readonly logger: Logger;

  private readonly completions$ = new Subject<HubCompletion>();
  private readonly inFlight = new Set<InFlightReply<unknown>>();

  constructor(config: HubClientConfig = {}) {
    this.fetchImpl = config.fetch ?? ((url, init) => fetch(url, init));
    this.statisticsTimeout = config.statisticsTimeout ?? STATISTICS_TIMEOUT;
    this.logger = resolveLogger(config.logger, 'hub-client');
  }

  /**
   * Completion events, one per issued call, in completion order.
   */
  completions(): Observable<HubCompletion> {
    return this.completions$.asObservable();
  }

  /** Number of calls not yet settled */
  pendingCount(): number {
    return this.inFlight.size;
  }

  /** Abort every pending call */
  abortAll(): void {
    for (const reply of [...this.inFlight]) {
      reply.abort();
    }
  }

  /**
   * Abort pending calls and complete the completion stream.
   */
  destroy(): void {
    this.abortAll();
    this.completions$.complete();
  }

  // ── Space calls ─────────────────────────────────────────────────────

  fetchStatistics(conn: ConnectionDescriptor): HubReply<SpaceStatistics> {
    return this.issue(conn, '/spaces/{space_id}/statistics', {
      replyTag: 'statistics',
      request: {},
      decode: (raw) => parseWith(statisticsSchema, raw, 'statistics', 'GEOSYNC_V101'),
      timeout: this.statisticsTimeout,
    });
  }

  fetchCount(conn: ConnectionDescriptor): HubReply<SpaceCount> {
    return this.issue(conn, '/spaces/{space_id}/count', {
      replyTag: 'count',
      request: {},
      decode: (raw) => parseWith(countSchema, raw, 'count', 'GEOSYNC_V101'),
    });
  }

  fetchMeta(conn: ConnectionDescriptor): HubReply<SpaceMetadata> {
    return this.issue(conn, '/spaces/{space_id}', {
      replyTag: 'space_meta',
      request: {},
      decode: parseSpaceMetadata,
    });
  }

  listSpaces(conn: ConnectionDescriptor, includeRights = true): HubReply<SpaceMetadata[]> {
    return this.issue(conn, '/spaces', {
      replyTag: 'spaces',
      request: { query: includeRights ? { includeRights: 'true' } : {} },
      decode: decodeSpaceList,
    });
  }

  addSpace(
    conn: ConnectionDescriptor,
    spaceInfo: Partial<SpaceMetadata> & { title: string }
  ): HubReply<SpaceMetadata> {
    return this.issue(conn, '/spaces', {
      replyTag: 'add_space',
      request: { method: 'POST', body: prepareNewSpaceInfo(spaceInfo), bodyMode: 'json' },
      decode: parseSpaceMetadata,
    });
  }

  editSpace(conn: ConnectionDescriptor, spaceInfo: Partial<SpaceMetadata>): HubReply<SpaceMetadata> {
    return this.issue(conn, '/spaces/{space_id}', {
      replyTag: 'edit_space',
      request: { method: 'PATCH', body: spaceInfo, bodyMode: 'json' },
      decode: parseSpaceMetadata,
    });
  }

  deleteSpace(conn: ConnectionDescriptor): HubReply<unknown> {
    return this.issue(conn, '/spaces/{space_id}', {
      replyTag: 'del_space',
      request: { method: 'DELETE' },
      decode: passthrough,
    });
  }

  // ── Feature reads ───────────────────────────────────────────────────

  loadFeaturesByBbox(
    conn: ConnectionDescriptor,
    bbox: BoundingBox,
    extra: FeatureQuery = {}
  ): HubReply<FeaturePage> {
    return this.issue(conn, '/spaces/{space_id}/bbox', {
      replyTag: 'bbox',
      request: { query: { ...bbox, ...extra } },
      params: { ...extra, bbox: { ...bbox } },
      decode: decodeFeaturePage,
    });
  }

  loadFeaturesByTile(
    conn: ConnectionDescriptor,
    tileId = '0',
    tileSchema = 'quadkey',
    extra: FeatureQuery = {}
  ): HubReply<FeaturePage> {
    const endpoint = `/spaces/{space_id}/tile/${encodeURIComponent(tileSchema)}/${encodeURIComponent(tileId)}`;
    return this.issue(conn, endpoint, {
      replyTag: 'tile',
      request: { query: extra },
      params: { ...extra, tileId, tileSchema },
      decode: decodeFeaturePage,
    });
  }

  /**
   * One page of the space's features in hub order. Follow `body.handle`
   * with the next call to get the following page.
   */
  loadFeaturesIterate(conn: ConnectionDescriptor, extra: PagedFeatureQuery = {}): HubReply<FeaturePage> {
    return this.loadFeaturesEndpoint(conn, '/spaces/{space_id}/iterate', 'iterate', extra);
  }

  loadFeaturesSearch(conn: ConnectionDescriptor, extra: PagedFeatureQuery = {}): HubReply<FeaturePage> {
    return this.loadFeaturesEndpoint(conn, '/spaces/{space_id}/search', 'search', extra);
  }

  // ── Feature writes ──────────────────────────────────────────────────

  /**
   * Create or merge: an existing feature is augmented with the payload.
   */
  addFeatures(
    conn: ConnectionDescriptor,
    features: readonly Feature[],
    extra: FeatureQuery = {}
  ): HubReply<FeaturePage> {
    return this.writeFeatures(conn, 'POST', features, extra);
  }

  modifyFeatures(
    conn: ConnectionDescriptor,
    features: readonly Feature[],
    extra: FeatureQuery = {}
  ): HubReply<FeaturePage> {
    return this.addFeatures(conn, features, extra);
  }

  /**
   * Create or replace: an existing feature's attributes are wholly replaced.
   */
  replaceFeatures(
    conn: ConnectionDescriptor,
    features: readonly Feature[],
    extra: FeatureQuery = {}
  ): HubReply<FeaturePage> {
    return this.writeFeatures(conn, 'PUT', features, extra);
  }

  /**
   * Delete features by id.
   *
   * @throws GeoSyncError (GEOSYNC_R201) for an empty id list
   */
  deleteFeatures(
    conn: ConnectionDescriptor,
    ids: readonly (string | number)[],
    extra: QueryParams = {}
  ): HubReply<unknown> {
    if (ids.length === 0) {
      throw new GeoSyncError({
        code: 'GEOSYNC_R201',
        message: 'deleteFeatures needs at least one feature id',
        context: { spaceId: conn.spaceId },
      });
    }
    const query: QueryParams = { ...extra, id: ids };
    return this.issue(conn, '/spaces/{space_id}/features', {
      replyTag: 'del_feat',
      request: { method: 'DELETE', query },
      params: { ...query },
      decode: passthrough,
    });
  }

  // ── Private ─────────────────────────────────────────────────────────

  private loadFeaturesEndpoint(
    conn: ConnectionDescriptor,
    endpoint: string,
    defaultTag: string,
    extra: PagedFeatureQuery
  ): HubReply<FeaturePage> {
    const { replyTag, ...query } = extra;
    return this.issue(conn, endpoint, {
      replyTag: replyTag ?? defaultTag,
      request: { query },
      params: { ...query },
      decode: decodeFeaturePage,
    });
  }

  private writeFeatures(
    conn: ConnectionDescriptor,
    method: 'POST' | 'PUT',
    features: readonly Feature[],
    extra: FeatureQuery
  ): HubReply<FeaturePage> {
    const { tags, ...rest } = extra;
    const query: QueryParams = tags !== undefined ? { ...rest, addTags: tags } : rest;
    return this.issue(conn, '/spaces/{space_id}/features', {
      replyTag: 'add_feat',
      request: { method, query, body: features, bodyMode: 'geo' },
      params: { ...query },
      decode: decodeFeaturePage,
    });
  }

  private issue<T>(conn: ConnectionDescriptor, endpoint: string, call: CallSpec<T>): HubReply<T> {
    const request = buildRequest(conn, endpoint, call.request);
    const context = createRequestContext({
      replyTag: call.replyTag,
      connection: conn,
      params: call.params ?? {},
      method: request.method,
      url: request.url,
    });

    const inFlight = new InFlightReply<HubResult<T>>((signal) =>
      this.execute(request, context, signal, call.decode)
    );
    const reply = correlate(inFlight, context);

    this.inFlight.add(inFlight);
    this.logger.debug('Request issued', {
      replyTag: context.replyTag,
      method: request.method,
      url: request.url,
    });

    if (call.timeout !== undefined) {
      const timer = setTimeout(() => inFlight.abort('timeout'), call.timeout);
      inFlight.onSettled(() => clearTimeout(timer));
    }

    reply.result.then(
      (result) => {
        this.inFlight.delete(inFlight);
        this.completions$.next({
          ok: true,
          context: reply.context,
          status: result.status,
          body: result.body,
        });
      },
      (error: unknown) => {
        this.inFlight.delete(inFlight);
        const failure =
          error instanceof GeoSyncError ? error : GeoSyncError.wrap(toError(error), 'GEOSYNC_X900');
        this.logger.warn('Request failed', {
          replyTag: context.replyTag,
          url: request.url,
          code: failure.code,
          message: failure.message,
        });
        this.completions$.next({ ok: false, context: reply.context, error: failure });
      }
    );

    return reply;
  }

  private async execute<T>(
    request: HubRequest,
    context: RequestContext,
    signal: AbortSignal,
    decode: Decoder<T>
  ): Promise<HubResult<T>> {
    let status: number;
    let text: string;
    try {
      const response = await untilAborted(
        this.fetchImpl(request.url, {
          method: request.method,
          headers: { ...request.headers },
          ...(request.body !== undefined ? { body: request.body } : {}),
          signal,
        }),
        signal
      );
      status = response.status;
      if (!response.ok) {
        throw new TransportFailureError('http', context.replyTag, { ...context.params }, {
          message: `Hub replied ${response.status} to "${context.replyTag}"`,
          statusCode: response.status,
          url: request.url,
        });
      }
      text = await untilAborted(response.text(), signal);
    } catch (error) {
      if (error instanceof TransportFailureError) throw error;
      const reason = signal.aborted ? (signal.reason === 'timeout' ? 'timeout' : 'aborted') : 'network';
      throw new TransportFailureError(reason, context.replyTag, { ...context.params }, {
        url: request.url,
        cause: toError(error),
      });
    }

    return { context, status, body: decode(this.parseBody(text, context)) };
  }

  private parseBody(text: string, context: RequestContext): unknown {
    if (text.trim().length === 0) return null;
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new ValidationError(
        `${context.replyTag} reply body`,
        [{ path: '', message: toError(error).message }],
        'GEOSYNC_V101'
      );
    }
  }
}

/**
 * Create a hub client.
 */
export function createHubClient(config?: HubClientConfig): HubClient {
  return new HubClient(config);
}
