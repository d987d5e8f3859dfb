import {
  InvalidEndpointError,
  type ConnectionDescriptor,
  type Feature,
  type FeatureCollection,
} from '@geosync/core';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/**
 * A query value. Lists are sent comma-joined; `null`/`undefined` are skipped.
 */
export type QueryValue =
  | string
  | number
  | boolean
  | readonly (string | number)[]
  | null
  | undefined;

export type QueryParams = Readonly<Record<string, QueryValue>>;

/**
 * How a write body is serialized.
 *
 * - `geo`: features wrapped in a GeoJSON FeatureCollection
 * - `json`: the value as plain JSON (space metadata)
 */
export type BodyMode = 'geo' | 'json';

export interface RequestOptions {
  /** @default 'GET' */
  method?: HttpMethod;
  query?: QueryParams;
  body?: unknown;
  /** Required whenever `body` is given */
  bodyMode?: BodyMode;
}

/**
 * Fully resolved request, ready for the transport.
 */
export interface HubRequest {
  readonly method: HttpMethod;
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly body?: string;
}

const SPACE_PLACEHOLDER = '{space_id}';
const UNRESOLVED_PLACEHOLDER = /\{[^}]*\}/;

const CONTENT_TYPES: Record<BodyMode, string> = {
  geo: 'application/geo+json',
  json: 'application/json',
};

/**
 * Substitute `{space_id}` in an endpoint template.
 *
 * @throws InvalidEndpointError when the connection has no space id but the
 * template needs one, or when another placeholder is left
 */
export function resolveEndpoint(conn: ConnectionDescriptor, endpoint: string): string {
  if (!endpoint.startsWith('/')) {
    throw new InvalidEndpointError(endpoint, 'endpoint must start with "/"');
  }

  let path = endpoint;
  if (path.includes(SPACE_PLACEHOLDER)) {
    if (!conn.spaceId) {
      throw new InvalidEndpointError(endpoint, 'connection descriptor has no space id', {
        server: conn.server,
      });
    }
    path = path.split(SPACE_PLACEHOLDER).join(encodeURIComponent(conn.spaceId));
  }

  const leftover = UNRESOLVED_PLACEHOLDER.exec(path);
  if (leftover) {
    throw new InvalidEndpointError(endpoint, `unresolved placeholder ${leftover[0]}`);
  }
  return path;
}

/**
 * Serialize query parameters in insertion order. List values become
 * comma-joined strings with each element percent-encoded, so `["f1","f2"]`
 * is sent as `f1,f2`.
 */
export function serializeQuery(query: QueryParams = {}): string {
  const parts: string[] = [];
  for (const [key, value] of Object.entries(query)) {
    if (value === undefined || value === null) continue;
    const encoded = Array.isArray(value)
      ? value.map((item) => encodeURIComponent(String(item))).join(',')
      : encodeURIComponent(String(value));
    parts.push(`${encodeURIComponent(key)}=${encoded}`);
  }
  return parts.join('&');
}

function isFeatureList(body: unknown): body is readonly Feature[] {
  return Array.isArray(body);
}

/**
 * Serialize a write body in the requested mode.
 */
export function serializeBody(body: unknown, mode: BodyMode): string {
  if (mode === 'json') {
    return JSON.stringify(body);
  }
  if (isFeatureList(body)) {
    const collection: FeatureCollection = { type: 'FeatureCollection', features: [...body] };
    return JSON.stringify(collection);
  }
  return JSON.stringify(body);
}

function baseUrl(conn: ConnectionDescriptor, endpoint: string): string {
  let parsed: URL;
  try {
    parsed = new URL(conn.server);
  } catch {
    throw new InvalidEndpointError(endpoint, `server "${conn.server}" is not a URL`);
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new InvalidEndpointError(endpoint, `unsupported protocol ${parsed.protocol}`);
  }
  return conn.server.replace(/\/+$/, '');
}

/**
 * Build a request for `endpoint` against the connection's hub. Pure: no
 * network I/O, inputs are never mutated.
 *
 * @example
 * ```typescript
 * const request = buildRequest(conn, '/spaces/{space_id}/features', {
 *   method: 'DELETE',
 *   query: { id: ['f1', 'f2'] },
 * });
 * // request.url === 'https://hub.example.com/spaces/abc/features?id=f1,f2'
 * ```
 */
export function buildRequest(
  conn: ConnectionDescriptor,
  endpoint: string,
  options: RequestOptions = {}
): HubRequest {
  const path = resolveEndpoint(conn, endpoint);
  const query = serializeQuery(options.query);
  const url = `${baseUrl(conn, endpoint)}${path}${query ? `?${query}` : ''}`;

  const headers: Record<string, string> = {
    Accept: 'application/json',
  };

  let body: string | undefined;
  if (options.body !== undefined) {
    if (!options.bodyMode) {
      throw new InvalidEndpointError(endpoint, 'a request body needs an explicit body mode');
    }
    body = serializeBody(options.body, options.bodyMode);
    headers['Content-Type'] = CONTENT_TYPES[options.bodyMode];
  }

  if (conn.token) {
    headers.Authorization = `Bearer ${conn.token}`;
  }

  Object.assign(headers, conn.headers);

  return {
    method: options.method ?? 'GET',
    url,
    headers,
    ...(body !== undefined ? { body } : {}),
  };
}
