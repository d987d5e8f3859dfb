import { connectionSchema, parseWith } from '../validation/schemas.js';

/**
 * Identifies a remote space: hub base URL, space id, credential and any
 * custom headers. Frozen once built; passed by reference into every call.
 */
export interface ConnectionDescriptor {
  readonly server: string;
  readonly spaceId?: string;
  readonly token?: string;
  readonly headers?: Readonly<Record<string, string>>;
}

/** Plain JSON form, credentials included */
export interface ConnectionJSON {
  server: string;
  spaceId?: string;
  token?: string;
  headers?: Record<string, string>;
}

function freeze(json: ConnectionJSON): ConnectionDescriptor {
  return Object.freeze({
    server: json.server,
    ...(json.spaceId !== undefined ? { spaceId: json.spaceId } : {}),
    ...(json.token !== undefined ? { token: json.token } : {}),
    ...(json.headers !== undefined ? { headers: Object.freeze({ ...json.headers }) } : {}),
  });
}

/**
 * Build a connection descriptor.
 *
 * @throws ValidationError when `server` is not a URL
 */
export function createConnectionDescriptor(init: ConnectionJSON): ConnectionDescriptor {
  return freeze(parseWith(connectionSchema, init, 'connection descriptor'));
}

/** Same hub and credentials, another space */
export function withSpace(conn: ConnectionDescriptor, spaceId: string): ConnectionDescriptor {
  return createConnectionDescriptor({ ...connectionToJSON(conn), spaceId });
}

export function connectionToJSON(conn: ConnectionDescriptor): ConnectionJSON {
  return {
    server: conn.server,
    ...(conn.spaceId !== undefined ? { spaceId: conn.spaceId } : {}),
    ...(conn.token !== undefined ? { token: conn.token } : {}),
    ...(conn.headers !== undefined ? { headers: { ...conn.headers } } : {}),
  };
}

export function connectionFromJSON(value: unknown): ConnectionDescriptor {
  return freeze(parseWith(connectionSchema, value, 'connection descriptor'));
}
