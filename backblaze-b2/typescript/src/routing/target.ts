/**
 * Request targets and the routing table that maps them to hosts
 * @module backblaze-b2/routing/target
 */

import type { SessionInfo } from '../auth/types.js';
import type { HttpMethod, HttpRequest } from '../transport/index.js';
import { omitHeaders } from '../transport/index.js';
import { AuthenticationError } from '../errors/index.js';

/**
 * Path prefix of file-serving requests on the download host.
 */
export const FILE_PATH_PREFIX = '/file/';

export type QueryValue = string | number | boolean | undefined;

export type QueryParams = Record<string, QueryValue>;

export type JsonBody = Record<string, unknown>;

/**
 * Where a request goes. Each kind fixes its host, path shape, token and body
 * encoding; nothing is inferred from flag combinations.
 */
export type RequestTarget =
  /** b2_authorize_account on the fixed control host, Basic auth */
  | {
      readonly kind: 'control';
      readonly action: string;
      readonly authorization: string;
    }
  /** Version-prefixed JSON call on the API host with the session token */
  | {
      readonly kind: 'api';
      readonly method: HttpMethod;
      readonly action: string;
      readonly params?: QueryParams;
      readonly data?: JsonBody;
      /** GET: adds accountId to the query. POST: adds it to the body. */
      readonly includeAccountId?: boolean;
    }
  /** b2_get_upload_url for one bucket */
  | {
      readonly kind: 'uploadTicketFetch';
      readonly bucketId: string;
    }
  /** Raw GET on the download host under /file/ */
  | {
      readonly kind: 'download';
      readonly action: string;
    }
  /** Raw POST to the ticket's host and path with the ticket's token */
  | {
      readonly kind: 'uploadPut';
      readonly host: string;
      readonly path: string;
      readonly token: string;
      readonly body: Uint8Array;
    };

export type TargetKind = RequestTarget['kind'];

export interface RoutingContext {
  /** Control host for the handshake */
  readonly authHost: string;
  /** Version segment, e.g. v1 */
  readonly apiVersion: string;
}

/**
 * Host, path and credentials a target resolves to.
 */
export interface ResolvedTarget {
  readonly method: HttpMethod;
  readonly host: string;
  readonly path: string;
  readonly authorization: string;
}

export function apiPathPrefix(apiVersion: string): string {
  return `/b2api/${apiVersion}/`;
}

/**
 * Targets that carry the session token, and therefore invalidate the session
 * when rejected with 401.
 */
export function usesSessionToken(target: RequestTarget): boolean {
  return target.kind === 'api' || target.kind === 'uploadTicketFetch' || target.kind === 'download';
}

function requireSession(session: SessionInfo | undefined, kind: TargetKind): SessionInfo {
  if (!session) {
    throw new AuthenticationError({
      message: `A ${kind} request needs an authenticated session`,
      code: 'NOT_AUTHENTICATED',
    });
  }
  return session;
}

/**
 * Resolves host, path and authorization for a target.
 *
 * @throws {AuthenticationError} If the target needs a session and none is given
 */
export function resolveTarget(
  target: RequestTarget,
  context: RoutingContext,
  session?: SessionInfo
): ResolvedTarget {
  const prefix = apiPathPrefix(context.apiVersion);

  switch (target.kind) {
    case 'control':
      return {
        method: 'GET',
        host: context.authHost,
        path: prefix + target.action,
        authorization: target.authorization,
      };
    case 'api': {
      const current = requireSession(session, target.kind);
      return {
        method: target.method,
        host: current.apiHost,
        path: prefix + target.action,
        authorization: current.authToken,
      };
    }
    case 'uploadTicketFetch': {
      const current = requireSession(session, target.kind);
      return {
        method: 'GET',
        host: current.apiHost,
        path: prefix + 'b2_get_upload_url',
        authorization: current.authToken,
      };
    }
    case 'download': {
      const current = requireSession(session, target.kind);
      return {
        method: 'GET',
        host: current.downloadHost,
        path: FILE_PATH_PREFIX + target.action,
        authorization: current.authToken,
      };
    }
    case 'uploadPut':
      return {
        method: 'POST',
        host: target.host,
        path: target.path,
        authorization: target.token,
      };
  }
}

export function buildQueryString(params: QueryParams): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      search.append(key, String(value));
    }
  }
  const query = search.toString();
  return query ? `?${query}` : '';
}

/**
 * Builds the transport request for a target: resolves the route, injects the
 * account id where asked, and shapes the body.
 *
 * @throws {AuthenticationError} If the target needs a session and none is given
 */
export function buildHttpRequest(
  target: RequestTarget,
  context: RoutingContext,
  session?: SessionInfo,
  extraHeaders: Record<string, string> = {}
): HttpRequest {
  const resolved = resolveTarget(target, context, session);
  const headers: Record<string, string> = {
    ...omitHeaders(extraHeaders, ['Authorization']),
    Authorization: resolved.authorization,
  };

  let params: QueryParams = {};
  let body: Uint8Array | string | undefined;

  switch (target.kind) {
    case 'api': {
      params = { ...target.params };
      let data = target.data;

      if (target.includeAccountId && session) {
        if (target.method === 'GET') {
          params.accountId = session.accountId;
        } else {
          data = { ...data, accountId: session.accountId };
        }
      }

      if (data !== undefined) {
        headers['Content-Type'] = 'application/json';
        body = JSON.stringify(data);
      }
      break;
    }
    case 'uploadTicketFetch':
      params = { bucketId: target.bucketId };
      break;
    case 'uploadPut':
      body = target.body;
      break;
    case 'control':
    case 'download':
      break;
  }

  return {
    method: resolved.method,
    url: `https://${resolved.host}${resolved.path}${buildQueryString(params)}`,
    headers,
    body,
  };
}
