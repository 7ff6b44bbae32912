/**
 * Request routing for the Backblaze B2 storage driver
 * @module backblaze-b2/routing/router
 */

import type { AuthSession, SessionInfo } from '../auth/index.js';
import type {
  HttpRequest,
  HttpResponse,
  HttpTransport,
  StreamingHttpResponse,
} from '../transport/index.js';
import { collectBody } from '../transport/index.js';
import type { Logger } from '../observability/index.js';
import { NoopLogger } from '../observability/index.js';
import {
  AuthenticationError,
  classifyResponse,
  decodeBody,
  parseErrorBody,
} from '../errors/index.js';
import {
  buildHttpRequest,
  usesSessionToken,
  type RequestTarget,
  type RoutingContext,
} from './target.js';

export interface RequestRouterOptions {
  session: AuthSession;
  transport: HttpTransport;
  routing: RoutingContext;
  logger?: Logger;
}

/**
 * Sends each request to the host its target resolves to, with the matching
 * token, authenticating first when no session exists.
 *
 * A 401 on a session-token target drops the session it was sent with and raises
 * {@link AuthenticationError}; every other status is returned to the caller.
 */
export class RequestRouter {
  private readonly session: AuthSession;
  private readonly transport: HttpTransport;
  private readonly routing: RoutingContext;
  private readonly logger: Logger;

  constructor(options: RequestRouterOptions) {
    this.session = options.session;
    this.transport = options.transport;
    this.routing = options.routing;
    this.logger = options.logger ?? new NoopLogger();
  }

  /**
   * Sends a request and buffers the response body.
   */
  async request(target: RequestTarget, headers?: Record<string, string>): Promise<HttpResponse> {
    const { request, session } = await this.prepare(target, headers);
    const response = await this.transport.send(request);

    this.logger.debug('B2 response', {
      kind: target.kind,
      method: request.method,
      url: request.url,
      status: response.status,
    });

    if (usesSessionToken(target)) {
      const outcome = classifyResponse(response);
      if (outcome.kind === 'auth_failure') {
        this.rejectSession(session, outcome.message, outcome.code);
      }
    }

    return response;
  }

  /**
   * Sends a request and returns the body as a stream.
   */
  async stream(
    target: RequestTarget,
    headers?: Record<string, string>
  ): Promise<StreamingHttpResponse> {
    const { request, session } = await this.prepare(target, headers);
    const response = await this.transport.sendStreaming(request);

    this.logger.debug('B2 streaming response', {
      kind: target.kind,
      method: request.method,
      url: request.url,
      status: response.status,
    });

    if (response.status === 401 && usesSessionToken(target)) {
      const text = decodeBody(await collectBody(response.body));
      const parsed = parseErrorBody(text);
      this.rejectSession(session, parsed.message ?? text, parsed.code);
    }

    return response;
  }

  private async prepare(
    target: RequestTarget,
    headers?: Record<string, string>
  ): Promise<{ request: HttpRequest; session?: SessionInfo }> {
    const session = target.kind === 'control' ? undefined : await this.session.authenticate();
    const request = buildHttpRequest(target, this.routing, session, headers);

    this.logger.debug('B2 request', {
      kind: target.kind,
      method: request.method,
      url: request.url,
    });

    return { request, session };
  }

  /**
   * Drops the session the rejected request was sent with. A session installed
   * since then by a forced refresh is kept.
   */
  private rejectSession(sent: SessionInfo | undefined, message: string, code?: string): never {
    if (sent) {
      this.session.invalidate(sent.authToken);
    }
    this.logger.warn('B2 rejected the session token', { code });
    throw AuthenticationError.unauthorized(message, code);
  }
}
