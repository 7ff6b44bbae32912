/**
 * Authentication session for the Backblaze B2 storage driver
 * @module backblaze-b2/auth/session
 */

import type { HttpTransport } from '../transport/index.js';
import type { Logger } from '../observability/index.js';
import { NoopLogger } from '../observability/index.js';
import { AuthenticationError, decodeBody, parseErrorBody } from '../errors/index.js';
import { authorizeAccountSchema } from '../types/index.js';
import { buildHttpRequest, type RoutingContext } from '../routing/target.js';
import type { B2Credentials, SessionInfo, SessionState } from './types.js';

export const AUTHORIZE_ACCOUNT_ACTION = 'b2_authorize_account';

export interface AuthSessionOptions {
  credentials: B2Credentials;
  routing: RoutingContext;
  transport: HttpTransport;
  logger?: Logger;
}

/**
 * Builds the Basic authorization header for the handshake.
 */
export function basicAuthorization(credentials: B2Credentials): string {
  const encoded = Buffer.from(
    `${credentials.applicationKeyId}:${credentials.applicationKey}`
  ).toString('base64');
  return `Basic ${encoded}`;
}

/**
 * Owns the account id, resolved hosts and token of one B2 session.
 *
 * State moves Unauthenticated → Authenticating → Authenticated. It goes back
 * to Unauthenticated when a handshake fails or a call observes a 401, and
 * back to Authenticating on an explicit forced refresh.
 */
export class AuthSession {
  private readonly credentials: B2Credentials;
  private readonly routing: RoutingContext;
  private readonly transport: HttpTransport;
  private readonly logger: Logger;

  private state: SessionState = { status: 'unauthenticated' };

  constructor(options: AuthSessionOptions) {
    this.credentials = options.credentials;
    this.routing = options.routing;
    this.transport = options.transport;
    this.logger = options.logger ?? new NoopLogger();
  }

  get status(): SessionState['status'] {
    return this.state.status;
  }

  /**
   * The current session, if authenticated.
   */
  current(): SessionInfo | undefined {
    return this.state.status === 'authenticated' ? this.state.session : undefined;
  }

  /**
   * Ensures a session exists.
   *
   * Resolves immediately when already authenticated and `force` is false.
   * Callers arriving while a handshake runs wait for that handshake instead of
   * starting another one.
   *
   * @throws {AuthenticationError} If the handshake is rejected
   */
  async authenticate(force: boolean = false): Promise<SessionInfo> {
    if (this.state.status === 'authenticating') {
      return this.state.pending;
    }

    if (this.state.status === 'authenticated' && !force) {
      return this.state.session;
    }

    const pending = this.handshake();
    this.state = { status: 'authenticating', pending };

    try {
      const session = await pending;
      this.state = { status: 'authenticated', session };
      return session;
    } catch (error) {
      this.state = { status: 'unauthenticated' };
      throw error;
    }
  }

  /**
   * Drops the current session so the next call handshakes again.
   * A handshake already in flight is left to finish.
   *
   * @param authToken - When given, the session is dropped only if it still
   *   holds this token
   */
  invalidate(authToken?: string): void {
    if (
      this.state.status === 'authenticated' &&
      (authToken === undefined || this.state.session.authToken === authToken)
    ) {
      this.logger.info('Session invalidated');
      this.state = { status: 'unauthenticated' };
    }
  }

  private async handshake(): Promise<SessionInfo> {
    const request = buildHttpRequest(
      {
        kind: 'control',
        action: AUTHORIZE_ACCOUNT_ACTION,
        authorization: basicAuthorization(this.credentials),
      },
      this.routing
    );

    this.logger.debug('Authorizing account', { host: this.routing.authHost });
    const response = await this.transport.send(request);
    const text = decodeBody(response.body);

    if (response.status !== 200) {
      const parsed = parseErrorBody(text);
      this.logger.warn('Account authorization rejected', {
        status: response.status,
        code: parsed.code,
      });
      throw AuthenticationError.handshakeFailed(response.status, parsed.message ?? text, parsed.code);
    }

    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch {
      throw AuthenticationError.invalidResponse('body is not JSON');
    }

    const result = authorizeAccountSchema.safeParse(payload);
    if (!result.success) {
      throw AuthenticationError.invalidResponse(result.error.issues[0]?.message ?? 'unexpected shape');
    }

    const data = result.data;
    const session: SessionInfo = {
      accountId: data.accountId,
      apiUrl: data.apiUrl,
      apiHost: new URL(data.apiUrl).host,
      downloadUrl: data.downloadUrl,
      downloadHost: new URL(data.downloadUrl).host,
      authToken: data.authorizationToken,
    };

    this.logger.info('Account authorized', {
      accountId: session.accountId,
      apiHost: session.apiHost,
      downloadHost: session.downloadHost,
    });

    return session;
  }
}
