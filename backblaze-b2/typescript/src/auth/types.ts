/**
 * Authentication types for the Backblaze B2 storage driver
 * @module backblaze-b2/auth/types
 */

/**
 * Application key pair used for the Basic-auth handshake.
 */
export interface B2Credentials {
  readonly applicationKeyId: string;
  readonly applicationKey: string;
}

/**
 * Session obtained from one successful b2_authorize_account call.
 * All fields come from the same handshake.
 */
export interface SessionInfo {
  readonly accountId: string;
  readonly apiUrl: string;
  /** Authority (host[:port]) of apiUrl */
  readonly apiHost: string;
  readonly downloadUrl: string;
  /** Authority (host[:port]) of downloadUrl */
  readonly downloadHost: string;
  readonly authToken: string;
}

/**
 * Session lifecycle. A handshake in flight is shared by every caller that
 * arrives while it runs.
 */
export type SessionState =
  | { readonly status: 'unauthenticated' }
  | { readonly status: 'authenticating'; readonly pending: Promise<SessionInfo> }
  | { readonly status: 'authenticated'; readonly session: SessionInfo };
