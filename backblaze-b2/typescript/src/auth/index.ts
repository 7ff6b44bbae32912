/**
 * Authentication for the Backblaze B2 storage driver
 */

export type { B2Credentials, SessionInfo, SessionState } from './types.js';

export {
  AuthSession,
  AUTHORIZE_ACCOUNT_ACTION,
  basicAuthorization,
  type AuthSessionOptions,
} from './session.js';
