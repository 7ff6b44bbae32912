/**
 * Request routing for the Backblaze B2 storage driver
 */

export {
  FILE_PATH_PREFIX,
  apiPathPrefix,
  buildHttpRequest,
  buildQueryString,
  resolveTarget,
  usesSessionToken,
  type JsonBody,
  type QueryParams,
  type QueryValue,
  type RequestTarget,
  type ResolvedTarget,
  type RoutingContext,
  type TargetKind,
} from './target.js';

export { RequestRouter, type RequestRouterOptions } from './router.js';
