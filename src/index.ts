/**
 * mirth-rest-client
 *
 * Typed asynchronous client for the Mirth Connect REST API.
 */

export { MirthApi, buildQueryString, extractSessionCookie } from './client/MirthApi.js';
export type {
  EventQuery,
  MirthApiOptions,
  MirthResponse,
  PostOptions,
  QueryParams,
  QueryValue,
  RequestOptions,
} from './client/MirthApi.js';
export { Channel, raisePostErrors } from './client/Channel.js';
export type { ChannelCommand, ChannelMetadata, MessageQuery, PostMessageOptions } from './client/Channel.js';
export {
  MirthApiError,
  MirthError,
  MirthLoginError,
  MirthParseError,
  MirthPostError,
  MirthValidationError,
} from './client/errors.js';
export { compareVersions, supportsMessagesWithObj } from './client/version.js';
export { loadClientConfig, clientConfigSchema, DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS } from './config/ClientConfig.js';
export type { ClientConfig, ClientConfigInput } from './config/ClientConfig.js';
export * from './models/index.js';
export { getLogger, initializeLogging, LogLevel, setGlobalLevel, shutdownLogging } from './logging/index.js';
export type { Logger } from './logging/index.js';
