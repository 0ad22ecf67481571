export { FitbitClient, ConfigSource, joinUrl, USER_AGENT } from "./lib/client.js";
export type { FitbitClientOptions, NewClientOptions } from "./lib/client.js";
export {
  StaticTokenSupplier,
  RefreshingTokenSupplier,
  buildAuthorizationUrl,
  exchangeAuthorizationCode,
  refreshAccessToken,
  DEFAULT_AUTH_URL,
  DEFAULT_TOKEN_URL,
  DEFAULT_SCOPES,
} from "./lib/oauth.js";
export type {
  TokenSupplier,
  TokenEndpointOptions,
  RefreshingTokenSupplierOptions,
} from "./lib/oauth.js";
export {
  FitbitError,
  MalformedInputError,
  TransportError,
  RequestFailedError,
  DecodeError,
} from "./lib/errors.js";
export { DEFAULT_API_BASE_URL, oauthConfigFromEnv, apiBaseUrlFromEnv } from "./lib/env.js";
export { formatDay, getTodayDate } from "./lib/date-utils.js";
export { logger, fitbitLogger, createLoggerWithDestination } from "./lib/logger.js";
export type { Logger, LogLevel } from "./lib/logger.js";
export type * from "./types/index.js";
