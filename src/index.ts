export { TokenAcquirer, parseToken, OAUTH_ADS_SCOPES, OAUTH_AGENCY_SCOPES, OAUTH_MANAGER_SCOPES } from './services/auth.js';
export { TargetApiClient, normalizeResource } from './services/api.js';
export { resolveEndpoint, PRODUCTION_HOST, SANDBOX_HOST } from './services/endpoint.js';
export { ConfigService, createClientConfig, getConfigService, DEFAULT_TIMEOUT_MS } from './services/config.js';
export {
  TargetClientError,
  ConfigError,
  NetworkError,
  MalformedResponseError,
  TargetApiError,
  AuthError,
  ValidationError,
} from './services/errors.js';
export { StructuredLogger, loggers, createComponentLogger } from './lib/logger.js';
export type { LogContext, LogEntry, LogLevel, LoggerConfig } from './lib/logger.js';
export type { Token, GrantType, ClientCredentials, AuthorizeUrl, RequestOptions } from './types/auth.js';
export type { ClientConfig, ClientConfigOptions, EndpointConfig, AppConfig } from './types/config.js';
export type { HttpMethod, QueryValue, ResourceRequestOptions, LeadFilters, Lead, LeadsResponse } from './types/api.js';
