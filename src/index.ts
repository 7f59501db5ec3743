/**
 * OpenADR 3 client library
 */

export {
  TokenProvider,
  DEFAULT_LEEWAY_SECONDS,
  DEFAULT_TOKEN_TIMEOUT_MS,
  DEFAULT_EXPIRES_IN_SECONDS,
} from './services/token-provider.js';
export type {
  AccessToken,
  AccessTokenSource,
  ClientAuthMethod,
  TokenProviderConfig,
  TokenResponse,
  TokenStatus,
} from './types/auth.js';

export {
  OpenADRError,
  ConfigurationError,
  AuthenticationError,
  TokenTransportError,
  VtnRequestError,
  ModelValidationError,
  CreationGuardError,
  ConversionError,
  exitCodeFor,
} from './lib/errors.js';
export type { OpenADRErrorCode, ValidationIssue, RowError } from './lib/errors.js';

export { ConfigService, getConfigService, parseScopes, ENV_KEYS } from './services/config.js';
export type { AppConfig, ConfigKey } from './types/config.js';

export * from './models/index.js';

export { HttpInterface, buildQuery, type HttpInterfaceOptions } from './services/vtn/http-interface.js';
export { AuthReadOnlyHttpInterface } from './services/vtn/auth.js';
export { EventsHttpInterface, EventsReadOnlyHttpInterface } from './services/vtn/events.js';
export { ProgramsHttpInterface, ProgramsReadOnlyHttpInterface } from './services/vtn/programs.js';
export { ReportsHttpInterface, ReportsReadOnlyHttpInterface } from './services/vtn/reports.js';
export { VensHttpInterface, VensReadOnlyHttpInterface } from './services/vtn/vens.js';
export { SubscriptionsHttpInterface, SubscriptionsReadOnlyHttpInterface } from './services/vtn/subscriptions.js';
export type * from './services/vtn/interfaces.js';

export {
  createBusinessLogicHttpClient,
  createVirtualEndNodeHttpClient,
  createBusinessLogicClientFromConfig,
  createVirtualEndNodeClientFromConfig,
  clientOptionsFromConfig,
} from './services/clients.js';
export type {
  BusinessLogicClient,
  BusinessLogicClientOptions,
  VirtualEndNodeClient,
  VirtualEndNodeClientOptions,
} from './services/clients.js';

export {
  DictEventIntervalConverter,
  TableEventIntervalConverter,
  DictEventIntervalOutputConverter,
  TableEventIntervalOutputConverter,
} from './lib/interval-converter.js';
export type { EventIntervalRow, EventIntervalTable } from './lib/interval-converter.js';
export { parseCsv, toCsv } from './lib/csv.js';

export { StructuredLogger, loggers, setLogLevel } from './lib/logger.js';
export type { LogLevel, LogEntry, LogContext, LoggerConfig } from './lib/logger.js';
export { metricsRegistry, getMetricsSnapshot, getMetricsContentType, resetMetrics } from './lib/metrics.js';
