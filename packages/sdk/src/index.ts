// @outline-admin/sdk - TypeScript client for the proxy server management API

export const VERSION = '0.1.0';

// Client
export { OutlineAdminClient } from './client.js';
export type { ClientOptions, ClientOverrides } from './client.js';

// Response handling
export {
  AccessKeySchema,
  AccessKeyListSchema,
  DataLimitSchema,
  classify,
  expectStatus,
  parseBody,
  type AccessKey,
  type AccessKeyList,
} from './classifier.js';

// Configuration & logging
export {
  ConfigSchema,
  parseConfig,
  loadConfig,
  loadConfigSafe,
  validateTlsConfig,
  getConfig,
  setConfig,
  resetConfig,
  type Config,
} from './config.js';
export { initLogger, getLogger } from './logger.js';

// Errors
export {
  OutlineApiError,
  UrlError,
  ConfigError,
  TransportError,
  TimeoutError,
  ServerError,
  ParseError,
  isOutlineApiError,
} from '@outline-admin/core';

// Re-export types from core for convenience
export type {
  AccessKeyParams,
  CreateAccessKeyParams,
  UpdateAccessKeyParams,
  HttpExchangeResult,
  TransportStage,
  TlsTrustOptions,
  Connector,
  ExchangeSession,
} from '@outline-admin/core';
