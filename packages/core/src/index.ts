// @outline-admin/core - URL resolution, HTTP codec and TLS transport

export const VERSION = '0.1.0';

// Types
export type {
  HttpVerb,
  ApiUrl,
  EndpointTemplate,
  PlaceholderMap,
  HttpExchangeResult,
  TransportStage,
  AccessKeyParams,
  CreateAccessKeyParams,
  UpdateAccessKeyParams,
  AccessKeyBody,
  JsonValue,
} from './types.js';

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
} from './errors.js';

// Endpoint resolution
export {
  parseApiUrl,
  resolveEndpoint,
  substitutePlaceholders,
  formatTarget,
  formatHostHeader,
  formatApiUrl,
  type ResolveOptions,
} from './url.js';
export { Endpoints, UrlParams, type EndpointDefinition, type OperationName } from './endpoints.js';

// Shared utilities
export { toAccessKeyBody, canonicalize, canonicalJson, truncate } from './utils.js';

// HTTP codec
export {
  DEFAULT_USER_AGENT,
  buildRequest,
  serializeRequest,
  readResponse,
  ResponseParser,
  type HttpRequest,
} from './http-codec.js';

// Transport
export {
  TransportSession,
  MAX_TIMEOUT_MS,
  nodeConnector,
  fingerprintMatches,
  isPeerClosedError,
  shutdownStream,
  type Connector,
  type ExchangeSession,
  type HandshakeOptions,
  type ResolvedAddress,
  type TlsTrustOptions,
  type TransportSessionOptions,
} from './transport.js';
