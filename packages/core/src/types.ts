// @outline-admin/core - Core type definitions

/**
 * HTTP verbs used by the management API
 */
export type HttpVerb = 'GET' | 'POST' | 'PUT' | 'DELETE';

/**
 * Parsed API base URL. Created once from the user-supplied string and never mutated.
 */
export interface ApiUrl {
  readonly scheme: 'https';
  readonly host: string;
  readonly port: string;
  /** Path without trailing slash ("" for the root) */
  readonly path: string;
  /** Raw query string without the leading "?" */
  readonly query: string;
}

/**
 * Path template with named `{placeholder}` markers, optionally followed by `?query`
 */
export type EndpointTemplate = string;

/**
 * Placeholder name → substituted value
 */
export type PlaceholderMap = Readonly<Record<string, string>>;

/**
 * Status code and raw body of one request/response cycle
 */
export interface HttpExchangeResult {
  status: number;
  body: string;
}

/**
 * Step of a transport exchange at which a failure occurred
 */
export type TransportStage = 'resolve' | 'connect' | 'handshake' | 'write' | 'read' | 'shutdown';

/**
 * Fields accepted when creating or updating an access key.
 * Absent fields are left out of the request body.
 */
export interface AccessKeyParams {
  name?: string;
  password?: string;
  /** Encryption method, e.g. "chacha20-ietf-poly1305" */
  method?: string;
  dataLimitBytes?: number;
}

export type CreateAccessKeyParams = AccessKeyParams;
export type UpdateAccessKeyParams = AccessKeyParams;

/**
 * JSON request body for create/update
 */
export interface AccessKeyBody {
  name?: string;
  password?: string;
  method?: string;
  limit?: { bytes: number };
}

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };
