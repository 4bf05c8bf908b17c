// @outline-admin/sdk - Access key management client

import { readFileSync } from 'node:fs';
import type { Logger } from 'pino';
import {
  ConfigError,
  Endpoints,
  TransportSession,
  UrlError,
  UrlParams,
  parseApiUrl,
  resolveEndpoint,
  toAccessKeyBody,
  type AccessKeyBody,
  type ApiUrl,
  type Connector,
  type CreateAccessKeyParams,
  type ExchangeSession,
  type HttpExchangeResult,
  type OperationName,
  type PlaceholderMap,
  type UpdateAccessKeyParams,
} from '@outline-admin/core';
import { AccessKeyListSchema, AccessKeySchema, classify, expectStatus, type AccessKey } from './classifier.js';
import type { Config } from './config.js';
import { getLogger, initLogger } from './logger.js';

const USER_AGENT = 'outline-admin-sdk/0.1.0';

function readCaFile(path: string): Buffer {
  try {
    return readFileSync(path);
  } catch (err) {
    throw new ConfigError(`Unable to read CA file ${path}`, { cause: err });
  }
}

/**
 * Options for creating a client
 */
export interface ClientOptions {
  /** Management API URL including the secret path */
  apiUrl: string;
  /** Expected SHA-256 fingerprint of the server certificate */
  certSha256?: string;
  /** PEM trust anchor(s) for the server certificate */
  ca?: string | Buffer;
  /** Accept any server certificate (default: false) */
  insecure?: boolean;
  /** Per-call deadline in milliseconds (default: 30 seconds) */
  timeoutMs?: number;
  userAgent?: string;
  logger?: Logger;
  /** Replaces the DNS/TCP/TLS steps of the default transport */
  connector?: Connector;
  /** Replaces the transport entirely */
  session?: ExchangeSession;
}

export type ClientOverrides = Pick<ClientOptions, 'logger' | 'connector' | 'session'>;

/**
 * Client for the proxy server's access key API.
 *
 * Every call builds its target from the immutable base URL and runs over a fresh connection.
 * Not meant for concurrent use; overlapping calls are run one after another.
 */
export class OutlineAdminClient {
  private readonly baseUrl: ApiUrl;
  private readonly session: ExchangeSession;

  constructor(options: ClientOptions) {
    this.baseUrl = parseApiUrl(options.apiUrl);

    const logger = options.logger ?? getLogger();
    this.session =
      options.session ??
      new TransportSession({
        tls: {
          insecure: options.insecure,
          ca: options.ca,
          certSha256: options.certSha256,
        },
        timeoutMs: options.timeoutMs,
        userAgent: options.userAgent ?? USER_AGENT,
        logger: logger.child({ component: 'transport' }),
        connector: options.connector,
      });
  }

  /**
   * Build a client from loaded configuration, reading the CA file if one is configured
   */
  static fromConfig(config: Config, overrides: ClientOverrides = {}): OutlineAdminClient {
    return new OutlineAdminClient({
      apiUrl: config.apiUrl,
      certSha256: config.certSha256,
      ca: config.caFile ? readCaFile(config.caFile) : undefined,
      insecure: config.insecure,
      timeoutMs: config.timeoutMs,
      logger: overrides.logger ?? initLogger(config),
      connector: overrides.connector,
      session: overrides.session,
    });
  }

  /**
   * Resolve the operation's endpoint and run one exchange
   */
  private async call(
    operation: OperationName,
    placeholders: PlaceholderMap = {},
    body?: AccessKeyBody
  ): Promise<HttpExchangeResult> {
    const endpoint = Endpoints[operation];
    const url = resolveEndpoint(this.baseUrl, endpoint.template, placeholders);
    return this.session.execute(endpoint.verb, url, body === undefined ? undefined : JSON.stringify(body));
  }

  private keyPlaceholders(id: string): PlaceholderMap {
    if (id.trim() === '') {
      throw new UrlError('Access key id must not be empty');
    }
    return { [UrlParams.KeyId]: id };
  }

  // ==========================================================================
  // Access Key Methods
  // ==========================================================================

  async listAccessKeys(): Promise<AccessKey[]> {
    const result = await this.call('listAccessKeys');
    return classify('listAccessKeys', result, AccessKeyListSchema).accessKeys;
  }

  async getAccessKey(id: string): Promise<AccessKey> {
    const result = await this.call('getAccessKey', this.keyPlaceholders(id));
    return classify('getAccessKey', result, AccessKeySchema);
  }

  async createAccessKey(params: CreateAccessKeyParams = {}): Promise<AccessKey> {
    const result = await this.call('createAccessKey', {}, toAccessKeyBody(params));
    return classify('createAccessKey', result, AccessKeySchema);
  }

  /**
   * Update an existing key. Only the fields present in `params` are sent.
   */
  async updateAccessKey(id: string, params: UpdateAccessKeyParams): Promise<AccessKey> {
    const result = await this.call('updateAccessKey', this.keyPlaceholders(id), toAccessKeyBody(params));
    return classify('updateAccessKey', result, AccessKeySchema);
  }

  async deleteAccessKey(id: string): Promise<void> {
    const result = await this.call('deleteAccessKey', this.keyPlaceholders(id));
    expectStatus('deleteAccessKey', result);
  }

  /**
   * Release the transport session. Shutdown failures are logged, not thrown.
   */
  async close(): Promise<void> {
    await this.session.destroy();
  }
}
