// @outline-admin/core - One-connection-per-call TLS transport session

import { lookup } from 'node:dns/promises';
import net from 'node:net';
import tls from 'node:tls';
import type { Duplex } from 'node:stream';
import { pino, type Logger } from 'pino';
import { TimeoutError, TransportError } from './errors.js';
import { DEFAULT_USER_AGENT, buildRequest, readResponse, serializeRequest } from './http-codec.js';
import type { ApiUrl, HttpExchangeResult, HttpVerb, TransportStage } from './types.js';

const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_SHUTDOWN_GRACE_MS = 1_000;

/** Largest delay a Node timer honours; longer ones fire after 1 ms */
export const MAX_TIMEOUT_MS = 2_147_483_647;

/** Errors meaning the peer already went away; harmless during shutdown */
const PEER_CLOSED_CODES = new Set([
  'ECONNRESET',
  'EPIPE',
  'ENOTCONN',
  'ERR_STREAM_DESTROYED',
  'ERR_STREAM_PREMATURE_CLOSE',
  'ERR_STREAM_WRITE_AFTER_END',
]);

export interface ResolvedAddress {
  address: string;
  family: number;
}

/**
 * How the server certificate is trusted
 */
export interface TlsTrustOptions {
  /** Accept any server certificate. Explicit opt-in only. */
  insecure?: boolean;
  /** PEM trust anchor(s) for chain verification */
  ca?: string | Buffer | Array<string | Buffer>;
  /** Expected SHA-256 fingerprint of the server certificate (hex, colons optional) */
  certSha256?: string;
}

export interface HandshakeOptions extends TlsTrustOptions {
  /** Target host, used for SNI and identity checks */
  servername: string;
}

/**
 * The three connection-establishing steps of an exchange.
 * Implementations must destroy any socket they created when `signal` aborts.
 */
export interface Connector {
  lookup(host: string): Promise<ResolvedAddress[]>;
  connect(address: ResolvedAddress, port: number, signal: AbortSignal): Promise<Duplex>;
  handshake(socket: Duplex, options: HandshakeOptions, signal: AbortSignal): Promise<Duplex>;
}

/**
 * Anything that can run one exchange; implemented by {@link TransportSession}
 */
export interface ExchangeSession {
  execute(verb: HttpVerb, url: ApiUrl, body?: string): Promise<HttpExchangeResult>;
  destroy(): Promise<void>;
}

export interface TransportSessionOptions {
  tls?: TlsTrustOptions;
  /** Per-call budget shared by every stage (default: 30 seconds) */
  timeoutMs?: number;
  userAgent?: string;
  logger?: Logger;
  connector?: Connector;
  /** How long to wait for the peer to acknowledge a close before tearing the socket down */
  shutdownGraceMs?: number;
}

function normalizeFingerprint(value: string): string {
  return value.replace(/:/g, '').trim().toLowerCase();
}

/**
 * Compare a configured fingerprint with the one Node reports (`AB:CD:...`)
 */
export function fingerprintMatches(expected: string, actual: string | undefined): boolean {
  if (!actual) return false;
  const want = normalizeFingerprint(expected);
  return want.length > 0 && want === normalizeFingerprint(actual);
}

export function isPeerClosedError(err: unknown): boolean {
  return err instanceof Error && 'code' in err && typeof err.code === 'string' && PEER_CLOSED_CODES.has(err.code);
}

function checkDelay(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 1 || value > MAX_TIMEOUT_MS) {
    throw new RangeError(`${name} must be an integer between 1 and ${MAX_TIMEOUT_MS}, got ${value}`);
  }
  return value;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Default connector on Node's dns, net and tls modules
 */
export const nodeConnector: Connector = {
  lookup(host) {
    return lookup(host, { all: true });
  },

  connect(address, port, signal) {
    return new Promise((resolve, reject) => {
      const socket = net.connect({ host: address.address, port, family: address.family });

      const onAbort = () => socket.destroy(new Error('Connect aborted'));
      const onError = (err: Error) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      };

      signal.addEventListener('abort', onAbort, { once: true });
      socket.once('error', onError);
      socket.once('connect', () => {
        signal.removeEventListener('abort', onAbort);
        socket.off('error', onError);
        resolve(socket);
      });
    });
  },

  handshake(socket, options, signal) {
    return new Promise((resolve, reject) => {
      const pinned = options.certSha256 !== undefined;
      const secure = tls.connect({
        socket,
        host: options.servername,
        // SNI only carries host names
        servername: net.isIP(options.servername) ? undefined : options.servername,
        ca: options.ca,
        rejectUnauthorized: !options.insecure && !pinned,
      });

      const onAbort = () => secure.destroy(new Error('Handshake aborted'));
      const onError = (err: Error) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      };

      signal.addEventListener('abort', onAbort, { once: true });
      secure.once('error', onError);
      secure.once('secureConnect', () => {
        signal.removeEventListener('abort', onAbort);
        secure.off('error', onError);

        if (options.certSha256 !== undefined && !options.insecure) {
          const actual = secure.getPeerCertificate().fingerprint256;
          if (!fingerprintMatches(options.certSha256, actual)) {
            secure.destroy();
            reject(new Error('Server certificate fingerprint does not match'));
            return;
          }
        }

        resolve(secure);
      });
    });
  },
};

function writeAll(stream: Duplex, data: Buffer): Promise<void> {
  return new Promise((resolve, reject) => {
    stream.write(data, (err) => (err ? reject(err) : resolve()));
  });
}

/**
 * End the stream and wait for it to close. Peer-closed errors count as a clean close;
 * a peer that never acknowledges is destroyed after `graceMs`.
 */
export function shutdownStream(stream: Duplex, graceMs: number): Promise<void> {
  return new Promise((resolve, reject) => {
    if (stream.destroyed) {
      resolve();
      return;
    }

    const cleanup = () => {
      clearTimeout(timer);
      stream.off('close', onClose);
      stream.off('error', onError);
    };
    const onClose = () => {
      cleanup();
      resolve();
    };
    const onError = (err: Error) => {
      cleanup();
      if (isPeerClosedError(err)) resolve();
      else reject(err);
    };

    const timer = setTimeout(() => stream.destroy(), graceMs);
    stream.once('close', onClose);
    stream.once('error', onError);
    // drain anything left so the readable side can end
    stream.resume();
    stream.end();
  });
}

/**
 * Owns the TLS settings for a client's lifetime and runs each call over a fresh connection:
 * resolve → connect → handshake → write → read → shutdown.
 *
 * Calls are serialized; nothing is pooled or reused between them.
 */
export class TransportSession implements ExchangeSession {
  private readonly tls: TlsTrustOptions;
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly logger: Logger;
  private readonly connector: Connector;
  private readonly shutdownGraceMs: number;

  private active: Duplex | null = null;
  private queue: Promise<void> = Promise.resolve();
  private closed = false;

  constructor(options: TransportSessionOptions = {}) {
    this.tls = { ...options.tls };
    this.timeoutMs = checkDelay('timeoutMs', options.timeoutMs ?? DEFAULT_TIMEOUT_MS);
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.logger = options.logger ?? pino({ name: 'outline-admin' });
    this.connector = options.connector ?? nodeConnector;
    this.shutdownGraceMs = checkDelay('shutdownGraceMs', options.shutdownGraceMs ?? DEFAULT_SHUTDOWN_GRACE_MS);

    if (this.tls.insecure) {
      this.logger.warn('TLS peer verification is disabled; any server certificate will be accepted');
    }
  }

  /**
   * Run one exchange on a new connection
   * @throws TransportError tagged with the failing stage
   */
  execute(verb: HttpVerb, url: ApiUrl, body?: string): Promise<HttpExchangeResult> {
    const run = this.queue.then(() => this.exchange(verb, url, body));
    // the caller sees the failure through `run`; the queue only orders calls
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  /**
   * Close whatever stream is still open. Failures are logged, never thrown.
   */
  async destroy(): Promise<void> {
    this.closed = true;
    const stream = this.active;
    this.active = null;
    if (!stream || stream.destroyed) return;

    try {
      await shutdownStream(stream, this.shutdownGraceMs);
    } catch (err) {
      this.logger.warn({ err }, 'Transport shutdown failed');
    }
  }

  private async exchange(verb: HttpVerb, url: ApiUrl, body?: string): Promise<HttpExchangeResult> {
    if (this.closed) {
      throw new TransportError('Transport session is closed', 'connect');
    }

    const request = serializeRequest(buildRequest(verb, url, body, this.userAgent));
    const controller = new AbortController();
    const deadline = Date.now() + this.timeoutMs;
    const onStreamError = (err: Error) => this.logger.debug({ err }, 'Stream error');

    let tcp: Duplex | null = null;
    let secure: Duplex | null = null;

    try {
      const addresses = await this.stage('resolve', deadline, controller, () => this.connector.lookup(url.host));
      const first = addresses[0];
      if (!first) {
        throw new TransportError(`No addresses found for ${url.host}`, 'resolve');
      }

      const socket = await this.stage('connect', deadline, controller, () =>
        this.connector.connect(first, Number(url.port), controller.signal)
      );
      tcp = socket;
      socket.on('error', onStreamError);
      this.active = socket;

      const stream = await this.stage('handshake', deadline, controller, () =>
        this.connector.handshake(socket, { ...this.tls, servername: url.host }, controller.signal)
      );
      secure = stream;
      stream.on('error', onStreamError);
      this.active = stream;

      await this.stage('write', deadline, controller, () => writeAll(stream, request));
      const result = await this.stage('read', deadline, controller, () => readResponse(stream));

      try {
        await shutdownStream(stream, this.shutdownGraceMs);
      } catch (err) {
        throw new TransportError(`shutdown failed: ${errorMessage(err)}`, 'shutdown', { cause: err });
      }

      this.logger.debug({ verb, host: url.host, status: result.status }, 'Exchange complete');
      return result;
    } catch (err) {
      controller.abort();
      secure?.destroy();
      tcp?.destroy();
      throw err;
    } finally {
      this.active = null;
    }
  }

  /**
   * Run one stage against the call's deadline, tagging failures with the stage
   */
  private async stage<T>(
    stage: TransportStage,
    deadline: number,
    controller: AbortController,
    work: () => Promise<T>
  ): Promise<T> {
    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      throw new TimeoutError(stage, this.timeoutMs);
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const expiry = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new TimeoutError(stage, this.timeoutMs));
        controller.abort();
      }, remaining);
    });

    try {
      return await Promise.race([work(), expiry]);
    } catch (err) {
      if (err instanceof TransportError) throw err;
      throw new TransportError(`${stage} failed: ${errorMessage(err)}`, stage, { cause: err });
    } finally {
      clearTimeout(timer);
    }
  }
}
