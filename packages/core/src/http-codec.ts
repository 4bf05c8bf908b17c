// @outline-admin/core - HTTP/1.1 request serialization and response parsing

import type { Readable } from 'node:stream';
import type { ApiUrl, HttpExchangeResult, HttpVerb } from './types.js';
import { formatHostHeader, formatTarget } from './url.js';
import { truncate } from './utils.js';

export const DEFAULT_USER_AGENT = 'outline-admin/0.1.0';

/** Response heads larger than this are rejected */
const MAX_HEAD_BYTES = 64 * 1024;

const CRLF = '\r\n';
const EMPTY = Buffer.alloc(0);

export interface HttpRequest {
  method: HttpVerb;
  /** `path[?query]` */
  target: string;
  headers: Array<[name: string, value: string]>;
  body?: string;
}

/**
 * Build a request for one exchange. A body is always sent as JSON.
 */
export function buildRequest(
  verb: HttpVerb,
  url: ApiUrl,
  body?: string,
  userAgent: string = DEFAULT_USER_AGENT
): HttpRequest {
  const headers: Array<[string, string]> = [
    ['Host', formatHostHeader(url)],
    ['User-Agent', userAgent],
    ['Accept', 'application/json'],
    ['Connection', 'close'],
  ];

  if (body !== undefined) {
    headers.push(['Content-Type', 'application/json']);
    headers.push(['Content-Length', String(Buffer.byteLength(body, 'utf8'))]);
  }

  return { method: verb, target: formatTarget(url), headers, body };
}

export function serializeRequest(request: HttpRequest): Buffer {
  const lines = [
    `${request.method} ${request.target} HTTP/1.1`,
    ...request.headers.map(([name, value]) => `${name}: ${value}`),
  ];
  const head = Buffer.from(lines.join(CRLF) + CRLF + CRLF, 'utf8');
  if (request.body === undefined) return head;
  return Buffer.concat([head, Buffer.from(request.body, 'utf8')]);
}

type BodyFraming =
  | { kind: 'none' }
  | { kind: 'length'; remaining: number }
  | { kind: 'chunked' }
  | { kind: 'eof' };

type ChunkState =
  | { phase: 'size' }
  | { phase: 'data'; remaining: number }
  | { phase: 'data-end' }
  | { phase: 'trailer' };

function framingFor(status: number, headers: Record<string, string>): BodyFraming {
  if (status === 204 || status === 304) {
    return { kind: 'none' };
  }

  const transferEncoding = headers['transfer-encoding'];
  if (transferEncoding !== undefined) {
    const codings = transferEncoding.toLowerCase().split(',').map((c) => c.trim());
    if (codings.includes('chunked')) return { kind: 'chunked' };
  }

  const contentLength = headers['content-length'];
  if (contentLength !== undefined) {
    if (!/^\d+$/.test(contentLength)) {
      throw new Error(`Invalid Content-Length: ${truncate(contentLength, 40)}`);
    }
    return { kind: 'length', remaining: Number(contentLength) };
  }

  return { kind: 'eof' };
}

/**
 * Incremental HTTP/1.x response parser.
 *
 * Feed bytes with {@link push} until it reports completion; call {@link finish}
 * when the stream ends. Interim 1xx responses are skipped.
 */
export class ResponseParser {
  private buffer: Buffer = EMPTY;
  private status: number | null = null;
  private framing: BodyFraming | null = null;
  private chunk: ChunkState = { phase: 'size' };
  private readonly body: Buffer[] = [];
  private done = false;

  get complete(): boolean {
    return this.done;
  }

  /**
   * @returns true once a complete response has been read
   */
  push(data: Buffer): boolean {
    if (this.done) return true;
    this.buffer = this.buffer.length === 0 ? data : Buffer.concat([this.buffer, data]);
    this.advance();
    return this.done;
  }

  /**
   * End of stream. Only a response delimited by connection close may be cut here.
   */
  finish(): HttpExchangeResult {
    if (!this.done) {
      if (this.framing?.kind !== 'eof') {
        throw new Error(
          this.status === null
            ? 'Connection closed before response headers were received'
            : 'Connection closed before response body was complete'
        );
      }
      this.done = true;
    }
    return this.result();
  }

  result(): HttpExchangeResult {
    if (!this.done || this.status === null) {
      throw new Error('Response is not complete');
    }
    return { status: this.status, body: Buffer.concat(this.body).toString('utf8') };
  }

  private advance(): void {
    while (!this.done) {
      const framing = this.framing;
      if (framing === null) {
        if (!this.parseHead()) return;
        continue;
      }

      switch (framing.kind) {
        case 'none':
          this.done = true;
          return;
        case 'eof':
          this.take(this.buffer.length);
          return;
        case 'length':
          framing.remaining -= this.take(framing.remaining);
          if (framing.remaining === 0) this.done = true;
          return;
        case 'chunked':
          if (!this.parseChunked()) return;
          break;
      }
    }
  }

  /** Move up to `max` buffered bytes into the body */
  private take(max: number): number {
    const count = Math.min(max, this.buffer.length);
    if (count > 0) {
      this.body.push(this.buffer.subarray(0, count));
      this.buffer = this.buffer.subarray(count);
    }
    return count;
  }

  private parseHead(): boolean {
    const end = this.buffer.indexOf(CRLF + CRLF);
    if (end === -1) {
      if (this.buffer.length > MAX_HEAD_BYTES) {
        throw new Error('Response headers too large');
      }
      return false;
    }

    const lines = this.buffer.subarray(0, end).toString('latin1').split(CRLF);
    this.buffer = this.buffer.subarray(end + 4);

    const statusLine = lines[0] ?? '';
    const match = /^HTTP\/1\.[01] (\d{3})(?: .*)?$/.exec(statusLine);
    if (!match) {
      throw new Error(`Malformed status line: ${truncate(statusLine, 80)}`);
    }
    const status = Number(match[1]);

    const headers: Record<string, string> = {};
    for (const line of lines.slice(1)) {
      const colon = line.indexOf(':');
      if (colon <= 0) {
        throw new Error(`Malformed header line: ${truncate(line, 80)}`);
      }
      const name = line.slice(0, colon).trim().toLowerCase();
      const value = line.slice(colon + 1).trim();
      const previous = headers[name];
      headers[name] = previous === undefined ? value : `${previous}, ${value}`;
    }

    // 1xx: another head follows
    if (status < 200) return true;

    this.status = status;
    this.framing = framingFor(status, headers);
    return true;
  }

  private parseChunked(): boolean {
    const state = this.chunk;
    switch (state.phase) {
      case 'size': {
        const lineEnd = this.buffer.indexOf(CRLF);
        if (lineEnd === -1) return false;
        const sizeText = (this.buffer.subarray(0, lineEnd).toString('latin1').split(';')[0] ?? '').trim();
        if (!/^[0-9a-fA-F]+$/.test(sizeText)) {
          throw new Error(`Invalid chunk size: ${truncate(sizeText, 20)}`);
        }
        this.buffer = this.buffer.subarray(lineEnd + 2);
        const size = parseInt(sizeText, 16);
        this.chunk = size === 0 ? { phase: 'trailer' } : { phase: 'data', remaining: size };
        return true;
      }
      case 'data': {
        if (this.buffer.length === 0) return false;
        state.remaining -= this.take(state.remaining);
        if (state.remaining === 0) this.chunk = { phase: 'data-end' };
        return true;
      }
      case 'data-end': {
        if (this.buffer.length < 2) return false;
        if (this.buffer.toString('latin1', 0, 2) !== CRLF) {
          throw new Error('Missing CRLF after chunk data');
        }
        this.buffer = this.buffer.subarray(2);
        this.chunk = { phase: 'size' };
        return true;
      }
      case 'trailer': {
        const lineEnd = this.buffer.indexOf(CRLF);
        if (lineEnd === -1) return false;
        // trailer fields are read and dropped; an empty line ends the message
        this.buffer = this.buffer.subarray(lineEnd + 2);
        if (lineEnd === 0) this.done = true;
        return true;
      }
    }
  }
}

/**
 * Read one complete response from the stream.
 * A clean end-of-stream after a full response is not an error.
 */
export function readResponse(stream: Readable): Promise<HttpExchangeResult> {
  const parser = new ResponseParser();

  return new Promise((resolve, reject) => {
    const cleanup = () => {
      stream.off('data', onData);
      stream.off('end', onEnd);
      stream.off('close', onEnd);
      stream.off('error', onError);
    };

    const onData = (chunk: Buffer | string) => {
      try {
        if (parser.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk)) {
          cleanup();
          resolve(parser.result());
        }
      } catch (err) {
        cleanup();
        reject(err);
      }
    };

    const onEnd = () => {
      cleanup();
      try {
        resolve(parser.finish());
      } catch (err) {
        reject(err);
      }
    };

    const onError = (err: Error) => {
      cleanup();
      reject(err);
    };

    stream.on('data', onData);
    stream.once('end', onEnd);
    stream.once('close', onEnd);
    stream.once('error', onError);
  });
}
