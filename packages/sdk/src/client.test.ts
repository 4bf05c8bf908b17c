// @outline-admin/sdk - Tests for OutlineAdminClient

import { describe, it, expect, vi, afterEach } from 'vitest';
import { Duplex } from 'node:stream';
import { pino } from 'pino';
import {
  ConfigError,
  ParseError,
  ServerError,
  TransportError,
  UrlError,
  type ApiUrl,
  type HttpExchangeResult,
  type HttpVerb,
  type ResolvedAddress,
} from '@outline-admin/core';
import { OutlineAdminClient } from './client.js';
import { parseConfig } from './config.js';

const API_URL = 'https://203.0.113.5:8081/AbCdEf';
const silent = pino({ level: 'silent' });

function createSession(...results: HttpExchangeResult[]) {
  const execute = vi.fn(async (_verb: HttpVerb, _url: ApiUrl, _body?: string): Promise<HttpExchangeResult> => {
    const next = results.shift();
    if (!next) throw new Error('No response queued');
    return next;
  });
  const destroy = vi.fn(async (): Promise<void> => undefined);
  return { execute, destroy };
}

function createClient(...results: HttpExchangeResult[]) {
  const session = createSession(...results);
  const client = new OutlineAdminClient({ apiUrl: API_URL, session, logger: silent });
  return { client, session };
}

function target(path: string): ApiUrl {
  return { scheme: 'https', host: '203.0.113.5', port: '8081', path, query: '' };
}

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error('Expected promise to reject');
}

describe('OutlineAdminClient', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('constructor', () => {
    it('rejects a malformed API URL', () => {
      expect(() => new OutlineAdminClient({ apiUrl: 'not a url', logger: silent })).toThrow(UrlError);
    });

    it('rejects a plain http API URL', () => {
      expect(() => new OutlineAdminClient({ apiUrl: 'http://203.0.113.5:8081/AbCdEf', logger: silent })).toThrow(
        'API URL must use https, got http'
      );
    });
  });

  describe('listAccessKeys', () => {
    it('GETs /access-keys and returns the keys', async () => {
      const { client, session } = createClient({
        status: 200,
        body: '{"accessKeys":[{"name":"a","id":"1"},{"id":"2","dataLimit":{"bytes":10}}]}',
      });

      const keys = await client.listAccessKeys();

      expect(keys).toEqual([{ id: '1', name: 'a' }, { id: '2', dataLimit: { bytes: 10 } }]);
      expect(session.execute).toHaveBeenCalledWith('GET', target('/AbCdEf/access-keys'), undefined);
    });

    it('fails with ServerError on any status but 200', async () => {
      const { client } = createClient({ status: 401, body: '' });

      const err = await captureError(client.listAccessKeys());

      expect(err).toBeInstanceOf(ServerError);
      expect(err).toMatchObject({ operation: 'listAccessKeys', status: 401, code: 'SERVER_ERROR' });
    });

    it('fails with ParseError when the body lacks accessKeys', async () => {
      const { client } = createClient({ status: 200, body: '{"keys":[]}' });

      const err = await captureError(client.listAccessKeys());

      expect(err).toBeInstanceOf(ParseError);
      expect(err).toMatchObject({ operation: 'listAccessKeys' });
    });
  });

  describe('getAccessKey', () => {
    it('GETs the key by id', async () => {
      const { client, session } = createClient({ status: 200, body: '{"id":"7","port":12345}' });

      await expect(client.getAccessKey('7')).resolves.toEqual({ id: '7', port: 12345 });
      expect(session.execute).toHaveBeenCalledWith('GET', target('/AbCdEf/access-keys/7'), undefined);
    });

    it('fails with ParseError, not ServerError, on an unparsable body', async () => {
      const { client } = createClient({ status: 200, body: 'not-json' });

      const err = await captureError(client.getAccessKey('7'));

      expect(err).toBeInstanceOf(ParseError);
      expect(err).not.toBeInstanceOf(ServerError);
      expect(err).toMatchObject({ operation: 'getAccessKey', code: 'PARSE_ERROR' });
      expect(err).toHaveProperty('cause');
    });

    it('returns every field, unknown ones included, with keys sorted', async () => {
      const { client } = createClient({
        status: 200,
        body: '{"port":1,"name":"n","method":"m","id":"1","accessUrl":"ss://x"}',
      });

      const key = await client.getAccessKey('1');

      expect(Object.keys(key)).toEqual(['accessUrl', 'id', 'method', 'name', 'port']);
    });

    it('never lets a __proto__ field reshape the key', async () => {
      const { client } = createClient({ status: 200, body: '{"id":"1","__proto__":{"extra":"x"}}' });

      const key = await client.getAccessKey('1');

      expect(Object.keys(key)).toEqual(['id']);
      expect('extra' in key).toBe(false);
      expect(Object.getPrototypeOf(key)).toBe(Object.prototype);
    });

    it('fails with ParseError when the JSON is not a key', async () => {
      const { client } = createClient({ status: 200, body: '[]' });

      await expect(client.getAccessKey('7')).rejects.toBeInstanceOf(ParseError);
    });

    it('rejects an empty id before sending anything', async () => {
      const { client, session } = createClient();

      await expect(client.getAccessKey(' ')).rejects.toThrow('Access key id must not be empty');
      expect(session.execute).not.toHaveBeenCalled();
    });
  });

  describe('createAccessKey', () => {
    it('POSTs only the fields that are set and returns the created key', async () => {
      const { client, session } = createClient({ status: 201, body: '{"id":"1","name":"alice"}' });

      const key = await client.createAccessKey({ name: 'alice' });

      expect(key).toEqual({ id: '1', name: 'alice' });
      expect(session.execute).toHaveBeenCalledWith('POST', target('/AbCdEf/access-keys'), '{"name":"alice"}');
    });

    it('sends an empty object when no params are given', async () => {
      const { client, session } = createClient({ status: 201, body: '{"id":"2"}' });

      await client.createAccessKey();

      expect(session.execute).toHaveBeenCalledWith('POST', target('/AbCdEf/access-keys'), '{}');
    });

    it('fails with ServerError on 500 without parsing the body', async () => {
      const { client } = createClient({ status: 500, body: '{"code":"internal"}' });
      const parse = vi.spyOn(JSON, 'parse');

      const err = await captureError(client.createAccessKey({ name: 'alice' }));

      expect(err).toBeInstanceOf(ServerError);
      expect(err).toMatchObject({ operation: 'createAccessKey', status: 500 });
      expect(parse).not.toHaveBeenCalled();
    });

    it('canonicalizes the returned key', async () => {
      const { client } = createClient({
        status: 201,
        body: '{ "name" : "bob",\n  "dataLimit": {"bytes": 5}, "id": "3" }',
      });

      const key = await client.createAccessKey({ name: 'bob' });

      expect(JSON.stringify(key)).toBe('{"dataLimit":{"bytes":5},"id":"3","name":"bob"}');
    });
  });

  describe('updateAccessKey', () => {
    it('PUTs the changed fields to the key', async () => {
      const { client, session } = createClient({ status: 201, body: '{"id":"5","dataLimit":{"bytes":1000}}' });

      const key = await client.updateAccessKey('5', { dataLimitBytes: 1000 });

      expect(key).toEqual({ id: '5', dataLimit: { bytes: 1000 } });
      expect(session.execute).toHaveBeenCalledWith(
        'PUT',
        target('/AbCdEf/access-keys/5'),
        '{"limit":{"bytes":1000}}'
      );
    });

    it('expects 201, so 200 is a ServerError', async () => {
      const { client } = createClient({ status: 200, body: '{"id":"5"}' });

      await expect(client.updateAccessKey('5', { name: 'x' })).rejects.toMatchObject({
        operation: 'updateAccessKey',
        status: 200,
      });
    });
  });

  describe('deleteAccessKey', () => {
    it('DELETEs the key and resolves on 204', async () => {
      const { client, session } = createClient({ status: 204, body: '' });

      await expect(client.deleteAccessKey('3')).resolves.toBeUndefined();
      expect(session.execute).toHaveBeenCalledWith('DELETE', target('/AbCdEf/access-keys/3'), undefined);
    });

    it('fails with ServerError on any other status', async () => {
      const { client } = createClient({ status: 404, body: '' });

      const err = await captureError(client.deleteAccessKey('3'));

      expect(err).toBeInstanceOf(ServerError);
      expect(err).toMatchObject({ operation: 'deleteAccessKey', status: 404 });
    });
  });

  it('builds every target from the original base URL', async () => {
    const { client, session } = createClient(
      { status: 200, body: '{"id":"1"}' },
      { status: 204, body: '' },
      { status: 200, body: '{"accessKeys":[]}' }
    );

    await client.getAccessKey('1');
    await client.deleteAccessKey('1');
    await client.listAccessKeys();

    const paths = session.execute.mock.calls.map(([, url]) => url.path);
    expect(paths).toEqual(['/AbCdEf/access-keys/1', '/AbCdEf/access-keys/1', '/AbCdEf/access-keys']);
  });

  it('passes transport errors through unchanged', async () => {
    const { client, session } = createClient();
    const failure = new TransportError('connect failed: connect ECONNREFUSED', 'connect');
    session.execute.mockRejectedValueOnce(failure);

    await expect(client.listAccessKeys()).rejects.toBe(failure);
  });

  it('close() destroys the session', async () => {
    const { client, session } = createClient();

    await client.close();

    expect(session.destroy).toHaveBeenCalledTimes(1);
  });

  describe('fromConfig', () => {
    it('uses the configured API URL', async () => {
      const session = createSession({ status: 200, body: '{"accessKeys":[]}' });
      const config = parseConfig({ apiUrl: 'https://198.51.100.7:9000/Secret', timeoutMs: '5000' });

      const client = OutlineAdminClient.fromConfig(config, { session, logger: silent });
      await client.listAccessKeys();

      expect(session.execute).toHaveBeenCalledWith(
        'GET',
        { scheme: 'https', host: '198.51.100.7', port: '9000', path: '/Secret/access-keys', query: '' },
        undefined
      );
    });
  });

  describe('fromConfig with a CA file', () => {
    it('reports an unreadable CA file as ConfigError', () => {
      const config = parseConfig({ apiUrl: API_URL, caFile: '/nonexistent/outline-ca.pem' });

      let err: unknown;
      try {
        OutlineAdminClient.fromConfig(config, { logger: silent });
      } catch (caught) {
        err = caught;
      }

      expect(err).toBeInstanceOf(ConfigError);
      expect(err).toMatchObject({
        code: 'CONFIG_ERROR',
        message: 'Unable to read CA file /nonexistent/outline-ca.pem',
      });
      expect(err).toHaveProperty('cause.code', 'ENOENT');
    });
  });

  describe('default transport', () => {
    /** Answers the first write with a canned response, then ends */
    class ReplySocket extends Duplex {
      readonly written: Buffer[] = [];

      constructor(private readonly reply: string) {
        super();
      }

      override _read(): void {}

      override _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
        this.written.push(chunk);
        setImmediate(() => {
          this.push(this.reply);
          this.push(null);
        });
        callback();
      }
    }

    it('runs calls through the connector with the client user agent', async () => {
      const sockets: ReplySocket[] = [];
      const connector = {
        lookup: vi.fn(async (): Promise<ResolvedAddress[]> => [{ address: '203.0.113.5', family: 4 }]),
        connect: vi.fn(async (): Promise<Duplex> => new ReplySocket('')),
        handshake: vi.fn(async (): Promise<Duplex> => {
          const socket = new ReplySocket('HTTP/1.1 200 OK\r\nContent-Length: 10\r\n\r\n{"id":"8"}');
          sockets.push(socket);
          return socket;
        }),
      };
      const client = new OutlineAdminClient({ apiUrl: API_URL, connector, logger: silent });

      await expect(client.getAccessKey('8')).resolves.toEqual({ id: '8' });

      const request = Buffer.concat(sockets[0]?.written ?? []).toString('utf8');
      expect(request.split('\r\n').slice(0, 3)).toEqual([
        'GET /AbCdEf/access-keys/8 HTTP/1.1',
        'Host: 203.0.113.5:8081',
        'User-Agent: outline-admin-sdk/0.1.0',
      ]);
    });
  });
});
