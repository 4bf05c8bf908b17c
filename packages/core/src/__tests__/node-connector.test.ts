import { describe, it, expect, beforeAll, afterAll, afterEach } from 'vitest';
import { readFileSync } from 'node:fs';
import { X509Certificate } from 'node:crypto';
import type { Duplex } from 'node:stream';
import tls from 'node:tls';
import { nodeConnector, type HandshakeOptions } from '../transport.js';

// Self-signed certificate for 127.0.0.1 and localhost, test use only
const cert = readFileSync(new URL('./fixtures/server-cert.pem', import.meta.url));
const key = readFileSync(new URL('./fixtures/server-key.pem', import.meta.url));
const fingerprint = new X509Certificate(cert).fingerprint256;

const LOOPBACK = { address: '127.0.0.1', family: 4 };

describe('nodeConnector against a self-signed server', () => {
  let server: tls.Server;
  let port: number;
  const opened: Duplex[] = [];

  beforeAll(async () => {
    server = tls.createServer({ key, cert }, (socket) => {
      socket.on('error', () => socket.destroy());
      socket.end('ok');
    });
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Server is not listening on a TCP port');
    }
    port = address.port;
  });

  afterEach(() => {
    for (const stream of opened.splice(0)) stream.destroy();
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  });

  async function handshake(trust: Omit<HandshakeOptions, 'servername'>): Promise<Duplex> {
    const signal = new AbortController().signal;
    const socket = await nodeConnector.connect(LOOPBACK, port, signal);
    opened.push(socket);
    const secure = await nodeConnector.handshake(socket, { ...trust, servername: '127.0.0.1' }, signal);
    opened.push(secure);
    return secure;
  }

  it('rejects the server when no trust setting is given', async () => {
    await expect(handshake({})).rejects.toMatchObject({ code: 'DEPTH_ZERO_SELF_SIGNED_CERT' });
  });

  it('accepts the server when its certificate is the configured CA', async () => {
    const secure = await handshake({ ca: cert });
    expect(secure).toBeInstanceOf(tls.TLSSocket);
  });

  it('accepts the server when the pinned fingerprint matches', async () => {
    const secure = await handshake({ certSha256: fingerprint });
    expect(secure).toBeInstanceOf(tls.TLSSocket);
  });

  it('accepts a pinned fingerprint written in lower case without colons', async () => {
    const secure = await handshake({ certSha256: fingerprint.replace(/:/g, '').toLowerCase() });
    expect(secure).toBeInstanceOf(tls.TLSSocket);
  });

  it('rejects the server when the pinned fingerprint differs', async () => {
    await expect(handshake({ certSha256: 'ab'.repeat(32) })).rejects.toThrow(
      'Server certificate fingerprint does not match'
    );
  });

  it('accepts any certificate in insecure mode', async () => {
    const secure = await handshake({ insecure: true });
    expect(secure).toBeInstanceOf(tls.TLSSocket);
  });
});
