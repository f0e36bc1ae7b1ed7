import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import http from 'http';
import net from 'net';
import { connectChannel } from './channel';
import {
  AuthenticatedClient,
  RpcStatusError,
  SecretManagerClient,
  authInterceptor,
  statusFromResponse,
} from './client';
import { Credential } from './credentials';

function credentialOf(headerValue: () => Promise<string>): Credential {
  return { kind: 'test', headerValue };
}

describe('statusFromResponse', () => {
  it('uses the status from a Google error body', () => {
    const body = JSON.stringify({
      error: { code: 404, message: 'Secret not found', status: 'NOT_FOUND' }
    });
    expect(statusFromResponse(404, body)).toEqual({
      code: 'NOT_FOUND',
      message: 'Secret not found',
      httpStatus: 404
    });
  });

  it('maps the HTTP status when the body carries none', () => {
    expect(statusFromResponse(503, 'upstream unavailable')).toEqual({
      code: 'UNAVAILABLE',
      message: 'upstream unavailable',
      httpStatus: 503
    });
    expect(statusFromResponse(401, '')).toEqual({
      code: 'UNAUTHENTICATED',
      message: 'HTTP 401',
      httpStatus: 401
    });
  });

  it('falls back to UNKNOWN for unmapped statuses', () => {
    expect(statusFromResponse(418, 'teapot').code).toBe('UNKNOWN');
  });

  it('ignores status names it does not know', () => {
    const body = JSON.stringify({ error: { message: 'odd', status: 'SOMETHING_ELSE' } });
    expect(statusFromResponse(403, body)).toEqual({
      code: 'PERMISSION_DENIED',
      message: 'odd',
      httpStatus: 403
    });
  });
});

describe('authInterceptor', () => {
  it('adds the rendered credential as the authorization header', async () => {
    const intercept = authInterceptor(credentialOf(async () => 'Bearer test-token'));

    const req = await intercept({ method: 'GET', path: '/v1/x', headers: { accept: 'application/json' } });

    expect(req).toEqual({
      method: 'GET',
      path: '/v1/x',
      headers: { accept: 'application/json', authorization: 'Bearer test-token' }
    });
  });

  it('fails the request with UNKNOWN when the credential cannot render', async () => {
    const intercept = authInterceptor(credentialOf(async () => {
      throw new Error('token endpoint unreachable');
    }));

    try {
      await intercept({ method: 'GET', path: '/v1/x', headers: {} });
      expect.unreachable('should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(RpcStatusError);
      expect((err as RpcStatusError).status).toEqual({
        code: 'UNKNOWN',
        message: 'token endpoint unreachable'
      });
    }
  });

  it('reports a thrown non-Error value as a string message', async () => {
    const intercept = authInterceptor(credentialOf(() => Promise.reject('token endpoint unreachable')));

    try {
      await intercept({ method: 'GET', path: '/v1/x', headers: {} });
      expect.unreachable('should have thrown');
    } catch (err) {
      expect((err as RpcStatusError).status).toEqual({
        code: 'UNKNOWN',
        message: 'token endpoint unreachable'
      });
    }
  });

  it('renders the credential on every request', async () => {
    const headerValue = vi.fn(async () => 'Bearer test-token');
    const intercept = authInterceptor(credentialOf(headerValue));

    await intercept({ method: 'GET', path: '/a', headers: {} });
    await intercept({ method: 'GET', path: '/b', headers: {} });

    expect(headerValue).toHaveBeenCalledTimes(2);
  });
});

describe('AuthenticatedClient', () => {
  let server: http.Server;
  let port: number;
  let status: number;
  let body: string;
  let seenHeaders: http.IncomingHttpHeaders | undefined;

  beforeEach(async () => {
    status = 200;
    body = '{}';
    seenHeaders = undefined;
    server = http.createServer((req, res) => {
      seenHeaders = req.headers;
      res.writeHead(status, { 'Content-Type': 'application/json' });
      res.end(body);
    });
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    port = typeof address === 'object' && address ? address.port : 0;
  });

  afterEach(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  async function makeClient(credential: Credential): Promise<AuthenticatedClient> {
    const channel = await connectChannel({
      connect: (options, onConnected) => net.connect({ host: '127.0.0.1', port }, onConnected)
    });
    return new AuthenticatedClient(channel, [authInterceptor(credential)]);
  }

  it('runs interceptors before sending', async () => {
    const client = await makeClient(credentialOf(async () => 'Bearer test-token'));

    await client.call('GET', '/v1/anything');
    client.close();

    expect(seenHeaders?.authorization).toBe('Bearer test-token');
    expect(seenHeaders?.accept).toBe('application/json');
  });

  it('returns the parsed body of a successful call', async () => {
    body = '{"name":"projects/p/secrets/s/versions/1"}';
    const client = await makeClient(credentialOf(async () => 'Bearer test-token'));

    const result = await client.call('GET', '/v1/anything');
    client.close();

    expect(result).toEqual({ name: 'projects/p/secrets/s/versions/1' });
  });

  it('turns error responses into RpcStatusError', async () => {
    status = 429;
    body = JSON.stringify({ error: { code: 429, message: 'Quota exceeded', status: 'RESOURCE_EXHAUSTED' } });
    const client = await makeClient(credentialOf(async () => 'Bearer test-token'));

    await expect(client.call('GET', '/v1/anything')).rejects.toThrow(RpcStatusError);
    client.close();
  });

  it('reports a malformed success body as INTERNAL', async () => {
    body = 'not json';
    const client = await makeClient(credentialOf(async () => 'Bearer test-token'));

    try {
      await client.call('GET', '/v1/anything');
      expect.unreachable('should have thrown');
    } catch (err) {
      expect((err as RpcStatusError).status.code).toBe('INTERNAL');
    } finally {
      client.close();
    }
  });

  it('reports a call on a closed channel as UNAVAILABLE', async () => {
    const client = await makeClient(credentialOf(async () => 'Bearer test-token'));
    client.close();

    try {
      await client.call('GET', '/v1/anything');
      expect.unreachable('should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(RpcStatusError);
      expect((err as RpcStatusError).status.code).toBe('UNAVAILABLE');
    }
  });
});

describe('SecretManagerClient', () => {
  let server: http.Server;
  let port: number;
  let url: string | undefined;

  beforeEach(async () => {
    server = http.createServer((req, res) => {
      url = req.url;
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({
        name: 'projects/p/secrets/s/versions/7',
        payload: { data: 'e30=', dataCrc32c: '2745614147' }
      }));
    });
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    port = typeof address === 'object' && address ? address.port : 0;
  });

  afterEach(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it('calls the access endpoint and returns only name and payload data', async () => {
    const channel = await connectChannel({
      connect: (options, onConnected) => net.connect({ host: '127.0.0.1', port }, onConnected)
    });
    const client = new SecretManagerClient(
      new AuthenticatedClient(channel, [authInterceptor(credentialOf(async () => 'Bearer test-token'))])
    );

    const response = await client.accessSecretVersion('projects/p/secrets/s/versions/latest');
    client.close();

    expect(url).toBe('/v1/projects/p/secrets/s/versions/latest:access');
    expect(response).toStrictEqual({
      name: 'projects/p/secrets/s/versions/7',
      payload: { data: 'e30=' }
    });
  });
});
