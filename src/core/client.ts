/**
 * Authenticated client over a secure channel
 *
 * Outgoing requests pass through an interceptor chain before they hit the
 * wire. Authentication is one interceptor; logging is another.
 */

import { ChannelRequest, ChannelResponse, SecureChannel } from './channel';
import { Credential } from './credentials';
import { RpcStatus, StatusCode, errorMessage } from '../vaults/types';

export type Interceptor = (req: ChannelRequest) => Promise<ChannelRequest>;

/**
 * A failed call, described by its remote status
 */
export class RpcStatusError extends Error {
  readonly status: RpcStatus;

  constructor(status: RpcStatus, options?: { cause?: unknown }) {
    super(status.message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'RpcStatusError';
    this.status = status;
  }
}

/**
 * Attach the credential as an `authorization` header.
 * A credential that cannot render fails the request, not the client.
 */
export function authInterceptor(credential: Credential): Interceptor {
  return async (req) => {
    let header: string;
    try {
      header = await credential.headerValue();
    } catch (err) {
      throw new RpcStatusError(
        { code: 'UNKNOWN', message: errorMessage(err) },
        { cause: err }
      );
    }
    return { ...req, headers: { ...req.headers, authorization: header } };
  };
}

const HTTP_STATUS_CODES: Record<number, StatusCode> = {
  400: 'INVALID_ARGUMENT',
  401: 'UNAUTHENTICATED',
  403: 'PERMISSION_DENIED',
  404: 'NOT_FOUND',
  409: 'ABORTED',
  412: 'FAILED_PRECONDITION',
  416: 'OUT_OF_RANGE',
  429: 'RESOURCE_EXHAUSTED',
  499: 'CANCELLED',
  500: 'INTERNAL',
  501: 'UNIMPLEMENTED',
  503: 'UNAVAILABLE',
  504: 'DEADLINE_EXCEEDED',
};

const STATUS_CODES = new Set<string>([
  'CANCELLED', 'UNKNOWN', 'INVALID_ARGUMENT', 'DEADLINE_EXCEEDED', 'NOT_FOUND',
  'ALREADY_EXISTS', 'PERMISSION_DENIED', 'RESOURCE_EXHAUSTED', 'FAILED_PRECONDITION',
  'ABORTED', 'OUT_OF_RANGE', 'UNIMPLEMENTED', 'INTERNAL', 'UNAVAILABLE', 'DATA_LOSS',
  'UNAUTHENTICATED',
]);

function isStatusCode(value: unknown): value is StatusCode {
  return typeof value === 'string' && STATUS_CODES.has(value);
}

/**
 * Map an error response to a status. Google's JSON error body
 * ({ error: { code, message, status } }) wins over the bare HTTP status.
 */
export function statusFromResponse(httpStatus: number, body: string): RpcStatus {
  let code: StatusCode = HTTP_STATUS_CODES[httpStatus] ?? 'UNKNOWN';
  let message = body.trim() || `HTTP ${httpStatus}`;

  const parsed = parseJson(body);
  if (typeof parsed === 'object' && parsed !== null && 'error' in parsed) {
    const error: unknown = parsed.error;
    if (typeof error === 'object' && error !== null) {
      if ('status' in error && isStatusCode(error.status)) {
        code = error.status;
      }
      if ('message' in error && typeof error.message === 'string') {
        message = error.message;
      }
    }
  }

  return { code, message, httpStatus };
}

function parseJson(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch {
    return undefined;
  }
}

export class AuthenticatedClient {
  private channel: SecureChannel;
  private interceptors: Interceptor[];

  constructor(channel: SecureChannel, interceptors: Interceptor[]) {
    this.channel = channel;
    this.interceptors = interceptors;
  }

  /**
   * Issue one JSON call.
   * @throws RpcStatusError on any failure
   */
  async call(method: string, path: string): Promise<unknown> {
    let req: ChannelRequest = { method, path, headers: { accept: 'application/json' } };
    for (const intercept of this.interceptors) {
      req = await intercept(req);
    }

    let response: ChannelResponse;
    try {
      response = await this.channel.request(req);
    } catch (err) {
      throw new RpcStatusError(
        { code: 'UNAVAILABLE', message: errorMessage(err) },
        { cause: err }
      );
    }

    if (response.statusCode < 200 || response.statusCode >= 300) {
      throw new RpcStatusError(statusFromResponse(response.statusCode, response.body));
    }

    try {
      return JSON.parse(response.body);
    } catch (err) {
      throw new RpcStatusError(
        { code: 'INTERNAL', message: `Malformed response body: ${errorMessage(err)}`, httpStatus: response.statusCode },
        { cause: err }
      );
    }
  }

  close(): void {
    this.channel.close();
  }
}

export interface AccessSecretVersionResponse {
  name?: string;
  payload?: {
    /** base64-encoded secret bytes */
    data?: string;
  };
}

/**
 * Secret Manager v1 calls over an authenticated client
 */
export class SecretManagerClient {
  private client: AuthenticatedClient;

  constructor(client: AuthenticatedClient) {
    this.client = client;
  }

  /**
   * AccessSecretVersion
   * @param name - projects/{project}/secrets/{secret}/versions/{version}
   */
  async accessSecretVersion(name: string): Promise<AccessSecretVersionResponse> {
    const body = await this.client.call('GET', `/v1/${name}:access`);
    if (typeof body !== 'object' || body === null) {
      throw new RpcStatusError({ code: 'INTERNAL', message: 'AccessSecretVersion returned a non-object body' });
    }

    const response: AccessSecretVersionResponse = {};
    if ('name' in body && typeof body.name === 'string') {
      response.name = body.name;
    }
    if ('payload' in body && typeof body.payload === 'object' && body.payload !== null) {
      const payload = body.payload;
      response.payload = {
        data: 'data' in payload && typeof payload.data === 'string' ? payload.data : undefined,
      };
    }
    return response;
  }

  close(): void {
    this.client.close();
  }
}
