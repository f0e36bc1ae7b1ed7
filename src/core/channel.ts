/**
 * Secure channel to the Secret Manager endpoint
 *
 * One channel is one TLS connection, validated against an embedded root
 * bundle instead of the host's certificate store. Requests are HTTP/1.1
 * over that connection.
 */

import fs from 'fs';
import http from 'http';
import net from 'net';
import tls from 'tls';
import { VaultError, VaultErrorCode, errorMessage } from '../vaults/types';

export const SECRET_MANAGER_DOMAIN = 'secretmanager.googleapis.com';
export const SECRET_MANAGER_PORT = 443;

/**
 * Root certificates compiled into the Node.js binary. Host configuration
 * (system stores, NODE_EXTRA_CA_CERTS) does not affect this list.
 */
export const EMBEDDED_ROOT_CERTIFICATES = tls.rootCertificates.join('\n');

/** Opens the underlying socket; `onConnected` fires once it is ready for requests */
export type ConnectFn = (options: tls.ConnectionOptions, onConnected: () => void) => net.Socket;

export interface ChannelOptions {
  domain?: string;
  port?: number;
  /** PEM bundle to trust (default: embedded roots) */
  rootCertificates?: string;
  /** PEM file to trust instead of the embedded roots */
  caFile?: string;
  connect?: ConnectFn;
}

export interface ChannelRequest {
  method: string;
  path: string;
  headers: Record<string, string>;
  body?: string;
}

export interface ChannelResponse {
  statusCode: number;
  headers: http.IncomingHttpHeaders;
  body: string;
}

/**
 * Open a validated channel. Resolves once the TLS handshake has completed.
 *
 * @throws VaultError with TRANSPORT_ERROR code
 */
export async function connectChannel(options: ChannelOptions = {}): Promise<SecureChannel> {
  const domain = options.domain ?? SECRET_MANAGER_DOMAIN;
  const port = options.port ?? SECRET_MANAGER_PORT;
  const connect: ConnectFn = options.connect ?? tls.connect;
  const ca = loadRootCertificates(options);

  const tlsOptions: tls.ConnectionOptions = {
    host: domain,
    port,
    servername: domain,
    ca,
    rejectUnauthorized: true,
    minVersion: 'TLSv1.2',
    ALPNProtocols: ['http/1.1'],
  };

  const socket = await new Promise<net.Socket>((resolve, reject) => {
    let settled = false;
    const sock = connect(tlsOptions, () => {
      if (settled) return;
      settled = true;
      resolve(sock);
    });
    const onError = (error: Error) => {
      if (settled) return;
      settled = true;
      sock.destroy();
      reject(new VaultError(
        VaultErrorCode.TRANSPORT_ERROR,
        `Cannot establish secure channel to ${domain}:${port}: ${error.message}`,
        { cause: error }
      ));
    };
    sock.on('error', onError);
  });

  return new SecureChannel(domain, socket);
}

function loadRootCertificates(options: ChannelOptions): string {
  if (!options.caFile) {
    return options.rootCertificates ?? EMBEDDED_ROOT_CERTIFICATES;
  }
  try {
    return fs.readFileSync(options.caFile, 'utf8');
  } catch (err) {
    throw new VaultError(
      VaultErrorCode.TRANSPORT_ERROR,
      `Cannot read CA bundle "${options.caFile}": ${errorMessage(err)}`,
      { cause: err }
    );
  }
}

/**
 * An established connection. Owned by a single client and closed with it.
 */
export class SecureChannel {
  readonly domain: string;
  private socket: net.Socket;
  private socketError?: Error;

  constructor(domain: string, socket: net.Socket) {
    this.domain = domain;
    this.socket = socket;
    this.socket.on('error', (error: Error) => {
      this.socketError = error;
    });
  }

  get closed(): boolean {
    return this.socket.destroyed;
  }

  /**
   * Send one request over the channel. The connection is closed once the
   * response has been read.
   * Rejects with the raw socket error; callers map it.
   */
  request(req: ChannelRequest): Promise<ChannelResponse> {
    return new Promise((resolve, reject) => {
      if (this.socket.destroyed) {
        reject(this.socketError ?? new Error('Channel is closed'));
        return;
      }

      const headers: Record<string, string> = { host: this.domain, ...req.headers };
      if (req.body !== undefined) {
        headers['content-length'] = String(Buffer.byteLength(req.body));
      }

      const request = http.request(
        {
          method: req.method,
          path: req.path,
          headers,
          createConnection: () => this.socket,
        },
        (res) => {
          let body = '';
          res.setEncoding('utf8');

          res.on('data', (chunk: string) => {
            body += chunk;
          });

          res.on('end', () => {
            resolve({
              statusCode: res.statusCode || 500,
              headers: res.headers,
              body
            });
          });

          res.on('error', reject);
        }
      );

      request.on('error', reject);

      if (req.body !== undefined) {
        request.write(req.body);
      }

      request.end();
    });
  }

  close(): void {
    this.socket.destroy();
  }
}
