/**
 * Google Credential Resolution
 *
 * Builds a bearer credential from an explicit credential file or from
 * default discovery. Resolution is local only: the access token is fetched
 * the first time the credential renders its header.
 */

import crypto from 'crypto';
import fs from 'fs';
import os from 'os';
import path from 'path';
import jwt from 'jsonwebtoken';
import { VaultError, VaultErrorCode, errorMessage } from '../vaults/types';

export const CLOUD_PLATFORM_SCOPE = 'https://www.googleapis.com/auth/cloud-platform';
export const CREDENTIALS_ENV = 'GOOGLE_APPLICATION_CREDENTIALS';

const DEFAULT_TOKEN_URI = 'https://oauth2.googleapis.com/token';
const DEFAULT_METADATA_HOST = 'metadata.google.internal';

/** Tokens with less than this many seconds left are refreshed */
const REFRESH_MARGIN_SECONDS = 600;

export interface ServiceAccountCredentials {
  type: 'service_account';
  project_id?: string;
  private_key_id?: string;
  private_key: string;
  client_email: string;
  token_uri: string;
}

export interface AuthorizedUserCredentials {
  type: 'authorized_user';
  client_id: string;
  client_secret: string;
  refresh_token: string;
  quota_project_id?: string;
}

export type CredentialsFile = ServiceAccountCredentials | AuthorizedUserCredentials;

export interface AccessToken {
  access_token: string;
  expires_at: number;  // Unix timestamp in seconds
  token_type: string;
}

/**
 * A short-lived bearer credential.
 */
export interface Credential {
  /** Where the credential came from: service_account, authorized_user or metadata */
  readonly kind: string;
  /** Render the credential as an `authorization` header value */
  headerValue(): Promise<string>;
}

export interface CredentialOptions {
  fetchFn?: typeof fetch;
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
  scopes?: string[];
}

type TokenSource = (fetchFn: typeof fetch) => Promise<AccessToken>;

/**
 * Credential backed by a token source. The token is fetched on first use
 * and reused by this instance until it nears expiry.
 */
export class Token implements Credential {
  readonly kind: string;
  private cached?: AccessToken;

  constructor(kind: string, private source: TokenSource, private fetchFn: typeof fetch = fetch) {
    this.kind = kind;
  }

  async headerValue(): Promise<string> {
    const token = await this.accessToken();
    return `${token.token_type} ${token.access_token}`;
  }

  private async accessToken(): Promise<AccessToken> {
    if (this.cached) {
      const timeRemaining = this.cached.expires_at - Math.floor(Date.now() / 1000);
      if (timeRemaining > REFRESH_MARGIN_SECONDS) {
        return this.cached;
      }
    }
    this.cached = await this.source(this.fetchFn);
    return this.cached;
  }
}

/**
 * Resolve a credential from an explicit file, or by default discovery:
 *   1. the file named by GOOGLE_APPLICATION_CREDENTIALS
 *   2. gcloud application default credentials
 *   3. the compute metadata server
 *
 * @throws VaultError with CONFIG_ERROR code
 */
export function resolveCredential(
  credentialsFile?: string,
  options: CredentialOptions = {}
): Credential {
  if (credentialsFile) {
    return credentialFromFile(credentialsFile, options);
  }

  const env = options.env ?? process.env;

  const fromEnv = env[CREDENTIALS_ENV];
  if (fromEnv) {
    return credentialFromFile(fromEnv, options);
  }

  const wellKnown = wellKnownCredentialsPath(env, options.homeDir ?? os.homedir());
  if (fs.existsSync(wellKnown)) {
    return credentialFromFile(wellKnown, options);
  }

  return metadataCredential(env, options);
}

/**
 * Build a credential from a credential JSON file.
 *
 * @throws VaultError with CONFIG_ERROR code
 */
export function credentialFromFile(filePath: string, options: CredentialOptions = {}): Credential {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf8');
  } catch (err) {
    throw new VaultError(
      VaultErrorCode.CONFIG_ERROR,
      `Cannot read credentials file "${filePath}": ${errorMessage(err)}`,
      { cause: err }
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new VaultError(
      VaultErrorCode.CONFIG_ERROR,
      `Credentials file "${filePath}" is not valid JSON`,
      { cause: err }
    );
  }

  const credentials = validateCredentials(parsed);
  const scopes = options.scopes ?? [CLOUD_PLATFORM_SCOPE];

  if (credentials.type === 'service_account') {
    return new Token(
      credentials.type,
      (fetchFn) => exchangeJWTForToken(createServiceAccountJWT(credentials, scopes), credentials.token_uri, fetchFn),
      options.fetchFn
    );
  }

  return new Token(
    credentials.type,
    (fetchFn) => refreshUserToken(credentials, fetchFn),
    options.fetchFn
  );
}

/**
 * Validate the content of a credential file
 *
 * @throws VaultError with CONFIG_ERROR code
 */
export function validateCredentials(credentials: unknown): CredentialsFile {
  if (!isRecord(credentials)) {
    throw invalid('must be an object');
  }

  if (credentials.type === 'service_account') {
    const privateKey = requireString(credentials, 'private_key');
    const clientEmail = requireString(credentials, 'client_email');
    requirePrivateKey(privateKey);
    return {
      type: 'service_account',
      project_id: optionalString(credentials, 'project_id'),
      private_key_id: optionalString(credentials, 'private_key_id'),
      private_key: privateKey,
      client_email: clientEmail,
      token_uri: optionalString(credentials, 'token_uri') ?? DEFAULT_TOKEN_URI,
    };
  }

  if (credentials.type === 'authorized_user') {
    return {
      type: 'authorized_user',
      client_id: requireString(credentials, 'client_id'),
      client_secret: requireString(credentials, 'client_secret'),
      refresh_token: requireString(credentials, 'refresh_token'),
      quota_project_id: optionalString(credentials, 'quota_project_id'),
    };
  }

  throw invalid(`unsupported credential type "${String(credentials.type)}"`);
}

/**
 * Create a signed JWT for service account authentication
 */
export function createServiceAccountJWT(
  credentials: ServiceAccountCredentials,
  scopes: string[]
): string {
  const now = Math.floor(Date.now() / 1000);

  const payload = {
    iss: credentials.client_email,
    scope: scopes.join(' '),
    aud: credentials.token_uri,
    iat: now,
    exp: now + 3600  // 1 hour
  };

  return jwt.sign(payload, credentials.private_key, {
    algorithm: 'RS256',
    ...(credentials.private_key_id ? { keyid: credentials.private_key_id } : {})
  });
}

/**
 * Exchange JWT for access token
 */
export async function exchangeJWTForToken(
  assertion: string,
  tokenUri: string,
  fetchFn: typeof fetch = fetch
): Promise<AccessToken> {
  const response = await fetchFn(tokenUri, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/x-www-form-urlencoded'
    },
    body: new URLSearchParams({
      grant_type: 'urn:ietf:params:oauth:grant-type:jwt-bearer',
      assertion
    })
  });

  return readTokenResponse(response);
}

/**
 * Trade a gcloud user refresh token for an access token
 */
export async function refreshUserToken(
  credentials: AuthorizedUserCredentials,
  fetchFn: typeof fetch = fetch
): Promise<AccessToken> {
  const response = await fetchFn(DEFAULT_TOKEN_URI, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/x-www-form-urlencoded'
    },
    body: new URLSearchParams({
      grant_type: 'refresh_token',
      client_id: credentials.client_id,
      client_secret: credentials.client_secret,
      refresh_token: credentials.refresh_token
    })
  });

  return readTokenResponse(response);
}

function metadataCredential(env: NodeJS.ProcessEnv, options: CredentialOptions): Credential {
  const host = env.GCE_METADATA_HOST || DEFAULT_METADATA_HOST;
  const url = `http://${host}/computeMetadata/v1/instance/service-accounts/default/token`;

  return new Token(
    'metadata',
    async (fetchFn) => {
      const response = await fetchFn(url, { headers: { 'Metadata-Flavor': 'Google' } });
      return readTokenResponse(response);
    },
    options.fetchFn
  );
}

async function readTokenResponse(response: Response): Promise<AccessToken> {
  if (!response.ok) {
    const errorText = await response.text();
    throw new Error(`Token exchange failed: ${response.status} ${errorText}`);
  }

  const data: unknown = await response.json();

  if (!isRecord(data) || typeof data.access_token !== 'string' || typeof data.expires_in !== 'number') {
    throw new Error('Invalid token response: missing access_token or expires_in');
  }

  return {
    access_token: data.access_token,
    expires_at: Math.floor(Date.now() / 1000) + data.expires_in,
    token_type: typeof data.token_type === 'string' ? data.token_type : 'Bearer'
  };
}

/**
 * Location of gcloud's application default credentials
 */
export function wellKnownCredentialsPath(env: NodeJS.ProcessEnv, homeDir: string): string {
  let configDir = env.CLOUDSDK_CONFIG;
  if (!configDir) {
    configDir = process.platform === 'win32' && env.APPDATA
      ? path.join(env.APPDATA, 'gcloud')
      : path.join(homeDir, '.config', 'gcloud');
  }
  return path.join(configDir, 'application_default_credentials.json');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(record: Record<string, unknown>, field: string): string {
  const value = record[field];
  if (typeof value !== 'string' || value.length === 0) {
    throw invalid(`missing or invalid ${field}`);
  }
  return value;
}

/** The key must parse now, not when the first request is signed */
function requirePrivateKey(pem: string): void {
  let keyType: string | undefined;
  try {
    keyType = crypto.createPrivateKey(pem).asymmetricKeyType;
  } catch (err) {
    throw new VaultError(
      VaultErrorCode.CONFIG_ERROR,
      'Invalid credentials: private_key is not a valid PEM private key',
      { cause: err }
    );
  }
  if (keyType !== 'rsa') {
    throw invalid('private_key must be an RSA key');
  }
}

function optionalString(record: Record<string, unknown>, field: string): string | undefined {
  const value = record[field];
  return typeof value === 'string' ? value : undefined;
}

function invalid(reason: string): VaultError {
  return new VaultError(VaultErrorCode.CONFIG_ERROR, `Invalid credentials: ${reason}`);
}
