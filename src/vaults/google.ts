/**
 * Google Secret Manager Vault
 *
 * Fetches the latest version of a secret and decodes its JSON payload into
 * environment entries. Each call resolves credentials and opens its own
 * channel; nothing is kept between calls.
 *
 * Usage in config:
 *   vault:
 *     type: google
 *     project: my-project
 *     credentialsFile: ./service-account.json
 */

import { ConnectFn, connectChannel } from '../core/channel';
import { AccessSecretVersionResponse, AuthenticatedClient, Interceptor, RpcStatusError, SecretManagerClient, authInterceptor } from '../core/client';
import { decodeEnvFromBytes } from '../core/convert';
import { resolveCredential } from '../core/credentials';
import { EnvEntry, GoogleVaultConfig, Vault, VaultError, VaultErrorCode, VaultHooks } from './types';

/** Secret Manager accepts letters, digits, underscores and hyphens */
const SECRET_NAME_PATTERN = /^[A-Za-z0-9_-]{1,255}$/;

export interface SecretReference {
  project: string;
  secretName: string;
  version: 'latest';
}

export function secretResourceName(ref: SecretReference): string {
  return `projects/${ref.project}/secrets/${ref.secretName}/versions/${ref.version}`;
}

export interface GoogleVaultOptions extends VaultHooks {
  connect?: ConnectFn;
  fetchFn?: typeof fetch;
  rootCertificates?: string;
  domain?: string;
  port?: number;
  env?: NodeJS.ProcessEnv;
}

export class GoogleVault implements Vault {
  readonly type = 'google';

  private project: string;
  private credentialsFile?: string;
  private caFile?: string;
  private options: GoogleVaultOptions;

  constructor(config: GoogleVaultConfig, options: GoogleVaultOptions = {}) {
    if (!config.project) {
      throw new VaultError(
        VaultErrorCode.CONFIG_ERROR,
        'GoogleVault: project is required',
        { vault: 'google' }
      );
    }

    this.project = config.project;
    this.credentialsFile = config.credentialsFile;
    this.caFile = config.caFile;
    this.options = options;
  }

  async downloadPrefixed(prefix: string): Promise<EnvEntry[]> {
    throw new VaultError(
      VaultErrorCode.UNIMPLEMENTED,
      `GoogleVault: downloading secrets by prefix ("${prefix}") is not implemented`,
      { vault: this.type }
    );
  }

  async downloadJson(secretName: string): Promise<EnvEntry[]> {
    if (!SECRET_NAME_PATTERN.test(secretName)) {
      throw new VaultError(
        VaultErrorCode.CONFIG_ERROR,
        `GoogleVault: invalid secret name "${secretName}"`,
        { vault: this.type, secretName }
      );
    }

    const client = await this.toClient();
    const name = secretResourceName({ project: this.project, secretName, version: 'latest' });

    let response: AccessSecretVersionResponse;
    try {
      response = await client.accessSecretVersion(name);
    } catch (err) {
      if (err instanceof RpcStatusError) {
        throw new VaultError(
          VaultErrorCode.REMOTE_CALL_ERROR,
          `Cannot load secret "${secretName}" from Secret Manager: ${err.status.code}: ${err.status.message}`,
          { vault: this.type, secretName, status: err.status, cause: err }
        );
      }
      throw err;
    } finally {
      client.close();
    }

    const data = response.payload?.data;
    if (!data) {
      throw new VaultError(
        VaultErrorCode.EMPTY_SECRET,
        `Secret "${secretName}" is empty`,
        { vault: this.type, secretName }
      );
    }

    return decodeEnvFromBytes(secretName, Buffer.from(data, 'base64'));
  }

  /**
   * Resolves the credential before the channel is opened.
   */
  private async toClient(): Promise<SecretManagerClient> {
    const credential = resolveCredential(this.credentialsFile, {
      fetchFn: this.options.fetchFn,
      env: this.options.env,
    });

    const channel = await connectChannel({
      domain: this.options.domain,
      port: this.options.port,
      rootCertificates: this.options.rootCertificates,
      caFile: this.caFile,
      connect: this.options.connect,
    });

    const interceptors: Interceptor[] = [authInterceptor(credential)];
    const onRequest = this.options.onRequest;
    if (onRequest) {
      interceptors.push(async (req) => {
        onRequest(`${req.method} ${req.path}`);
        return req;
      });
    }
    return new SecretManagerClient(new AuthenticatedClient(channel, interceptors));
  }
}
