/**
 * Local File Vault
 *
 * Reads secrets from JSON files in a directory: secret "db" lives in
 * <dir>/db.json. Useful for development and tests where no cloud secret
 * store is reachable.
 *
 * Usage in config:
 *   vault:
 *     type: local
 *     dir: ./.vaultenv
 */

import fs from 'fs';
import path from 'path';
import { decodeEnvFromBytes } from '../core/convert';
import { EnvEntry, LocalVaultConfig, Vault, VaultError, VaultErrorCode, VaultHooks, errorMessage, validateSecretName } from './types';

export class LocalVault implements Vault {
  readonly type = 'local';

  private dir: string;
  private hooks: VaultHooks;

  constructor(config: LocalVaultConfig, hooks: VaultHooks = {}) {
    if (!config.dir) {
      throw new VaultError(
        VaultErrorCode.CONFIG_ERROR,
        'LocalVault: dir is required',
        { vault: 'local' }
      );
    }
    this.dir = path.resolve(config.dir);
    this.hooks = hooks;
  }

  async downloadPrefixed(prefix: string): Promise<EnvEntry[]> {
    throw new VaultError(
      VaultErrorCode.UNIMPLEMENTED,
      `LocalVault: downloading secrets by prefix ("${prefix}") is not implemented`,
      { vault: this.type }
    );
  }

  async downloadJson(secretName: string): Promise<EnvEntry[]> {
    const filePath = this.resolvePath(secretName);

    this.hooks.onRequest?.(`READ ${filePath}`);

    let data: Buffer;
    try {
      data = await fs.promises.readFile(filePath);
    } catch (err) {
      const notFound = err instanceof Error && 'code' in err && err.code === 'ENOENT';
      throw new VaultError(
        VaultErrorCode.REMOTE_CALL_ERROR,
        `Cannot load secret "${secretName}" from ${this.dir}: ${errorMessage(err)}`,
        {
          vault: this.type,
          secretName,
          status: {
            code: notFound ? 'NOT_FOUND' : 'UNAVAILABLE',
            message: errorMessage(err),
          },
          cause: err,
        }
      );
    }

    if (data.toString('utf8').trim().length === 0) {
      throw new VaultError(
        VaultErrorCode.EMPTY_SECRET,
        `Secret "${secretName}" is empty`,
        { vault: this.type, secretName }
      );
    }

    return decodeEnvFromBytes(secretName, data);
  }

  /**
   * Resolve a secret name to its file, contained within the vault directory.
   */
  private resolvePath(secretName: string): string {
    validateSecretName(secretName);

    const resolved = path.resolve(this.dir, `${secretName}.json`);
    const dirWithSep = this.dir.endsWith(path.sep) ? this.dir : this.dir + path.sep;

    if (!resolved.startsWith(dirWithSep)) {
      throw new VaultError(
        VaultErrorCode.CONFIG_ERROR,
        `Secret name "${secretName}" resolves outside ${this.dir}`,
        { vault: this.type, secretName }
      );
    }

    return resolved;
  }
}
