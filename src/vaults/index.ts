/**
 * vaultenv vaults
 *
 * Built-in vault types:
 *   - google: Google Secret Manager over a pinned TLS channel
 *   - local: JSON files in a directory
 *
 * Usage:
 *   import { createVault } from './vaults';
 *
 *   const vault = createVault({ type: 'google', project: 'my-project' });
 *   const entries = await vault.downloadJson('db-password');
 */

export {
  createVault,
  registerVaultType,
  unregisterVaultType,
  listVaultTypes,
} from './registry';

export type {
  Vault,
  VaultConfig,
  VaultFactory,
  VaultHooks,
  GoogleVaultConfig,
  LocalVaultConfig,
  EnvEntry,
  RpcStatus,
  StatusCode,
} from './types';

export {
  VaultError,
  VaultErrorCode,
  validateSecretName,
  errorMessage,
} from './types';

export { GoogleVault, secretResourceName } from './google';
export type { GoogleVaultOptions, SecretReference } from './google';
export { LocalVault } from './local';
