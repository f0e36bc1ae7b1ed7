/**
 * Vault Registry
 *
 * Maps vault types to factories. Callers hand in a VaultConfig and get a
 * Vault back without knowing which backend serves it.
 */

import { Vault, VaultConfig, VaultFactory, VaultError, VaultErrorCode, VaultHooks } from './types';
import { GoogleVault } from './google';
import { LocalVault } from './local';

/**
 * Registry of vault factories by type name.
 */
const factories = new Map<string, VaultFactory>();

/**
 * Register a vault factory.
 */
export function registerVaultType(type: string, factory: VaultFactory): void {
  if (factories.has(type)) {
    throw new VaultError(
      VaultErrorCode.CONFIG_ERROR,
      `Vault type "${type}" is already registered`
    );
  }
  factories.set(type, factory);
}

/**
 * Remove a vault factory. Returns false if the type was not registered.
 */
export function unregisterVaultType(type: string): boolean {
  return factories.delete(type);
}

/**
 * Build a vault from its configuration.
 */
export function createVault(config: VaultConfig, hooks: VaultHooks = {}): Vault {
  const factory = factories.get(config.type);
  if (!factory) {
    const available = Array.from(factories.keys()).join(', ');
    throw new VaultError(
      VaultErrorCode.CONFIG_ERROR,
      `Unknown vault type "${config.type}". Available types: ${available}`,
      { vault: config.type }
    );
  }
  return factory(config, hooks);
}

export function listVaultTypes(): string[] {
  return Array.from(factories.keys());
}

// Register built-in vault types
registerVaultType('google', (config, hooks) => {
  if (config.type !== 'google') {
    throw new VaultError(VaultErrorCode.CONFIG_ERROR, `Expected a google vault config, got "${config.type}"`);
  }
  return new GoogleVault(config, hooks);
});
registerVaultType('local', (config, hooks) => {
  if (config.type !== 'local') {
    throw new VaultError(VaultErrorCode.CONFIG_ERROR, `Expected a local vault config, got "${config.type}"`);
  }
  return new LocalVault(config, hooks);
});
