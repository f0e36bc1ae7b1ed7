/**
 * vaultenv
 *
 * Library entry: vaults, credential resolution and the JSON decoder.
 */

export * from './vaults';
export { decodeEnvFromJson, decodeEnvFromBytes, mergeEntries } from './core/convert';
export { resolveCredential, credentialFromFile, CREDENTIALS_ENV } from './core/credentials';
export type { Credential, CredentialOptions } from './core/credentials';
export { connectChannel, SecureChannel, EMBEDDED_ROOT_CERTIFICATES, SECRET_MANAGER_DOMAIN } from './core/channel';
export type { ChannelOptions, ConnectFn } from './core/channel';
export { AuthenticatedClient, SecretManagerClient, RpcStatusError, authInterceptor } from './core/client';
export type { Interceptor } from './core/client';
