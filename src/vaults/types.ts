/**
 * Vault Interface
 *
 * Defines the contract every secret backend implements, plus the
 * error taxonomy shared by all of them.
 */

// --- Error Taxonomy --------------------------------------

/**
 * Error codes for categorizing vault failures.
 * Callers branch on the code, never on the message.
 */
export enum VaultErrorCode {
  /** TLS negotiation, certificate validation or connection failure */
  TRANSPORT_ERROR = 'TRANSPORT_ERROR',
  /** Credentials or vault configuration are missing, unreadable or malformed */
  CONFIG_ERROR = 'CONFIG_ERROR',
  /** The secret store answered with a non-success status */
  REMOTE_CALL_ERROR = 'REMOTE_CALL_ERROR',
  /** The call succeeded but carried no payload */
  EMPTY_SECRET = 'EMPTY_SECRET',
  /** Payload is not JSON or does not decode into env entries */
  DECODE_ERROR = 'DECODE_ERROR',
  /** Capability not offered by this backend */
  UNIMPLEMENTED = 'UNIMPLEMENTED',
}

/**
 * Canonical status names, as reported by Google APIs.
 */
export type StatusCode =
  | 'CANCELLED'
  | 'UNKNOWN'
  | 'INVALID_ARGUMENT'
  | 'DEADLINE_EXCEEDED'
  | 'NOT_FOUND'
  | 'ALREADY_EXISTS'
  | 'PERMISSION_DENIED'
  | 'RESOURCE_EXHAUSTED'
  | 'FAILED_PRECONDITION'
  | 'ABORTED'
  | 'OUT_OF_RANGE'
  | 'UNIMPLEMENTED'
  | 'INTERNAL'
  | 'UNAVAILABLE'
  | 'DATA_LOSS'
  | 'UNAUTHENTICATED';

export interface RpcStatus {
  code: StatusCode;
  message: string;
  httpStatus?: number;
}

/**
 * Typed error for vault operations.
 */
export class VaultError extends Error {
  readonly code: VaultErrorCode;
  readonly vault?: string;
  readonly secretName?: string;
  /** Remote status, set for REMOTE_CALL_ERROR */
  readonly status?: RpcStatus;

  constructor(
    code: VaultErrorCode,
    message: string,
    options?: { vault?: string; secretName?: string; status?: RpcStatus; cause?: unknown }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'VaultError';
    this.code = code;
    this.vault = options?.vault;
    this.secretName = options?.secretName;
    this.status = options?.status;
  }
}

/**
 * Message of a thrown value, whatever was thrown
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// --- Core Interface --------------------------------------

/** One decoded environment entry: [name, value] */
export type EnvEntry = [key: string, value: string];

/**
 * Backend-agnostic secret retrieval.
 *
 * Every call is self-contained: implementations resolve credentials and
 * open connections per call and keep no state between calls.
 */
export interface Vault {
  /** Vault type identifier (e.g., "google", "local") */
  readonly type: string;

  /**
   * Retrieve every key stored under a name prefix.
   * @throws VaultError with UNIMPLEMENTED on backends that do not offer it
   */
  downloadPrefixed(prefix: string): Promise<EnvEntry[]>;

  /**
   * Retrieve one secret, parse its payload as JSON and decode it into
   * environment entries.
   */
  downloadJson(secretName: string): Promise<EnvEntry[]>;
}

// --- Configuration ---------------------------------------

export interface GoogleVaultConfig {
  type: 'google';
  /** Google Cloud project holding the secrets */
  project: string;
  /** Credential JSON file; blank means default credential discovery */
  credentialsFile?: string;
  /** PEM bundle replacing the embedded root certificates */
  caFile?: string;
}

export interface LocalVaultConfig {
  type: 'local';
  /** Directory holding <secret>.json files */
  dir: string;
}

export type VaultConfig = GoogleVaultConfig | LocalVaultConfig;

/**
 * Hooks shared by every vault type.
 */
export interface VaultHooks {
  /** Called with a short description of each outgoing request */
  onRequest?: (description: string) => void;
}

/**
 * Factory function type for creating vault instances.
 */
export type VaultFactory = (config: VaultConfig, hooks: VaultHooks) => Vault;

// --- Secret names ----------------------------------------

/** Maximum length of a secret name */
const MAX_SECRET_NAME_LENGTH = 255;

/**
 * Validate a secret name for safety.
 * Rejects empty names, absolute paths and ".." segments.
 *
 * @throws VaultError with CONFIG_ERROR code on validation failure
 */
export function validateSecretName(secretName: string): void {
  if (!secretName) {
    throw new VaultError(VaultErrorCode.CONFIG_ERROR, 'Secret name must not be empty');
  }

  if (secretName.length > MAX_SECRET_NAME_LENGTH) {
    throw new VaultError(
      VaultErrorCode.CONFIG_ERROR,
      `Secret name exceeds maximum length of ${MAX_SECRET_NAME_LENGTH} characters`,
      { secretName }
    );
  }

  if (secretName.startsWith('/') || /^[A-Za-z]:/.test(secretName)) {
    throw new VaultError(
      VaultErrorCode.CONFIG_ERROR,
      `Secret name must be relative, got: "${secretName}"`,
      { secretName }
    );
  }

  for (const segment of secretName.split(/[/\\]/)) {
    if (segment === '..') {
      throw new VaultError(
        VaultErrorCode.CONFIG_ERROR,
        `Secret name must not contain ".." segments: "${secretName}"`,
        { secretName }
      );
    }
  }
}
