/**
 * JSON → environment decoding
 *
 * A secret payload is a flat JSON object; each member becomes one
 * environment entry.
 */

import { EnvEntry, VaultError, VaultErrorCode, errorMessage } from '../vaults/types';

const ENV_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Decode a parsed JSON secret into ordered environment entries.
 *
 * Strings pass through, numbers and booleans are stringified and nulls are
 * skipped. Nested objects and arrays are rejected.
 *
 * @throws VaultError with DECODE_ERROR code
 */
export function decodeEnvFromJson(secretName: string, value: unknown): EnvEntry[] {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    throw new VaultError(
      VaultErrorCode.DECODE_ERROR,
      `Secret "${secretName}" must contain a JSON object, got ${describe(value)}`,
      { secretName }
    );
  }

  const entries: EnvEntry[] = [];

  for (const [key, member] of Object.entries(value)) {
    if (!ENV_NAME_PATTERN.test(key) || key === '__proto__') {
      throw new VaultError(
        VaultErrorCode.DECODE_ERROR,
        `Secret "${secretName}": "${key}" is not a valid environment variable name`,
        { secretName }
      );
    }

    if (member === null) continue;

    switch (typeof member) {
      case 'string':
        entries.push([key, member]);
        break;
      case 'number':
      case 'boolean':
        entries.push([key, String(member)]);
        break;
      default:
        throw new VaultError(
          VaultErrorCode.DECODE_ERROR,
          `Secret "${secretName}": value of "${key}" must be a string, number or boolean, got ${describe(member)}`,
          { secretName }
        );
    }
  }

  return entries;
}

/**
 * Parse raw payload bytes as JSON and decode them.
 *
 * @throws VaultError with DECODE_ERROR code
 */
export function decodeEnvFromBytes(secretName: string, data: Buffer): EnvEntry[] {
  let value: unknown;
  try {
    value = JSON.parse(data.toString('utf8'));
  } catch (err) {
    throw new VaultError(
      VaultErrorCode.DECODE_ERROR,
      `Secret "${secretName}" is not valid JSON: ${errorMessage(err)}`,
      { secretName, cause: err }
    );
  }
  return decodeEnvFromJson(secretName, value);
}

/**
 * Merge entries from several secrets. A key keeps the position of its first
 * occurrence and the value of its last.
 */
export function mergeEntries(lists: EnvEntry[][]): EnvEntry[] {
  const merged = new Map<string, string>();
  for (const entries of lists) {
    for (const [key, value] of entries) {
      merged.set(key, value);
    }
  }
  return Array.from(merged.entries());
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'an array';
  return typeof value === 'object' ? 'an object' : `a ${typeof value}`;
}
