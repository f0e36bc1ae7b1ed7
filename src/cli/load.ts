/**
 * Shared flow for every vault command: fetch the requested secrets, then
 * print them, write them to a file, or hand them to a child command.
 */

import fs from 'fs';
import { CliConfig, DataConfig } from './config';
import { formatEntries } from './output';
import { buildExecEnv, executeCommand } from '../core/exec';
import { mergeEntries } from '../core/convert';
import { createVault } from '../vaults/registry';
import { EnvEntry, Vault, VaultError } from '../vaults/types';

/**
 * Download each secret in order and merge the results.
 * Stops at the first failure.
 */
export async function loadEntries(vault: Vault, secrets: string[]): Promise<EnvEntry[]> {
  const lists: EnvEntry[][] = [];
  for (const secret of secrets) {
    lists.push(await vault.downloadJson(secret));
  }
  return mergeEntries(lists);
}

/**
 * Print or write the entries, or run the command with them.
 * Resolves with the exit code for the process.
 */
export async function deliver(entries: EnvEntry[], data: DataConfig, command: string[]): Promise<number> {
  if (command.length > 0) {
    return executeCommand(command, buildExecEnv(entries));
  }

  const rendered = formatEntries(entries, data.format);
  if (data.output) {
    fs.writeFileSync(data.output, rendered, { mode: 0o600 });
    console.error(`✅ Wrote ${entries.length} entries to ${data.output}`);
  } else {
    process.stdout.write(rendered);
  }
  return 0;
}

export function reportError(error: unknown): void {
  if (error instanceof VaultError) {
    console.error('❌ Error:', error.message);
    console.error(`   code: ${error.code}`);
    if (error.status) {
      console.error(`   status: ${error.status.code}`);
    }
    if (error.cause instanceof Error && !error.message.includes(error.cause.message)) {
      console.error(`   cause: ${error.cause.message}`);
    }
  } else if (error instanceof Error) {
    console.error('❌ Error:', error.message);
  } else {
    console.error('❌ Unknown error occurred');
  }
}

/**
 * Run a vault command end to end and exit the process.
 * `buildConfig` runs inside the error boundary so bad options are reported
 * the same way as vault failures.
 */
export async function runVaultCommand(
  buildConfig: () => CliConfig,
  command: string[],
  options: { verbose?: boolean } = {}
): Promise<void> {
  let exitCode: number;
  try {
    const config = buildConfig();
    const vault = createVault(config.vault, {
      onRequest: options.verbose
        ? (description) => console.error(`→ ${config.vault.type}: ${description}`)
        : undefined,
    });
    const entries = await loadEntries(vault, config.data.secrets);
    exitCode = await deliver(entries, config.data, command);
  } catch (error) {
    reportError(error);
    exitCode = 1;
  }
  process.exit(exitCode);
}
