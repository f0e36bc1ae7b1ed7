import { configFromFile, DataOptions, DEFAULT_CONFIG_FILE } from '../config';
import { runVaultCommand } from '../load';

export interface LoadCommandOptions extends DataOptions {
  config?: string;
}

export async function loadCommand(command: string[], options: LoadCommandOptions): Promise<void> {
  await runVaultCommand(
    () => configFromFile(options.config || DEFAULT_CONFIG_FILE, options),
    command,
    { verbose: options.verbose }
  );
}
