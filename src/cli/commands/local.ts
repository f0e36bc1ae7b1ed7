import { DataOptions, DEFAULT_LOCAL_DIR, resolveDataConfig } from '../config';
import { runVaultCommand } from '../load';

export interface LocalCommandOptions extends DataOptions {
  dir?: string;
}

export async function localCommand(command: string[], options: LocalCommandOptions): Promise<void> {
  await runVaultCommand(
    () => ({
      vault: { type: 'local', dir: options.dir || DEFAULT_LOCAL_DIR },
      data: resolveDataConfig(options),
    }),
    command,
    { verbose: options.verbose }
  );
}
