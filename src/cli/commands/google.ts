import { DataOptions, resolveDataConfig } from '../config';
import { runVaultCommand } from '../load';

export interface GoogleCommandOptions extends DataOptions {
  project: string;
  credentialsFile?: string;
  caFile?: string;
}

export async function googleCommand(command: string[], options: GoogleCommandOptions): Promise<void> {
  await runVaultCommand(
    () => ({
      vault: {
        type: 'google',
        project: options.project,
        credentialsFile: options.credentialsFile || undefined,
        caFile: options.caFile,
      },
      data: resolveDataConfig(options),
    }),
    command,
    { verbose: options.verbose }
  );
}
