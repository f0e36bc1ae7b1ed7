#!/usr/bin/env node

/**
 * vaultenv CLI
 * Load secrets from a vault into the environment
 */

import { Command, Option } from 'commander';
import { googleCommand } from './commands/google';
import { localCommand } from './commands/local';
import { loadCommand } from './commands/load';
import { DEFAULT_CONFIG_FILE, DEFAULT_LOCAL_DIR } from './config';
import { CREDENTIALS_ENV } from '../core/credentials';
import { readFileSync } from 'fs';
import { join } from 'path';

// Read version from package.json
const packageJsonPath = join(__dirname, '../../package.json');
const packageJson: { version?: string } = JSON.parse(readFileSync(packageJsonPath, 'utf8'));
const version = packageJson.version || '0.0.0';

const program = new Command();

program
  .name('vaultenv')
  .description('Load secrets from a vault into the environment')
  .version(version);

function withDataOptions(command: Command): Command {
  return command
    .argument('[command...]', 'Command to run with the secrets in its environment (after --)')
    .option('-s, --secret <name...>', 'Secret(s) to load; later secrets override earlier keys')
    .option('-f, --format <format>', 'Output format (dotenv|json|shell), default dotenv')
    .option('-o, --output <file>', 'Write entries to a file instead of stdout')
    .option('-v, --verbose', 'Log each request to stderr');
}

withDataOptions(
  program
    .command('google')
    .description('Load JSON secrets from Google Secret Manager')
)
  .requiredOption('-p, --project <id>', 'Google project to use')
  .addOption(
    new Option('-c, --credentials-file <path>', 'Path to credentials file. Leave blank to use default credentials resolution')
      .env(CREDENTIALS_ENV)
  )
  .option('--ca-file <path>', 'PEM bundle to trust instead of the embedded root certificates')
  .action(googleCommand);

withDataOptions(
  program
    .command('local')
    .description('Load JSON secrets from <dir>/<secret>.json files')
)
  .option('-d, --dir <path>', 'Directory holding the secret files', DEFAULT_LOCAL_DIR)
  .action(localCommand);

withDataOptions(
  program
    .command('load')
    .description('Load secrets as described by a YAML config file')
)
  .option('-C, --config <path>', 'Config file', DEFAULT_CONFIG_FILE)
  .action(loadCommand);

program.parse();
