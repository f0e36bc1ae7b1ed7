/**
 * Configuration for the vaultenv CLI
 *
 * Turns command-line options and an optional YAML file into a vault
 * configuration plus the shared data configuration.
 */

import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { Static, Type } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { OutputFormat, OUTPUT_FORMATS, isOutputFormat } from './output';
import { VaultConfig, VaultError, VaultErrorCode, errorMessage } from '../vaults/types';

export const DEFAULT_CONFIG_FILE = 'vaultenv.yaml';
export const DEFAULT_LOCAL_DIR = '.vaultenv';

const GoogleVaultSchema = Type.Object({
  type: Type.Literal('google'),
  project: Type.String({ minLength: 1 }),
  credentialsFile: Type.Optional(Type.String({ minLength: 1 })),
  caFile: Type.Optional(Type.String({ minLength: 1 })),
}, { additionalProperties: false });

const LocalVaultSchema = Type.Object({
  type: Type.Literal('local'),
  dir: Type.String({ minLength: 1 }),
}, { additionalProperties: false });

const ConfigFileSchema = Type.Object({
  vault: Type.Union([GoogleVaultSchema, LocalVaultSchema]),
  secrets: Type.Optional(Type.Array(Type.String({ minLength: 1 }))),
  format: Type.Optional(Type.Union([Type.Literal('dotenv'), Type.Literal('json'), Type.Literal('shell')])),
  output: Type.Optional(Type.String({ minLength: 1 })),
}, { additionalProperties: false });

export type ConfigFile = Static<typeof ConfigFileSchema>;

/**
 * Shared data configuration: what to fetch and where it goes
 */
export interface DataConfig {
  secrets: string[];
  format: OutputFormat;
  /** File to write instead of stdout */
  output?: string;
}

/** Data options common to every vault command */
export interface DataOptions {
  secret?: string[];
  format?: string;
  output?: string;
  verbose?: boolean;
}

export interface CliConfig {
  vault: VaultConfig;
  data: DataConfig;
}

/**
 * Load and validate a YAML config file. Relative paths inside it are
 * resolved against the file's directory.
 *
 * @throws VaultError with CONFIG_ERROR code
 */
export function loadConfigFile(filePath: string): ConfigFile {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf8');
  } catch (err) {
    throw new VaultError(
      VaultErrorCode.CONFIG_ERROR,
      `Cannot read config file "${filePath}": ${errorMessage(err)}`,
      { cause: err }
    );
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(raw);
  } catch (err) {
    throw new VaultError(
      VaultErrorCode.CONFIG_ERROR,
      `Config file "${filePath}" is not valid YAML: ${errorMessage(err)}`,
      { cause: err }
    );
  }

  if (!Value.Check(ConfigFileSchema, parsed)) {
    const first = Value.Errors(ConfigFileSchema, parsed).First();
    const where = first?.path || '/';
    throw new VaultError(
      VaultErrorCode.CONFIG_ERROR,
      `Invalid config file "${filePath}": ${where}: ${first?.message ?? 'does not match schema'}`
    );
  }

  const baseDir = path.dirname(path.resolve(filePath));
  const config = parsed;

  if (config.vault.type === 'google') {
    config.vault.credentialsFile = resolveFrom(baseDir, config.vault.credentialsFile);
    config.vault.caFile = resolveFrom(baseDir, config.vault.caFile);
  } else {
    config.vault.dir = path.resolve(baseDir, config.vault.dir);
  }
  config.output = resolveFrom(baseDir, config.output);

  return config;
}

function resolveFrom(baseDir: string, value: string | undefined): string | undefined {
  return value === undefined ? undefined : path.resolve(baseDir, value);
}

/**
 * Merge command-line data options over file defaults.
 *
 * @throws VaultError with CONFIG_ERROR code
 */
export function resolveDataConfig(options: DataOptions, defaults: Partial<DataConfig> = {}): DataConfig {
  const secrets = options.secret && options.secret.length > 0 ? options.secret : defaults.secrets ?? [];
  if (secrets.length === 0) {
    throw new VaultError(
      VaultErrorCode.CONFIG_ERROR,
      'No secrets requested. Pass --secret <name> or list them under "secrets" in the config file.'
    );
  }

  const format = options.format ?? defaults.format ?? 'dotenv';
  if (!isOutputFormat(format)) {
    throw new VaultError(
      VaultErrorCode.CONFIG_ERROR,
      `Unknown output format "${format}". Available formats: ${OUTPUT_FORMATS.join(', ')}`
    );
  }

  return {
    secrets,
    format,
    output: options.output ?? defaults.output,
  };
}

/**
 * Build the full CLI configuration from a config file and options.
 */
export function configFromFile(filePath: string, options: DataOptions): CliConfig {
  const file = loadConfigFile(filePath);
  return {
    vault: file.vault,
    data: resolveDataConfig(options, {
      secrets: file.secrets,
      format: file.format,
      output: file.output,
    }),
  };
}
