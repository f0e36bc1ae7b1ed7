/**
 * Render decoded entries for the terminal or a file
 */

import { EnvEntry } from '../vaults/types';

export const OUTPUT_FORMATS = ['dotenv', 'json', 'shell'] as const;

export type OutputFormat = typeof OUTPUT_FORMATS[number];

export function isOutputFormat(value: string): value is OutputFormat {
  return (OUTPUT_FORMATS as readonly string[]).includes(value);
}

export function formatEntries(entries: EnvEntry[], format: OutputFormat): string {
  switch (format) {
    case 'json':
      return JSON.stringify(Object.fromEntries(entries), null, 2) + '\n';
    case 'shell':
      return entries.map(([key, value]) => `export ${key}=${shellQuote(value)}\n`).join('');
    case 'dotenv':
      return entries.map(([key, value]) => `${key}=${dotenvQuote(value)}\n`).join('');
  }
}

/** Double-quoted dotenv value; backslash, quote, dollar and newlines escaped */
export function dotenvQuote(value: string): string {
  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\$/g, '\\$')
    .replace(/\r/g, '\\r')
    .replace(/\n/g, '\\n');
  return `"${escaped}"`;
}

/** Single-quoted POSIX shell word */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}
