/**
 * Run a command with decoded secrets in its environment.
 */

import { spawn } from 'child_process';
import { EnvEntry } from '../vaults/types';

/**
 * Layer entries over a base environment. Entries win.
 */
export function buildExecEnv(
  entries: EnvEntry[],
  baseEnv: NodeJS.ProcessEnv = process.env
): NodeJS.ProcessEnv {
  // Own data properties only; a "__proto__" entry stays a variable
  return { ...baseEnv, ...Object.fromEntries(entries) };
}

/**
 * Spawn the command with inherited stdio and resolve with its exit code.
 * Signals map to 128 + signal number; a command that cannot start gives 127.
 */
export function executeCommand(
  command: string[],
  env: NodeJS.ProcessEnv,
  options: { cwd?: string; stdio?: 'inherit' | 'ignore' } = {}
): Promise<number> {
  if (command.length === 0) {
    return Promise.reject(new Error('Empty command'));
  }

  return new Promise((resolve) => {
    const proc = spawn(command[0], command.slice(1), {
      env,
      cwd: options.cwd,
      stdio: options.stdio ?? 'inherit',
      // Don't use shell — prevents injection
      shell: false,
    });

    proc.on('close', (code, signal) => {
      if (code !== null) {
        resolve(code);
        return;
      }
      resolve(128 + signalNumber(signal));
    });

    proc.on('error', (error) => {
      console.error(`Failed to execute command: ${error.message}`);
      resolve(127);
    });
  });
}

const SIGNAL_NUMBERS: Record<string, number> = {
  SIGHUP: 1,
  SIGINT: 2,
  SIGQUIT: 3,
  SIGKILL: 9,
  SIGTERM: 15,
};

function signalNumber(signal: NodeJS.Signals | null): number {
  return signal ? SIGNAL_NUMBERS[signal] ?? 1 : 1;
}
