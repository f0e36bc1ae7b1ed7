/**
 * Tests for running a command with secrets in its environment
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { buildExecEnv, executeCommand } from './exec';

describe('buildExecEnv', () => {
  it('layers entries over the base environment', () => {
    const env = buildExecEnv(
      [['DB_PASS', 'secret123'], ['APP_NAME', 'myapp']],
      { PATH: '/usr/bin', APP_NAME: 'old' }
    );

    expect(env).toEqual({ PATH: '/usr/bin', APP_NAME: 'myapp', DB_PASS: 'secret123' });
  });

  it('does not modify the base environment', () => {
    const base = { PATH: '/usr/bin' };

    buildExecEnv([['DB_PASS', 'secret123']], base);

    expect(base).toEqual({ PATH: '/usr/bin' });
  });

  it('keeps a __proto__ entry as an own variable', () => {
    const env = buildExecEnv([['__proto__', 'x']], { PATH: '/usr/bin' });

    expect(Object.keys(env)).toEqual(['PATH', '__proto__']);
    expect(Object.getOwnPropertyDescriptor(env, '__proto__')?.value).toBe('x');
    expect(Object.getPrototypeOf(env)).toBe(Object.prototype);
  });

  it('defaults to the process environment', () => {
    const env = buildExecEnv([]);

    expect(env.PATH).toBe(process.env.PATH);
  });
});

describe('executeCommand', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('resolves with the exit code of the command', async () => {
    const code = await executeCommand(
      [process.execPath, '-e', 'process.exit(3)'],
      buildExecEnv([]),
      { stdio: 'ignore' }
    );

    expect(code).toBe(3);
  });

  it('passes the environment to the command', async () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'vaultenv-exec-'));
    const outFile = path.join(tmpDir, 'out.txt');

    const code = await executeCommand(
      [process.execPath, '-e', `require('fs').writeFileSync(${JSON.stringify(outFile)}, process.env.DB_PASS)`],
      buildExecEnv([['DB_PASS', 'secret123']]),
      { stdio: 'ignore' }
    );

    const written = fs.readFileSync(outFile, 'utf8');
    fs.rmSync(tmpDir, { recursive: true, force: true });
    expect(code).toBe(0);
    expect(written).toBe('secret123');
  });

  it('does not interpret shell syntax', async () => {
    const code = await executeCommand(
      [process.execPath, '-e', 'process.exit(process.argv[1] === "$(exit 9)" ? 0 : 1)', '$(exit 9)'],
      buildExecEnv([]),
      { stdio: 'ignore' }
    );

    expect(code).toBe(0);
  });

  it('maps a terminating signal to 128 + its number', async () => {
    const code = await executeCommand(
      [process.execPath, '-e', 'process.kill(process.pid, "SIGTERM")'],
      buildExecEnv([]),
      { stdio: 'ignore' }
    );

    expect(code).toBe(143);
  });

  it('resolves 127 when the command cannot start', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    const code = await executeCommand(['vaultenv-no-such-command'], buildExecEnv([]), { stdio: 'ignore' });

    expect(code).toBe(127);
    expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining('Failed to execute command:'));
  });

  it('rejects an empty command', async () => {
    await expect(executeCommand([], {})).rejects.toThrow('Empty command');
  });
});
