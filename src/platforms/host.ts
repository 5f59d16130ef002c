import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import fs from 'node:fs/promises';
import os from 'node:os';

const execFileP = promisify(execFile);

export interface ExecOptions {
  /** Milliseconds before the child is killed. */
  timeout?: number;
}

/**
 * Everything the platform implementations need from the host. Tests swap in
 * doubles so that no real system tool is invoked.
 */
export interface HostAccess {
  /** Runs a binary and resolves its stdout; rejects on spawn failure or non-zero exit. */
  exec(file: string, args: readonly string[], options?: ExecOptions): Promise<string>;
  readFile(file: string): Promise<string>;
  pathExists(file: string): Promise<boolean>;
  env: NodeJS.ProcessEnv;
  hostname(): string;
  release(): string;
  homedir(): string;
  tmpdir(): string;
  /** Name of the user owning this process. */
  processUser(): string | null;
}

export const defaultHost: HostAccess = {
  async exec(file, args, options = {}) {
    const { stdout } = await execFileP(file, [...args], {
      encoding: 'utf8',
      timeout: options.timeout ?? 0,
      windowsHide: true,
    });
    return stdout;
  },
  readFile: (file) => fs.readFile(file, 'utf-8'),
  async pathExists(file) {
    try {
      await fs.access(file);
      return true;
    } catch {
      return false;
    }
  },
  env: process.env,
  hostname: () => os.hostname(),
  release: () => os.release(),
  homedir: () => os.homedir(),
  tmpdir: () => os.tmpdir(),
  processUser() {
    try {
      return os.userInfo().username;
    } catch {
      return null;
    }
  },
};

export function createHost(overrides: Partial<HostAccess> = {}): HostAccess {
  return { ...defaultHost, ...overrides };
}

// Serial numbers OEMs leave unset
const PLACEHOLDER_SERIALS = new Set(['', 'none', 'to be filled by o.e.m.', 'default string', '0']);

export function normalizeSerial(raw: string | undefined): string | null {
  const serial = raw?.trim() ?? '';
  return PLACEHOLDER_SERIALS.has(serial.toLowerCase()) ? null : serial;
}
