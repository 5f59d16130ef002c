import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { vi } from 'vitest';
import { createHost, type ExecOptions, type HostAccess } from '../src/platforms/host.js';

/** Canned stdout (or failure) per command line, keyed by `file arg1 arg2 ...`. */
export type ExecResponses = Record<string, string | Error>;

export function fakeHost(responses: ExecResponses = {}, overrides: Partial<HostAccess> = {}) {
  const exec = vi.fn(async (file: string, args: readonly string[], _options?: ExecOptions) => {
    const key = [file, ...args].join(' ');
    const response = responses[key];
    if (response === undefined) throw new Error(`Command failed: ${key}`);
    if (response instanceof Error) throw response;
    return response;
  });
  const readFile = vi.fn(async (file: string): Promise<string> => {
    throw new Error(`ENOENT: no such file or directory, open '${file}'`);
  });
  const pathExists = vi.fn(async (_file: string) => true);

  const host = createHost({
    exec,
    readFile,
    pathExists,
    env: {},
    hostname: () => 'test-host',
    release: () => '23.4.0',
    homedir: () => '/home/test',
    tmpdir: () => '/tmp',
    processUser: () => null,
    ...overrides,
  });
  return { host, exec, readFile, pathExists };
}

export function makeTempDir(prefix = 'mdmkit-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function cleanup(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function readLines(file: string): string[] {
  return fs.readFileSync(file, 'utf-8').split('\n').filter((line) => line);
}
