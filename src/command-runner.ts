import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import isRoot from 'is-root';
import type { Command, CommandOptions } from '../shared/types.js';
import { CommandExecutionError, CommandTimeoutError } from './errors.js';
import type { MdmLogger } from './logger.js';
import type { Platform } from './platforms/base.js';
import { getPlatform } from './platforms/detection.js';

const execFileP = promisify(execFile);

const DEFAULT_TIMEOUT_SECONDS = 30;
const MAX_OUTPUT_BYTES = 16 * 1024 * 1024;
// Conventional shell status for "command not found"
const NOT_FOUND_EXIT_CODE = 127;
const MAX_BUFFER_CODE = 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER';

// Order matters: specific patterns run before the general ones they overlap
const REDACTIONS: ReadonlyArray<[RegExp, string]> = [
  [/Authorization:\s*Bearer\s+\S+/gi, 'Authorization: Bearer <REDACTED>'],
  [/Bearer\s+\S+/gi, 'Bearer <REDACTED>'],
  [/token[=:]\S+/gi, 'token=<REDACTED>'],
  [/api[_-]?key[=:]\S+/gi, 'api_key=<REDACTED>'],
  [/password[=:]\S+/gi, 'password=<REDACTED>'],
  [/client[_-]?secret[=:]\S+/gi, 'client_secret=<REDACTED>'],
  [/client[_-]?id[=:]\S+/gi, 'client_id=<REDACTED>'],
  [/Authorization:\s*(?!Bearer)(?:(?:Basic|Digest|Negotiate|Token)\s+)?\S+/gi, 'Authorization: <REDACTED>'],
  [/(^|\s)(-p|--password)(\s+|=)(?!<REDACTED>)\S+/g, '$1$2$3<REDACTED>'],
];

/** Masks credentials in a command before it reaches a log. */
export function sanitizeCommand(command: Command): string {
  const text = typeof command === 'string' ? command : command.join(' ');
  return REDACTIONS.reduce((sanitized, [pattern, replacement]) => sanitized.replace(pattern, replacement), text);
}

interface ExecFailure {
  code?: unknown;
  killed?: unknown;
  signal?: unknown;
  stdout?: unknown;
  stderr?: unknown;
  message: string;
}

function isExecFailure(error: unknown): error is ExecFailure {
  return error instanceof Error;
}

function asText(value: unknown): string {
  if (typeof value === 'string') return value;
  if (Buffer.isBuffer(value)) return value.toString('utf-8');
  return '';
}

export interface CommandRunnerOptions {
  logger?: MdmLogger;
  /** Logged-in user for `runAsUser`. */
  username?: string;
  uid?: number;
  /** Platform whose run-as-user rules apply; resolved lazily when omitted. */
  platform?: Platform;
}

/**
 * Subprocess execution for deployment scripts.
 *
 * Array commands run without a shell; a string command (or `shell: true`)
 * goes through the system shell. Output is captured and the trimmed stdout
 * returned.
 */
export class CommandRunner {
  readonly username: string | undefined;
  readonly uid: number | undefined;
  private readonly logger: MdmLogger | undefined;
  private readonly platformOverride: Platform | undefined;

  constructor(options: CommandRunnerOptions = {}) {
    this.logger = options.logger;
    this.username = options.username;
    this.uid = options.uid;
    this.platformOverride = options.platform;
  }

  get platform(): Platform {
    return this.platformOverride ?? getPlatform();
  }

  async run(command: Command, options: CommandOptions = {}): Promise<string> {
    const timeoutSeconds = options.timeout ?? DEFAULT_TIMEOUT_SECONDS;
    const sanitized = sanitizeCommand(command);
    const useShell = options.shell === true || typeof command === 'string';
    const [file, args] = toInvocation(command, useShell);

    this.logger?.debug(`Running: ${sanitized}`);

    try {
      const { stdout } = await execFileP(file, args, {
        encoding: 'utf8',
        shell: useShell,
        timeout: timeoutSeconds > 0 ? timeoutSeconds * 1000 : 0,
        env: options.env ? { ...process.env, ...options.env } : process.env,
        cwd: options.cwd,
        maxBuffer: MAX_OUTPUT_BYTES,
        windowsHide: true,
      });
      return stdout.trimEnd();
    } catch (error) {
      throw this.translateFailure(error, sanitized, timeoutSeconds);
    }
  }

  /**
   * Runs the command in the configured user's context using the platform's
   * impersonation wrapper. Throws InvalidUserError before spawning anything
   * when the user does not pass the platform's checks.
   */
  async runAsUser(command: readonly string[], options: Omit<CommandOptions, 'shell'> = {}): Promise<string> {
    const { commands } = this.platform;
    try {
      commands.validateUser(this.username, this.uid);
    } catch (error) {
      this.logger?.error(`User validation failed (username=${JSON.stringify(this.username ?? null)}, uid=${this.uid ?? null})`);
      throw error;
    }
    // validateUser guarantees both are set
    const username = this.username ?? '';
    const uid = this.uid ?? 0;

    if (this.platform.name !== 'win32' && !isRoot()) {
      this.logger?.warn('Running a command as another user usually requires root privileges');
    }

    this.logger?.debug(`Running: ${sanitizeCommand(command)} as the logged in user ${username} (UID: ${uid})`);
    return this.run(commands.runAsUserCommand(command, username, uid), options);
  }

  private translateFailure(error: unknown, command: string, timeoutSeconds: number): Error {
    if (!isExecFailure(error)) {
      return new CommandExecutionError(`Command failed: ${command}`, command, 1, String(error));
    }

    if (error.code === MAX_BUFFER_CODE) {
      const message = `Command output exceeded ${MAX_OUTPUT_BYTES} bytes: ${command}`;
      this.logger?.error(message);
      return new CommandExecutionError(message, command, null, asText(error.stderr), asText(error.stdout));
    }

    if (error.killed === true && timeoutSeconds > 0) {
      this.logger?.error(`Command timed out after ${timeoutSeconds}s`);
      return new CommandTimeoutError(`Command timed out after ${timeoutSeconds}s: ${command}`, command, timeoutSeconds);
    }

    const stderr = asText(error.stderr);
    const stdout = asText(error.stdout);
    const exitCode = typeof error.code === 'number' ? error.code : error.code === 'ENOENT' ? NOT_FOUND_EXIT_CODE : 1;
    this.logger?.error(`Command failed: ${stderr.trim() || error.message}`);
    return new CommandExecutionError(
      `Command exited with status ${exitCode}: ${command}`,
      command,
      exitCode,
      stderr || error.message,
      stdout
    );
  }
}

function toInvocation(command: Command, useShell: boolean): [string, string[]] {
  if (typeof command === 'string') return [command, []];
  if (useShell) return [command.join(' '), []];
  const [file = '', ...args] = command;
  return [file, args];
}
