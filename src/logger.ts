import fs from 'node:fs';
import path from 'node:path';
import type { LogLevel, LogRecord } from '../shared/types.js';
import { describeError } from './errors.js';
import type { Platform } from './platforms/base.js';
import { getPlatform } from './platforms/detection.js';

export interface MdmLoggerOptions {
  /** Append-only log file. Without one, records only go to the console. */
  logPath?: string;
  /** Write debug records. Off by default. */
  debug?: boolean;
  /** Echo records to stdout/stderr. Defaults to true. */
  console?: boolean;
  /** Platform used for the startup banner; resolved lazily when omitted. */
  platform?: Platform;
  /** Called by `error()` with an exit code. Defaults to `process.exit`. */
  exit?: (code: number) => void;
}

// Lines after the first of a multi-line message carry this prefix
const CONTINUATION = '    ';
const RECORD_START = /^\d{4}-\d{2}-\d{2}T\S+ \[[A-Z]+\] /;

/**
 * One record per entry: embedded newlines (stack traces, command output) are
 * indented so that only the first line starts with a timestamp.
 */
export function formatRecord(record: LogRecord): string {
  const exitNote = record.exitCode === undefined ? '' : ` (exit code: ${record.exitCode})`;
  const message = record.message.replace(/\r?\n/g, `\n${CONTINUATION}`);
  return `${record.timestamp} [${record.level.toUpperCase()}] ${message}${exitNote}`;
}

/** Groups log file lines into records, joining continuation lines onto their record. */
export function splitRecords(text: string): string[] {
  const records: string[][] = [];
  for (const line of text.split('\n')) {
    if (!line) continue;
    const current = records[records.length - 1];
    if (current && !RECORD_START.test(line)) current.push(line);
    else records.push([line]);
  }
  return records.map((lines) => lines.join('\n'));
}

/**
 * Line-oriented logger for deployment scripts.
 *
 * The file is opened in append mode on the first write and held until
 * `close()`. Every leveled method goes through `updateLog`, and only
 * `error()` given an exit code ends the process.
 */
export class MdmLogger {
  readonly logPath: string | null;
  readonly debugEnabled: boolean;
  private readonly echo: boolean;
  private readonly platform: Platform | undefined;
  private readonly exit: (code: number) => void;
  private fd: number | null = null;

  constructor(options: MdmLoggerOptions = {}) {
    this.logPath = options.logPath ?? null;
    this.debugEnabled = options.debug ?? false;
    this.echo = options.console ?? true;
    this.platform = options.platform;
    this.exit = options.exit ?? ((code) => process.exit(code));
  }

  get isOpen(): boolean {
    return this.fd !== null;
  }

  updateLog(level: LogLevel, message: string, exitCode?: number): LogRecord {
    const record: LogRecord = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(exitCode !== undefined && { exitCode }),
    };
    const line = formatRecord(record);

    if (this.echo) {
      if (level === 'error') console.error(line);
      else console.log(line);
    }
    this.writeLine(line);
    return record;
  }

  info(message: string, exitCode?: number): void {
    this.updateLog('info', message, exitCode);
  }

  debug(message: string, exitCode?: number): void {
    if (!this.debugEnabled) return;
    this.updateLog('debug', message, exitCode);
  }

  warn(message: string, exitCode?: number): void {
    this.updateLog('warn', message, exitCode);
  }

  error(message: string, exitCode?: number): void {
    this.updateLog('error', message, exitCode);
    if (exitCode !== undefined) {
      this.close();
      this.exit(exitCode);
    }
  }

  /** Error-level record with the error's name, message and stack. */
  logException(message: string, error: unknown, exitCode?: number): void {
    this.error(`${message}: ${describeError(error, true)}`, exitCode);
  }

  logStartup(name: string, version: string): void {
    this.updateLog('info', `===== ${name} v${version} =====`);
    this.updateLog('info', this.osLabel());
    this.updateLog('info', `Hostname: ${this.hostname()}`);
  }

  /** Last `count` records of the log file, oldest first, continuation lines included. */
  readTail(count: number): string[] {
    if (!this.logPath || count <= 0) return [];
    try {
      return splitRecords(fs.readFileSync(this.logPath, 'utf-8')).slice(-count);
    } catch {
      return [];
    }
  }

  close(): void {
    if (this.fd === null) return;
    try {
      fs.closeSync(this.fd);
    } finally {
      this.fd = null;
    }
  }

  private writeLine(line: string): void {
    if (!this.logPath) return;
    try {
      if (this.fd === null) {
        fs.mkdirSync(path.dirname(this.logPath), { recursive: true });
        this.fd = fs.openSync(this.logPath, 'a');
      }
      fs.writeSync(this.fd, `${line}\n`, null, 'utf-8');
    } catch (fileError) {
      // The console copy is all that is left
      console.error(`Failed to write to log file ${this.logPath}: ${describeError(fileError)}`);
    }
  }

  private resolvePlatform(): Platform | null {
    try {
      return this.platform ?? getPlatform();
    } catch {
      return null;
    }
  }

  private osLabel(): string {
    return this.resolvePlatform()?.info.getOsVersionLabel() ?? `Unsupported OS: ${process.platform}`;
  }

  private hostname(): string {
    return this.resolvePlatform()?.info.getHostname() ?? '';
  }
}
