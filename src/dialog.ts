import { execFile } from 'node:child_process';
import { randomUUID } from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import {
  DialogExitCode,
  type DialogButton,
  type DialogConfig,
  type DialogFailure,
  type DialogResult,
  type DialogSuccess,
  type SelectResult,
  type SystemNotification,
} from '../shared/types.js';
import { describeError } from './errors.js';
import type { MdmLogger } from './logger.js';
import type { Platform } from './platforms/base.js';
import { getPlatform } from './platforms/detection.js';
import { defaultHost, type HostAccess } from './platforms/host.js';

const MAX_OUTPUT_BYTES = 4 * 1024 * 1024;

export interface SpawnResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/** Launches the dialog binary and resolves once it exits, whatever the status. */
export type DialogSpawner = (file: string, args: readonly string[]) => Promise<SpawnResult>;

export const spawnDialog: DialogSpawner = (file, args) =>
  new Promise((resolve, reject) => {
    execFile(file, [...args], { encoding: 'utf8', maxBuffer: MAX_OUTPUT_BYTES }, (error, stdout, stderr) => {
      // A numeric code is the dialog's own exit status; anything else is a spawn failure
      if (error && typeof error.code !== 'number') {
        reject(error);
        return;
      }
      resolve({ exitCode: typeof error?.code === 'number' ? error.code : 0, stdout, stderr });
    });
  });

const selectResultSchema = z.object({
  selectedValue: z.string(),
  selectedIndex: z.number(),
});

const dialogOutputSchema = z.record(z.union([z.string(), z.boolean(), z.number(), selectResultSchema]));

export function buildDialogArgs(config: DialogConfig, commandFile: string): string[] {
  const args = ['--title', config.title, '--message', config.message];

  if (config.icon) args.push('--icon', config.icon);
  if (config.button1Text) args.push('--button1text', config.button1Text);
  if (config.button2Text) args.push('--button2text', config.button2Text);
  if (config.infoButtonText) args.push('--infobuttontext', config.infoButtonText);
  if (config.timer !== undefined) args.push('--timer', String(config.timer));
  if (config.width !== undefined) args.push('--width', String(config.width));
  if (config.height !== undefined) args.push('--height', String(config.height));
  if (config.moveable) args.push('--moveable');
  if (config.ontop) args.push('--ontop');

  for (const field of config.textFields ?? []) {
    const modifiers = [
      field.required ? 'required' : null,
      field.secure ? 'secure' : null,
      field.prompt !== undefined ? `prompt=${field.prompt}` : null,
      field.value !== undefined ? `value=${field.value}` : null,
    ].filter((modifier): modifier is string => modifier !== null);
    args.push('--textfield', [field.title, ...modifiers].join(','));
  }

  for (const box of config.checkboxes ?? []) {
    const modifiers = [box.checked ? 'checked' : null, box.disabled ? 'disabled' : null].filter(
      (modifier): modifier is string => modifier !== null
    );
    args.push('--checkbox', [box.label, ...modifiers].join(','));
  }

  for (const select of config.selectItems ?? []) {
    args.push('--selecttitle', select.required ? `${select.title},required` : select.title);
    args.push('--selectvalues', select.values.join(','));
    if (select.defaultValue !== undefined) args.push('--selectdefault', select.defaultValue);
  }

  args.push('--commandfile', commandFile, '--json');
  return args;
}

export function buttonForExitCode(exitCode: number): DialogButton {
  switch (exitCode) {
    case DialogExitCode.Button1:
      return 'button1';
    case DialogExitCode.Button2:
      return 'button2';
    case DialogExitCode.InfoButton:
      return 'info';
    case DialogExitCode.TimerExpired:
      return 'timer';
    default:
      return 'none';
  }
}

/** Splits swiftDialog's `--json` output into plain values and select results. */
export function parseDialogOutput(stdout: string): Pick<DialogSuccess, 'values' | 'selections'> {
  const values: Record<string, string | boolean> = {};
  const selections: Record<string, SelectResult> = {};

  const trimmed = stdout.trim();
  if (!trimmed.startsWith('{')) return { values, selections };

  let raw: unknown;
  try {
    raw = JSON.parse(trimmed);
  } catch {
    return { values, selections };
  }
  const parsed = dialogOutputSchema.safeParse(raw);
  if (!parsed.success) return { values, selections };

  for (const [key, value] of Object.entries(parsed.data)) {
    if (typeof value === 'object') selections[key] = value;
    else if (typeof value === 'number') values[key] = String(value);
    else values[key] = value;
  }
  return { values, selections };
}

export interface DialogOptions {
  /** Overrides the platform's standard swiftDialog location. */
  binaryPath?: string;
  platform?: Platform;
  logger?: MdmLogger;
  host?: HostAccess;
  spawn?: DialogSpawner;
}

/**
 * swiftDialog integration. Only macOS has the binary: elsewhere every call
 * resolves to an `UnsupportedPlatformError` failure without spawning.
 */
export class Dialog {
  private readonly options: DialogOptions;
  private commandFile: string | null = null;

  constructor(options: DialogOptions = {}) {
    this.options = options;
  }

  get platform(): Platform {
    return this.options.platform ?? getPlatform();
  }

  async show(config: DialogConfig): Promise<DialogResult> {
    const ready = await this.locateBinary();
    if (!ready.ok) return ready;

    const commandFile = path.join(ready.platform.dialog.sharedTempDir, `mdmkit-dialog-${randomUUID()}.log`);
    this.commandFile = commandFile;
    try {
      const { exitCode, stdout } = await this.spawn(ready.binary, buildDialogArgs(config, commandFile));
      this.options.logger?.debug(`Dialog exited with code ${exitCode}`);
      return { ok: true, exitCode, button: buttonForExitCode(exitCode), ...parseDialogOutput(stdout) };
    } catch (error) {
      return this.spawnFailure(error);
    } finally {
      this.commandFile = null;
      await fs.rm(commandFile, { force: true }).catch((error: unknown) => {
        this.options.logger?.debug(`Could not remove dialog command file: ${describeError(error)}`);
      });
    }
  }

  async notify(notification: SystemNotification): Promise<DialogResult> {
    const ready = await this.locateBinary();
    if (!ready.ok) return ready;

    const args = ['--notification', '--title', notification.title, '--message', notification.message];
    if (notification.subtitle) args.push('--subtitle', notification.subtitle);
    try {
      const { exitCode } = await this.spawn(ready.binary, args);
      return { ok: true, exitCode, button: 'none', values: {}, selections: {} };
    } catch (error) {
      return this.spawnFailure(error);
    }
  }

  /**
   * Sends a live command (e.g. `progress: 50`) to the dialog currently shown.
   * Resolves false when no dialog is running.
   */
  async update(command: string): Promise<boolean> {
    if (!this.commandFile) return false;
    await fs.appendFile(this.commandFile, `${command}\n`, 'utf-8');
    return true;
  }

  private spawn(file: string, args: readonly string[]): Promise<SpawnResult> {
    return (this.options.spawn ?? spawnDialog)(file, args);
  }

  private async locateBinary(): Promise<{ ok: true; binary: string; platform: Platform } | DialogFailure> {
    let platform: Platform;
    try {
      platform = this.platform;
    } catch (error) {
      return { ok: false, reason: 'UnsupportedPlatformError', message: describeError(error) };
    }

    const { dialog } = platform;
    if (!dialog.dialogAvailable) {
      return { ok: false, reason: 'UnsupportedPlatformError', message: dialog.unavailableMessage };
    }

    const binary = this.options.binaryPath ?? dialog.standardBinaryPath;
    const host = this.options.host ?? defaultHost;
    if (!binary || !(await host.pathExists(binary))) {
      return {
        ok: false,
        reason: 'BinaryNotFound',
        message: `swiftDialog was not found at ${binary ?? '(no standard location)'}`,
      };
    }
    return { ok: true, binary, platform };
  }

  private spawnFailure(error: unknown): DialogFailure {
    const message = `Failed to launch swiftDialog: ${describeError(error)}`;
    this.options.logger?.error(message);
    return { ok: false, reason: 'SpawnFailed', message };
  }
}
