/**
 * mdmkit - helpers for MDM deployment scripts.
 *
 * Logging, script parameter parsing, subprocess execution, system
 * information, webhook reports and swiftDialog integration for Jamf Pro and
 * Intune on macOS, Windows and Linux.
 */

export const VERSION = '0.4.0';

export { CommandRunner, sanitizeCommand } from './command-runner.js';
export type { CommandRunnerOptions } from './command-runner.js';
export { Dialog, buildDialogArgs, buttonForExitCode, parseDialogOutput, spawnDialog } from './dialog.js';
export type { DialogOptions, DialogSpawner, SpawnResult } from './dialog.js';
export {
  CommandExecutionError,
  CommandTimeoutError,
  InvalidUserError,
  UnsupportedPlatformError,
  UnsupportedProviderError,
  describeError,
} from './errors.js';
export { MdmLogger, formatRecord, splitRecords } from './logger.js';
export type { MdmLoggerOptions } from './logger.js';
export * from './mdm/index.js';
export { ParamParser } from './param-parser.js';
export * from './platforms/index.js';
export { isProcessRunning, listProcesses, matchesProcessName } from './processes.js';
export type { ProcInfo } from './processes.js';
export { SystemInfo } from './system-info.js';
export { WebhookSender } from './webhook-sender.js';
export type { WebhookSenderOptions } from './webhook-sender.js';
export * from '../shared/types.js';
