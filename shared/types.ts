/**
 * Shared type definitions for mdmkit
 * Used by the library modules and the CLI
 */

// ============================================
// Descriptors
// ============================================

export type PlatformName = 'darwin' | 'win32' | 'linux';

export type ProviderName = 'jamf' | 'intune';

export const SUPPORTED_PLATFORMS: readonly PlatformName[] = ['darwin', 'win32', 'linux'];

export const SUPPORTED_PROVIDERS: readonly ProviderName[] = ['jamf', 'intune'];

export const PLATFORM_ENV_VAR = 'PYMDM_PLATFORM';
export const PROVIDER_ENV_VAR = 'PYMDM_MDM_PROVIDER';

// ============================================
// Users
// ============================================

export interface ConsoleUser {
  username: string;
  uid: number;
  homeDir: string;
}

// ============================================
// Commands
// ============================================

export interface CommandOptions {
  /** Seconds before the child is terminated. Defaults to 30; 0 disables the limit. */
  timeout?: number;
  /** Merged over the current process environment. */
  env?: Record<string, string>;
  cwd?: string;
  /** Run through the system shell. Implied for string commands. */
  shell?: boolean;
}

export type Command = string | readonly string[];

// ============================================
// Logging
// ============================================

export type LogLevel = 'info' | 'debug' | 'warn' | 'error';

export interface LogRecord {
  timestamp: string;
  level: LogLevel;
  message: string;
  exitCode?: number;
}

// ============================================
// Webhooks
// ============================================

export type WebhookMetadata = Record<string, unknown>;

/**
 * JSON body of a webhook POST: caller metadata verbatim, plus `hostname` and
 * `serial` when the caller left them out, and optionally `script_name` and
 * `log_tail`.
 */
export type WebhookPayload = Record<string, unknown>;

// ============================================
// Dialogs
// ============================================

export enum DialogExitCode {
  Button1 = 0,
  Button2 = 2,
  InfoButton = 3,
  TimerExpired = 4,
  CommandFileQuit = 5,
  UserQuit = 10,
  DoNotDisturb = 20,
  KeyAuthFailed = 30,
  ImageNotFound = 201,
  FileNotFound = 202,
}

export type DialogButton = 'button1' | 'button2' | 'info' | 'timer' | 'none';

export interface TextField {
  title: string;
  required?: boolean;
  prompt?: string;
  value?: string;
  secure?: boolean;
}

export interface CheckboxItem {
  label: string;
  checked?: boolean;
  disabled?: boolean;
}

export interface SelectItem {
  title: string;
  values: string[];
  defaultValue?: string;
  required?: boolean;
}

export interface SelectResult {
  selectedValue: string;
  selectedIndex: number;
}

export interface DialogConfig {
  title: string;
  message: string;
  icon?: string;
  button1Text?: string;
  button2Text?: string;
  infoButtonText?: string;
  /** Seconds until the dialog dismisses itself. */
  timer?: number;
  width?: number;
  height?: number;
  moveable?: boolean;
  ontop?: boolean;
  textFields?: TextField[];
  checkboxes?: CheckboxItem[];
  selectItems?: SelectItem[];
}

export interface SystemNotification {
  title: string;
  message: string;
  subtitle?: string;
}

export type DialogFailureReason = 'UnsupportedPlatformError' | 'BinaryNotFound' | 'SpawnFailed';

export interface DialogSuccess {
  ok: true;
  exitCode: number;
  button: DialogButton;
  values: Record<string, string | boolean>;
  selections: Record<string, SelectResult>;
}

export interface DialogFailure {
  ok: false;
  reason: DialogFailureReason;
  message: string;
}

export type DialogResult = DialogSuccess | DialogFailure;
