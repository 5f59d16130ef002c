import type { ConsoleUser, PlatformName } from '../../shared/types.js';
import { InvalidUserError } from '../errors.js';

/**
 * System information primitives each platform provides.
 */
export interface PlatformInfo {
  /** Usernames that mean "no real user is logged in". */
  readonly invalidUsers: readonly string[];
  getSerialNumber(): Promise<string | null>;
  getConsoleUser(): Promise<ConsoleUser | null>;
  getHostname(): string;
  getUserFullName(username: string): Promise<string | null>;
  /** Human-readable OS label for log banners, e.g. "macOS Version: 24.5.0". */
  getOsVersionLabel(): string;
  getMdmEnrollmentStatus(): Promise<string | null>;
}

/**
 * Run-as-user wrapping and user validation, which differ per OS.
 */
export interface PlatformCommandSupport {
  /** Lowest uid of a real human account on this platform. */
  readonly minUserUid: number;
  runAsUserCommand(command: readonly string[], username: string, uid: number): string[];
  /** Throws InvalidUserError when the user cannot be impersonated. */
  validateUser(username: string | null | undefined, uid: number | null | undefined): void;
}

/**
 * swiftDialog availability and locations.
 */
export interface PlatformDialogSupport {
  readonly sharedTempDir: string;
  readonly standardBinaryPath: string | null;
  readonly dialogAvailable: boolean;
  readonly unavailableMessage: string;
}

export interface Platform {
  readonly name: PlatformName;
  readonly info: PlatformInfo;
  readonly commands: PlatformCommandSupport;
  readonly dialog: PlatformDialogSupport;
}

/**
 * Shared validation: both fields present, username matches the platform's
 * pattern, uid at or above the platform threshold.
 */
export function assertValidUser(
  username: string | null | undefined,
  uid: number | null | undefined,
  pattern: RegExp,
  minUid: number
): void {
  const name = username ?? null;
  const id = uid ?? null;

  if (name === null || id === null) {
    throw new InvalidUserError(
      `Username and uid are both required (username=${JSON.stringify(name)}, uid=${id})`,
      name,
      id
    );
  }
  if (!pattern.test(name)) {
    throw new InvalidUserError(
      `Username ${JSON.stringify(name)} contains unsupported characters (uid=${id})`,
      name,
      id
    );
  }
  if (!Number.isInteger(id) || id < minUid) {
    throw new InvalidUserError(
      `uid ${id} of ${JSON.stringify(name)} is below the minimum of ${minUid} for a real user account`,
      name,
      id
    );
  }
}
