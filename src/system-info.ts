import type { ConsoleUser } from '../shared/types.js';
import type { Platform } from './platforms/base.js';
import { getPlatform } from './platforms/detection.js';
import { isProcessRunning } from './processes.js';

let platformOverride: Platform | null = null;

function currentPlatform(): Platform | null {
  try {
    return platformOverride ?? getPlatform();
  } catch {
    return null;
  }
}

/**
 * Static system queries for MDM scripts. Each call delegates to the platform
 * resolved on first use and degrades to `null`, `''` or `false` instead of
 * throwing: these feed diagnostics, not control flow.
 */
export class SystemInfo {
  /** Pins the facade to a platform bundle; `null` restores auto-detection. */
  static usePlatform(platform: Platform | null): void {
    platformOverride = platform;
  }

  static getInvalidUsers(): readonly string[] {
    return currentPlatform()?.info.invalidUsers ?? [];
  }

  static async getSerialNumber(): Promise<string | null> {
    return (await currentPlatform()?.info.getSerialNumber().catch(() => null)) ?? null;
  }

  static async getConsoleUser(): Promise<ConsoleUser | null> {
    return (await currentPlatform()?.info.getConsoleUser().catch(() => null)) ?? null;
  }

  static getHostname(): string {
    try {
      return currentPlatform()?.info.getHostname() ?? '';
    } catch {
      return '';
    }
  }

  static async getUserFullName(username: string): Promise<string | null> {
    return (await currentPlatform()?.info.getUserFullName(username).catch(() => null)) ?? null;
  }

  static getOsVersionLabel(): string {
    return currentPlatform()?.info.getOsVersionLabel() ?? '';
  }

  static async getMdmEnrollmentStatus(): Promise<string | null> {
    return (await currentPlatform()?.info.getMdmEnrollmentStatus().catch(() => null)) ?? null;
  }

  static async isProcessRunning(name: string): Promise<boolean> {
    return isProcessRunning(name).catch(() => false);
  }
}
