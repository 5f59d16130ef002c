import { z } from 'zod';
import type { ConsoleUser } from '../../shared/types.js';
import type { PlatformCommandSupport, PlatformDialogSupport, PlatformInfo } from './base.js';
import { assertValidUser } from './base.js';
import { defaultHost, normalizeSerial, type HostAccess } from './host.js';

const hardwareReport = z.object({
  SPHardwareDataType: z
    .array(z.object({ serial_number: z.string() }).passthrough())
    .min(1),
});

export class DarwinPlatformInfo implements PlatformInfo {
  readonly invalidUsers: readonly string[] = ['root', '', 'loginwindow', '_mbsetupuser'];

  constructor(private readonly host: HostAccess = defaultHost) {}

  async getSerialNumber(): Promise<string | null> {
    try {
      const stdout = await this.host.exec('/usr/sbin/system_profiler', ['SPHardwareDataType', '-json']);
      const parsed = hardwareReport.safeParse(JSON.parse(stdout));
      if (!parsed.success) return null;
      return normalizeSerial(parsed.data.SPHardwareDataType[0]?.serial_number);
    } catch {
      return null;
    }
  }

  async getConsoleUser(): Promise<ConsoleUser | null> {
    let username: string;
    try {
      username = (await this.host.exec('/usr/bin/stat', ['-f%Su', '/dev/console'])).trim();
    } catch {
      return null;
    }
    if (this.invalidUsers.includes(username)) return null;

    let uid: number;
    try {
      uid = parseInt((await this.host.exec('/usr/bin/id', ['-u', username])).trim(), 10);
    } catch {
      return null;
    }
    if (Number.isNaN(uid)) return null;

    const homeDir = `/Users/${username}`;
    return (await this.host.pathExists(homeDir)) ? { username, uid, homeDir } : null;
  }

  getHostname(): string {
    return this.host.hostname();
  }

  async getUserFullName(username: string): Promise<string | null> {
    try {
      const name = (await this.host.exec('/usr/bin/id', ['-F', username])).trim();
      return name || null;
    } catch {
      return null;
    }
  }

  getOsVersionLabel(): string {
    return `macOS Version: ${this.host.release()}`;
  }

  async getMdmEnrollmentStatus(): Promise<string | null> {
    try {
      const stdout = await this.host.exec('/usr/bin/profiles', ['status', '-type', 'enrollment'], { timeout: 10000 });
      return stdout.trim() || null;
    } catch {
      return null;
    }
  }
}

// Directory accounts come through as first.last or user@domain
const DARWIN_USERNAME = /^[A-Za-z0-9._@-]+$/;

export class DarwinCommandSupport implements PlatformCommandSupport {
  readonly minUserUid = 500;

  runAsUserCommand(command: readonly string[], username: string, uid: number): string[] {
    return ['/bin/launchctl', 'asuser', String(uid), 'sudo', '-u', username, ...command];
  }

  validateUser(username: string | null | undefined, uid: number | null | undefined): void {
    assertValidUser(username, uid, DARWIN_USERNAME, this.minUserUid);
  }
}

export class DarwinDialogSupport implements PlatformDialogSupport {
  readonly sharedTempDir = '/Users/Shared';
  readonly standardBinaryPath = '/usr/local/bin/dialog';
  readonly dialogAvailable = true;
  readonly unavailableMessage = '';
}
