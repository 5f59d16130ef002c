import type { ConsoleUser } from '../../shared/types.js';
import type { PlatformCommandSupport, PlatformDialogSupport, PlatformInfo } from './base.js';
import { assertValidUser } from './base.js';
import { defaultHost, normalizeSerial, type HostAccess } from './host.js';

const DMI_SERIAL_PATH = '/sys/class/dmi/id/product_serial';

export interface PasswdEntry {
  username: string;
  uid: number;
  gecos: string;
  homeDir: string;
}

/** Parses one `name:x:uid:gid:gecos:home:shell` line. */
export function parsePasswdLine(line: string): PasswdEntry | null {
  const fields = line.trim().split(':');
  if (fields.length < 7) return null;
  const [username = '', , uidField = '', , gecos = '', homeDir = ''] = fields;
  const uid = parseInt(uidField, 10);
  if (!username || Number.isNaN(uid)) return null;
  return { username, uid, gecos, homeDir };
}

export class LinuxPlatformInfo implements PlatformInfo {
  readonly invalidUsers: readonly string[] = ['root', '', 'gdm', 'lightdm', 'sddm', 'nobody'];

  constructor(private readonly host: HostAccess = defaultHost) {}

  async getSerialNumber(): Promise<string | null> {
    // sysfs is readable without root on most distributions
    const fromSysfs = normalizeSerial(await this.host.readFile(DMI_SERIAL_PATH).catch(() => ''));
    if (fromSysfs) return fromSysfs;

    try {
      const stdout = await this.host.exec('dmidecode', ['-s', 'system-serial-number'], { timeout: 10000 });
      return normalizeSerial(stdout);
    } catch {
      return null;
    }
  }

  async getConsoleUser(): Promise<ConsoleUser | null> {
    const username = await this.findLoggedInUser();
    if (!username) return null;

    const entry = await this.lookupPasswd(username);
    if (!entry) return null;

    return (await this.host.pathExists(entry.homeDir))
      ? { username: entry.username, uid: entry.uid, homeDir: entry.homeDir }
      : null;
  }

  getHostname(): string {
    return this.host.hostname();
  }

  async getUserFullName(username: string): Promise<string | null> {
    const entry = await this.lookupPasswd(username);
    // GECOS is "Full Name,Room,Work Phone,Home Phone,Other"
    const fullName = entry?.gecos.split(',')[0]?.trim();
    return fullName || null;
  }

  getOsVersionLabel(): string {
    return `Linux Version: ${this.host.release()}`;
  }

  async getMdmEnrollmentStatus(): Promise<string | null> {
    return null;
  }

  private async findLoggedInUser(): Promise<string | null> {
    const sudoUser = this.host.env.SUDO_USER;
    if (sudoUser && !this.invalidUsers.includes(sudoUser)) return sudoUser;

    // logname fails without a controlling terminal
    const logname = (await this.host.exec('logname', [], { timeout: 5000 }).catch(() => '')).trim();
    if (logname && !this.invalidUsers.includes(logname)) return logname;

    const processUser = this.host.processUser();
    if (processUser && !this.invalidUsers.includes(processUser)) return processUser;
    return null;
  }

  private async lookupPasswd(username: string): Promise<PasswdEntry | null> {
    try {
      const stdout = await this.host.exec('getent', ['passwd', username], { timeout: 5000 });
      return parsePasswdLine(stdout);
    } catch {
      return null;
    }
  }
}

const LINUX_USERNAME = /^[A-Za-z0-9._@-]+$/;

export class LinuxCommandSupport implements PlatformCommandSupport {
  readonly minUserUid = 1000;

  runAsUserCommand(command: readonly string[], username: string, _uid: number): string[] {
    return ['sudo', '-u', username, ...command];
  }

  validateUser(username: string | null | undefined, uid: number | null | undefined): void {
    assertValidUser(username, uid, LINUX_USERNAME, this.minUserUid);
  }
}

export class LinuxDialogSupport implements PlatformDialogSupport {
  readonly sharedTempDir = '/tmp';
  readonly standardBinaryPath = null;
  readonly dialogAvailable = false;
  readonly unavailableMessage =
    'swiftDialog is not available on Linux. Dialog functionality is macOS-only; ' +
    'consider zenity or kdialog for Linux desktops.';
}
