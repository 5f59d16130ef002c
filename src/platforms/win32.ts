import type { ConsoleUser } from '../../shared/types.js';
import type { PlatformCommandSupport, PlatformDialogSupport, PlatformInfo } from './base.js';
import { assertValidUser } from './base.js';
import { defaultHost, normalizeSerial, type HostAccess } from './host.js';

const POWERSHELL = 'powershell';

/** Quotes a value for a single-quoted PowerShell string literal. */
export function psQuote(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/**
 * Extracts the relative identifier (last SID component) from
 * `whoami /user /fo csv /nh` output, e.g. `"host\jane","S-1-5-21-...-1001"`.
 */
export function parseRid(whoamiOutput: string): number | null {
  const match = whoamiOutput.match(/S-1-5-[\d-]+-(\d+)/);
  const rid = match?.[1];
  return rid === undefined ? null : parseInt(rid, 10);
}

export class Win32PlatformInfo implements PlatformInfo {
  readonly invalidUsers: readonly string[] = ['', 'SYSTEM', 'LOCAL SERVICE', 'NETWORK SERVICE'];

  constructor(private readonly host: HostAccess = defaultHost) {}

  async getSerialNumber(): Promise<string | null> {
    // wmic is deprecated; only used when PowerShell is missing
    const fromCim = await this.powershell('(Get-CimInstance -ClassName Win32_BIOS).SerialNumber').catch(() => '');
    const serial = normalizeSerial(fromCim);
    if (serial) return serial;

    try {
      const stdout = await this.host.exec('wmic', ['bios', 'get', 'serialnumber'], { timeout: 15000 });
      // First line is the "SerialNumber" header
      const lines = stdout.split(/\r?\n/).map((line) => line.trim()).filter(Boolean);
      return lines.length >= 2 ? normalizeSerial(lines[1]) : null;
    } catch {
      return null;
    }
  }

  async getConsoleUser(): Promise<ConsoleUser | null> {
    const username = this.host.processUser() ?? this.host.env.USERNAME ?? '';
    if (this.invalidUsers.includes(username)) return null;

    // 0 stands in when the SID cannot be read
    const whoami = await this.host.exec('whoami', ['/user', '/fo', 'csv', '/nh'], { timeout: 15000 }).catch(() => '');
    const uid = parseRid(whoami) ?? 0;

    const homeDir = this.host.homedir();
    return (await this.host.pathExists(homeDir)) ? { username, uid, homeDir } : null;
  }

  getHostname(): string {
    return this.host.hostname();
  }

  async getUserFullName(username: string): Promise<string | null> {
    const fromLocalUser = await this.powershell(`(Get-LocalUser -Name ${psQuote(username)}).FullName`).catch(() => '');
    if (fromLocalUser.trim()) return fromLocalUser.trim();

    try {
      const stdout = await this.host.exec('net', ['user', username], { timeout: 15000 });
      for (const line of stdout.split(/\r?\n/)) {
        if (line.trim().startsWith('Full Name')) {
          const fullName = line.trim().slice('Full Name'.length).trim();
          return fullName || null;
        }
      }
      return null;
    } catch {
      return null;
    }
  }

  getOsVersionLabel(): string {
    return `Windows Version: ${this.host.release()}`;
  }

  async getMdmEnrollmentStatus(): Promise<string | null> {
    try {
      const stdout = await this.host.exec('dsregcmd', ['/status'], { timeout: 15000 });
      const lines = stdout
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter((line) => /^(AzureAdJoined|DomainJoined|WorkplaceJoined|MdmUrl)\s*:/.test(line));
      return lines.length > 0 ? lines.join('\n') : null;
    } catch {
      return null;
    }
  }

  private powershell(script: string): Promise<string> {
    return this.host.exec(POWERSHELL, ['-NoProfile', '-Command', script], { timeout: 15000 });
  }
}

// Local and domain accounts, including DOMAIN\user and UPN forms
const WINDOWS_USERNAME = /^[A-Za-z0-9._@\\ -]+$/;

export class Win32CommandSupport implements PlatformCommandSupport {
  // Windows has no uids; RIDs of real accounts are positive
  readonly minUserUid = 1;

  /**
   * Wraps the command in PowerShell `Start-Process` with a credential prompt
   * for the target user. Intune scripts run as SYSTEM cannot answer that
   * prompt unattended; scheduled tasks are the usual alternative there.
   */
  runAsUserCommand(command: readonly string[], username: string, _uid: number): string[] {
    const [file = '', ...args] = command;
    const argumentList = args.length > 0 ? ` -ArgumentList ${args.map(psQuote).join(',')}` : '';
    return [
      POWERSHELL,
      '-NoProfile',
      '-Command',
      `Start-Process -FilePath ${psQuote(file)}${argumentList} ` +
        `-Credential (Get-Credential -UserName ${psQuote(username)} -Message 'Enter password') ` +
        '-Wait -NoNewWindow',
    ];
  }

  validateUser(username: string | null | undefined, uid: number | null | undefined): void {
    assertValidUser(username, uid, WINDOWS_USERNAME, this.minUserUid);
  }
}

export class Win32DialogSupport implements PlatformDialogSupport {
  readonly standardBinaryPath = null;
  readonly dialogAvailable = false;
  readonly unavailableMessage =
    'swiftDialog is not available on Windows. Dialog functionality is macOS-only.';

  constructor(private readonly host: HostAccess = defaultHost) {}

  get sharedTempDir(): string {
    return this.host.tmpdir();
  }
}
