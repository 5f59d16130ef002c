export type { Platform, PlatformCommandSupport, PlatformDialogSupport, PlatformInfo } from './base.js';
export {
  clearPlatformCache,
  createPlatform,
  getCommandSupport,
  getDialogSupport,
  getPlatform,
  resolvePlatform,
} from './detection.js';
export { createHost, defaultHost } from './host.js';
export type { ExecOptions, HostAccess } from './host.js';
export { DarwinCommandSupport, DarwinDialogSupport, DarwinPlatformInfo } from './darwin.js';
export { LinuxCommandSupport, LinuxDialogSupport, LinuxPlatformInfo } from './linux.js';
export { Win32CommandSupport, Win32DialogSupport, Win32PlatformInfo } from './win32.js';
