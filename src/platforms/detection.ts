import { PLATFORM_ENV_VAR, SUPPORTED_PLATFORMS, type PlatformName } from '../../shared/types.js';
import { UnsupportedPlatformError } from '../errors.js';
import type { Platform, PlatformCommandSupport, PlatformDialogSupport } from './base.js';
import { DarwinCommandSupport, DarwinDialogSupport, DarwinPlatformInfo } from './darwin.js';
import { defaultHost, type HostAccess } from './host.js';
import { LinuxCommandSupport, LinuxDialogSupport, LinuxPlatformInfo } from './linux.js';
import { Win32CommandSupport, Win32DialogSupport, Win32PlatformInfo } from './win32.js';

const PLATFORM_ALIASES: Record<string, PlatformName> = {
  darwin: 'darwin',
  macos: 'darwin',
  win32: 'win32',
  windows: 'win32',
  linux: 'linux',
};

function matchPlatform(value: string | undefined): PlatformName | undefined {
  if (value === undefined) return undefined;
  return PLATFORM_ALIASES[value.trim().toLowerCase()];
}

/**
 * Resolves the platform descriptor.
 *
 * `PYMDM_PLATFORM` wins when it names a supported platform; an absent or
 * unrecognized override falls back to the host's own platform.
 */
export function resolvePlatform(
  env: NodeJS.ProcessEnv = process.env,
  hostPlatform: string = process.platform
): PlatformName {
  const resolved = matchPlatform(env[PLATFORM_ENV_VAR]) ?? matchPlatform(hostPlatform);
  if (resolved) return resolved;

  throw new UnsupportedPlatformError(
    `Platform '${hostPlatform}' is not supported. ` +
      `Supported platforms: ${SUPPORTED_PLATFORMS.join(', ')}. ` +
      `Set the ${PLATFORM_ENV_VAR} environment variable to override detection.`,
    hostPlatform
  );
}

export function createPlatform(name: PlatformName, host: HostAccess = defaultHost): Platform {
  switch (name) {
    case 'darwin':
      return {
        name,
        info: new DarwinPlatformInfo(host),
        commands: new DarwinCommandSupport(),
        dialog: new DarwinDialogSupport(),
      };
    case 'win32':
      return {
        name,
        info: new Win32PlatformInfo(host),
        commands: new Win32CommandSupport(),
        dialog: new Win32DialogSupport(host),
      };
    case 'linux':
      return {
        name,
        info: new LinuxPlatformInfo(host),
        commands: new LinuxCommandSupport(),
        dialog: new LinuxDialogSupport(),
      };
  }
}

let cachedPlatform: Platform | null = null;

/** The platform bundle for this process, resolved on first use. */
export function getPlatform(): Platform {
  if (!cachedPlatform) {
    cachedPlatform = createPlatform(resolvePlatform());
  }
  return cachedPlatform;
}

export function getCommandSupport(): PlatformCommandSupport {
  return getPlatform().commands;
}

export function getDialogSupport(): PlatformDialogSupport {
  return getPlatform().dialog;
}

/** Forgets the memoized platform so the next call re-reads the environment. */
export function clearPlatformCache(): void {
  cachedPlatform = null;
}
