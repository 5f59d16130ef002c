import { afterEach, describe, expect, it, vi } from 'vitest';
import { UnsupportedPlatformError, UnsupportedProviderError } from '../src/errors.js';
import { getProvider, resolveProvider } from '../src/mdm/index.js';
import {
  clearPlatformCache,
  createPlatform,
  getCommandSupport,
  getDialogSupport,
  getPlatform,
  resolvePlatform,
} from '../src/platforms/detection.js';

describe('resolvePlatform', () => {
  it.each([
    ['darwin', 'darwin'],
    ['macos', 'darwin'],
    ['MacOS', 'darwin'],
    ['win32', 'win32'],
    ['Windows', 'win32'],
    [' LINUX ', 'linux'],
  ])('honours the override %j regardless of host', (override, expected) => {
    expect(resolvePlatform({ PYMDM_PLATFORM: override }, 'linux')).toBe(expected);
    expect(resolvePlatform({ PYMDM_PLATFORM: override }, 'darwin')).toBe(expected);
  });

  it('maps the host platform when no override is set', () => {
    expect(resolvePlatform({}, 'darwin')).toBe('darwin');
    expect(resolvePlatform({}, 'win32')).toBe('win32');
    expect(resolvePlatform({}, 'linux')).toBe('linux');
  });

  it('falls back to the host platform for an unrecognized override', () => {
    expect(resolvePlatform({ PYMDM_PLATFORM: 'beos' }, 'linux')).toBe('linux');
  });

  it('rejects an unsupported host', () => {
    expect(() => resolvePlatform({}, 'aix')).toThrow(UnsupportedPlatformError);
    try {
      resolvePlatform({}, 'aix');
    } catch (error) {
      expect(error).toBeInstanceOf(UnsupportedPlatformError);
      if (error instanceof UnsupportedPlatformError) {
        expect(error.platform).toBe('aix');
        expect(error.message).toContain('darwin, win32, linux');
      }
    }
  });
});

describe('resolveProvider', () => {
  it('defaults per platform', () => {
    expect(resolveProvider('darwin', {})).toBe('jamf');
    expect(resolveProvider('win32', {})).toBe('intune');
    expect(resolveProvider('linux', {})).toBe('jamf');
  });

  it('honours the override regardless of platform', () => {
    expect(resolveProvider('darwin', { PYMDM_MDM_PROVIDER: 'Intune' })).toBe('intune');
    expect(resolveProvider('win32', { PYMDM_MDM_PROVIDER: 'jamf' })).toBe('jamf');
  });

  it('treats a blank override as unset', () => {
    expect(resolveProvider('win32', { PYMDM_MDM_PROVIDER: '  ' })).toBe('intune');
  });

  it('rejects an unknown provider', () => {
    expect(() => resolveProvider('darwin', { PYMDM_MDM_PROVIDER: 'kandji' })).toThrow(UnsupportedProviderError);
  });
});

describe('getProvider', () => {
  const argv = ['/script', '/', 'mac-01', 'jane', 'value4'];

  it('uses the provider resolved from the environment', () => {
    const provider = getProvider(undefined, { env: { PYMDM_PLATFORM: 'windows' }, argv });
    expect(provider.name).toBe('intune');
  });

  it('uses an explicit name over the environment', () => {
    const provider = getProvider('jamf', { env: { PYMDM_MDM_PROVIDER: 'intune' }, argv });
    expect(provider.name).toBe('jamf');
    expect(provider.get(4)).toBe('value4');
  });

  it('uses an explicit platform for the default', () => {
    expect(getProvider(undefined, { platform: 'linux', env: {}, argv }).name).toBe('jamf');
  });
});

describe('platform bundle', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    clearPlatformCache();
  });

  it('memoizes the resolved platform until the cache is cleared', () => {
    vi.stubEnv('PYMDM_PLATFORM', 'linux');
    clearPlatformCache();
    const first = getPlatform();
    expect(first.name).toBe('linux');

    vi.stubEnv('PYMDM_PLATFORM', 'windows');
    expect(getPlatform()).toBe(first);

    clearPlatformCache();
    expect(getPlatform().name).toBe('win32');
  });

  it('exposes the command and dialog parts of the current platform', () => {
    vi.stubEnv('PYMDM_PLATFORM', 'darwin');
    clearPlatformCache();
    expect(getCommandSupport().minUserUid).toBe(500);
    expect(getDialogSupport().standardBinaryPath).toBe('/usr/local/bin/dialog');
  });

  it('builds a bundle for every supported platform', () => {
    expect(createPlatform('darwin').commands.minUserUid).toBe(500);
    expect(createPlatform('linux').commands.minUserUid).toBe(1000);
    expect(createPlatform('win32').commands.minUserUid).toBe(1);
  });
});
