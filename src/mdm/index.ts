import type { PlatformName, ProviderName } from '../../shared/types.js';
import { resolvePlatform } from '../platforms/detection.js';
import { resolveProvider, type MdmParamProvider, type ParamSource } from './base.js';
import { IntuneParamProvider } from './intune.js';
import { JamfParamParser } from './jamf.js';

export { resolveProvider, toBool, toInt } from './base.js';
export type { MdmParamProvider, ParamKey, ParamSource } from './base.js';
export { IntuneParamProvider } from './intune.js';
export { JamfParamParser } from './jamf.js';

export interface ProviderOptions extends ParamSource {
  /** Platform used for the default provider; resolved from the host when omitted. */
  platform?: PlatformName;
}

export function createProvider(name: ProviderName, source: ParamSource = {}): MdmParamProvider {
  switch (name) {
    case 'jamf':
      return new JamfParamParser(source);
    case 'intune':
      return new IntuneParamProvider(source);
  }
}

/**
 * Builds the parameter provider for an explicit name, or for the provider
 * resolved from `PYMDM_MDM_PROVIDER` and the platform.
 */
export function getProvider(name?: ProviderName, options: ProviderOptions = {}): MdmParamProvider {
  const env = options.env ?? process.env;
  const resolved = name ?? resolveProvider(options.platform ?? resolvePlatform(env), env);
  return createProvider(resolved, options);
}
