import {
  PROVIDER_ENV_VAR,
  SUPPORTED_PROVIDERS,
  type PlatformName,
  type ProviderName,
} from '../../shared/types.js';
import { UnsupportedProviderError } from '../errors.js';

export type ParamKey = number | string;

/**
 * Script parameter access for one MDM provider. Missing values never throw:
 * they come back as `null`, `false` or the supplied default.
 */
export interface MdmParamProvider {
  readonly name: ProviderName;
  get(key: ParamKey): string | null;
  getBool(key: ParamKey): boolean;
  getInt(key: ParamKey, defaultValue?: number): number;
}

export interface ParamSource {
  /** Invocation arguments with the script itself at index 0. */
  argv?: readonly string[];
  env?: NodeJS.ProcessEnv;
}

export function defaultArgv(): string[] {
  // process.argv[0] is the node binary
  return process.argv.slice(1);
}

const TRUTHY = new Set(['true', '1', 'yes']);

export function toBool(value: string | null): boolean {
  if (!value) return false;
  return TRUTHY.has(value.trim().toLowerCase());
}

export function toInt(value: string | null, defaultValue: number): number {
  const trimmed = value?.trim();
  if (!trimmed || !/^[+-]?\d+$/.test(trimmed)) return defaultValue;
  return parseInt(trimmed, 10);
}

const DEFAULT_PROVIDERS: Record<PlatformName, ProviderName> = {
  darwin: 'jamf',
  win32: 'intune',
  linux: 'jamf',
};

function isProviderName(value: string): value is ProviderName {
  return SUPPORTED_PROVIDERS.some((provider) => provider === value);
}

/**
 * Resolves the MDM provider: `PYMDM_MDM_PROVIDER` when set, otherwise the
 * platform's usual provider.
 */
export function resolveProvider(platform: PlatformName, env: NodeJS.ProcessEnv = process.env): ProviderName {
  const override = env[PROVIDER_ENV_VAR];
  if (override === undefined || override.trim() === '') {
    return DEFAULT_PROVIDERS[platform];
  }

  const normalized = override.trim().toLowerCase();
  if (isProviderName(normalized)) return normalized;

  throw new UnsupportedProviderError(
    `Unknown MDM provider '${override}'. ` +
      `Supported providers: ${SUPPORTED_PROVIDERS.join(', ')}. ` +
      `Set the ${PROVIDER_ENV_VAR} environment variable to override detection.`,
    override
  );
}
