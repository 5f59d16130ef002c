import { defaultArgv, toBool, toInt, type MdmParamProvider, type ParamKey, type ParamSource } from './base.js';

const ENV_PREFIX = 'INTUNE_';

/**
 * Intune scripts receive parameters either as command-line arguments or as
 * environment variables, with no reserved slots.
 *
 * Numeric keys (and integer-like strings) index the invocation arguments,
 * where 0 is the script. Other strings name an environment variable, tried
 * as given and then with an `INTUNE_` prefix.
 */
export class IntuneParamProvider implements MdmParamProvider {
  readonly name = 'intune';
  private readonly argv: readonly string[];
  private readonly env: NodeJS.ProcessEnv;

  constructor(source: ParamSource = {}) {
    this.argv = source.argv ?? defaultArgv();
    this.env = source.env ?? process.env;
  }

  get(key: ParamKey): string | null {
    if (typeof key === 'number') {
      return this.positional(key);
    }
    if (/^\d+$/.test(key.trim())) {
      return this.positional(parseInt(key.trim(), 10));
    }
    return this.env[key] ?? this.env[`${ENV_PREFIX}${key}`] ?? null;
  }

  getBool(key: ParamKey): boolean {
    return toBool(this.get(key));
  }

  getInt(key: ParamKey, defaultValue = 0): number {
    return toInt(this.get(key), defaultValue);
  }

  private positional(index: number): string | null {
    if (!Number.isInteger(index) || index < 0) return null;
    return this.argv[index] ?? null;
  }
}
