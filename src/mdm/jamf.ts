import { defaultArgv, toBool, toInt, type MdmParamProvider, type ParamKey, type ParamSource } from './base.js';

/**
 * Jamf Pro passes script parameters positionally. Indices 0-3 are reserved:
 *
 * - `$0` script name
 * - `$1` mount point of the target drive
 * - `$2` computer name
 * - `$3` username of the logged in user
 *
 * Parameters 4 through 11 carry the policy's own values.
 */
export class JamfParamParser implements MdmParamProvider {
  static readonly RESERVED_PARAMS: readonly number[] = [0, 1, 2, 3];
  static readonly MIN_USABLE_PARAM = 4;
  static readonly MAX_USABLE_PARAM = 11;

  readonly name = 'jamf';
  private readonly argv: readonly string[];

  constructor(source: ParamSource = {}) {
    this.argv = source.argv ?? defaultArgv();
  }

  /**
   * Rejects reserved and out-of-range indices. These are mistakes in the
   * calling script, not missing data, so they throw.
   */
  static validateIndex(index: number): void {
    const { MIN_USABLE_PARAM: min, MAX_USABLE_PARAM: max } = JamfParamParser;
    if (JamfParamParser.RESERVED_PARAMS.includes(index)) {
      throw new RangeError(
        `Parameter $${index} is reserved by Jamf Pro and should not be used. Use parameters $${min} - $${max} instead.`
      );
    }
    if (!Number.isInteger(index) || index < min || index > max) {
      throw new RangeError(`Parameter $${index} is out of usable range. Use parameters $${min}-$${max}.`);
    }
  }

  get(key: ParamKey): string | null {
    if (typeof key !== 'number') {
      throw new TypeError(
        `Jamf parameter keys must be integers (got ${typeof key}). ` +
          `Use an integer index between ${JamfParamParser.MIN_USABLE_PARAM} and ${JamfParamParser.MAX_USABLE_PARAM}.`
      );
    }
    JamfParamParser.validateIndex(key);
    return this.argv[key] ?? null;
  }

  getBool(key: ParamKey): boolean {
    return toBool(this.get(key));
  }

  getInt(key: ParamKey, defaultValue = 0): number {
    return toInt(this.get(key), defaultValue);
  }
}
