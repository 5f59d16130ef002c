import { JamfParamParser } from './mdm/jamf.js';

// Shared instance behind the static API
const jamfParser = new JamfParamParser();

/**
 * Static Jamf parameter access, kept for scripts written against the
 * single-provider API. New code should prefer `getProvider()`.
 */
export class ParamParser {
  static get(index: number): string | null {
    return jamfParser.get(index);
  }

  static getBool(index: number): boolean {
    return jamfParser.getBool(index);
  }

  static getInt(index: number, defaultValue = 0): number {
    return jamfParser.getInt(index, defaultValue);
  }
}
