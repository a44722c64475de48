/**
 * SettingsValidator — raw settings request → complete allowance.
 *
 * Rules, in order:
 *   1. funds: non-negative integer amount, required
 *   2. hosts: optional, defaults to the profile's recommended count,
 *      must not be below the profile's required count
 *   3. period: unsigned block count, required
 *   4. renewWindow: optional, defaults to floor(period / 2),
 *      must not be below the profile's required window when supplied
 *
 * Pure: nothing is applied until the caller hands the result to the engine.
 */

import type { ProfileConstants } from "./constants.js";
import { InputValidationError } from "./errors.js";
import type { AllowanceSettings } from "./records.js";
import { isAbsent, scanAmount, scanUnsigned } from "./scan.js";

export interface RawSettings {
  funds: string;
  hosts?: string;
  period: string;
  renewWindow?: string;
}

export class SettingsValidator {
  constructor(private readonly profile: ProfileConstants) {}

  resolve(raw: RawSettings): AllowanceSettings {
    const funds = scanAmount(raw.funds);
    if (funds === null) {
      throw new InputValidationError("invalid_amount", `Couldn't parse funds: "${raw.funds}"`);
    }

    let hosts: number;
    if (isAbsent(raw.hosts)) {
      hosts = this.profile.recommendedHosts;
    } else {
      const parsed = scanUnsigned(raw.hosts);
      if (parsed === null) {
        throw new InputValidationError("invalid_count", `Couldn't parse hosts: "${raw.hosts}"`);
      }
      if (parsed < this.profile.requiredHosts) {
        throw new InputValidationError(
          "below_minimum",
          `Insufficient number of hosts, need at least ${this.profile.requiredHosts} but have ${parsed}.`,
        );
      }
      hosts = parsed;
    }

    const period = scanUnsigned(raw.period);
    if (period === null) {
      throw new InputValidationError("invalid_period", `Couldn't parse period: "${raw.period}"`);
    }

    let renewWindow: number;
    if (isAbsent(raw.renewWindow)) {
      renewWindow = Math.floor(period / 2);
    } else {
      const parsed = scanUnsigned(raw.renewWindow);
      if (parsed === null) {
        throw new InputValidationError(
          "invalid_renew_window",
          `Couldn't parse renewwindow: "${raw.renewWindow}"`,
        );
      }
      if (parsed < this.profile.requiredRenewWindow) {
        throw new InputValidationError(
          "below_minimum",
          `Renew window is too small, must be at least ${this.profile.requiredRenewWindow} blocks but have ${parsed} blocks.`,
        );
      }
      renewWindow = parsed;
    }

    return { funds, hosts, period, renewWindow };
  }
}
