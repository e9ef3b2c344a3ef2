import { REQUIRED_PROFILE_KEYS, type ChargeConfig, type ProfileSection } from "../charge-config/schema.js";
import { DEFAULT_PROFILE, type ChargeMode, type ManufacturerProfile } from "./types.js";

export type DefaultedReason =
  | { readonly _tag: 'NotAssigned' }
  | { readonly _tag: 'UnknownProfile'; readonly profileName: string }
  | { readonly _tag: 'MissingRequiredFields'; readonly profileName: string; readonly missing: ReadonlyArray<string> };

export type ProfileResolution =
  | { readonly _tag: 'Configured'; readonly profile: ManufacturerProfile; readonly mode: ChargeMode }
  | { readonly _tag: 'Defaulted'; readonly profile: ManufacturerProfile; readonly mode: ChargeMode; readonly reason: DefaultedReason };

export const describeDefaultedReason = (reason: DefaultedReason): string => {
  switch (reason._tag) {
    case 'NotAssigned':
      return 'outlet is not assigned to a profile';
    case 'UnknownProfile':
      return `profile ${reason.profileName} is not defined`;
    case 'MissingRequiredFields':
      return `profile ${reason.profileName} is missing ${reason.missing.join(', ')}`;
  }
};

type ProfileValidation =
  | { readonly _tag: 'Valid'; readonly profile: ManufacturerProfile }
  | { readonly _tag: 'Invalid'; readonly missing: ReadonlyArray<string> };

const validateProfile = (name: string, section: ProfileSection): ProfileValidation => {
  const {
    nominal_charge_stop_power_threshold: nominalStop,
    full_charge_power_threshold: fullStop,
    coarse_probe_threshold_margin: coarseProbeMargin,
  } = section;

  if (nominalStop === undefined || fullStop === undefined || coarseProbeMargin === undefined) {
    return { _tag: 'Invalid', missing: REQUIRED_PROFILE_KEYS.filter((key) => section[key] === undefined) };
  }

  const profile: ManufacturerProfile = {
    name,
    nominalStop,
    fullStop,
    coarseProbeMargin,
    nominalStart: section.nominal_charge_start_power_threshold,
    storageStop: section.storage_charge_stop_power_threshold,
    storageCycleLimit: section.storage_charge_cycle_limit ?? DEFAULT_PROFILE.storageCycleLimit,
    chargerAmpHourRate: section.charger_amp_hour_rate ?? DEFAULT_PROFILE.chargerAmpHourRate,
    batteryAmpHourCapacity: section.battery_amp_hour_capacity ?? DEFAULT_PROFILE.batteryAmpHourCapacity,
    chargerEfficiency: section.charger_efficiency ?? DEFAULT_PROFILE.chargerEfficiency,
  };

  return { _tag: 'Valid', profile };
};

/**
 * Picks the manufacturer profile and charge mode for an outlet.
 *
 * A profile that lacks any required threshold is replaced as a whole by
 * {@link DEFAULT_PROFILE}; the caller gets a `Defaulted` result explaining why.
 */
export class ProfileResolver {
  public constructor(
    private readonly config: ChargeConfig,
    private readonly options: { readonly forceFullCharge: boolean },
  ) { }

  public resolve(outletName: string): ProfileResolution {
    const mode = this.modeFor(outletName);
    const profileName = this.config.plugs[outletName];

    if (profileName === undefined) {
      return { _tag: 'Defaulted', profile: DEFAULT_PROFILE, mode, reason: { _tag: 'NotAssigned' } };
    }

    const section = this.config.profiles[profileName];
    if (section === undefined) {
      return { _tag: 'Defaulted', profile: DEFAULT_PROFILE, mode, reason: { _tag: 'UnknownProfile', profileName } };
    }

    const validation = validateProfile(profileName, section);
    if (validation._tag === 'Invalid') {
      return {
        _tag: 'Defaulted',
        profile: DEFAULT_PROFILE,
        mode,
        reason: { _tag: 'MissingRequiredFields', profileName, missing: validation.missing },
      };
    }

    return { _tag: 'Configured', profile: validation.profile, mode };
  }

  public modeFor(outletName: string): ChargeMode {
    if (this.config.storage.includes(outletName)) {
      return 'Storage';
    }
    if (this.options.forceFullCharge || this.config.fullCharge.includes(outletName)) {
      return 'FullCharge';
    }
    return 'Nominal';
  }
}
