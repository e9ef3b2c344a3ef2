import { describe, it, expect } from '@effect/vitest';
import { ProfileResolver, describeDefaultedReason } from '../../../profile/profile-resolver.js';
import { DEFAULT_PROFILE } from '../../../profile/types.js';
import type { ChargeConfig } from '../../../charge-config/schema.js';

const config: ChargeConfig = {
  profiles: {
    acme: {
      nominal_charge_stop_power_threshold: 45,
      nominal_charge_start_power_threshold: 90,
      full_charge_power_threshold: 5,
      coarse_probe_threshold_margin: 20,
      storage_charge_stop_power_threshold: 115,
      storage_charge_cycle_limit: 2,
    },
    partial: {
      nominal_charge_stop_power_threshold: 40,
    },
  },
  plugs: {
    battery_drill: 'acme',
    battery_saw: 'partial',
    battery_mower: 'ghost',
    battery_trimmer: 'acme',
  },
  storage: ['battery_trimmer', 'battery_unlisted'],
  fullCharge: ['battery_saw'],
  settings: {},
};

describe('ProfileResolver', () => {
  it('should resolve an assigned profile with every required field', () => {
    const resolver = new ProfileResolver(config, { forceFullCharge: false });

    expect(resolver.resolve('battery_drill')).toEqual({
      _tag: 'Configured',
      mode: 'Nominal',
      profile: {
        name: 'acme',
        nominalStop: 45,
        nominalStart: 90,
        fullStop: 5,
        coarseProbeMargin: 20,
        storageStop: 115,
        storageCycleLimit: 2,
        chargerAmpHourRate: undefined,
        batteryAmpHourCapacity: undefined,
        chargerEfficiency: undefined,
      },
    });
  });

  it('should fall back to the default profile when required fields are missing', () => {
    const resolver = new ProfileResolver(config, { forceFullCharge: false });

    expect(resolver.resolve('battery_saw')).toEqual({
      _tag: 'Defaulted',
      mode: 'FullCharge',
      profile: DEFAULT_PROFILE,
      reason: {
        _tag: 'MissingRequiredFields',
        profileName: 'partial',
        missing: ['full_charge_power_threshold', 'coarse_probe_threshold_margin'],
      },
    });
  });

  it('should fall back to the default profile when the assigned profile does not exist', () => {
    const resolver = new ProfileResolver(config, { forceFullCharge: false });

    const resolution = resolver.resolve('battery_mower');

    expect(resolution._tag).toBe('Defaulted');
    expect(resolution.profile).toBe(DEFAULT_PROFILE);
    expect(resolution._tag === 'Defaulted' && resolution.reason).toEqual({ _tag: 'UnknownProfile', profileName: 'ghost' });
  });

  it('should monitor an outlet missing from Plugs with the default profile and honor its storage membership', () => {
    const resolver = new ProfileResolver(config, { forceFullCharge: false });

    expect(resolver.resolve('battery_unlisted')).toEqual({
      _tag: 'Defaulted',
      mode: 'Storage',
      profile: DEFAULT_PROFILE,
      reason: { _tag: 'NotAssigned' },
    });
  });

  it('should let storage membership win over a forced full charge', () => {
    const resolver = new ProfileResolver(
      { ...config, fullCharge: ['battery_trimmer'] },
      { forceFullCharge: true },
    );

    expect(resolver.modeFor('battery_trimmer')).toBe('Storage');
    expect(resolver.modeFor('battery_drill')).toBe('FullCharge');
  });

  it('should describe why a profile was defaulted', () => {
    expect(describeDefaultedReason({ _tag: 'NotAssigned' })).toBe('outlet is not assigned to a profile');
    expect(describeDefaultedReason({ _tag: 'UnknownProfile', profileName: 'ghost' })).toBe('profile ghost is not defined');
    expect(describeDefaultedReason({
      _tag: 'MissingRequiredFields',
      profileName: 'partial',
      missing: ['full_charge_power_threshold'],
    })).toBe('profile partial is missing full_charge_power_threshold');
  });
});
