import { Duration } from "effect";
import type { SettingsSection } from "../charge-config/schema.js";
import { COARSE_PROBE_THRESHOLD_MARGIN_DEFAULT, type ChargeMode, type ManufacturerProfile } from "./types.js";

export const FULL_CHARGE_REPEAT_LIMIT_DEFAULT = 3;
export const MAX_CYCLES_IN_FINE_MODE_DEFAULT = 20;
export const MAX_HOURS_TO_RUN_DEFAULT = 12;
export const COARSE_PROBE_INTERVAL_MINUTES_DEFAULT = 30;
export const FINE_PROBE_INTERVAL_MINUTES_DEFAULT = 5;
export const CHARGER_EFFICIENCY_DEFAULT = 0.85;
export const RUNTIME_SAFETY_MARGIN_HOURS = 1;

/** Values given on the command line. They win over the config file and the defaults. */
export type ChargeOverrides = {
  readonly nominalStart?: number;
  readonly nominalStop?: number;
  readonly fullStart?: number;
  readonly fullStop?: number;
  readonly storageStart?: number;
  readonly storageStop?: number;
  readonly fullChargeRepeatLimit?: number;
  readonly maxCyclesInFineMode?: number;
  readonly storageChargeCycleLimit?: number;
  readonly maxHoursToRun?: number;
  readonly coarseProbeMinutes?: number;
  readonly fineProbeMinutes?: number;
};

export type GlobalLimits = {
  readonly fullChargeRepeatLimit: number;
  readonly maxCyclesInFineMode: number;
  readonly storageChargeCycleLimit?: number; // per-profile value applies when unset
  readonly maxHoursToRun: number;
  readonly coarseProbeInterval: Duration.Duration;
  readonly fineProbeInterval: Duration.Duration;
};

export type SessionThresholds = {
  readonly startThreshold: number;
  readonly stopThreshold: number;
  readonly coarseSwitchThreshold: number;
  readonly cycleLimit: number;
  readonly maxRuntime: Duration.Duration;
};

export type ThresholdWarning = {
  readonly _tag: 'InvalidMargin' | 'InvalidEfficiency' | 'InvalidChargerRate' | 'ThresholdMisconfigured';
  readonly message: string;
};

const cycleCount = (value: number) => Math.max(1, Math.floor(value));

export const resolveGlobalLimits = (overrides: ChargeOverrides, settings: SettingsSection): GlobalLimits => {
  const storageLimit = overrides.storageChargeCycleLimit ?? settings.storage_charge_cycle_limit;

  return {
    fullChargeRepeatLimit: cycleCount(
      overrides.fullChargeRepeatLimit ?? settings.full_charge_repeat_limit ?? FULL_CHARGE_REPEAT_LIMIT_DEFAULT
    ),
    maxCyclesInFineMode: Math.floor(
      overrides.maxCyclesInFineMode ?? settings.max_cycles_in_fine_mode ?? MAX_CYCLES_IN_FINE_MODE_DEFAULT
    ),
    storageChargeCycleLimit: storageLimit === undefined ? undefined : cycleCount(storageLimit),
    maxHoursToRun: overrides.maxHoursToRun ?? settings.max_hours_to_run ?? MAX_HOURS_TO_RUN_DEFAULT,
    coarseProbeInterval: Duration.minutes(
      overrides.coarseProbeMinutes ?? settings.coarse_probe_interval_minutes ?? COARSE_PROBE_INTERVAL_MINUTES_DEFAULT
    ),
    fineProbeInterval: Duration.minutes(
      overrides.fineProbeMinutes ?? settings.fine_probe_interval_minutes ?? FINE_PROBE_INTERVAL_MINUTES_DEFAULT
    ),
  };
};

const modeThresholds = (
  profile: ManufacturerProfile,
  mode: ChargeMode,
  overrides: ChargeOverrides,
): { start: number; stop: number } => {
  switch (mode) {
    case 'Nominal': {
      const stop = overrides.nominalStop ?? profile.nominalStop;
      return { start: overrides.nominalStart ?? profile.nominalStart ?? stop, stop };
    }
    case 'FullCharge': {
      const stop = overrides.fullStop ?? profile.fullStop;
      return { start: overrides.fullStart ?? stop, stop };
    }
    case 'Storage': {
      const stop = overrides.storageStop ?? profile.storageStop ?? profile.nominalStop;
      return { start: overrides.storageStart ?? stop, stop };
    }
  }
};

const maxRuntimeHours = (
  profile: ManufacturerProfile,
  limits: GlobalLimits,
  warnings: ThresholdWarning[],
): number => {
  const { batteryAmpHourCapacity: capacity, chargerAmpHourRate: rate } = profile;
  if (capacity === undefined || rate === undefined) {
    return limits.maxHoursToRun;
  }

  if (rate <= 0) {
    warnings.push({
      _tag: 'InvalidChargerRate',
      message: `charger_amp_hour_rate must be positive, got ${rate}; using max_hours_to_run`,
    });
    return limits.maxHoursToRun;
  }

  let efficiency = profile.chargerEfficiency ?? CHARGER_EFFICIENCY_DEFAULT;
  if (!(efficiency > 0 && efficiency <= 1)) {
    warnings.push({
      _tag: 'InvalidEfficiency',
      message: `charger_efficiency must be within (0, 1], got ${efficiency}; using ${CHARGER_EFFICIENCY_DEFAULT}`,
    });
    efficiency = CHARGER_EFFICIENCY_DEFAULT;
  }

  return capacity / (rate * efficiency) + RUNTIME_SAFETY_MARGIN_HOURS;
};

/**
 * Resolves the fixed thresholds of one charge session.
 *
 * Bad values are reported as warnings and replaced with defaults; a start
 * threshold below the stop threshold is reported but kept as given.
 */
export const calculateThresholds = (
  profile: ManufacturerProfile,
  mode: ChargeMode,
  overrides: ChargeOverrides,
  limits: GlobalLimits,
): { readonly thresholds: SessionThresholds; readonly warnings: ReadonlyArray<ThresholdWarning> } => {
  const warnings: ThresholdWarning[] = [];
  const { start, stop } = modeThresholds(profile, mode, overrides);

  let margin = profile.coarseProbeMargin;
  if (margin < 0) {
    warnings.push({
      _tag: 'InvalidMargin',
      message: `coarse_probe_threshold_margin must not be negative, got ${margin}; using ${COARSE_PROBE_THRESHOLD_MARGIN_DEFAULT}`,
    });
    margin = COARSE_PROBE_THRESHOLD_MARGIN_DEFAULT;
  }

  if (start < stop) {
    warnings.push({
      _tag: 'ThresholdMisconfigured',
      message: `${mode} start threshold ${start}W is below its stop threshold ${stop}W`,
    });
  }

  const cycleLimit = mode === 'Storage'
    ? limits.storageChargeCycleLimit ?? cycleCount(profile.storageCycleLimit)
    : limits.fullChargeRepeatLimit;

  return {
    thresholds: {
      startThreshold: start,
      stopThreshold: stop,
      coarseSwitchThreshold: stop + margin,
      cycleLimit,
      maxRuntime: Duration.millis(Math.round(maxRuntimeHours(profile, limits, warnings) * 60 * 60 * 1000)),
    },
    warnings,
  };
};
