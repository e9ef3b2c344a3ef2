export type ChargeMode = 'Nominal' | 'FullCharge' | 'Storage';

/**
 * Power thresholds (watts) for one charger/battery make.
 * Values are found by experiment, they are not published by manufacturers.
 */
export type ManufacturerProfile = {
  readonly name: string;
  readonly nominalStop: number;
  readonly nominalStart?: number; // falls back to nominalStop
  readonly fullStop: number;
  readonly storageStop?: number; // falls back to nominalStop
  readonly storageCycleLimit: number;
  readonly coarseProbeMargin: number;
  readonly chargerAmpHourRate?: number;
  readonly batteryAmpHourCapacity?: number;
  readonly chargerEfficiency?: number; // 0 < x <= 1
};

export const DEFAULT_PROFILE_NAME = 'default';
export const NOMINAL_STOP_THRESHOLD_DEFAULT = 90.0;
export const FULL_CHARGE_STOP_THRESHOLD_DEFAULT = 5.0;
export const STORAGE_CHARGE_CYCLE_LIMIT_DEFAULT = 1;
export const COARSE_PROBE_THRESHOLD_MARGIN_DEFAULT = 20.0;

export const DEFAULT_PROFILE: ManufacturerProfile = {
  name: DEFAULT_PROFILE_NAME,
  nominalStop: NOMINAL_STOP_THRESHOLD_DEFAULT,
  fullStop: FULL_CHARGE_STOP_THRESHOLD_DEFAULT,
  storageCycleLimit: STORAGE_CHARGE_CYCLE_LIMIT_DEFAULT,
  coarseProbeMargin: COARSE_PROBE_THRESHOLD_MARGIN_DEFAULT,
};

// outlets whose name contains this are monitored even when not listed under Plugs
export const BATTERY_OUTLET_MARKER = 'battery_';
