import { Schema } from "effect";

export const PLUGS_SECTION = 'Plugs';
export const STORAGE_SECTION = 'Storage';
export const FULL_CHARGE_SECTION = 'FullCharge';
export const SETTINGS_SECTION = 'Settings';

export const REQUIRED_PROFILE_KEYS = [
  'nominal_charge_stop_power_threshold',
  'full_charge_power_threshold',
  'coarse_probe_threshold_margin',
] as const;

// INI values arrive as strings
const ConfigNumber = Schema.Union(Schema.Number, Schema.NumberFromString);

export const ProfileSectionSchema = Schema.Struct({
  nominal_charge_stop_power_threshold: Schema.optional(ConfigNumber),
  full_charge_power_threshold: Schema.optional(ConfigNumber),
  coarse_probe_threshold_margin: Schema.optional(ConfigNumber),
  nominal_charge_start_power_threshold: Schema.optional(ConfigNumber),
  storage_charge_stop_power_threshold: Schema.optional(ConfigNumber),
  storage_charge_cycle_limit: Schema.optional(ConfigNumber),
  charger_amp_hour_rate: Schema.optional(ConfigNumber),
  battery_amp_hour_capacity: Schema.optional(ConfigNumber),
  charger_efficiency: Schema.optional(ConfigNumber),
});

export type ProfileSection = typeof ProfileSectionSchema.Type;

export const SettingsSectionSchema = Schema.Struct({
  max_hours_to_run: Schema.optional(ConfigNumber),
  full_charge_repeat_limit: Schema.optional(ConfigNumber),
  max_cycles_in_fine_mode: Schema.optional(ConfigNumber),
  storage_charge_cycle_limit: Schema.optional(ConfigNumber),
  coarse_probe_interval_minutes: Schema.optional(ConfigNumber),
  fine_probe_interval_minutes: Schema.optional(ConfigNumber),
});

export type SettingsSection = typeof SettingsSectionSchema.Type;

// a section of bare outlet names: `battery_saw` parses as `true`, `battery_saw =` as ""
const OutletListSchema = Schema.transform(
  Schema.Record({ key: Schema.String, value: Schema.Union(Schema.Literal(true), Schema.String, Schema.Null) }),
  Schema.Array(Schema.String),
  {
    strict: true,
    decode: (names) => Object.keys(names),
    encode: (names) => Object.fromEntries(names.map((name): [string, true] => [name, true])),
  }
);

export const ReservedSectionsSchema = Schema.Struct({
  [PLUGS_SECTION]: Schema.optionalWith(
    Schema.Record({ key: Schema.String, value: Schema.String }),
    { default: () => ({}) }
  ),
  [STORAGE_SECTION]: Schema.optionalWith(OutletListSchema, { default: () => [] }),
  [FULL_CHARGE_SECTION]: Schema.optionalWith(OutletListSchema, { default: () => [] }),
  [SETTINGS_SECTION]: Schema.optionalWith(SettingsSectionSchema, { default: () => ({}) }),
});

export const ProfileSectionsSchema = Schema.Record({ key: Schema.String, value: ProfileSectionSchema });

export const ConfigDocumentSchema = Schema.Record({ key: Schema.String, value: Schema.Unknown });

export type ChargeConfig = {
  readonly profiles: Readonly<Record<string, ProfileSection>>;
  readonly plugs: Readonly<Record<string, string>>;
  readonly storage: ReadonlyArray<string>;
  readonly fullCharge: ReadonlyArray<string>;
  readonly settings: SettingsSection;
};

export const EMPTY_CHARGE_CONFIG: ChargeConfig = {
  profiles: {},
  plugs: {},
  storage: [],
  fullCharge: [],
  settings: {},
};
