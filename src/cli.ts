import { Command, InvalidArgumentError, Option } from "commander";
import type { ChargeOverrides } from "./profile/threshold-calculator.js";
import type { RunOptions } from "./supervisor.js";

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warning', 'error', 'none'] as const;
export type CliLogLevel = typeof LOG_LEVELS[number];

export type CliOptions = {
  readonly configFile?: string;
  readonly reportFile?: string;
  readonly quiet: boolean;
  readonly logLevel?: CliLogLevel;
  readonly run: RunOptions;
};

type RawCliOptions = {
  configFile?: string;
  reportFile?: string;
  forceFullCharge?: boolean;
  testMode?: boolean;
  quiet?: boolean;
  logLevel?: CliLogLevel;
  nominalChargeStart?: number;
  nominalChargeCutoff?: number;
  fullChargeStart?: number;
  fullChargeCutoff?: number;
  storageChargeStart?: number;
  storageChargeCutoff?: number;
  fullChargeRepeatLimit?: number;
  maxCyclesInFineMode?: number;
  storageChargeCycleLimit?: number;
  maxHoursToRun?: number;
  coarseProbeMinutes?: number;
  fineProbeMinutes?: number;
};

const parseNonNegative = (value: string): number => {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative number.');
  }
  return parsed;
};

const parsePositive = (value: string): number => {
  const parsed = parseNonNegative(value);
  if (parsed === 0) {
    throw new InvalidArgumentError('Expected a positive number.');
  }
  return parsed;
};

const parseCount = (value: string): number => {
  const parsed = parseNonNegative(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Expected a whole number.');
  }
  return parsed;
};

export const createCli = (): Command =>
  new Command('battery-charge-monitor')
    .description('Switches smart outlets off once the lithium-ion batteries charging behind them are done')
    .option('-c, --config-file <path>', 'INI file with profiles, plug assignments and settings')
    .option('--force-full-charge', 'charge every non-storage outlet to full')
    .option('--test-mode', 'monitor and report without switching outlets off')
    .option('-q, --quiet', 'only log warnings and errors')
    .addOption(new Option('--log-level <level>', 'minimum log level').choices(LOG_LEVELS))
    .option('--report-file <path>', 'also write the final charge report to this file')
    .option('--nominal-charge-start <watts>', 'power that marks a nominal charge as started', parseNonNegative)
    .option('--nominal-charge-cutoff <watts>', 'power at which a nominal charge is complete', parseNonNegative)
    .option('--full-charge-start <watts>', 'power that marks a full charge as started', parseNonNegative)
    .option('--full-charge-cutoff <watts>', 'power at which a full charge is complete', parseNonNegative)
    .option('--storage-charge-start <watts>', 'power that marks a storage charge as started', parseNonNegative)
    .option('--storage-charge-cutoff <watts>', 'power at which a storage charge is complete', parseNonNegative)
    .option('--full-charge-repeat-limit <n>', 'charge cycles per nominal or full charge session', parseCount)
    .option('--max-cycles-in-fine-mode <n>', 'fine probes allowed before giving up on a cutoff', parseCount)
    .option('--storage-charge-cycle-limit <n>', 'charge cycles per storage session', parseCount)
    .option('--max-hours-to-run <hours>', 'wall-clock limit for the whole run', parsePositive)
    .option('--coarse-probe-minutes <minutes>', 'polling interval well above the cutoff', parsePositive)
    .option('--fine-probe-minutes <minutes>', 'polling interval close to the cutoff', parsePositive);

export const toCliOptions = (raw: RawCliOptions): CliOptions => {
  const overrides: ChargeOverrides = {
    nominalStart: raw.nominalChargeStart,
    nominalStop: raw.nominalChargeCutoff,
    fullStart: raw.fullChargeStart,
    fullStop: raw.fullChargeCutoff,
    storageStart: raw.storageChargeStart,
    storageStop: raw.storageChargeCutoff,
    fullChargeRepeatLimit: raw.fullChargeRepeatLimit,
    maxCyclesInFineMode: raw.maxCyclesInFineMode,
    storageChargeCycleLimit: raw.storageChargeCycleLimit,
    maxHoursToRun: raw.maxHoursToRun,
    coarseProbeMinutes: raw.coarseProbeMinutes,
    fineProbeMinutes: raw.fineProbeMinutes,
  };

  return {
    configFile: raw.configFile,
    reportFile: raw.reportFile,
    quiet: raw.quiet ?? false,
    logLevel: raw.logLevel,
    run: {
      forceFullCharge: raw.forceFullCharge ?? false,
      testMode: raw.testMode ?? false,
      overrides,
    },
  };
};

/** Parses user arguments, without the node executable and script path. */
export const parseCliOptions = (args: ReadonlyArray<string>, command: Command = createCli()): CliOptions =>
  toCliOptions(command.parse([...args], { from: 'user' }).opts<RawCliOptions>());
