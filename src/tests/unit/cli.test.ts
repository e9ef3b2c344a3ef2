import { describe, it, expect } from "@effect/vitest";
import { CommanderError } from "commander";
import { createCli, parseCliOptions } from "../../cli.js";

const quietCli = () => createCli()
    .exitOverride()
    .configureOutput({ writeErr: () => { }, writeOut: () => { } });

describe('parseCliOptions', () => {
    it('should default every flag to off and leave overrides unset', () => {
        const options = parseCliOptions([], quietCli());

        expect(options.quiet).toBe(false);
        expect(options.configFile).toBeUndefined();
        expect(options.run.forceFullCharge).toBe(false);
        expect(options.run.testMode).toBe(false);
        expect(Object.values(options.run.overrides).every((value) => value === undefined)).toBe(true);
    });

    it('should map thresholds and limits to charge overrides', () => {
        const options = parseCliOptions([
            '--config-file', 'chargers.ini',
            '--force-full-charge',
            '--test-mode',
            '--nominal-charge-cutoff', '45.5',
            '--storage-charge-start', '120',
            '--full-charge-repeat-limit', '2',
            '--max-hours-to-run', '6',
            '--fine-probe-minutes', '2.5',
            '--log-level', 'debug',
        ], quietCli());

        expect(options.configFile).toBe('chargers.ini');
        expect(options.logLevel).toBe('debug');
        expect(options.run.forceFullCharge).toBe(true);
        expect(options.run.testMode).toBe(true);
        expect(options.run.overrides).toMatchObject({
            nominalStop: 45.5,
            storageStart: 120,
            fullChargeRepeatLimit: 2,
            maxHoursToRun: 6,
            fineProbeMinutes: 2.5,
        });
    });

    it('should reject a threshold that is not a number', () => {
        expect(() => parseCliOptions(['--nominal-charge-cutoff', 'lots'], quietCli())).toThrow(CommanderError);
    });

    it('should reject a fractional cycle limit', () => {
        expect(() => parseCliOptions(['--storage-charge-cycle-limit', '1.5'], quietCli())).toThrow(CommanderError);
    });

    it('should reject an unknown log level', () => {
        expect(() => parseCliOptions(['--log-level', 'chatty'], quietCli())).toThrow(CommanderError);
    });
});
