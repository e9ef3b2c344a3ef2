import { describe, it, expect } from '@effect/vitest';
import { Duration } from 'effect';
import { ChargeStateMachine, type ChargeStateMachineConfig } from '../../../charge-session/charge-state-machine.js';
import { ChargeState } from '../../../charge-session/types.js';
import type { SessionThresholds } from '../../../profile/threshold-calculator.js';

const MINUTE = 60 * 1000;

const thresholds = (overrides: Partial<SessionThresholds> = {}): SessionThresholds => ({
  startThreshold: 90,
  stopThreshold: 45,
  coarseSwitchThreshold: 65,
  cycleLimit: 1,
  maxRuntime: Duration.hours(12),
  ...overrides,
});

const createMachine = (
  overrides: Partial<SessionThresholds> = {},
  config: Partial<ChargeStateMachineConfig> = {},
) => new ChargeStateMachine({
  outlet: 'battery_drill',
  mode: 'Nominal',
  profileName: 'acme',
  thresholds: thresholds(overrides),
  startedAtMs: 0,
  maxCyclesInFineMode: 20,
  ...config,
});

const feed = (machine: ChargeStateMachine, readings: number[]) =>
  readings.map((reading, index) => {
    const outcome = machine.observe(reading, (index + 1) * MINUTE);
    return { ...outcome, state: machine.state };
  });

describe('ChargeStateMachine', () => {
  it('should probe coarse through 70W, switch to fine at 60W and stop once at 40W', () => {
    const machine = createMachine();

    const outcomes = feed(machine, [150, 120, 70, 60, 40]);

    expect(outcomes.map((outcome) => outcome.probe?.kind)).toEqual(['coarse', 'coarse', 'coarse', 'fine', 'fine']);
    expect(outcomes.map((outcome) => outcome.state)).toEqual([
      ChargeState.ChargingCoarse,
      ChargeState.ChargingCoarse,
      ChargeState.ChargingCoarse,
      ChargeState.ChargingFine,
      ChargeState.StoppedComplete,
    ]);
    expect(outcomes.filter((outcome) => outcome.command === 'off')).toHaveLength(1);
    expect(outcomes[4]?.transition).toEqual({
      from: ChargeState.ChargingFine,
      to: ChargeState.StoppedComplete,
      reason: 'ChargeComplete',
    });

    const session = machine.snapshot();
    expect(session.cycleCount).toBe(1);
    expect(session.samples).toBe(5);
    expect(session.lastReading).toBe(40);
    expect(session.chargingStartedAtMs).toBe(MINUTE);
    expect(session.chargingStoppedAtMs).toBe(5 * MINUTE);
    expect(machine.isFinal).toBe(true);
  });

  it('should leave the outlet alone while the reading stays below the start threshold', () => {
    const machine = createMachine();

    const outcomes = feed(machine, [0, 12, 89.9]);

    expect(outcomes.every((outcome) => outcome.transition === null && outcome.command === null)).toBe(true);
    expect(machine.state).toBe(ChargeState.AwaitingStart);
    expect(machine.isFinal).toBe(false);
  });

  it('should treat every threshold boundary as inclusive', () => {
    const machine = createMachine();

    const outcomes = feed(machine, [90, 65, 45]);

    expect(outcomes.map((outcome) => outcome.state)).toEqual([
      ChargeState.ChargingCoarse,
      ChargeState.ChargingFine,
      ChargeState.StoppedComplete,
    ]);
  });

  it('should ignore readings once a storage charge has used its single cycle', () => {
    const machine = createMachine(
      { startThreshold: 115, stopThreshold: 115, coarseSwitchThreshold: 135, cycleLimit: 1 },
      { mode: 'Storage' },
    );

    feed(machine, [200, 130, 110]);
    expect(machine.state).toBe(ChargeState.StoppedComplete);

    const late = machine.observe(200, 10 * MINUTE);

    expect(late).toEqual({ transition: null, command: null, probe: null });
    expect(machine.state).toBe(ChargeState.StoppedComplete);
    expect(machine.snapshot().cycleCount).toBe(1);
    expect(machine.snapshot().samples).toBe(3);
  });

  it('should re-enter coarse charging while cycles remain and stop again on the next cutoff', () => {
    const machine = createMachine({ cycleLimit: 2 });

    const first = feed(machine, [100, 60, 40]);
    expect(first[2]?.command).toBe('off');
    expect(machine.isDormant).toBe(true);
    expect(machine.isFinal).toBe(false);

    expect(machine.observe(30, 10 * MINUTE).transition).toBeNull();

    const recharge = machine.observe(95, 20 * MINUTE);
    expect(recharge.transition).toEqual({
      from: ChargeState.StoppedComplete,
      to: ChargeState.ChargingCoarse,
      reason: 'Recharging',
    });
    expect(recharge.command).toBeNull();
    expect(machine.snapshot().lastCommand).toBeNull();

    expect(machine.observe(60, 30 * MINUTE).transition?.to).toBe(ChargeState.ChargingFine);
    const second = machine.observe(44, 40 * MINUTE);

    expect(second.command).toBe('off');
    expect(machine.snapshot().cycleCount).toBe(2);
    expect(machine.isFinal).toBe(true);
    expect(machine.snapshot().chargingStartedAtMs).toBe(MINUTE);
  });

  it('should give up with STOPPED_MAX_CYCLES after too many fine probes', () => {
    const machine = createMachine({}, { maxCyclesInFineMode: 2 });

    const outcomes = feed(machine, [100, 60, 55, 55, 55]);

    expect(outcomes.map((outcome) => outcome.state)).toEqual([
      ChargeState.ChargingCoarse,
      ChargeState.ChargingFine,
      ChargeState.ChargingFine,
      ChargeState.ChargingFine,
      ChargeState.StoppedMaxCycles,
    ]);
    expect(outcomes[4]?.command).toBe('off');
    expect(machine.snapshot().stopReason).toBe('FineModeCycleLimit');
    expect(machine.snapshot().cycleCount).toBe(0);
    expect(machine.isFinal).toBe(true);
  });

  it('should complete a full charge that keeps hovering just above its cutoff', () => {
    const machine = createMachine(
      { startThreshold: 5, stopThreshold: 5, coarseSwitchThreshold: 25 },
      { mode: 'FullCharge' },
    );

    const outcomes = feed(machine, [30, 20, 5.2, 5.2, 5.2, 5.2]);

    expect(outcomes.slice(0, 5).every((outcome) => outcome.command === null)).toBe(true);
    expect(outcomes[5]?.transition).toEqual({
      from: ChargeState.ChargingFine,
      to: ChargeState.StoppedComplete,
      reason: 'CloseMissLimitReached',
    });
    expect(outcomes[5]?.command).toBe('off');
    expect(machine.snapshot().closeMisses).toBe(4);
    expect(machine.snapshot().cycleCount).toBe(1);
  });

  it('should not count close misses outside full charge mode', () => {
    const machine = createMachine({}, { maxCyclesInFineMode: 20 });

    feed(machine, [100, 60, 46, 46, 46, 46, 46]);

    expect(machine.state).toBe(ChargeState.ChargingFine);
    expect(machine.snapshot().closeMisses).toBe(0);
  });

  it('should force the outlet off when the run deadline passes mid-charge', () => {
    const machine = createMachine();
    feed(machine, [150]);

    const outcome = machine.expire('run', 12 * 60 * MINUTE);

    expect(outcome.transition).toEqual({
      from: ChargeState.ChargingCoarse,
      to: ChargeState.StoppedMaxTime,
      reason: 'RunDeadlineReached',
    });
    expect(outcome.command).toBe('off');
    expect(machine.snapshot().chargingStoppedAtMs).toBe(12 * 60 * MINUTE);
    expect(machine.isFinal).toBe(true);
  });

  it('should stop a session that never started charging when its runtime is used up', () => {
    const machine = createMachine();
    feed(machine, [3]);

    const outcome = machine.expire('session', 60 * MINUTE);

    expect(outcome.transition?.reason).toBe('MaxRuntimeReached');
    expect(outcome.command).toBe('off');
    expect(machine.snapshot().chargingStoppedAtMs).toBeNull();
  });

  it('should finalize a dormant session as complete without another command', () => {
    const machine = createMachine({ cycleLimit: 3 });
    feed(machine, [100, 60, 40]);

    const outcome = machine.expire('session', 60 * MINUTE);

    expect(outcome).toEqual({ transition: null, command: null, probe: null });
    expect(machine.state).toBe(ChargeState.StoppedComplete);
    expect(machine.isFinal).toBe(true);
  });

  it('should retire only a dormant session', () => {
    const charging = createMachine({ cycleLimit: 3 });
    feed(charging, [150]);
    charging.retire();
    expect(charging.isFinal).toBe(false);

    const dormant = createMachine({ cycleLimit: 3 });
    feed(dormant, [100, 60, 40]);
    expect(dormant.isDormant).toBe(true);

    dormant.retire();

    expect(dormant.isFinal).toBe(true);
    expect(dormant.isDormant).toBe(false);
    expect(dormant.state).toBe(ChargeState.StoppedComplete);
    expect(dormant.observe(150, 10 * MINUTE).transition).toBeNull();
  });

  it('should move to ERROR on an outlet fault without commanding the outlet', () => {
    const machine = createMachine();
    feed(machine, [150]);

    const outcome = machine.fail('Outlet battery_drill is unreachable: EHOSTUNREACH', 2 * MINUTE);

    expect(outcome).toEqual({
      transition: { from: ChargeState.ChargingCoarse, to: ChargeState.Error, reason: 'OutletFault' },
      command: null,
      probe: null,
    });
    expect(machine.snapshot().fault).toBe('Outlet battery_drill is unreachable: EHOSTUNREACH');
    expect(machine.observe(40, 3 * MINUTE).transition).toBeNull();
    expect(machine.fail('again', 4 * MINUTE).transition).toBeNull();
  });
});
