import type { ChargeMode } from "../profile/types.js";
import type { SessionThresholds } from "../profile/threshold-calculator.js";
import { ProbeScheduler, type ProbeDecision } from "./probe-scheduler.js";
import type { BudgetCeiling } from "./runtime-budget-tracker.js";
import {
  ChargeState,
  type ChargeSession,
  type OutletCommand,
  type Transition,
  type TransitionReason,
} from "./types.js";

export const CLOSE_MISS_BAND_DEFAULT = 0.05;
export const CLOSE_MISS_LIMIT_DEFAULT = 3;

export type ChargeStateMachineConfig = {
  readonly outlet: string;
  readonly mode: ChargeMode;
  readonly profileName: string;
  readonly thresholds: SessionThresholds;
  readonly startedAtMs: number;
  readonly maxCyclesInFineMode: number;
  readonly closeMissBand?: number;
  readonly closeMissLimit?: number;
};

export type TickOutcome = {
  readonly transition: Transition | null;
  readonly command: OutletCommand | null;
  readonly probe: ProbeDecision | null;
};

const NO_CHANGE: TickOutcome = { transition: null, command: null, probe: null };

/**
 * Per-outlet charge controller. Owns its {@link ChargeSession} exclusively and
 * applies at most one transition per power reading.
 *
 * The machine performs no I/O: it returns the outlet command a tick calls for
 * and leaves sending it to the caller.
 */
export class ChargeStateMachine {
  private session: ChargeSession;
  private readonly closeMissBand: number;
  private readonly closeMissLimit: number;

  public constructor(
    private readonly config: ChargeStateMachineConfig,
    private readonly probeScheduler: ProbeScheduler = new ProbeScheduler(),
  ) {
    this.closeMissBand = config.closeMissBand ?? CLOSE_MISS_BAND_DEFAULT;
    this.closeMissLimit = config.closeMissLimit ?? CLOSE_MISS_LIMIT_DEFAULT;
    this.session = {
      outlet: config.outlet,
      mode: config.mode,
      profileName: config.profileName,
      thresholds: config.thresholds,
      startedAtMs: config.startedAtMs,
      state: ChargeState.AwaitingStart,
      probe: 'coarse',
      cycleCount: 0,
      fineTicks: 0,
      closeMisses: 0,
      samples: 0,
      lastReading: null,
      lastCommand: null,
      chargingStartedAtMs: null,
      chargingStoppedAtMs: null,
      finished: false,
      stopReason: null,
      fault: null,
    };
  }

  public snapshot(): ChargeSession {
    return this.session;
  }

  public get state(): ChargeState {
    return this.session.state;
  }

  /** No further readings will change this session. */
  public get isFinal(): boolean {
    return this.session.finished;
  }

  /** Completed, but allowed another cycle should the charger draw power again. */
  public get isDormant(): boolean {
    return this.session.state === ChargeState.StoppedComplete && !this.session.finished;
  }

  public observe(reading: number, nowMs: number): TickOutcome {
    if (this.session.finished) {
      return NO_CHANGE;
    }

    const probe = this.probeScheduler.next(reading, this.session.thresholds.coarseSwitchThreshold);
    this.session = {
      ...this.session,
      samples: this.session.samples + 1,
      lastReading: reading,
      probe: probe.kind,
    };

    return { ...this.decide(reading, nowMs), probe };
  }

  /** Applies a runtime ceiling. Charging sessions are forced off; a dormant one just ends. */
  public expire(ceiling: BudgetCeiling, nowMs: number): TickOutcome {
    if (this.session.finished) {
      return NO_CHANGE;
    }

    const reason: TransitionReason = ceiling === 'session' ? 'MaxRuntimeReached' : 'RunDeadlineReached';

    if (this.isDormant) {
      this.retire();
      return NO_CHANGE;
    }

    return this.stop(ChargeState.StoppedMaxTime, reason, nowMs);
  }

  /** Ends a dormant session once nothing else is left charging. The outlet is already off. */
  public retire(): void {
    if (this.isDormant) {
      this.session = { ...this.session, finished: true };
    }
  }

  /** The outlet could not be reached. Its last commanded state is left alone. */
  public fail(message: string, nowMs: number): TickOutcome {
    if (this.session.finished && this.session.state === ChargeState.Error) {
      return NO_CHANGE;
    }

    const transition = this.moveTo(ChargeState.Error, 'OutletFault');
    this.session = {
      ...this.session,
      finished: true,
      fault: message,
      stopReason: 'OutletFault',
      chargingStoppedAtMs: this.session.chargingStartedAtMs !== null && this.session.chargingStoppedAtMs === null
        ? nowMs
        : this.session.chargingStoppedAtMs,
    };

    return { transition, command: null, probe: null };
  }

  private decide(reading: number, nowMs: number): Omit<TickOutcome, 'probe'> {
    const { state, thresholds } = this.session;

    switch (state) {
      case ChargeState.AwaitingStart:
        if (reading >= thresholds.startThreshold) {
          this.session = { ...this.session, chargingStartedAtMs: nowMs };
          return { transition: this.moveTo(ChargeState.ChargingCoarse, 'ChargingStarted'), command: null };
        }
        return NO_CHANGE;

      case ChargeState.ChargingCoarse:
        if (reading <= thresholds.coarseSwitchThreshold) {
          return { transition: this.moveTo(ChargeState.ChargingFine, 'ApproachingCutoff'), command: null };
        }
        return NO_CHANGE;

      case ChargeState.ChargingFine:
        return this.decideFine(reading, nowMs);

      case ChargeState.StoppedComplete:
        if (reading >= thresholds.startThreshold) {
          this.session = {
            ...this.session,
            closeMisses: 0,
            lastCommand: null,
            chargingStoppedAtMs: null,
            stopReason: null,
          };
          return { transition: this.moveTo(ChargeState.ChargingCoarse, 'Recharging'), command: null };
        }
        return NO_CHANGE;

      default:
        return NO_CHANGE;
    }
  }

  private decideFine(reading: number, nowMs: number): Omit<TickOutcome, 'probe'> {
    const { thresholds, mode } = this.session;

    if (reading <= thresholds.stopThreshold) {
      return this.complete('ChargeComplete', nowMs);
    }

    // a full charge may hover just above its cutoff and never cross it
    if (mode === 'FullCharge' && reading <= thresholds.stopThreshold * (1 + this.closeMissBand)) {
      const closeMisses = this.session.closeMisses + 1;
      this.session = { ...this.session, closeMisses };
      if (closeMisses > this.closeMissLimit) {
        return this.complete('CloseMissLimitReached', nowMs);
      }
    }

    const fineTicks = this.session.fineTicks + 1;
    this.session = { ...this.session, fineTicks };
    if (fineTicks > this.config.maxCyclesInFineMode) {
      return this.stop(ChargeState.StoppedMaxCycles, 'FineModeCycleLimit', nowMs);
    }

    return NO_CHANGE;
  }

  private complete(reason: TransitionReason, nowMs: number): Omit<TickOutcome, 'probe'> {
    const cycleCount = this.session.cycleCount + 1;
    const outcome = this.stop(ChargeState.StoppedComplete, reason, nowMs);
    this.session = {
      ...this.session,
      cycleCount,
      finished: cycleCount >= this.session.thresholds.cycleLimit,
    };
    return outcome;
  }

  private stop(to: ChargeState, reason: TransitionReason, nowMs: number): TickOutcome {
    const transition = this.moveTo(to, reason);
    // off is idempotent: never sent twice in a row
    const command: OutletCommand | null = this.session.lastCommand === 'off' ? null : 'off';

    this.session = {
      ...this.session,
      finished: true,
      stopReason: reason,
      lastCommand: 'off',
      chargingStoppedAtMs: this.session.chargingStartedAtMs !== null && this.session.chargingStoppedAtMs === null
        ? nowMs
        : this.session.chargingStoppedAtMs,
    };

    return { transition, command, probe: null };
  }

  private moveTo(to: ChargeState, reason: TransitionReason): Transition {
    const transition: Transition = { from: this.session.state, to, reason };
    this.session = { ...this.session, state: to };
    return transition;
  }
}
