import type { ChargeMode } from "../profile/types.js";
import type { SessionThresholds } from "../profile/threshold-calculator.js";

export enum ChargeState {
  AwaitingStart = 'AWAITING_START',
  ChargingCoarse = 'CHARGING_COARSE',
  ChargingFine = 'CHARGING_FINE',
  StoppedComplete = 'STOPPED_COMPLETE',
  StoppedMaxTime = 'STOPPED_MAX_TIME',
  StoppedMaxCycles = 'STOPPED_MAX_CYCLES',
  Error = 'ERROR',
}

export type ProbeKind = 'coarse' | 'fine';

export type TransitionReason =
  | 'ChargingStarted'
  | 'ApproachingCutoff'
  | 'ChargeComplete'
  | 'CloseMissLimitReached'
  | 'Recharging'
  | 'FineModeCycleLimit'
  | 'MaxRuntimeReached'
  | 'RunDeadlineReached'
  | 'OutletFault';

export type Transition = {
  readonly from: ChargeState;
  readonly to: ChargeState;
  readonly reason: TransitionReason;
};

export type OutletCommand = 'off';

export type ChargeSession = {
  readonly outlet: string;
  readonly mode: ChargeMode;
  readonly profileName: string;
  readonly thresholds: SessionThresholds;
  readonly startedAtMs: number;
  readonly state: ChargeState;
  readonly probe: ProbeKind;
  readonly cycleCount: number;
  readonly fineTicks: number;
  readonly closeMisses: number;
  readonly samples: number;
  readonly lastReading: number | null;
  readonly lastCommand: OutletCommand | null;
  readonly chargingStartedAtMs: number | null;
  readonly chargingStoppedAtMs: number | null;
  readonly finished: boolean;
  readonly stopReason: TransitionReason | null;
  readonly fault: string | null;
};
