import type { ChargeMode } from "./profile/types.js";
import type { DefaultedReason } from "./profile/profile-resolver.js";
import type { SessionThresholds, ThresholdWarning } from "./profile/threshold-calculator.js";
import type { ChargeState, ProbeKind, TransitionReason } from "./charge-session/types.js";

type SessionEventBase = {
  readonly at: number;
  readonly outlet: string;
  readonly mode: ChargeMode;
};

export type SessionEvent =
  | SessionEventBase & { readonly _tag: 'SessionStarted'; readonly profileName: string; readonly thresholds: SessionThresholds }
  | SessionEventBase & { readonly _tag: 'ProfileDefaulted'; readonly reason: DefaultedReason }
  | SessionEventBase & { readonly _tag: 'ThresholdWarning'; readonly warning: ThresholdWarning }
  | SessionEventBase & { readonly _tag: 'PowerSampled'; readonly state: ChargeState; readonly reading: number; readonly probe: ProbeKind }
  | SessionEventBase & {
    readonly _tag: 'StateChanged';
    readonly from: ChargeState;
    readonly to: ChargeState;
    readonly reason: TransitionReason;
    readonly reading: number | null;
    readonly cycleCount: number;
  }
  | SessionEventBase & { readonly _tag: 'OutletSwitchedOn'; readonly reading: number }
  | SessionEventBase & { readonly _tag: 'OutletSwitchedOff'; readonly reason: TransitionReason | null }
  | SessionEventBase & { readonly _tag: 'OutletFault'; readonly message: string }
  | SessionEventBase & {
    readonly _tag: 'SessionFinished';
    readonly state: ChargeState;
    readonly cycleCount: number;
    readonly lastReading: number | null;
  };

export type SessionEventTag = SessionEvent['_tag'];
