import { Duration } from "effect";
import type { ProbeKind } from "./types.js";

export type ProbeDecision = {
  readonly kind: ProbeKind;
  readonly interval: Duration.Duration;
};

export type ProbeIntervals = {
  readonly coarse: Duration.DurationInput;
  readonly fine: Duration.DurationInput;
};

/**
 * Polls slowly while the charger draws well above its cutoff and quickly once
 * the reading is within the coarse probe margin, where the taper happens.
 */
export class ProbeScheduler {
  private readonly coarse: Duration.Duration;
  private readonly fine: Duration.Duration;

  public constructor(intervals: ProbeIntervals = { coarse: Duration.minutes(30), fine: Duration.minutes(5) }) {
    this.coarse = Duration.decode(intervals.coarse);
    this.fine = Duration.decode(intervals.fine);
  }

  public next(reading: number, coarseSwitchThreshold: number): ProbeDecision {
    return reading <= coarseSwitchThreshold
      ? { kind: 'fine', interval: this.fine }
      : { kind: 'coarse', interval: this.coarse };
  }
}
