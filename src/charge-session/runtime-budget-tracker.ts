import { Duration } from "effect";

export type BudgetCeiling = 'session' | 'run';

export type RuntimeBudget = {
  readonly sessionStartedAtMs: number;
  readonly maxRuntime: Duration.DurationInput;
  readonly runStartedAtMs: number;
  readonly maxHoursToRun: number;
};

export class RuntimeBudgetTracker {
  public readonly sessionDeadlineMs: number;
  public readonly runDeadlineMs: number;

  public constructor(budget: RuntimeBudget) {
    this.sessionDeadlineMs = budget.sessionStartedAtMs + Duration.toMillis(budget.maxRuntime);
    this.runDeadlineMs = budget.runStartedAtMs + Duration.toMillis(Duration.hours(budget.maxHoursToRun));
  }

  /**
   * The ceiling reached at `nowMs`, if any. When both have passed, the one that
   * was reached first is reported.
   */
  public check(nowMs: number): BudgetCeiling | null {
    const sessionReached = nowMs >= this.sessionDeadlineMs;
    const runReached = nowMs >= this.runDeadlineMs;

    if (sessionReached && runReached) {
      return this.runDeadlineMs < this.sessionDeadlineMs ? 'run' : 'session';
    }
    if (sessionReached) {
      return 'session';
    }
    return runReached ? 'run' : null;
  }

  // wake no later than the nearest ceiling
  public nextWakeMs(nowMs: number, interval: Duration.DurationInput): number {
    return Math.min(nowMs + Duration.toMillis(interval), this.sessionDeadlineMs, this.runDeadlineMs);
  }
}
