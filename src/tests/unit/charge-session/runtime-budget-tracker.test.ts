import { describe, it, expect } from '@effect/vitest';
import { Duration } from 'effect';
import { RuntimeBudgetTracker } from '../../../charge-session/runtime-budget-tracker.js';

const HOUR = 60 * 60 * 1000;

describe('RuntimeBudgetTracker', () => {
  it('should report the session ceiling once its max runtime has elapsed', () => {
    const tracker = new RuntimeBudgetTracker({
      sessionStartedAtMs: HOUR,
      maxRuntime: Duration.hours(2),
      runStartedAtMs: 0,
      maxHoursToRun: 12,
    });

    expect(tracker.check(3 * HOUR - 1)).toBeNull();
    expect(tracker.check(3 * HOUR)).toBe('session');
  });

  it('should report the run ceiling when it comes first', () => {
    const tracker = new RuntimeBudgetTracker({
      sessionStartedAtMs: 0,
      maxRuntime: Duration.hours(20),
      runStartedAtMs: 0,
      maxHoursToRun: 12,
    });

    expect(tracker.check(12 * HOUR)).toBe('run');
    expect(tracker.check(21 * HOUR)).toBe('run');
  });

  it('should prefer the session ceiling when both fall at the same time', () => {
    const tracker = new RuntimeBudgetTracker({
      sessionStartedAtMs: 0,
      maxRuntime: Duration.hours(12),
      runStartedAtMs: 0,
      maxHoursToRun: 12,
    });

    expect(tracker.check(12 * HOUR)).toBe('session');
  });

  it('should cap the next wake time at the nearest ceiling', () => {
    const tracker = new RuntimeBudgetTracker({
      sessionStartedAtMs: 0,
      maxRuntime: Duration.hours(2),
      runStartedAtMs: 0,
      maxHoursToRun: 12,
    });

    expect(tracker.nextWakeMs(HOUR, Duration.minutes(30))).toBe(HOUR + 30 * 60 * 1000);
    expect(tracker.nextWakeMs(HOUR + 45 * 60 * 1000, Duration.minutes(30))).toBe(2 * HOUR);
  });
});
