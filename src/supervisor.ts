import { Clock, Deferred, Duration, Effect, Either, Exit, PubSub, Ref, Schedule } from "effect";
import type { ChargeConfig } from "./charge-config/schema.js";
import { ChargeStateMachine, type TickOutcome } from "./charge-session/charge-state-machine.js";
import { ProbeScheduler } from "./charge-session/probe-scheduler.js";
import { RuntimeBudgetTracker } from "./charge-session/runtime-budget-tracker.js";
import { ChargeState, type TransitionReason } from "./charge-session/types.js";
import { NoOutletsFoundError } from "./errors/no-outlets-found.error.js";
import { EventLogger } from "./event-logger/index.js";
import type { IEventLogger } from "./event-logger/types.js";
import type { SessionEvent } from "./events.js";
import type { IOutletDriver, OutletDriverError } from "./outlet-driver/types.js";
import { ProfileResolver } from "./profile/profile-resolver.js";
import {
  calculateThresholds,
  resolveGlobalLimits,
  type ChargeOverrides,
  type GlobalLimits,
} from "./profile/threshold-calculator.js";
import { BATTERY_OUTLET_MARKER, type ChargeMode } from "./profile/types.js";

export type RunOptions = {
  readonly forceFullCharge: boolean;
  readonly testMode: boolean;
  readonly overrides: ChargeOverrides;
};

export type SupervisorTiming = {
  readonly settleTime: Duration.DurationInput;
  readonly outletRetryTimes: number;
  readonly outletRetryBackoff: Duration.DurationInput;
  /** Times an outlet is switched on before monitoring gives up on seeing it draw power. */
  readonly outletSetupAttempts: number;
  readonly outletSetupDelay: Duration.DurationInput;
};

export const DEFAULT_SUPERVISOR_TIMING: SupervisorTiming = {
  settleTime: Duration.seconds(30),
  outletRetryTimes: 3,
  outletRetryBackoff: Duration.seconds(2),
  outletSetupAttempts: 3,
  outletSetupDelay: Duration.seconds(2),
};

export type OutletSummary = {
  readonly outlet: string;
  readonly mode: ChargeMode;
  readonly profileName: string;
  readonly profileDefaulted: boolean;
  readonly state: ChargeState;
  readonly reason: TransitionReason | null;
  readonly cycleCount: number;
  readonly lastReading: number | null;
  readonly samples: number;
  readonly chargingDurationMs: number | null;
  readonly fault: string | null;
};

export type ChargeRunReport = {
  readonly startedAtMs: number;
  readonly finishedAtMs: number;
  readonly testMode: boolean;
  readonly outlets: ReadonlyArray<OutletSummary>;
  readonly events: ReadonlyArray<SessionEvent>;
  /** Some session ended in ERROR. */
  readonly abnormal: boolean;
};

type SessionContext = {
  readonly outlet: string;
  readonly mode: ChargeMode;
  readonly machine: ChargeStateMachine;
  readonly emit: (event: SessionEvent) => Effect.Effect<void>;
  readonly activity: RunActivity;
};

type RunActivity = {
  /** Completed when no session is charging any more. */
  readonly settled: Deferred.Deferred<void>;
  readonly rest: Effect.Effect<void>;
  readonly resume: Effect.Effect<void>;
};

/**
 * Runs one charge session per battery outlet, all of them concurrently, until
 * every session is final or the run deadline passes.
 */
export class Supervisor {
  private readonly resolver: ProfileResolver;
  private readonly limits: GlobalLimits;

  public constructor(
    private readonly outletDriver: IOutletDriver,
    private readonly chargeConfig: ChargeConfig,
    private readonly options: RunOptions,
    private readonly eventLogger: IEventLogger = new EventLogger(),
    private readonly timing: SupervisorTiming = DEFAULT_SUPERVISOR_TIMING,
  ) {
    this.resolver = new ProfileResolver(chargeConfig, { forceFullCharge: options.forceFullCharge });
    this.limits = resolveGlobalLimits(options.overrides, chargeConfig.settings);
  }

  public run(pubSub?: PubSub.PubSub<SessionEvent>): Effect.Effect<ChargeRunReport, NoOutletsFoundError> {
    const deps = this;

    return Effect.gen(function* () {
      const startedAtMs = yield* Clock.currentTimeMillis;
      const outlets = yield* deps.collectOutlets();

      yield* deps.logBanner(outlets);

      const eventLog = yield* Ref.make<ReadonlyArray<SessionEvent>>([]);
      const emit = (event: SessionEvent) => Effect.gen(function* () {
        yield* Ref.update(eventLog, (events) => [...events, event]);
        yield* deps.eventLogger.record(event);
        if (pubSub !== undefined) {
          yield* PubSub.publish(pubSub, event);
        }
      });

      // sessions still charging; dormant ones keep watching only while this is above zero
      const charging = yield* Ref.make(outlets.length);
      const settled = yield* Deferred.make<void>();
      const activity: RunActivity = {
        settled,
        rest: Ref.updateAndGet(charging, (count) => count - 1).pipe(
          Effect.flatMap((count) => count === 0 ? Deferred.succeed(settled, undefined) : Effect.succeed(false)),
          Effect.asVoid,
        ),
        resume: Ref.update(charging, (count) => count + 1),
      };

      const summaries = yield* Effect.forEach(
        outlets,
        (outlet) => deps.runSession(outlet, startedAtMs, emit, activity),
        { concurrency: 'unbounded' },
      );

      const finishedAtMs = yield* Clock.currentTimeMillis;

      return {
        startedAtMs,
        finishedAtMs,
        testMode: deps.options.testMode,
        outlets: summaries,
        events: yield* Ref.get(eventLog),
        abnormal: summaries.some((summary) => summary.state === ChargeState.Error),
      };
    }).pipe(Effect.withSpan('Supervisor.run'));
  }

  /** Outlets listed under Plugs first, then discovered ones following the battery naming convention. */
  public collectOutlets(): Effect.Effect<ReadonlyArray<string>, NoOutletsFoundError> {
    const deps = this;

    return Effect.gen(function* () {
      const configured = Object.keys(deps.chargeConfig.plugs);

      const discovered = yield* deps.outletDriver.discover().pipe(Effect.either);
      if (Either.isLeft(discovered)) {
        yield* Effect.logWarning(
          `Outlet discovery failed, continuing with configured outlets: ${discovered.left.message}`
        );
      }

      const battery = Either.isRight(discovered)
        ? discovered.right.filter((name) => name.includes(BATTERY_OUTLET_MARKER) && !configured.includes(name))
        : [];
      const outlets = [...configured, ...new Set(battery)];

      if (outlets.length === 0) {
        return yield* new NoOutletsFoundError({ discoveryFailed: Either.isLeft(discovered) });
      }

      return outlets;
    });
  }

  private logBanner(outlets: ReadonlyArray<string>): Effect.Effect<void> {
    const { limits, options, chargeConfig } = this;

    return Effect.logInfo('Starting battery charge monitor', {
      outlets,
      testMode: options.testMode,
      forceFullCharge: options.forceFullCharge,
      storageOutlets: chargeConfig.storage,
      fullChargeOutlets: chargeConfig.fullCharge,
      overrides: options.overrides,
      fullChargeRepeatLimit: limits.fullChargeRepeatLimit,
      maxCyclesInFineMode: limits.maxCyclesInFineMode,
      maxHoursToRun: limits.maxHoursToRun,
      coarseProbeInterval: Duration.format(limits.coarseProbeInterval),
      fineProbeInterval: Duration.format(limits.fineProbeInterval),
    });
  }

  private runSession(
    outlet: string,
    runStartedAtMs: number,
    emit: (event: SessionEvent) => Effect.Effect<void>,
    activity: RunActivity,
  ): Effect.Effect<OutletSummary> {
    const deps = this;

    return Effect.gen(function* () {
      const startedAtMs = yield* Clock.currentTimeMillis;
      const resolution = deps.resolver.resolve(outlet);
      const { profile, mode } = resolution;
      const { thresholds, warnings } = calculateThresholds(profile, mode, deps.options.overrides, deps.limits);

      const machine = new ChargeStateMachine(
        {
          outlet,
          mode,
          profileName: profile.name,
          thresholds,
          startedAtMs,
          maxCyclesInFineMode: deps.limits.maxCyclesInFineMode,
        },
        new ProbeScheduler({ coarse: deps.limits.coarseProbeInterval, fine: deps.limits.fineProbeInterval }),
      );
      const budget = new RuntimeBudgetTracker({
        sessionStartedAtMs: startedAtMs,
        maxRuntime: thresholds.maxRuntime,
        runStartedAtMs,
        maxHoursToRun: deps.limits.maxHoursToRun,
      });
      const session: SessionContext = { outlet, mode, machine, emit, activity };

      yield* Effect.addFinalizer((exit) => Exit.isSuccess(exit) ? Effect.void : deps.shutdownOutlet(session));

      if (resolution._tag === 'Defaulted') {
        yield* emit({ _tag: 'ProfileDefaulted', at: startedAtMs, outlet, mode, reason: resolution.reason });
      }
      for (const warning of warnings) {
        yield* emit({ _tag: 'ThresholdWarning', at: startedAtMs, outlet, mode, warning });
      }
      yield* emit({ _tag: 'SessionStarted', at: startedAtMs, outlet, mode, profileName: profile.name, thresholds });

      yield* deps.prepareOutlet(session);

      let resting = false;
      if (!machine.isFinal) {
        // let the charger and the outlet's meter settle before the first reading
        yield* Effect.sleep(deps.timing.settleTime);
      }

      while (!machine.isFinal) {
        const wait = yield* deps.tick(session, budget);

        const nowResting = machine.isFinal || machine.isDormant;
        if (nowResting !== resting) {
          resting = nowResting;
          yield* resting ? activity.rest : activity.resume;
        }

        if (wait !== null) {
          yield* machine.isDormant
            ? Effect.race(Effect.sleep(wait), Deferred.await(activity.settled))
            : Effect.sleep(wait);
        }
      }
      if (!resting) {
        yield* activity.rest;
      }

      const finishedAtMs = yield* Clock.currentTimeMillis;
      const snapshot = machine.snapshot();
      yield* emit({
        _tag: 'SessionFinished',
        at: finishedAtMs,
        outlet,
        mode,
        state: snapshot.state,
        cycleCount: snapshot.cycleCount,
        lastReading: snapshot.lastReading,
      });

      const { chargingStartedAtMs, chargingStoppedAtMs } = snapshot;

      return {
        outlet,
        mode,
        profileName: profile.name,
        profileDefaulted: resolution._tag === 'Defaulted',
        state: snapshot.state,
        reason: snapshot.stopReason,
        cycleCount: snapshot.cycleCount,
        lastReading: snapshot.lastReading,
        samples: snapshot.samples,
        chargingDurationMs: chargingStartedAtMs === null
          ? null
          : (chargingStoppedAtMs ?? finishedAtMs) - chargingStartedAtMs,
        fault: snapshot.fault,
      };
    }).pipe(
      Effect.scoped,
      Effect.annotateLogs({ outlet }),
      Effect.withSpan('Supervisor.runSession', { attributes: { outlet } }),
    );
  }

  /**
   * Switches the outlet on and waits for the charger to draw power, cycling
   * the outlet between attempts. An outlet that never draws power is still
   * monitored.
   */
  private prepareOutlet(session: SessionContext): Effect.Effect<void> {
    const deps = this;
    const { outlet, mode } = session;
    const attempts = Math.max(1, deps.timing.outletSetupAttempts);

    return Effect.gen(function* () {
      for (let attempt = 1; attempt <= attempts; attempt++) {
        if (deps.options.testMode) {
          yield* Effect.log(`Test mode: not switching ${outlet} on`);
        } else {
          const switchedOn = yield* deps.withRetry(deps.outletDriver.setPower(outlet, true)).pipe(Effect.either);
          if (Either.isLeft(switchedOn)) {
            return yield* deps.fault(session, switchedOn.left, yield* Clock.currentTimeMillis);
          }
        }

        yield* Effect.sleep(deps.timing.outletSetupDelay);

        const reading = yield* deps.withRetry(deps.outletDriver.readPower(outlet)).pipe(Effect.either);
        const at = yield* Clock.currentTimeMillis;
        if (Either.isLeft(reading)) {
          return yield* deps.fault(session, reading.left, at);
        }

        if (reading.right > 0 || deps.options.testMode || attempt === attempts) {
          return yield* session.emit({ _tag: 'OutletSwitchedOn', at, outlet, mode, reading: reading.right });
        }

        yield* Effect.logDebug(`${outlet} draws no power after switching on (attempt ${attempt} of ${attempts})`);
        const switchedOff = yield* deps.withRetry(deps.outletDriver.setPower(outlet, false)).pipe(Effect.either);
        if (Either.isLeft(switchedOff)) {
          return yield* deps.fault(session, switchedOff.left, yield* Clock.currentTimeMillis);
        }
        yield* Effect.sleep(deps.timing.outletSetupDelay);
      }
    }).pipe(Effect.withSpan('Supervisor.prepareOutlet'));
  }

  /** Runs when a session is interrupted or dies: an outlet still charging is switched off. */
  private shutdownOutlet(session: SessionContext): Effect.Effect<void> {
    const deps = this;
    const { outlet } = session;
    const { state, lastCommand } = session.machine.snapshot();

    const charging = state === ChargeState.AwaitingStart
      || state === ChargeState.ChargingCoarse
      || state === ChargeState.ChargingFine;
    if (!charging || lastCommand === 'off') {
      return Effect.void;
    }

    if (deps.options.testMode) {
      return Effect.log(`Test mode: not switching ${outlet} off on shutdown`);
    }

    return deps.outletDriver.setPower(outlet, false).pipe(
      Effect.tap(() => Effect.logWarning(`Switched ${outlet} off on shutdown`)),
      Effect.catchAll((err) => Effect.logError(`Could not switch ${outlet} off on shutdown: ${err.message}`)),
    );
  }

  /** One reading and its consequences. Returns how long to wait before the next tick, if there is one. */
  private tick(session: SessionContext, budget: RuntimeBudgetTracker): Effect.Effect<Duration.Duration | null> {
    const deps = this;
    const { machine, outlet, activity } = session;

    return Effect.gen(function* () {
      if (machine.isDormant && (yield* Deferred.isDone(activity.settled))) {
        machine.retire();
        return null;
      }

      const now = yield* Clock.currentTimeMillis;

      const ceiling = budget.check(now);
      if (ceiling !== null) {
        yield* Effect.logInfo(`Runtime ceiling reached (${ceiling})`);
        yield* deps.apply(session, machine.expire(ceiling, now), machine.snapshot().lastReading, now);
        return null;
      }

      const reading = yield* deps.withRetry(deps.outletDriver.readPower(outlet)).pipe(Effect.either);
      const readAt = yield* Clock.currentTimeMillis;

      if (Either.isLeft(reading)) {
        yield* deps.fault(session, reading.left, readAt);
        return null;
      }

      const sampledIn = machine.state;
      const outcome = machine.observe(reading.right, readAt);
      yield* Effect.annotateCurrentSpan({ reading: reading.right, state: sampledIn });
      yield* session.emit({
        _tag: 'PowerSampled',
        at: readAt,
        outlet,
        mode: session.mode,
        state: sampledIn,
        reading: reading.right,
        probe: machine.snapshot().probe,
      });

      yield* deps.apply(session, outcome, reading.right, readAt);

      if (machine.isFinal || outcome.probe === null) {
        return null;
      }

      const afterMs = yield* Clock.currentTimeMillis;
      const wakeMs = budget.nextWakeMs(afterMs, outcome.probe.interval);
      return Duration.millis(Math.max(0, wakeMs - afterMs));
    }).pipe(Effect.withSpan('Supervisor.tick'));
  }

  private apply(session: SessionContext, outcome: TickOutcome, reading: number | null, at: number): Effect.Effect<void> {
    const deps = this;
    const { machine, outlet, mode } = session;

    return Effect.gen(function* () {
      if (outcome.transition !== null) {
        yield* session.emit({
          _tag: 'StateChanged',
          at,
          outlet,
          mode,
          ...outcome.transition,
          reading,
          cycleCount: machine.snapshot().cycleCount,
        });
      }

      if (outcome.command !== 'off') {
        return;
      }

      const reason = machine.snapshot().stopReason;

      // test mode records the command without sending it
      if (deps.options.testMode) {
        yield* Effect.log(`Test mode: not switching ${outlet} off`);
        yield* session.emit({ _tag: 'OutletSwitchedOff', at, outlet, mode, reason });
        return;
      }

      const switched = yield* deps.withRetry(deps.outletDriver.setPower(outlet, false)).pipe(Effect.either);

      if (Either.isLeft(switched)) {
        // an undelivered off command leaves even a completed session in ERROR
        yield* deps.fault(session, switched.left, yield* Clock.currentTimeMillis);
        return;
      }

      yield* session.emit({ _tag: 'OutletSwitchedOff', at, outlet, mode, reason });
    });
  }

  private fault(session: SessionContext, err: OutletDriverError, at: number): Effect.Effect<void> {
    const { machine, outlet, mode } = session;
    const previousReading = machine.snapshot().lastReading;

    return Effect.gen(function* () {
      yield* session.emit({ _tag: 'OutletFault', at, outlet, mode, message: err.message });
      const outcome = machine.fail(err.message, at);
      if (outcome.transition !== null) {
        yield* session.emit({
          _tag: 'StateChanged',
          at,
          outlet,
          mode,
          ...outcome.transition,
          reading: previousReading,
          cycleCount: machine.snapshot().cycleCount,
        });
      }
    });
  }

  // only unreachable outlets are worth another attempt
  private withRetry<A>(effect: Effect.Effect<A, OutletDriverError>): Effect.Effect<A, OutletDriverError> {
    return effect.pipe(
      Effect.retry({
        schedule: Schedule.compose(
          Schedule.recurs(this.timing.outletRetryTimes),
          Schedule.exponential(this.timing.outletRetryBackoff, 2)
        ),
        while: (err) => err._tag === 'OutletUnreachable',
      }),
    );
  }
}
