import type { IEventLogger } from "./types.js";
import { Effect } from "effect";
import type { SessionEvent } from "../events.js";
import { describeDefaultedReason } from "../profile/profile-resolver.js";

export class EventLogger implements IEventLogger {

  public record(event: SessionEvent): Effect.Effect<void> {
    return this.write(event).pipe(
      Effect.annotateLogs({ outlet: event.outlet, mode: event.mode })
    );
  }

  private write(event: SessionEvent): Effect.Effect<void> {
    switch (event._tag) {
      case 'SessionStarted':
        return Effect.logInfo(
          `Monitoring ${event.outlet} with profile ${event.profileName}: start ${event.thresholds.startThreshold}W, stop ${event.thresholds.stopThreshold}W, fine probing below ${event.thresholds.coarseSwitchThreshold}W`
        );
      case 'ProfileDefaulted':
        return Effect.logWarning(`Using default profile for ${event.outlet}: ${describeDefaultedReason(event.reason)}`);
      case 'ThresholdWarning':
        return Effect.logWarning(`Threshold problem on ${event.outlet}: ${event.warning.message}`);
      case 'PowerSampled':
        return Effect.logDebug(`${event.outlet} drawing ${event.reading}W (${event.state}, ${event.probe} probe)`);
      case 'StateChanged':
        return Effect.logInfo(`${event.outlet} ${event.from} -> ${event.to} (${event.reason})`, {
          reading: event.reading,
          cycleCount: event.cycleCount,
        });
      case 'OutletSwitchedOn':
        return event.reading > 0
          ? Effect.logInfo(`Switched ${event.outlet} on, drawing ${event.reading}W`)
          : Effect.logWarning(`Switched ${event.outlet} on but it draws no power; is a charger plugged in?`);
      case 'OutletSwitchedOff':
        return Effect.logInfo(`Switched ${event.outlet} off (${event.reason ?? 'no stop reason'})`);
      case 'OutletFault':
        return Effect.logError(`Outlet ${event.outlet} failed: ${event.message}`);
      case 'SessionFinished':
        return Effect.logInfo(`Finished monitoring ${event.outlet} in ${event.state} after ${event.cycleCount} cycle(s)`);
    }
  }
}
