import type { Effect } from "effect";
import type { SessionEvent } from "../events.js";

export type IEventLogger = {
  record: (event: SessionEvent) => Effect.Effect<void>;
};
