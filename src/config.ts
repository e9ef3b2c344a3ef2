import { Config as EffectConfig } from "effect";


export const AppConfig = {
  outlets: {
    broadcastAddress: EffectConfig.string("OUTLET_BROADCAST_ADDRESS").pipe(
      EffectConfig.withDefault("255.255.255.255")
    ),
    discoverySeconds: EffectConfig.number("OUTLET_DISCOVERY_SECONDS").pipe(
      EffectConfig.withDefault(10)
    ),
    commandTimeoutMs: EffectConfig.integer("OUTLET_COMMAND_TIMEOUT_MS").pipe(
      EffectConfig.withDefault(5000)
    ),
  },
};
