import { Client } from "tplink-smarthome-api";
import { Duration, Effect, Layer, Schema } from "effect";
import { AppConfig } from "../config.js";
import {
  OutletDriver,
  OutletNotFoundError,
  OutletUnreachableError,
  PowerReadingUnavailableError,
  type IOutletDriver,
  type OutletDriverError,
} from "./types.js";

export type KasaConfig = {
  readonly discoveryWindow: Duration.DurationInput;
  readonly commandTimeout: Duration.DurationInput;
};

/** The part of a tplink-smarthome-api plug the driver talks to. */
export type KasaOutlet = {
  readonly alias: string;
  readonly emeter: {
    readonly getRealtime: () => Promise<unknown>;
  };
  readonly setPowerState: (value: boolean) => Promise<unknown>;
};

export type KasaDiscovery = (
  window: Duration.DurationInput
) => Effect.Effect<ReadonlyArray<KasaOutlet>, OutletUnreachableError>;

// emeter responses carry watts on older firmware and milliwatts on newer
const RealtimeSchema = Schema.Struct({
  power: Schema.optional(Schema.Number),
  power_mw: Schema.optional(Schema.Number),
});

const DISCOVERY = '<discovery>';

const describe = (err: unknown) => err instanceof Error ? err.message : String(err);

/**
 * Discovers outlets through the client's UDP broadcast. Power strips are broken
 * out so each child socket appears as its own outlet.
 */
export const discoverKasaOutlets = (client: Client, broadcastAddress: string): KasaDiscovery => (window) =>
  Effect.acquireUseRelease(
    Effect.try({
      try: () => {
        const found = new Map<string, KasaOutlet>();
        const failures: string[] = [];
        client.on('plug-new', (plug: KasaOutlet) => {
          found.set(plug.alias, plug);
        });
        client.on('error', (err: Error) => {
          failures.push(err.message);
        });
        client.startDiscovery({ broadcast: broadcastAddress, breakoutChildren: true });
        return { found, failures };
      },
      catch: (err) => new OutletUnreachableError({ outlet: DISCOVERY, reason: describe(err) }),
    }),
    ({ found, failures }) => Effect.sleep(window).pipe(
      Effect.flatMap(() => found.size === 0 && failures.length > 0
        ? Effect.fail(new OutletUnreachableError({ outlet: DISCOVERY, reason: failures.join('; ') }))
        : Effect.succeed([...found.values()])
      )
    ),
    () => Effect.sync(() => {
      client.stopDiscovery();
      client.removeAllListeners('plug-new');
      client.removeAllListeners('error');
    }),
  );

export class KasaOutletDriver implements IOutletDriver {
  private readonly outlets = new Map<string, KasaOutlet>();

  public constructor(
    private readonly discoverOutlets: KasaDiscovery,
    private readonly config: KasaConfig,
  ) { }

  public discover(): Effect.Effect<ReadonlyArray<string>, OutletUnreachableError> {
    const deps = this;

    return Effect.gen(function* () {
      const found = yield* deps.discoverOutlets(deps.config.discoveryWindow);
      for (const outlet of found) {
        deps.outlets.set(outlet.alias, outlet);
      }

      yield* Effect.logDebug('Outlet discovery finished', { outlets: found.map((outlet) => outlet.alias) });

      return found.map((outlet) => outlet.alias);
    });
  }

  public readPower(outlet: string): Effect.Effect<number, OutletDriverError> {
    const deps = this;

    return Effect.gen(function* () {
      const device = yield* deps.lookup(outlet);
      const response = yield* deps.call(outlet, () => device.emeter.getRealtime());

      const realtime = yield* Schema.decodeUnknown(RealtimeSchema)(response).pipe(
        Effect.mapError(() => new PowerReadingUnavailableError({ outlet }))
      );

      if (realtime.power !== undefined) {
        return realtime.power;
      }
      if (realtime.power_mw !== undefined) {
        return realtime.power_mw / 1000;
      }

      return yield* new PowerReadingUnavailableError({ outlet });
    });
  }

  public setPower(outlet: string, on: boolean): Effect.Effect<void, OutletDriverError> {
    const deps = this;

    return Effect.gen(function* () {
      const device = yield* deps.lookup(outlet);
      yield* deps.call(outlet, () => device.setPowerState(on));
      yield* Effect.logDebug(`Outlet ${outlet} switched ${on ? 'on' : 'off'}`);
    });
  }

  private lookup(outlet: string): Effect.Effect<KasaOutlet, OutletNotFoundError> {
    const device = this.outlets.get(outlet);
    return device === undefined ? Effect.fail(new OutletNotFoundError({ outlet })) : Effect.succeed(device);
  }

  private call<A>(outlet: string, request: () => Promise<A>): Effect.Effect<A, OutletUnreachableError> {
    return Effect.tryPromise({
      try: request,
      catch: (err) => new OutletUnreachableError({ outlet, reason: describe(err) }),
    }).pipe(
      Effect.timeout(this.config.commandTimeout),
      Effect.catchTag('TimeoutException', () =>
        Effect.fail(new OutletUnreachableError({ outlet, reason: 'request timed out' }))
      ),
    );
  }
}

export const KasaOutletDriverLayer = Layer.effect(
  OutletDriver,
  Effect.gen(function* () {
    const broadcastAddress = yield* AppConfig.outlets.broadcastAddress;
    const discoverySeconds = yield* AppConfig.outlets.discoverySeconds;
    const commandTimeoutMs = yield* AppConfig.outlets.commandTimeoutMs;

    const client = new Client({ defaultSendOptions: { timeout: commandTimeoutMs } });

    return new KasaOutletDriver(discoverKasaOutlets(client, broadcastAddress), {
      discoveryWindow: Duration.seconds(discoverySeconds),
      commandTimeout: Duration.millis(commandTimeoutMs),
    });
  })
);
