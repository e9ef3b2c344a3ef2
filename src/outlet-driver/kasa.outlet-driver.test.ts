import { Duration, Effect, Fiber, TestClock } from "effect";
import { describe, it, expect, vitest } from "@effect/vitest";
import { KasaOutletDriver, type KasaConfig, type KasaDiscovery, type KasaOutlet } from "./kasa.outlet-driver.js";
import { OutletUnreachableError } from "./types.js";

const makeOutlet = (alias: string, realtime: () => Promise<unknown>) => {
  const setPowerState = vitest.fn((_value: boolean) => Promise.resolve(true));
  const outlet: KasaOutlet = {
    alias,
    emeter: { getRealtime: realtime },
    setPowerState,
  };
  return { outlet, setPowerState };
};

describe("KasaOutletDriver", () => {
  const config: KasaConfig = {
    discoveryWindow: Duration.seconds(1),
    commandTimeout: Duration.seconds(5),
  };

  const driverFor = (...outlets: KasaOutlet[]) => {
    const discovery: KasaDiscovery = () => Effect.succeed(outlets);
    return new KasaOutletDriver(discovery, config);
  };

  it.effect("should return the aliases of discovered outlets", () =>
    Effect.gen(function* () {
      const driver = driverFor(
        makeOutlet("battery_drill", () => Promise.resolve({ power: 1 })).outlet,
        makeOutlet("desk lamp", () => Promise.resolve({ power: 1 })).outlet,
      );

      expect(yield* driver.discover()).toEqual(["battery_drill", "desk lamp"]);
    })
  );

  it.effect("should read power reported in watts", () =>
    Effect.gen(function* () {
      const driver = driverFor(makeOutlet("battery_drill", () => Promise.resolve({ power: 42.5, voltage: 230 })).outlet);
      yield* driver.discover();

      expect(yield* driver.readPower("battery_drill")).toBe(42.5);
    })
  );

  it.effect("should convert power reported in milliwatts", () =>
    Effect.gen(function* () {
      const driver = driverFor(makeOutlet("battery_drill", () => Promise.resolve({ power_mw: 12500 })).outlet);
      yield* driver.discover();

      expect(yield* driver.readPower("battery_drill")).toBe(12.5);
    })
  );

  it.effect("should fail with PowerReadingUnavailable when the response carries no power", () =>
    Effect.gen(function* () {
      const driver = driverFor(makeOutlet("battery_drill", () => Promise.resolve({ voltage_mv: 230000 })).outlet);
      yield* driver.discover();

      const err = yield* driver.readPower("battery_drill").pipe(Effect.flip);
      expect(err._tag).toBe("PowerReadingUnavailable");
    })
  );

  it.effect("should fail with OutletNotFound for an outlet that was never discovered", () =>
    Effect.gen(function* () {
      const driver = driverFor();
      yield* driver.discover();

      const err = yield* driver.readPower("battery_drill").pipe(Effect.flip);
      expect(err._tag).toBe("OutletNotFound");
      expect(err.message).toBe("Outlet battery_drill was not found on the network.");
    })
  );

  it.effect("should map a rejected request to OutletUnreachable", () =>
    Effect.gen(function* () {
      const driver = driverFor(makeOutlet("battery_drill", () => Promise.reject(new Error("EHOSTUNREACH"))).outlet);
      yield* driver.discover();

      const err = yield* driver.readPower("battery_drill").pipe(Effect.flip);
      expect(err._tag).toBe("OutletUnreachable");
      expect(err.message).toBe("Outlet battery_drill is unreachable: EHOSTUNREACH");
    })
  );

  it.effect("should give up on a request that outlives the command timeout", () =>
    Effect.gen(function* () {
      const driver = driverFor(makeOutlet("battery_drill", () => new Promise<unknown>(() => { })).outlet);
      yield* driver.discover();

      const fiber = yield* driver.readPower("battery_drill").pipe(Effect.flip, Effect.fork);
      yield* TestClock.adjust(Duration.seconds(6));
      const err = yield* Fiber.join(fiber);

      expect(err._tag).toBe("OutletUnreachable");
      expect(err.message).toBe("Outlet battery_drill is unreachable: request timed out");
    })
  );

  it.effect("should switch the outlet's relay", () =>
    Effect.gen(function* () {
      const { outlet, setPowerState } = makeOutlet("battery_drill", () => Promise.resolve({ power: 0 }));
      const driver = driverFor(outlet);
      yield* driver.discover();

      yield* driver.setPower("battery_drill", false);

      expect(setPowerState).toHaveBeenCalledTimes(1);
      expect(setPowerState).toHaveBeenCalledWith(false);
    })
  );

  it.effect("should propagate discovery failures", () =>
    Effect.gen(function* () {
      const discovery: KasaDiscovery = () => Effect.fail(
        new OutletUnreachableError({ outlet: "<discovery>", reason: "bind EADDRINUSE" })
      );
      const driver = new KasaOutletDriver(discovery, config);

      const err = yield* driver.discover().pipe(Effect.flip);
      expect(err.message).toBe("Outlet <discovery> is unreachable: bind EADDRINUSE");
    })
  );
});
