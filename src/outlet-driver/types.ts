import { Context, Data, Effect } from "effect";

export class OutletUnreachableError extends Data.TaggedError("OutletUnreachable")<{
  outlet: string;
  reason: string;
}> {
  public override readonly message = `Outlet ${this.outlet} is unreachable: ${this.reason}`;
}

export class OutletNotFoundError extends Data.TaggedError("OutletNotFound")<{
  outlet: string;
}> {
  public override readonly message = `Outlet ${this.outlet} was not found on the network.`;
}

export class PowerReadingUnavailableError extends Data.TaggedError("PowerReadingUnavailable")<{
  outlet: string;
}> {
  public override readonly message = `Outlet ${this.outlet} did not report its power draw.`;
}

export type OutletDriverError = OutletUnreachableError | OutletNotFoundError | PowerReadingUnavailableError;

export class OutletDriver extends Context.Tag("OutletDriver")<
  OutletDriver,
  {
    /** Names of the outlets visible on the network. */
    readonly discover: () => Effect.Effect<ReadonlyArray<string>, OutletUnreachableError>;
    /** Instantaneous draw in watts. */
    readonly readPower: (outlet: string) => Effect.Effect<number, OutletDriverError>;
    readonly setPower: (outlet: string, on: boolean) => Effect.Effect<void, OutletDriverError>;
  }>
(){}

export type IOutletDriver = Context.Tag.Service<typeof OutletDriver>;
