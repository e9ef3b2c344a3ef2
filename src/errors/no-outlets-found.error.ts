import { Data } from "effect";

export class NoOutletsFoundError extends Data.TaggedError('NoOutletsFound')<{
  discoveryFailed: boolean;
}> {
  public override readonly message = this.discoveryFailed
    ? 'No outlets configured under Plugs and outlet discovery failed'
    : 'No outlets configured under Plugs or discovered with a battery_ name';
}
