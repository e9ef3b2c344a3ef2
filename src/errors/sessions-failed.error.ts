import { Data } from "effect";

export class SessionsFailedError extends Data.TaggedError('SessionsFailed')<{
  outlets: ReadonlyArray<string>;
}> {
  public override readonly message = `Charge monitoring ended in error for ${this.outlets.join(', ')}`;
}
