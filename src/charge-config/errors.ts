import { Data } from "effect";

export class ConfigFileNotFoundError extends Data.TaggedError("ConfigFileNotFound")<{
  path: string;
}> {
  public override readonly message = `Config file ${this.path} does not exist.`;
}

export class ConfigFileInvalidError extends Data.TaggedError("ConfigFileInvalid")<{
  path: string;
  reason: string;
}> {
  public override readonly message = `Config file ${this.path} could not be read: ${this.reason}`;
}
