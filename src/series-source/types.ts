import { Context, Data, Effect } from "effect";
import type { RawRow } from "../series-normalizer/types.js";

export class SeriesFileNotFoundError extends Data.TaggedError("SeriesFileNotFound")<{
  readonly path: string;
}> {
  public override readonly message = `Data file not found: ${this.path}`;
}

export class SourceNotAvailableError extends Data.TaggedError("SourceNotAvailable")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class SeriesSource extends Context.Tag("SeriesSource")<
  SeriesSource,
  {
    readonly readRows: () => Effect.Effect<readonly RawRow[], SeriesFileNotFoundError | SourceNotAvailableError>;
  }
>() {}

export type ISeriesSource = Context.Tag.Service<typeof SeriesSource>;
