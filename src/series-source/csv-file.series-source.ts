import { FileSystem } from "@effect/platform";
import type { PlatformError } from "@effect/platform/Error";
import { Effect, Layer } from "effect";
import Papa from "papaparse";
import type { RawRow } from "../series-normalizer/types.js";
import { SeriesFileNotFoundError, SeriesSource, SourceNotAvailableError } from "./types.js";

// Meter export layout: datetime, rate_a, (empty), rate_b, (empty), rate_c, (empty)
const TIMESTAMP_COLUMN = 0;
const RATE_A_COLUMN = 1;
const RATE_B_COLUMN = 3;
const RATE_C_COLUMN = 5;

const BYTE_ORDER_MARK = "\uFEFF";

/**
 * Parses the meter CSV export. The first line is a header and is skipped;
 * columns are read by position, so header wording does not matter.
 */
export const parseCsvRows = (text: string): RawRow[] => {
  const content = text.startsWith(BYTE_ORDER_MARK) ? text.slice(BYTE_ORDER_MARK.length) : text;
  const { data } = Papa.parse<string[]>(content, { header: false, skipEmptyLines: true });

  return data.slice(1).map((columns) => ({
    timestamp: columns[TIMESTAMP_COLUMN] ?? "",
    rateA: columns[RATE_A_COLUMN],
    rateB: columns[RATE_B_COLUMN],
    rateC: columns[RATE_C_COLUMN],
  }));
};

const unreadable = (path: string, error: PlatformError) =>
  new SourceNotAvailableError({
    message: `Could not read ${path}: ${error.message}`,
    cause: error,
  });

export const CsvFileSeriesSourceLayer = (
  path: string
): Layer.Layer<SeriesSource, never, FileSystem.FileSystem> =>
  Layer.effect(
    SeriesSource,
    Effect.gen(function* () {
      const fileSystem = yield* FileSystem.FileSystem;

      const readRows = () =>
        Effect.gen(function* () {
          yield* Effect.logInfo(`Loading data from ${path}`);

          const exists = yield* fileSystem.exists(path);
          if (!exists) {
            return yield* Effect.fail(new SeriesFileNotFoundError({ path }));
          }

          const content = yield* fileSystem.readFileString(path, "utf-8");
          return parseCsvRows(content);
        }).pipe(
          Effect.catchTags({
            SystemError: (error) => Effect.fail(unreadable(path, error)),
            BadArgument: (error) => Effect.fail(unreadable(path, error)),
          })
        );

      return SeriesSource.of({ readRows });
    })
  );
