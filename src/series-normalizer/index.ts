import { Effect, Option } from "effect";
import { DataError } from "../errors/data.error.js";
import { parseTimestamp, toDateKey, toHourOfDay } from "./parse-timestamp.js";
import type { ChannelValue, DaySeries, NormalizedSeries, RawRow, Sample } from "./types.js";

export type { ChannelValue, DaySeries, NormalizedSeries, ParsedTimestamp, RawRow, Sample } from "./types.js";
export { parseTimestamp, toDateKey, toGregorianYear, toHourOfDay } from "./parse-timestamp.js";

// Missing or non-numeric readings count as zero.
export const coerceChannel = (value: ChannelValue): number => {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : 0;
  }
  if (typeof value !== "string" || value.trim() === "") {
    return 0;
  }
  const parsed = Number(value.trim());
  return Number.isFinite(parsed) ? parsed : 0;
};

const toSample = (row: RawRow, timestamp: Date): Sample => {
  const rateA = coerceChannel(row.rateA);
  const rateB = coerceChannel(row.rateB);
  const rateC = coerceChannel(row.rateC);

  return {
    timestamp,
    date: toDateKey(timestamp),
    hourOfDay: toHourOfDay(timestamp),
    rateA,
    rateB,
    rateC,
    consumption: rateA + rateB + rateC,
  };
};

/**
 * Turns raw meter rows into a chronologically sorted sample series.
 *
 * Rows with unparseable timestamps are dropped (and counted). Gaps are left as
 * they are and rows sharing a timestamp are all kept.
 */
export const normalizeSeries = (
  rows: readonly RawRow[],
): Effect.Effect<NormalizedSeries, DataError> =>
  Effect.gen(function* () {
    if (rows.length === 0) {
      return yield* Effect.fail(
        new DataError({ message: "No rows to analyse: the input is empty.", droppedRows: 0 })
      );
    }

    const samples: Sample[] = [];
    let droppedRows = 0;

    for (const row of rows) {
      const parsed = parseTimestamp(row.timestamp);
      if (Option.isNone(parsed)) {
        droppedRows++;
        continue;
      }
      samples.push(toSample(row, parsed.value.timestamp));
    }

    if (droppedRows > 0) {
      yield* Effect.logWarning(`Dropped ${droppedRows} rows with unparseable timestamps`);
    }

    if (samples.length === 0) {
      return yield* Effect.fail(
        new DataError({
          message: `No usable rows: all ${droppedRows} timestamps were unparseable.`,
          droppedRows,
        })
      );
    }

    // Array.prototype.sort is stable, so duplicates keep their input order.
    samples.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());

    const dates = Array.from(new Set(samples.map((sample) => sample.date)));

    yield* Effect.logInfo(
      `Loaded ${samples.length} samples covering ${dates.length} days (${dates[0]} to ${dates[dates.length - 1]})`
    );

    return { samples, dates, droppedRows };
  }).pipe(Effect.withSpan("normalizeSeries"));

// Assumes the samples are sorted, which normalizeSeries guarantees.
export const groupByDate = (samples: readonly Sample[]): DaySeries[] => {
  const days: { date: string; samples: Sample[] }[] = [];

  for (const sample of samples) {
    const current = days[days.length - 1];
    if (current && current.date === sample.date) {
      current.samples.push(sample);
    } else {
      days.push({ date: sample.date, samples: [sample] });
    }
  }

  return days;
};
