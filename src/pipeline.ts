import { Effect } from "effect";
import { aggregate, type Aggregate } from "./aggregator/index.js";
import type { AnalysisConfiguration } from "./analysis-configuration.js";
import { calculateDayBalance, type DayBalanceRecord } from "./daily-balance/index.js";
import type { ConvergenceError } from "./errors/convergence.error.js";
import type { DataError } from "./errors/data.error.js";
import { groupByDate, normalizeSeries, type RawRow } from "./series-normalizer/index.js";
import { replicateCurve, synthesizeSolarCurve, type SolarCurveModel } from "./solar-curve/index.js";

export type AnalysisResult = {
  readonly configuration: AnalysisConfiguration;
  readonly solarCurve: SolarCurveModel;
  readonly sampleCount: number;
  readonly droppedRows: number;
  readonly days: readonly DayBalanceRecord[];
  readonly aggregate: Aggregate;
};

/**
 * Runs normalisation, curve synthesis, the per-day balance and dispatch, and
 * aggregation. Nothing outside the call is touched, so independent runs can
 * share a process.
 */
export const runAnalysis = (
  rows: readonly RawRow[],
  configuration: AnalysisConfiguration,
): Effect.Effect<AnalysisResult, DataError | ConvergenceError> =>
  Effect.gen(function* () {
    const series = yield* normalizeSeries(rows);
    const solarCurve = yield* synthesizeSolarCurve(configuration);

    const days = groupByDate(series.samples);
    const solarByDay = replicateCurve(solarCurve, days);

    const records = days.map((day, i) =>
      calculateDayBalance(day, solarByDay[i] ?? [], configuration)
    );

    yield* Effect.logInfo(`Analysed battery requirements for ${records.length} days`);

    return {
      configuration,
      solarCurve,
      sampleCount: series.samples.length,
      droppedRows: series.droppedRows,
      days: records,
      aggregate: aggregate(records),
    };
  }).pipe(Effect.withSpan("runAnalysis"));
