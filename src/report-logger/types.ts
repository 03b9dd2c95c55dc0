import type { Effect } from "effect";
import type { AnalysisSummary } from "../aggregator/types.js";
import type { AnalysisConfiguration } from "../analysis-configuration.js";
import type { DayBalanceRecord } from "../daily-balance/types.js";
import type { SolarCurveModel } from "../solar-curve/types.js";

export type IReportLogger = {
  onCurveSynthesized: (model: SolarCurveModel) => Effect.Effect<void>;
  onDailySummary: (days: readonly DayBalanceRecord[], configuration: AnalysisConfiguration) => Effect.Effect<void>;
  onDayDetail: (day: DayBalanceRecord) => Effect.Effect<void>;
  onSummary: (label: string, summary: AnalysisSummary) => Effect.Effect<void>;
};
