import { Effect } from "effect";
import type { AnalysisSummary } from "../aggregator/types.js";
import type { AnalysisConfiguration } from "../analysis-configuration.js";
import type { DayBalanceRecord } from "../daily-balance/types.js";
import type { SolarCurveModel } from "../solar-curve/types.js";
import { formatCurve, formatDailyTable, formatDayDetail, formatSummary } from "./format.js";
import type { IReportLogger } from "./types.js";

const logLines = (lines: readonly string[]) =>
  Effect.forEach(lines, (line) => Effect.log(line), { discard: true });

export class ReportLogger implements IReportLogger {

  public onCurveSynthesized(model: SolarCurveModel) {
    return Effect.log(formatCurve(model));
  }

  public onDailySummary(days: readonly DayBalanceRecord[], configuration: AnalysisConfiguration) {
    return logLines(formatDailyTable(days, configuration));
  }

  public onDayDetail(day: DayBalanceRecord) {
    return logLines(formatDayDetail(day));
  }

  public onSummary(label: string, summary: AnalysisSummary) {
    return logLines(formatSummary(label, summary));
  }
}
