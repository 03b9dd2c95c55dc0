import { Effect } from 'effect';
import type { AnalysisConfiguration } from './analysis-configuration.js';
import type { ConvergenceError } from './errors/convergence.error.js';
import type { DataError } from './errors/data.error.js';
import { runAnalysis, type AnalysisResult } from './pipeline.js';
import { ReportLogger } from './report-logger/index.js';
import type { IReportLogger } from './report-logger/types.js';
import type { ISeriesSource, SeriesFileNotFoundError, SourceNotAvailableError } from './series-source/types.js';

export type ReportSections = 'daily' | 'weekly' | 'complete';

export class App {
  public constructor(
    private readonly seriesSource: ISeriesSource,
    private readonly sections: ReportSections = 'complete',
    private readonly reportLogger: IReportLogger = new ReportLogger(),
  ) { }

  public run(configuration: AnalysisConfiguration): Effect.Effect<
    AnalysisResult,
    SeriesFileNotFoundError
    | SourceNotAvailableError
    | DataError
    | ConvergenceError
  > {
    const deps = this;

    return Effect.gen(function* () {
      const rows = yield* deps.seriesSource.readRows();
      const result = yield* runAnalysis(rows, configuration);

      yield* deps.report(result);

      return result;
    });
  }

  private report(result: AnalysisResult) {
    const deps = this;

    return Effect.gen(function* () {
      yield* deps.reportLogger.onCurveSynthesized(result.solarCurve);
      yield* deps.reportLogger.onDailySummary(result.days, result.configuration);

      if (deps.sections !== 'weekly') {
        yield* Effect.forEach(result.days, (day) => deps.reportLogger.onDayDetail(day), { discard: true });
      }

      if (deps.sections !== 'daily') {
        yield* deps.reportLogger.onSummary('Last 7 days', result.aggregate.lastSevenDays);
      }

      if (deps.sections === 'complete') {
        yield* deps.reportLogger.onSummary('Whole period', result.aggregate.overall);
      }
    });
  }
}
