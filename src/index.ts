export * from "./aggregator/index.js";
export * from "./analysis-configuration.js";
export * from "./daily-balance/index.js";
export * from "./evening-dispatch/index.js";
export * from "./pipeline.js";
export * from "./series-normalizer/index.js";
export * from "./solar-curve/index.js";
export { App, type ReportSections } from "./app.js";
export { ConfigurationError } from "./errors/configuration.error.js";
export { ConvergenceError } from "./errors/convergence.error.js";
export { DataError } from "./errors/data.error.js";
export { CsvFileSeriesSourceLayer, parseCsvRows } from "./series-source/csv-file.series-source.js";
export { SeriesFileNotFoundError, SeriesSource, SourceNotAvailableError, type ISeriesSource } from "./series-source/types.js";
export { ReportLogger } from "./report-logger/index.js";
export type { IReportLogger } from "./report-logger/types.js";
