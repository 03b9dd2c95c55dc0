import { Effect, Layer } from "effect";
import { AppConfig } from "./config.js";
import { CsvFileSeriesSourceLayer } from "./series-source/csv-file.series-source.js";

export const createSeriesSourceLayer = (pathOverride?: string) =>
  Layer.unwrapEffect(
    Effect.map(AppConfig.dataFile, (configuredPath) =>
      CsvFileSeriesSourceLayer(pathOverride ?? configuredPath)
    )
  );
