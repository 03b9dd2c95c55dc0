#!/usr/bin/env node
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import { Effect, Logger, LogLevel } from "effect";
import { App, type ReportSections } from "./app.js";
import { loadAnalysisConfiguration } from "./config.js";
import { createSeriesSourceLayer } from "./layers.js";
import { SeriesSource } from "./series-source/types.js";

const isProd = process.env.NODE_ENV == 'production';

const args = process.argv.slice(2);
const dataFileArgument = args.find((arg) => !arg.startsWith('--'));
const sections: ReportSections = args.includes('--daily')
  ? 'daily'
  : (args.includes('--weekly') ? 'weekly' : 'complete');

const program = Effect.gen(function*() {
  const configuration = yield* loadAnalysisConfiguration;
  const seriesSource = yield* SeriesSource;

  yield* Effect.log(`Starting analysis: ${configuration.capacityKw} kW array, ${configuration.sunHours} sun-hours, threshold ${configuration.dischargeThresholdKw} kW`);

  const app = new App(seriesSource, sections);
  yield* app.run(configuration);

  yield* Effect.log('Analysis complete');
}).pipe(
  Effect.provide(createSeriesSourceLayer(dataFileArgument)),
  Effect.provide(NodeContext.layer),
  Effect.catchAll((err) =>
    Effect.logError('Analysis failed', err).pipe(
      Effect.zipRight(Effect.sync(() => {
        process.exitCode = 1;
      }))
    )
  ),
  Logger.withMinimumLogLevel(isProd ? LogLevel.Info : LogLevel.Debug),
);

NodeRuntime.runMain(program);
