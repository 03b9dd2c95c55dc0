import { Config as EffectConfig, Effect } from "effect";
import { makeAnalysisConfiguration } from "./analysis-configuration.js";

export const AppConfig = {
  solar: {
    capacityMw: EffectConfig.number("SOLAR_CAPACITY_MW").pipe(EffectConfig.withDefault(3.0)),
    sunHours: EffectConfig.number("SUN_HOURS").pipe(EffectConfig.withDefault(4.0)),
  },

  battery: {
    thresholdW: EffectConfig.number("BATTERY_THRESHOLD_W").pipe(EffectConfig.withDefault(1500)),
    // 0 sizes the battery from each day's swing
    sizeKwh: EffectConfig.number("BATTERY_SIZE_KWH").pipe(EffectConfig.withDefault(0)),
  },

  dataFile: EffectConfig.string("DATA_FILE").pipe(EffectConfig.withDefault("data/kw.csv")),
};

// Environment values are in MWp and W; the analysis works in kW.
export const loadAnalysisConfiguration = Effect.gen(function* () {
  const capacityMw = yield* AppConfig.solar.capacityMw;
  const sunHours = yield* AppConfig.solar.sunHours;
  const thresholdW = yield* AppConfig.battery.thresholdW;
  const batterySizeKwh = yield* AppConfig.battery.sizeKwh;

  return yield* makeAnalysisConfiguration({
    capacityKw: capacityMw * 1000,
    sunHours,
    dischargeThresholdKw: thresholdW / 1000,
    batterySizeKwh,
  });
});
