import { Effect } from "effect";
import type { AnalysisConfiguration } from "../analysis-configuration.js";
import type { ConvergenceError } from "../errors/convergence.error.js";
import type { DaySeries } from "../series-normalizer/types.js";
import {
  DEFAULT_WIDTH_SEARCH,
  curveShapeForCapacity,
  dailyEnergyForWidth,
  dayCurve,
  maxReachableEnergy,
  solarPowerAt,
} from "./solar-calculations.js";
import type { SolarCurveModel, WidthSearch } from "./types.js";
import { solveWidth } from "./width-solver.js";

export type { CurveShape, SolarCurveModel, WidthSearch } from "./types.js";
export {
  DEFAULT_WIDTH_SEARCH,
  PEAK_EFFICIENCY,
  SLOTS_PER_DAY,
  SUNRISE_HOUR,
  SUNSET_HOUR,
  curveShapeForCapacity,
  dailyEnergyForWidth,
  dayCurve,
  maxReachableEnergy,
  quarterHours,
  solarPowerAt,
  widestSearchWidth,
} from "./solar-calculations.js";
export { solveWidth } from "./width-solver.js";

/**
 * Solves the single clear-sky curve used for every day of the run, an
 * average-day model rather than a per-date fit.
 */
export const synthesizeSolarCurve = (
  configuration: Pick<AnalysisConfiguration, "capacityKw" | "sunHours">,
  search: WidthSearch = DEFAULT_WIDTH_SEARCH,
): Effect.Effect<SolarCurveModel, ConvergenceError> =>
  Effect.gen(function* () {
    const shape = curveShapeForCapacity(configuration.capacityKw);
    const requestedEnergy = configuration.capacityKw * configuration.sunHours;
    const ceiling = maxReachableEnergy(shape, search);
    const clamped = requestedEnergy > ceiling;
    const targetEnergy = clamped ? ceiling : requestedEnergy;

    if (clamped) {
      yield* Effect.logWarning(
        `Target energy ${requestedEnergy.toFixed(1)} kWh exceeds the ${ceiling.toFixed(1)} kWh reachable under a ${shape.peakPower.toFixed(0)} kW peak; clamping`
      );
    }

    const width = yield* solveWidth(targetEnergy, shape, search);
    const dailyEnergy = dailyEnergyForWidth(width, shape);

    yield* Effect.logDebug(`Solved curve width ${width.toFixed(3)} h, ${dailyEnergy.toFixed(1)} kWh/day`);

    return {
      ...shape,
      capacity: configuration.capacityKw,
      requestedEnergy,
      targetEnergy,
      maxReachableEnergy: ceiling,
      clamped,
      width,
      dailyEnergy,
      canonicalCurve: dayCurve(width, shape),
    };
  }).pipe(Effect.withSpan("synthesizeSolarCurve"));

// The canonical curve read at each sample's time of day.
export const sampleCurveForDay = (model: SolarCurveModel, day: DaySeries): number[] =>
  day.samples.map((sample) => solarPowerAt(sample.hourOfDay, model.width, model));

/** One solar array per day; together they line up one-to-one with the samples. */
export const replicateCurve = (
  model: SolarCurveModel,
  days: readonly DaySeries[],
): number[][] => days.map((day) => sampleCurveForDay(model, day));
