import { SAMPLE_HOURS, trapezoid } from "../numeric/integration.js";
import type { CurveShape, WidthSearch } from "./types.js";

// Pure functions for the idealised clear-sky day

export const PEAK_EFFICIENCY = 0.9;
export const SUNRISE_HOUR = 6;
export const SUNSET_HOUR = 18;
export const SLOTS_PER_DAY = 96;

export const DEFAULT_WIDTH_SEARCH: WidthSearch = {
  lower: 0.2,
  upper: 20,
  ceiling: 200,
  iterations: 60,
  tolerance: 1e-6,
};

export const curveShapeForCapacity = (capacity: number): CurveShape => ({
  peakPower: capacity * PEAK_EFFICIENCY,
  sunrise: SUNRISE_HOUR,
  sunset: SUNSET_HOUR,
});

/** Hours of day at quarter-hour resolution, 0, 0.25, ... 23.75. */
export const quarterHours = (): number[] =>
  Array.from({ length: SLOTS_PER_DAY }, (_, slot) => slot * SAMPLE_HOURS);

export const solarPowerAt = (hour: number, width: number, shape: CurveShape): number => {
  if (hour < shape.sunrise || hour > shape.sunset) {
    return 0;
  }

  const solarNoon = (shape.sunrise + shape.sunset) / 2;
  const z = (hour - solarNoon) / width;

  return shape.peakPower * Math.exp(-0.5 * z * z);
};

export const dayCurve = (width: number, shape: CurveShape): number[] =>
  quarterHours().map((hour) => solarPowerAt(hour, width, shape));

export const dailyEnergyForWidth = (width: number, shape: CurveShape): number =>
  trapezoid(dayCurve(width, shape));

// The widest curve the bracketing step can reach.
export const widestSearchWidth = (search: WidthSearch): number => {
  let width = search.upper;
  while (width < search.ceiling) {
    width *= 2;
  }
  return width;
};

/**
 * Highest daily energy the fixed peak and daylight window allow. A target above
 * this is clamped to it.
 */
export const maxReachableEnergy = (
  shape: CurveShape,
  search: WidthSearch = DEFAULT_WIDTH_SEARCH,
): number => dailyEnergyForWidth(widestSearchWidth(search), shape);
