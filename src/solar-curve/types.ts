export type CurveShape = {
  readonly peakPower: number; // kW at solar noon
  readonly sunrise: number; // hour of day, curve is zero before this
  readonly sunset: number; // hour of day, curve is zero after this
};

export type WidthSearch = {
  readonly lower: number; // hours
  readonly upper: number; // initial upper bound, doubled while too narrow
  readonly ceiling: number; // doubling stops once the upper bound reaches this
  readonly iterations: number; // bisection steps
  readonly tolerance: number; // accepted relative energy error
};

export type SolarCurveModel = CurveShape & {
  readonly capacity: number; // kW
  readonly requestedEnergy: number; // capacity * sunHours, kWh
  readonly targetEnergy: number; // requestedEnergy clamped to maxReachableEnergy
  readonly maxReachableEnergy: number;
  readonly clamped: boolean;
  readonly width: number; // solved standard deviation, hours
  readonly dailyEnergy: number; // energy of the solved curve, kWh
  readonly canonicalCurve: readonly number[]; // 96 quarter-hour values from 00:00
};
