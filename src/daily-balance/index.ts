import type { AnalysisConfiguration } from "../analysis-configuration.js";
import { selectEveningWindow, simulateEveningDispatch } from "../evening-dispatch/index.js";
import {
  SAMPLE_HOURS,
  cumulativeTrapezoid,
  negativePart,
  positivePart,
  rectangleSum,
  trapezoid,
} from "../numeric/integration.js";
import type { DaySeries } from "../series-normalizer/types.js";
import type { DayBalanceRecord } from "./types.js";

export type { DayBalanceRecord } from "./types.js";

// Share of the worst swing recommended when no battery size is fixed.
export const AUTO_BATTERY_SIZE_FACTOR = 0.8;

export const calculateDayBalance = (
  day: DaySeries,
  solar: readonly number[],
  configuration: AnalysisConfiguration,
): DayBalanceRecord => {
  const consumption = day.samples.map((sample) => sample.consumption);
  const powerDifference = consumption.map((load, i) => (solar[i] ?? 0) - load);
  const cumulativeBalance = cumulativeTrapezoid(powerDifference);

  const maxExcess = Math.max(...cumulativeBalance);
  const maxDeficit = Math.min(...cumulativeBalance);
  const neededBatterySize = Math.max(Math.abs(maxExcess), Math.abs(maxDeficit));
  const optimalBatterySize = configuration.batterySizeKwh > 0
    ? configuration.batterySizeKwh
    : neededBatterySize * AUTO_BATTERY_SIZE_FACTOR;

  const totalExcessEnergy = trapezoid(positivePart(powerDifference));
  const totalDeficitEnergy = trapezoid(negativePart(powerDifference));

  const solarConsumedDirectly = rectangleSum(
    consumption.map((load, i) => Math.min(solar[i] ?? 0, load))
  );
  const solarAboveThresholdEnergy = solar.reduce(
    (sum, power) => sum + Math.max(0, power - configuration.dischargeThresholdKw) * SAMPLE_HOURS,
    0,
  );

  return {
    date: day.date,
    timestamps: day.samples.map((sample) => sample.timestamp),
    consumption,
    solar,
    powerDifference,
    cumulativeBalance,
    maxExcess,
    maxDeficit,
    neededBatterySize,
    optimalBatterySize,
    totalExcessEnergy,
    totalDeficitEnergy,
    netEnergyBalance: totalExcessEnergy - totalDeficitEnergy,
    consumptionEnergy: trapezoid(consumption),
    solarEnergy: trapezoid(solar),
    solarConsumedDirectly,
    solarAboveThresholdEnergy,
    eveningDispatch: simulateEveningDispatch(
      selectEveningWindow(day.samples),
      totalExcessEnergy,
      configuration,
    ),
  };
};
