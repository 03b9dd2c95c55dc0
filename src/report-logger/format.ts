import type { AnalysisSummary } from "../aggregator/types.js";
import { hasFixedBatterySize, type AnalysisConfiguration } from "../analysis-configuration.js";
import type { DayBalanceRecord } from "../daily-balance/types.js";
import type { SolarCurveModel } from "../solar-curve/types.js";

const DATE_WIDTH = 12;
const COLUMN_WIDTHS = [12, 12, 12, 12, 16, 18] as const;

const formatColumns = (date: string, values: readonly string[]): string =>
  [date.padEnd(DATE_WIDTH), ...values.map((value, i) => value.padStart(COLUMN_WIDTHS[i] ?? 0))].join(" ");

export const formatDailyTable = (
  days: readonly DayBalanceRecord[],
  configuration: AnalysisConfiguration,
): string[] => {
  const batteryHeader = hasFixedBatterySize(configuration) ? "Battery set(kWh)" : "Battery rec(kWh)";
  const header = formatColumns("Date", [
    "Load(kWh)",
    "Solar(kWh)",
    "Excess(kWh)",
    "Deficit(kWh)",
    batteryHeader,
    "Evening batt.(kWh)",
  ]);

  const rows = days.map((day) =>
    formatColumns(
      day.date,
      [
        day.consumptionEnergy,
        day.solarEnergy,
        day.totalExcessEnergy,
        day.totalDeficitEnergy,
        day.optimalBatterySize,
        day.eveningDispatch.dischargeEnergy,
      ].map((value) => value.toFixed(0))
    )
  );

  return [header, ...rows];
};

export const formatDayDetail = (day: DayBalanceRecord): string[] => {
  const dispatch = day.eveningDispatch;
  const peakSolar = Math.max(0, ...day.solar);

  return [
    `${day.date}: load ${day.consumptionEnergy.toFixed(1)} kWh, solar ${day.solarEnergy.toFixed(1)} kWh (peak ${peakSolar.toFixed(0)} kW), used directly ${day.solarConsumedDirectly.toFixed(1)} kWh`,
    `  balance: max excess ${day.maxExcess.toFixed(1)} kWh, max deficit ${day.maxDeficit.toFixed(1)} kWh, battery needed ${day.neededBatterySize.toFixed(1)} kWh, recommended ${day.optimalBatterySize.toFixed(1)} kWh`,
    `  16:00-22:00: load ${dispatch.windowLoadEnergy.toFixed(1)} kWh, above threshold ${dispatch.loadAboveThresholdEnergy.toFixed(1)} kWh, battery ${dispatch.dischargeEnergy.toFixed(1)} of ${dispatch.availableEnergy.toFixed(1)} kWh, grid after battery ${dispatch.effectiveLoadEnergy.toFixed(1)} kWh`,
  ];
};

export const formatSummary = (label: string, summary: AnalysisSummary): string[] => {
  if (summary._tag === "NoData") {
    return [`${label}: no data`];
  }

  const first = summary.dates[0] ?? "";
  const last = summary.dates[summary.dates.length - 1] ?? "";

  return [
    `${label} (${summary.totalDays} days, ${first} to ${last})`,
    `  load: ${summary.totalConsumption.toFixed(1)} kWh total, ${summary.averageDailyConsumption.toFixed(1)} kWh/day`,
    `  solar: ${summary.totalSolar.toFixed(1)} kWh total, ${summary.averageDailySolar.toFixed(1)} kWh/day`,
    `  excess: ${summary.totalExcessEnergy.toFixed(1)} kWh, deficit: ${summary.totalDeficitEnergy.toFixed(1)} kWh`,
    `  battery size: ${summary.averageOptimalBatterySize.toFixed(1)} kWh average`,
    `  evening discharge: ${summary.totalEveningDischarge.toFixed(1)} kWh total, ${summary.averageEveningDischarge.toFixed(1)} kWh/day`,
  ];
};

export const formatCurve = (model: SolarCurveModel): string =>
  `Solar curve: width ${model.width.toFixed(3)} h, ${model.dailyEnergy.toFixed(1)} kWh/day, peak ${model.peakPower.toFixed(0)} kW` +
  (model.clamped ? ` (clamped from ${model.requestedEnergy.toFixed(1)} kWh)` : "");
