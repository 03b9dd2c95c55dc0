import type { Aggregate, AnalysisSummary, DailyTotals } from "./types.js";

export type { Aggregate, AnalysisSummary, DailyTotals, NoData, Summary } from "./types.js";

export const SHORT_WINDOW_DAYS = 7;

const sumOf = <T>(items: readonly T[], pick: (item: T) => number): number =>
  items.reduce((sum, item) => sum + pick(item), 0);

export const summarize = (records: readonly DailyTotals[]): AnalysisSummary => {
  if (records.length === 0) {
    return { _tag: "NoData" };
  }

  const totalDays = records.length;
  const totalConsumption = sumOf(records, (day) => day.consumptionEnergy);
  const totalSolar = sumOf(records, (day) => day.solarEnergy);
  const totalEveningDischarge = sumOf(records, (day) => day.eveningDispatch.dischargeEnergy);

  return {
    _tag: "Summary",
    totalDays,
    dates: records.map((day) => day.date),
    totalConsumption,
    averageDailyConsumption: totalConsumption / totalDays,
    totalSolar,
    averageDailySolar: totalSolar / totalDays,
    totalExcessEnergy: sumOf(records, (day) => day.totalExcessEnergy),
    totalDeficitEnergy: sumOf(records, (day) => day.totalDeficitEnergy),
    averageOptimalBatterySize: sumOf(records, (day) => day.optimalBatterySize) / totalDays,
    totalEveningDischarge,
    averageEveningDischarge: totalEveningDischarge / totalDays,
  };
};

/** Records of the most recent dates present in the run, oldest first. */
export const lastDates = <T extends DailyTotals>(
  records: readonly T[],
  count: number = SHORT_WINDOW_DAYS,
): T[] => {
  const recentDates = new Set(
    Array.from(new Set(records.map((day) => day.date))).sort().slice(-count)
  );
  return records.filter((day) => recentDates.has(day.date));
};

export const aggregate = (records: readonly DailyTotals[]): Aggregate => ({
  overall: summarize(records),
  lastSevenDays: summarize(lastDates(records)),
});
