import type { DayBalanceRecord } from "../daily-balance/types.js";
import type { EveningDispatchResult } from "../evening-dispatch/types.js";

// The slice of a day record the aggregator reads.
export type DailyTotals = Pick<
  DayBalanceRecord,
  | "date"
  | "consumptionEnergy"
  | "solarEnergy"
  | "totalExcessEnergy"
  | "totalDeficitEnergy"
  | "optimalBatterySize"
> & {
  readonly eveningDispatch: Pick<EveningDispatchResult, "dischargeEnergy">;
};

export type NoData = {
  readonly _tag: "NoData";
};

export type Summary = {
  readonly _tag: "Summary";
  readonly totalDays: number;
  readonly dates: readonly string[];
  readonly totalConsumption: number;
  readonly averageDailyConsumption: number;
  readonly totalSolar: number;
  readonly averageDailySolar: number;
  readonly totalExcessEnergy: number;
  readonly totalDeficitEnergy: number;
  readonly averageOptimalBatterySize: number;
  readonly totalEveningDischarge: number;
  readonly averageEveningDischarge: number;
};

export type AnalysisSummary = NoData | Summary;

export type Aggregate = {
  readonly overall: AnalysisSummary;
  readonly lastSevenDays: AnalysisSummary;
};
