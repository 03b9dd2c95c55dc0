import type { EveningDispatchResult } from "../evening-dispatch/types.js";

export type DayBalanceRecord = {
  readonly date: string;
  readonly timestamps: readonly Date[];
  readonly consumption: readonly number[]; // kW
  readonly solar: readonly number[]; // kW
  readonly powerDifference: readonly number[]; // solar - consumption, kW
  readonly cumulativeBalance: readonly number[]; // kWh
  readonly maxExcess: number;
  readonly maxDeficit: number;
  readonly neededBatterySize: number;
  readonly optimalBatterySize: number;
  readonly totalExcessEnergy: number; // solar available to charge the battery
  readonly totalDeficitEnergy: number;
  readonly netEnergyBalance: number;
  readonly consumptionEnergy: number;
  readonly solarEnergy: number;
  readonly solarConsumedDirectly: number;
  readonly solarAboveThresholdEnergy: number;
  readonly eveningDispatch: EveningDispatchResult;
};
