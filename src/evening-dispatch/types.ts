export type DispatchState = {
  readonly remainingEnergy: number; // kWh left in the battery
  readonly dischargeEnergy: number; // kWh delivered so far
  readonly loadAboveThresholdEnergy: number;
  readonly windowLoadEnergy: number;
  readonly effectiveLoadEnergy: number; // load left for the grid after the battery
};

export type DispatchStep = {
  readonly state: DispatchState;
  readonly dischargePower: number; // kW during this interval
  readonly effectiveLoad: number; // kW drawn from the grid during this interval
};

export type EveningDispatchResult = {
  readonly availableEnergy: number;
  readonly dischargeEnergy: number;
  readonly loadAboveThresholdEnergy: number;
  readonly windowLoadEnergy: number;
  readonly effectiveLoadEnergy: number;
  readonly timestamps: readonly Date[];
  readonly dischargePower: readonly number[];
  readonly remainingEnergy: readonly number[]; // battery energy after each interval
};
