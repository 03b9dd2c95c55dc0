import type { AnalysisConfiguration } from "../analysis-configuration.js";
import { SAMPLE_HOURS } from "../numeric/integration.js";
import type { Sample } from "../series-normalizer/types.js";
import type { DispatchState, DispatchStep, EveningDispatchResult } from "./types.js";

export type { DispatchState, DispatchStep, EveningDispatchResult } from "./types.js";

export const EVENING_START_HOUR = 16;
export const EVENING_END_HOUR = 22;

export const selectEveningWindow = (samples: readonly Sample[]): Sample[] =>
  samples.filter(
    (sample) => sample.hourOfDay >= EVENING_START_HOUR && sample.hourOfDay < EVENING_END_HOUR
  );

export const availableBatteryEnergy = (
  storedEnergy: number,
  configuration: Pick<AnalysisConfiguration, "batterySizeKwh">,
): number =>
  configuration.batterySizeKwh > 0
    ? Math.min(storedEnergy, configuration.batterySizeKwh)
    : storedEnergy; // no fixed size: everything stored is usable, lossless

export const initialDispatchState = (availableEnergy: number): DispatchState => ({
  remainingEnergy: availableEnergy,
  dischargeEnergy: 0,
  loadAboveThresholdEnergy: 0,
  windowLoadEnergy: 0,
  effectiveLoadEnergy: 0,
});

/**
 * One quarter-hour of threshold dispatch. Load above the threshold is covered
 * from the battery until it runs dry; remaining energy never increases.
 */
export const stepDispatch = (
  state: DispatchState,
  load: number,
  thresholdKw: number,
): DispatchStep => {
  const windowLoadEnergy = state.windowLoadEnergy + load * SAMPLE_HOURS;

  if (load <= thresholdKw) {
    return {
      state: {
        ...state,
        windowLoadEnergy,
        effectiveLoadEnergy: state.effectiveLoadEnergy + load * SAMPLE_HOURS,
      },
      dischargePower: 0,
      effectiveLoad: load,
    };
  }

  const loadExcess = load - thresholdKw;
  const energyNeeded = loadExcess * SAMPLE_HOURS;
  const discharge = Math.min(state.remainingEnergy, energyNeeded);
  const dischargePower = discharge / SAMPLE_HOURS;
  const effectiveLoad = thresholdKw + Math.max(0, loadExcess - dischargePower);

  return {
    state: {
      remainingEnergy: state.remainingEnergy - discharge,
      dischargeEnergy: state.dischargeEnergy + discharge,
      loadAboveThresholdEnergy: state.loadAboveThresholdEnergy + energyNeeded,
      windowLoadEnergy,
      effectiveLoadEnergy: state.effectiveLoadEnergy + effectiveLoad * SAMPLE_HOURS,
    },
    dischargePower,
    effectiveLoad,
  };
};

type DispatchTrace = {
  readonly state: DispatchState;
  readonly dischargePower: readonly number[];
  readonly remainingEnergy: readonly number[];
};

export const simulateEveningDispatch = (
  window: readonly Sample[],
  storedEnergy: number,
  configuration: Pick<AnalysisConfiguration, "batterySizeKwh" | "dischargeThresholdKw">,
): EveningDispatchResult => {
  const availableEnergy = availableBatteryEnergy(storedEnergy, configuration);

  const trace = window.reduce<DispatchTrace>(
    (acc, sample) => {
      const step = stepDispatch(acc.state, sample.consumption, configuration.dischargeThresholdKw);
      return {
        state: step.state,
        dischargePower: [...acc.dischargePower, step.dischargePower],
        remainingEnergy: [...acc.remainingEnergy, step.state.remainingEnergy],
      };
    },
    { state: initialDispatchState(availableEnergy), dischargePower: [], remainingEnergy: [] },
  );

  return {
    availableEnergy,
    dischargeEnergy: trace.state.dischargeEnergy,
    loadAboveThresholdEnergy: trace.state.loadAboveThresholdEnergy,
    windowLoadEnergy: trace.state.windowLoadEnergy,
    effectiveLoadEnergy: trace.state.effectiveLoadEnergy,
    timestamps: window.map((sample) => sample.timestamp),
    dischargePower: trace.dischargePower,
    remainingEnergy: trace.remainingEnergy,
  };
};
