import { describe, it, expect } from "@effect/vitest";
import type { AnalysisConfiguration } from "../../../analysis-configuration.js";
import { calculateDayBalance } from "../../../daily-balance/index.js";
import { makeDay } from "../builders.js";

describe("calculateDayBalance", () => {
  const configuration: AnalysisConfiguration = {
    capacityKw: 3000,
    sunHours: 4,
    dischargeThresholdKw: 1.5,
    batterySizeKwh: 0,
  };

  it("should integrate the instantaneous and cumulative balance", () => {
    const day = makeDay("2024-03-15", 10, [2, 2, 2, 2]);

    const record = calculateDayBalance(day, [0, 4, 4, 0], configuration);

    expect(record.date).toBe("2024-03-15");
    expect(record.powerDifference).toEqual([-2, 2, 2, -2]);
    expect(record.cumulativeBalance).toEqual([0, 0, 0.5, 0.5]);
    expect(record.maxExcess).toBe(0.5);
    expect(record.maxDeficit).toBe(0);
    expect(record.neededBatterySize).toBe(0.5);
    expect(record.optimalBatterySize).toBeCloseTo(0.4, 12);
    expect(record.totalExcessEnergy).toBe(1);
    expect(record.totalDeficitEnergy).toBe(0.5);
    expect(record.netEnergyBalance).toBe(0.5);
    expect(record.consumptionEnergy).toBe(1.5);
    expect(record.solarEnergy).toBe(2);
    expect(record.solarConsumedDirectly).toBe(1);
    expect(record.solarAboveThresholdEnergy).toBe(1.25);
  });

  it("should keep the net balance equal to the last cumulative value", () => {
    const day = makeDay("2024-03-15", 8, [1.2, 3.4, 0.7, 5.5, 2.2, 0.1, 4.8]);

    const record = calculateDayBalance(day, [0.3, 2.9, 4.4, 1.1, 6.0, 3.3, 0.2], configuration);

    expect(record.totalExcessEnergy - record.totalDeficitEnergy).toBe(record.netEnergyBalance);
    expect(record.cumulativeBalance[record.cumulativeBalance.length - 1]).toBeCloseTo(record.netEnergyBalance, 9);
  });

  it("should size the battery from the deficit when load exceeds solar all day", () => {
    const day = makeDay("2024-03-15", 10, [5, 5, 5]);

    const record = calculateDayBalance(day, [1, 2, 1], configuration);

    expect(record.cumulativeBalance).toEqual([0, -0.875, -1.75]);
    expect(record.maxExcess).toBe(0);
    expect(record.maxDeficit).toBe(-1.75);
    expect(record.neededBatterySize).toBe(1.75);
    expect(record.optimalBatterySize).toBeCloseTo(0.8 * 1.75, 12);
    expect(record.totalExcessEnergy).toBe(0);
  });

  it("should use a fixed battery size when one is configured", () => {
    const day = makeDay("2024-03-15", 10, [5, 5, 5]);

    const record = calculateDayBalance(day, [1, 2, 1], { ...configuration, batterySizeKwh: 50 });

    expect(record.optimalBatterySize).toBe(50);
  });

  it("should discharge the day's excess solar in the evening window", () => {
    const day = makeDay("2024-03-15", 16, [3, 3]);

    const record = calculateDayBalance(day, [5, 1], { ...configuration, dischargeThresholdKw: 1 });

    expect(record.totalExcessEnergy).toBe(0.25);
    expect(record.eveningDispatch.availableEnergy).toBe(0.25);
    expect(record.eveningDispatch.dischargeEnergy).toBe(0.25);
    expect(record.eveningDispatch.loadAboveThresholdEnergy).toBe(1);
    expect(record.eveningDispatch.dischargePower).toEqual([1, 0]);
  });

  it("should leave the evening dispatch empty for a morning-only day", () => {
    const day = makeDay("2024-03-15", 10, [2, 2, 2, 2]);

    const record = calculateDayBalance(day, [0, 4, 4, 0], configuration);

    expect(record.eveningDispatch.timestamps).toEqual([]);
    expect(record.eveningDispatch.dischargeEnergy).toBe(0);
    expect(record.eveningDispatch.availableEnergy).toBe(1);
  });
});
