import { describe, it, expect } from "@effect/vitest";
import {
  DEFAULT_WIDTH_SEARCH,
  curveShapeForCapacity,
  dailyEnergyForWidth,
  dayCurve,
  maxReachableEnergy,
  quarterHours,
  solarPowerAt,
  widestSearchWidth,
} from "../../../solar-curve/solar-calculations.js";

describe("solar-calculations", () => {
  const shape = curveShapeForCapacity(1000);

  describe("curveShapeForCapacity", () => {
    it("should derate the peak to 90% of capacity over a 06:00-18:00 window", () => {
      expect(shape).toEqual({ peakPower: 900, sunrise: 6, sunset: 18 });
    });
  });

  describe("quarterHours", () => {
    it("should cover one day at 15 minute resolution", () => {
      const hours = quarterHours();
      expect(hours).toHaveLength(96);
      expect(hours[0]).toBe(0);
      expect(hours[95]).toBe(23.75);
    });
  });

  describe("solarPowerAt", () => {
    it("should peak at solar noon", () => {
      expect(solarPowerAt(12, 2, shape)).toBe(900);
    });

    it("should be zero outside the daylight window", () => {
      expect(solarPowerAt(5.75, 2, shape)).toBe(0);
      expect(solarPowerAt(18.25, 2, shape)).toBe(0);
    });

    it("should include the window edges", () => {
      expect(solarPowerAt(6, 2, shape)).toBeGreaterThan(0);
      expect(solarPowerAt(18, 2, shape)).toBeCloseTo(solarPowerAt(6, 2, shape), 12);
    });

    it("should be symmetric around noon", () => {
      expect(solarPowerAt(9.5, 3, shape)).toBeCloseTo(solarPowerAt(14.5, 3, shape), 12);
    });
  });

  describe("dailyEnergyForWidth", () => {
    it("should grow with the curve width", () => {
      const energies = [0.5, 1, 2, 4, 8, 16].map((width) => dailyEnergyForWidth(width, shape));

      for (let i = 1; i < energies.length; i++) {
        expect(energies[i]).toBeGreaterThan(energies[i - 1] ?? Infinity);
      }
    });

    it("should equal the quarter-hour sum of the day curve", () => {
      const curve = dayCurve(3, shape);
      const sum = curve.reduce((total, power) => total + power, 0);

      // the curve is zero at 00:00 and 23:45, so the trapezoid rule reduces to a plain sum
      expect(dailyEnergyForWidth(3, shape)).toBeCloseTo(sum * 0.25, 9);
    });
  });

  describe("maxReachableEnergy", () => {
    it("should double the initial upper bound until it passes the ceiling", () => {
      expect(widestSearchWidth(DEFAULT_WIDTH_SEARCH)).toBe(320);
    });

    it("should stay below a flat peak held over the sampled window", () => {
      const ceiling = maxReachableEnergy(shape);

      // 49 daylight samples at most 900 kW each, 0.25 h apart
      expect(ceiling).toBeLessThan(900 * 49 * 0.25);
      expect(ceiling).toBeGreaterThan(900 * 49 * 0.25 * 0.999);
      expect(ceiling).toBe(dailyEnergyForWidth(320, shape));
    });
  });
});
