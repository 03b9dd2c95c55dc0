import { describe, it, expect } from "@effect/vitest";
import { Effect } from "effect";
import { hasFixedBatterySize, makeAnalysisConfiguration } from "../../analysis-configuration.js";

describe("makeAnalysisConfiguration", () => {
  const valid = {
    capacityKw: 3000,
    sunHours: 4,
    dischargeThresholdKw: 1.5,
    batterySizeKwh: 0,
  };

  it.effect("should accept a valid configuration", () =>
    Effect.gen(function* () {
      const configuration = yield* makeAnalysisConfiguration(valid);
      expect(configuration).toEqual(valid);
      expect(hasFixedBatterySize(configuration)).toBe(false);
    })
  );

  it.effect("should accept the 12 sun-hour upper bound and a zero threshold", () =>
    Effect.gen(function* () {
      const configuration = yield* makeAnalysisConfiguration({
        ...valid,
        sunHours: 12,
        dischargeThresholdKw: 0,
        batterySizeKwh: 50,
      });
      expect(configuration.sunHours).toBe(12);
      expect(hasFixedBatterySize(configuration)).toBe(true);
    })
  );

  it.effect.each([
    { name: "zero capacity", override: { capacityKw: 0 } },
    { name: "negative capacity", override: { capacityKw: -1 } },
    { name: "non-finite capacity", override: { capacityKw: Number.NaN } },
    { name: "zero sun-hours", override: { sunHours: 0 } },
    { name: "sun-hours above 12", override: { sunHours: 12.5 } },
    { name: "negative threshold", override: { dischargeThresholdKw: -0.1 } },
    { name: "negative battery size", override: { batterySizeKwh: -5 } },
  ])("should reject $name", ({ override }) =>
    Effect.gen(function* () {
      const error = yield* makeAnalysisConfiguration({ ...valid, ...override }).pipe(Effect.flip);
      expect(error._tag).toBe("ConfigurationError");
      expect(error.message).toContain("Invalid analysis configuration");
    })
  );

  it.effect("should reject a missing field", () =>
    Effect.gen(function* () {
      const error = yield* makeAnalysisConfiguration({ capacityKw: 3000, sunHours: 4 }).pipe(Effect.flip);
      expect(error._tag).toBe("ConfigurationError");
    })
  );
});
