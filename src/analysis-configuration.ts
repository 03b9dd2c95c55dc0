import { Effect, Schema } from "effect";
import { ConfigurationError } from "./errors/configuration.error.js";

export const MAX_SUN_HOURS = 12;

export const AnalysisConfigurationSchema = Schema.Struct({
  // kW of installed array
  capacityKw: Schema.Number.pipe(Schema.finite(), Schema.positive()),
  sunHours: Schema.Number.pipe(
    Schema.finite(),
    Schema.positive(),
    Schema.lessThanOrEqualTo(MAX_SUN_HOURS),
  ),
  // evening load above this is shaved by the battery
  dischargeThresholdKw: Schema.Number.pipe(Schema.finite(), Schema.nonNegative()),
  // 0 means size the battery automatically
  batterySizeKwh: Schema.Number.pipe(Schema.finite(), Schema.nonNegative()),
});

export type AnalysisConfiguration = Schema.Schema.Type<typeof AnalysisConfigurationSchema>;

export const hasFixedBatterySize = (configuration: AnalysisConfiguration): boolean =>
  configuration.batterySizeKwh > 0;

export const makeAnalysisConfiguration = (
  input: unknown,
): Effect.Effect<AnalysisConfiguration, ConfigurationError> =>
  Schema.decodeUnknown(AnalysisConfigurationSchema)(input, { errors: "all" }).pipe(
    Effect.mapError((error) =>
      new ConfigurationError({
        message: `Invalid analysis configuration: ${error.message}`,
      })
    ),
  );
