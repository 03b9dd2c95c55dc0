import { Either } from "effect";
import { ConvergenceError } from "../errors/convergence.error.js";
import { DEFAULT_WIDTH_SEARCH, dailyEnergyForWidth } from "./solar-calculations.js";
import type { CurveShape, WidthSearch } from "./types.js";

/**
 * Finds the curve width whose integrated daily energy equals `targetEnergy`.
 *
 * Energy grows with width, so the upper bound is doubled until it overshoots the
 * target, then the bracket is bisected a fixed number of times.
 */
export const solveWidth = (
  targetEnergy: number,
  shape: CurveShape,
  search: WidthSearch = DEFAULT_WIDTH_SEARCH,
): Either.Either<number, ConvergenceError> => {
  let lo = search.lower;
  let hi = search.upper;

  while (dailyEnergyForWidth(hi, shape) < targetEnergy && hi < search.ceiling) {
    hi *= 2;
  }

  const bracketEnergy = dailyEnergyForWidth(hi, shape);
  if (bracketEnergy < targetEnergy) {
    return Either.left(
      new ConvergenceError({
        message: `Could not bracket ${targetEnergy} kWh: widest curve reaches ${bracketEnergy} kWh`,
        targetEnergy,
        reachedEnergy: bracketEnergy,
        width: hi,
      })
    );
  }

  for (let i = 0; i < search.iterations; i++) {
    const mid = 0.5 * (lo + hi);
    if (dailyEnergyForWidth(mid, shape) < targetEnergy) {
      lo = mid;
    } else {
      hi = mid;
    }
  }

  const width = 0.5 * (lo + hi);
  const reachedEnergy = dailyEnergyForWidth(width, shape);

  if (Math.abs(reachedEnergy - targetEnergy) > search.tolerance * targetEnergy) {
    return Either.left(
      new ConvergenceError({
        message: `Width search settled at ${width} h with ${reachedEnergy} kWh, target was ${targetEnergy} kWh`,
        targetEnergy,
        reachedEnergy,
        width,
      })
    );
  }

  return Either.right(width);
};
