import { Data } from "effect";

// Raised when the width search cannot bracket or hit the target energy.
export class ConvergenceError extends Data.TaggedError("ConvergenceError")<{
  readonly message: string;
  readonly targetEnergy: number;
  readonly reachedEnergy: number;
  readonly width: number;
}> {}
