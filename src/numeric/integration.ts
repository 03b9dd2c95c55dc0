// Pure integration helpers over evenly spaced samples.

/** Length of one sample in hours. */
export const SAMPLE_HOURS = 0.25;

export const trapezoid = (values: readonly number[], dx: number = SAMPLE_HOURS): number => {
  let area = 0;
  for (let i = 1; i < values.length; i++) {
    area += ((values[i - 1] ?? 0) + (values[i] ?? 0)) / 2 * dx;
  }
  return area;
};

/**
 * Running trapezoidal integral. The first element is 0 so the result has the
 * same length as the input, and its last element equals `trapezoid(values, dx)`.
 */
export const cumulativeTrapezoid = (values: readonly number[], dx: number = SAMPLE_HOURS): number[] => {
  const result: number[] = [];
  let area = 0;
  for (let i = 0; i < values.length; i++) {
    if (i > 0) {
      area += ((values[i - 1] ?? 0) + (values[i] ?? 0)) / 2 * dx;
    }
    result.push(area);
  }
  return result;
};

// Left-rectangle sum: each sample's power held for the whole interval.
export const rectangleSum = (values: readonly number[], dx: number = SAMPLE_HOURS): number =>
  values.reduce((sum, value) => sum + value * dx, 0);

export const positivePart = (values: readonly number[]): number[] =>
  values.map((value) => Math.max(0, value));

export const negativePart = (values: readonly number[]): number[] =>
  values.map((value) => Math.max(0, -value));
