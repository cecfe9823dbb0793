import { UndefinedMetricError } from "./errors.js";

export const NOT_APPLICABLE = "N/A";
export type NotApplicable = typeof NOT_APPLICABLE;

export function strictMean(metric: string, values: readonly number[]): number {
  if (values.length === 0) {
    throw new UndefinedMetricError(metric);
  }
  let sum = 0;
  for (const value of values) {
    sum += value;
  }
  return sum / values.length;
}

export function strictPercentage(metric: string, count: number, denominator: number): number {
  if (denominator <= 0) {
    throw new UndefinedMetricError(metric);
  }
  return (count / denominator) * 100;
}

export function meanOrNa(metric: string, values: readonly number[]): number | NotApplicable {
  return orNotApplicable(() => strictMean(metric, values));
}

export function percentageOrNa(
  metric: string,
  count: number,
  denominator: number,
): number | NotApplicable {
  return orNotApplicable(() => strictPercentage(metric, count, denominator));
}

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function orNotApplicable(compute: () => number): number | NotApplicable {
  try {
    return compute();
  } catch (error) {
    if (error instanceof UndefinedMetricError) {
      return NOT_APPLICABLE;
    }
    throw error;
  }
}
