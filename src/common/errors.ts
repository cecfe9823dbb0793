import type { EntityCategory } from "../types.js";

export class AnalyticsError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Dataset could not be read or does not have the expected shape. Fatal. */
export class DataLoadError extends AnalyticsError {
  readonly source: string;

  constructor(source: string, message: string, options?: ErrorOptions) {
    super(`Cannot load dataset ${source}: ${message}`, options);
    this.source = source;
  }
}

export class UnknownEntityError extends AnalyticsError {
  readonly category: EntityCategory;
  readonly value: string;

  constructor(category: EntityCategory, value: string) {
    super(`Unknown ${category.toLowerCase()} "${value}"`);
    this.category = category;
    this.value = value;
  }
}

export class MissingSelectionError extends AnalyticsError {
  constructor(category: EntityCategory) {
    super(`Select at least one ${category.toLowerCase()} to analyze`);
  }
}

export class EmptyComparisonError extends AnalyticsError {
  constructor(category: EntityCategory) {
    super(`Select a second ${category.toLowerCase()} to compare`);
  }
}

// Raised for a mean or share over zero values; calculators turn it into "N/A".
export class UndefinedMetricError extends AnalyticsError {
  readonly metric: string;

  constructor(metric: string) {
    super(`Metric ${metric} is undefined for an empty input`);
    this.metric = metric;
  }
}

export function stringifyError(value: unknown): string {
  if (value instanceof Error) {
    return value.message;
  }
  return String(value);
}
