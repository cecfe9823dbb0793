import { roundTo, strictMean } from "../common/math.js";
import {
  VIEW_NAMES,
  type AnalysisResult,
  type CrossTab,
  type MatchRecord,
  type MetricBundle,
  type MetricScalar,
  type ViewName,
  type ViewOutcome,
} from "../types.js";

const SEPARATOR = "==================";

const VIEW_TITLES: Record<ViewName, string> = {
  overview: "Performance Overview",
  trend: "Trend Analysis",
  results: "Match Results",
  comparative: "Comparative Stats",
  records: "Detailed Records",
};

export interface FormatAnalysisOptions {
  maxRows?: number;
}

export function formatAnalysis(result: AnalysisResult, options: FormatAnalysisOptions = {}): string {
  const maxRows = options.maxRows ?? 20;
  const heading = result.selection.secondary
    ? `${result.selection.primary} vs ${result.selection.secondary}`
    : result.selection.primary;
  const lines = [`${result.category.toUpperCase()} ANALYSIS`, SEPARATOR, heading, SEPARATOR];

  for (const name of VIEW_NAMES) {
    const outcome = result.views[name];
    if (!outcome) {
      continue;
    }
    lines.push(`[${VIEW_TITLES[name]}]`, ...formatOutcome(outcome, result, maxRows), SEPARATOR);
  }
  return lines.join("\n");
}

/** Percentages and means are rounded to one decimal here and nowhere earlier. */
export function formatMetricValue(metric: MetricScalar): string {
  if (typeof metric.value === "string") {
    return metric.value;
  }
  switch (metric.unit) {
    case "percent":
      return `${roundTo(metric.value, 1).toFixed(1)}%`;
    case "mean":
      return roundTo(metric.value, 1).toFixed(1);
    default:
      return String(metric.value);
  }
}

export function humanizeKey(key: string, result: AnalysisResult): string {
  const [scope, name] = key.includes(".") ? key.split(".", 2) : ["", key];
  const words = name.replace(/([a-z0-9])([A-Z])/g, "$1 $2").toLowerCase();
  const label = words.charAt(0).toUpperCase() + words.slice(1);
  if (scope === "primary") {
    return `${result.selection.primary}: ${label}`;
  }
  if (scope === "secondary" && result.selection.secondary) {
    return `${result.selection.secondary}: ${label}`;
  }
  return label;
}

function formatOutcome(outcome: ViewOutcome, result: AnalysisResult, maxRows: number): string[] {
  if (outcome.status === "needs_second_selection") {
    return [outcome.notice];
  }
  if (outcome.status === "error") {
    return [`Error: ${outcome.error}`];
  }
  return formatBundle(outcome.bundle, result, maxRows);
}

function formatBundle(bundle: MetricBundle, result: AnalysisResult, maxRows: number): string[] {
  const lines: string[] = [];
  for (const [key, metric] of Object.entries(bundle.metrics)) {
    lines.push(`${humanizeKey(key, result)}: ${formatMetricValue(metric)}`);
  }
  for (const [key, points] of Object.entries(bundle.series)) {
    const body = points.length
      ? points.map((point) => `${point.label}=${formatSeriesValue(key, point.value)}`).join(", ")
      : "-";
    lines.push(`${humanizeKey(key, result)}: ${body}`);
  }
  for (const [key, values] of Object.entries(bundle.distributions)) {
    lines.push(`${humanizeKey(key, result)}: ${formatDistribution(values)}`);
  }
  for (const [key, table] of Object.entries(bundle.crossTabs)) {
    lines.push(`${humanizeKey(key, result)}:`, ...formatCrossTab(table));
  }
  for (const [key, points] of Object.entries(bundle.points)) {
    lines.push(`${humanizeKey(key, result)}: ${points.length} points`);
  }
  if (bundle.rows) {
    lines.push(...bundle.rows.slice(0, maxRows).map(formatRecordLine));
    if (bundle.rows.length > maxRows) {
      lines.push(`... ${bundle.rows.length - maxRows} more`);
    }
  }
  return lines;
}

function formatSeriesValue(key: string, value: number): string {
  if (/(percentage|shares)/i.test(key)) {
    return `${roundTo(value, 1).toFixed(1)}%`;
  }
  return String(value);
}

export function formatDistribution(values: number[]): string {
  if (values.length === 0) {
    return "n=0";
  }
  const min = Math.min(...values);
  const max = Math.max(...values);
  const mean = strictMean("distribution", values);
  return `n=${values.length} min=${min} max=${max} mean=${roundTo(mean, 1).toFixed(1)}`;
}

function formatCrossTab(table: CrossTab): string[] {
  return table.rows.map(
    (row, rowIndex) =>
      `  ${row}: ` +
      table.columns
        .map((column, columnIndex) => `${column}=${table.counts[rowIndex][columnIndex]}`)
        .join(" "),
  );
}

export function formatRecordLine(record: MatchRecord): string {
  let outcome: string = record.result;
  if (record.winner && record.resultMargin !== null) {
    outcome = `${record.winner} won by ${record.resultMargin} ${record.result}`;
  } else if (record.winner) {
    outcome = `${record.winner} won (${record.result})`;
  }
  return (
    `${record.date} | ${record.season} | ${record.team1} vs ${record.team2} | ` +
    `${outcome} | ${record.venue} | POTM: ${record.playerOfMatch ?? "-"}`
  );
}
