import {
  EmptyComparisonError,
  MissingSelectionError,
  stringifyError,
} from "../common/errors.js";
import { createSilentLogger } from "../logger.js";
import { normalizeWhitespace } from "../normalize.js";
import { filterRecords } from "../resolve/entityResolver.js";
import { DEFAULT_VENUE_TOP_TEAMS } from "../metrics/venue.js";
import {
  VIEW_NAMES,
  type AnalysisOptions,
  type AnalysisResult,
  type Dataset,
  type EntityCategory,
  type MatchRecord,
  type MetricBundle,
  type RecordSubset,
  type ViewName,
  type ViewOutcome,
} from "../types.js";
import { BundleBuilder } from "./bundle.js";
import { CATEGORY_VIEWS, type CategoryViews, type SortDirection, type ViewContext } from "./views.js";

export const DEFAULT_COMPARATIVE_TOP_TEAMS = 5;

export function analyze(
  dataset: Dataset,
  category: EntityCategory,
  primary: string,
  secondary?: string,
  options: AnalysisOptions = {},
): AnalysisResult {
  const logger = options.logger ?? createSilentLogger();
  const primaryValue = normalizeWhitespace(primary);
  if (!primaryValue) {
    throw new MissingSelectionError(category);
  }
  const secondaryValue = normalizeWhitespace(secondary ?? "");

  // Both selections are validated before any view computes.
  const ctx: ViewContext = {
    dataset,
    primary: { value: primaryValue, records: filterRecords(dataset, category, primaryValue) },
    ...(secondaryValue
      ? {
          secondary: {
            value: secondaryValue,
            records: filterRecords(dataset, category, secondaryValue),
          },
        }
      : {}),
    venueTopTeams: options.venueTopTeams ?? DEFAULT_VENUE_TOP_TEAMS,
    comparativeTopTeams: options.comparativeTopTeams ?? DEFAULT_COMPARATIVE_TOP_TEAMS,
  };
  const mode = ctx.secondary ? "dual" : "single";
  logger.debug(
    `Analyze ${category}: primary="${primaryValue}" (${ctx.primary.records.length} matches)` +
      (ctx.secondary
        ? `, secondary="${ctx.secondary.value}" (${ctx.secondary.records.length} matches)`
        : "") +
      `, mode=${mode}`,
  );

  const views = CATEGORY_VIEWS[category];
  const result: AnalysisResult = {
    category,
    selection: ctx.secondary
      ? { primary: primaryValue, secondary: ctx.secondary.value }
      : { primary: primaryValue },
    mode,
    views: {},
  };

  const requested: readonly ViewName[] =
    options.views && options.views.length > 0 ? options.views : VIEW_NAMES;
  for (const name of VIEW_NAMES) {
    if (!requested.includes(name)) {
      continue;
    }
    const outcome = runView(name, () => computeView(name, views, ctx, category));
    if (outcome.status === "error") {
      logger.error(`View ${name} failed for ${category} "${primaryValue}": ${outcome.error}`);
    }
    result.views[name] = outcome;
  }
  return result;
}

function computeView(
  name: ViewName,
  views: CategoryViews,
  ctx: ViewContext,
  category: EntityCategory,
): MetricBundle {
  switch (name) {
    case "overview":
      return views.overview(ctx);
    case "trend":
      return views.trend(ctx);
    case "results":
      return views.results(ctx);
    case "comparative":
      if (!ctx.secondary) {
        throw new EmptyComparisonError(category);
      }
      return views.comparative(ctx, ctx.secondary);
    case "records":
      return new BundleBuilder()
        .count("rowCount", ctx.primary.records.length)
        .rows(sortByDate(ctx.primary.records, views.recordsOrder))
        .build();
  }
}

export function runView(name: ViewName, compute: () => MetricBundle): ViewOutcome {
  try {
    return { status: "ok", bundle: compute() };
  } catch (error) {
    if (error instanceof EmptyComparisonError) {
      return { status: "needs_second_selection", notice: error.message };
    }
    return { status: "error", error: `${name}: ${stringifyError(error)}` };
  }
}

export function sortByDate(records: RecordSubset, direction: SortDirection): MatchRecord[] {
  const sign = direction === "asc" ? 1 : -1;
  // Array#sort is stable, so matches on the same date keep dataset order.
  return [...records].sort((a, b) => (a.date < b.date ? -sign : a.date > b.date ? sign : 0));
}
