import type { Logger } from "./logger.js";

export const ENTITY_CATEGORIES = ["Player", "Team", "Venue", "Season"] as const;
export type EntityCategory = (typeof ENTITY_CATEGORIES)[number];

export const VIEW_NAMES = ["overview", "trend", "results", "comparative", "records"] as const;
export type ViewName = (typeof VIEW_NAMES)[number];

export type TossDecision = "bat" | "field";
export type ResultType = "runs" | "wickets" | "tie" | "no-result";
export type OutputFormat = "text" | "json";
export type CliCommand = "categories" | "values" | "analyze";

export interface MatchRecord {
  readonly matchId: string;
  readonly date: string;
  readonly season: string;
  readonly team1: string;
  readonly team2: string;
  readonly winner: string | null;
  readonly venue: string;
  readonly city: string | null;
  readonly tossDecision: TossDecision;
  readonly result: ResultType;
  readonly resultMargin: number | null;
  readonly targetRuns: number | null;
  readonly superOver: boolean;
  readonly playerOfMatch: string | null;
  readonly tossWinner?: string | null;
  readonly matchType?: string | null;
  readonly method?: string | null;
  readonly targetOvers?: number | null;
}

export interface Dataset {
  readonly source: string;
  readonly records: readonly MatchRecord[];
}

export type RecordSubset = readonly MatchRecord[];

export interface Selection {
  primary: string;
  secondary?: string;
}

export type AnalysisMode = "single" | "dual";

export type MetricUnit = "count" | "percent" | "mean" | "date" | "text";

export interface MetricScalar {
  unit: MetricUnit;
  value: number | string;
}

export interface SeriesPoint {
  label: string;
  value: number;
}

export interface CrossTab {
  rows: string[];
  columns: string[];
  counts: number[][];
}

export interface ScatterPoint {
  x: number;
  y: number;
  tag: string;
}

export interface MetricBundle {
  metrics: Record<string, MetricScalar>;
  series: Record<string, SeriesPoint[]>;
  distributions: Record<string, number[]>;
  crossTabs: Record<string, CrossTab>;
  points: Record<string, ScatterPoint[]>;
  rows?: MatchRecord[];
}

export type ViewOutcome =
  | { status: "ok"; bundle: MetricBundle }
  | { status: "needs_second_selection"; notice: string }
  | { status: "error"; error: string };

export interface AnalysisResult {
  category: EntityCategory;
  selection: Selection;
  mode: AnalysisMode;
  views: Partial<Record<ViewName, ViewOutcome>>;
}

export interface AnalysisOptions {
  venueTopTeams?: number;
  comparativeTopTeams?: number;
  views?: readonly ViewName[];
  logger?: Logger;
}

export interface RunConfig {
  command: CliCommand;
  dataPath: string;
  format: OutputFormat;
  category?: EntityCategory;
  primary?: string;
  secondary?: string;
  views: ViewName[];
  venueTopTeams: number;
  comparativeTopTeams: number;
  debug: boolean;
}

export interface ResultTransport {
  readonly name: string;
  sendAnalysis(result: AnalysisResult): Promise<void>;
  sendValues(category: EntityCategory | null, values: readonly string[]): Promise<void>;
}
