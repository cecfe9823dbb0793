import type { NotApplicable } from "../common/math.js";
import type { RecordSubset, ScatterPoint, SeriesPoint } from "../types.js";
import {
  averageResultMargin,
  averageTargetRuns,
  distinctTeams,
  marginDistribution,
  winsByTeam,
} from "./shared.js";

export interface SeasonSummary {
  totalMatches: number;
  teams: number;
  superOvers: number;
  averageTargetRuns: number | NotApplicable;
  averageResultMargin: number | NotApplicable;
  winsByTeam: SeriesPoint[];
  marginDistribution: number[];
  targetVsMargin: ScatterPoint[];
}

export function superOverCount(records: RecordSubset): number {
  return records.filter((record) => record.superOver).length;
}

export function targetVsMargin(records: RecordSubset): ScatterPoint[] {
  const points: ScatterPoint[] = [];
  for (const record of records) {
    if (
      record.result === "no-result" ||
      record.targetRuns === null ||
      record.resultMargin === null
    ) {
      continue;
    }
    points.push({ x: record.targetRuns, y: record.resultMargin, tag: record.result });
  }
  return points;
}

export function summarizeSeason(records: RecordSubset): SeasonSummary {
  return {
    totalMatches: records.length,
    teams: distinctTeams(records).length,
    superOvers: superOverCount(records),
    averageTargetRuns: averageTargetRuns(records),
    averageResultMargin: averageResultMargin(records),
    winsByTeam: winsByTeam(records),
    marginDistribution: marginDistribution(records),
    targetVsMargin: targetVsMargin(records),
  };
}
