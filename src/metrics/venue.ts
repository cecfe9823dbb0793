import { NOT_APPLICABLE, percentageOrNa, type NotApplicable } from "../common/math.js";
import type { CrossTab, RecordSubset, SeriesPoint } from "../types.js";
import {
  RESULT_TYPE_ORDER,
  averageTargetRuns,
  countBySeason,
  crossTab,
  earliestDate,
  marginDistribution,
  resultTypeCounts,
  winsByTeam,
} from "./shared.js";

export const DEFAULT_VENUE_TOP_TEAMS = 10;

export interface VenueSummary {
  totalMatches: number;
  city: string;
  firstMatch: string | NotApplicable;
  averageTargetRuns: number | NotApplicable;
  resultShares: SeriesPoint[];
  matchesBySeason: SeriesPoint[];
  topTeams: SeriesPoint[];
  resultsBySeason: CrossTab;
  marginDistribution: number[];
}

export function venueCity(records: RecordSubset): string {
  for (const record of records) {
    if (record.city !== null) {
      return record.city;
    }
  }
  return NOT_APPLICABLE;
}

/** Percentage of hosted matches per result type, in the same order as the raw counts. */
export function resultShares(records: RecordSubset): SeriesPoint[] {
  const out: SeriesPoint[] = [];
  for (const point of resultTypeCounts(records)) {
    const share = percentageOrNa("resultShare", point.value, records.length);
    if (typeof share === "number") {
      out.push({ label: point.label, value: share });
    }
  }
  return out;
}

export function resultsBySeason(records: RecordSubset): CrossTab {
  return crossTab(
    records,
    (record) => record.season,
    (record) => record.result,
    RESULT_TYPE_ORDER,
  );
}

export function summarizeVenue(
  records: RecordSubset,
  topTeams: number = DEFAULT_VENUE_TOP_TEAMS,
): VenueSummary {
  return {
    totalMatches: records.length,
    city: venueCity(records),
    firstMatch: earliestDate(records),
    averageTargetRuns: averageTargetRuns(records),
    resultShares: resultShares(records),
    matchesBySeason: countBySeason(records),
    topTeams: winsByTeam(records, topTeams),
    resultsBySeason: resultsBySeason(records),
    marginDistribution: marginDistribution(records),
  };
}
