import type { NotApplicable } from "../common/math.js";
import type { RecordSubset, SeriesPoint } from "../types.js";
import {
  countBySeason,
  distinctTeams,
  earliestDate,
  marginDistribution,
  resultTypeCounts,
} from "./shared.js";

export interface PlayerSummary {
  awards: number;
  // Every team on either side of an award match, the player's own included.
  teamsInvolved: number;
  firstAward: string | NotApplicable;
  awardsBySeason: SeriesPoint[];
  resultTypes: SeriesPoint[];
  marginDistribution: number[];
}

export function summarizePlayer(awardMatches: RecordSubset): PlayerSummary {
  return {
    awards: awardMatches.length,
    teamsInvolved: distinctTeams(awardMatches).length,
    firstAward: earliestDate(awardMatches),
    awardsBySeason: countBySeason(awardMatches),
    resultTypes: resultTypeCounts(awardMatches),
    marginDistribution: marginDistribution(awardMatches),
  };
}
