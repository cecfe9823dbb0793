import { percentageOrNa, type NotApplicable } from "../common/math.js";
import { sortLabels } from "../dataset/accessor.js";
import type { CrossTab, Dataset, MatchRecord, RecordSubset, SeriesPoint } from "../types.js";
import { crossTab, resultTypeCounts } from "./shared.js";

export interface TeamRecord {
  totalMatches: number;
  wins: number;
  winPercentage: number | NotApplicable;
}

export interface SeasonWinLoss {
  wins: SeriesPoint[];
  losses: SeriesPoint[];
}

export interface HeadToHead {
  teams: [string, string];
  directMatches: number;
  wins: SeriesPoint[];
  noDecision: number;
}

export function involvesTeam(record: MatchRecord, team: string): boolean {
  return record.team1 === team || record.team2 === team;
}

export function teamRecord(team: string, records: RecordSubset): TeamRecord {
  let totalMatches = 0;
  let wins = 0;
  for (const record of records) {
    if (!involvesTeam(record, team) || record.winner === null) {
      continue;
    }
    totalMatches += 1;
    if (record.winner === team) {
      wins += 1;
    }
  }
  return {
    totalMatches,
    wins,
    winPercentage: percentageOrNa("winPercentage", wins, totalMatches),
  };
}

/** Losses are decided matches the team did not win; seasons with no decided match are left out. */
export function seasonWinLoss(team: string, records: RecordSubset): SeasonWinLoss {
  const wins = new Map<string, number>();
  const losses = new Map<string, number>();
  for (const record of records) {
    if (!involvesTeam(record, team) || record.winner === null) {
      continue;
    }
    wins.set(record.season, (wins.get(record.season) ?? 0) + (record.winner === team ? 1 : 0));
    losses.set(record.season, (losses.get(record.season) ?? 0) + (record.winner !== team ? 1 : 0));
  }
  const seasons = sortLabels(wins.keys());
  return {
    wins: seasons.map((label) => ({ label, value: wins.get(label) ?? 0 })),
    losses: seasons.map((label) => ({ label, value: losses.get(label) ?? 0 })),
  };
}

/** Share of decided matches won per season; seasons without a decided match are left out. */
export function seasonWinPercentage(team: string, records: RecordSubset): SeriesPoint[] {
  const { wins, losses } = seasonWinLoss(team, records);
  const out: SeriesPoint[] = [];
  wins.forEach((point, index) => {
    const decided = point.value + losses[index].value;
    const share = percentageOrNa("seasonWinPercentage", point.value, decided);
    if (typeof share === "number") {
      out.push({ label: point.label, value: share });
    }
  });
  return out;
}

export function tossOutcomes(team: string, records: RecordSubset): CrossTab {
  return crossTab(
    records.filter((record) => involvesTeam(record, team)),
    (record) => record.tossDecision,
    (record) => (record.winner === team ? "Won" : "Lost"),
    ["Won", "Lost"],
  );
}

export function teamResultTypes(team: string, records: RecordSubset): SeriesPoint[] {
  return resultTypeCounts(records.filter((record) => involvesTeam(record, team)));
}

export function headToHead(dataset: Dataset, teamA: string, teamB: string): HeadToHead {
  let directMatches = 0;
  let winsA = 0;
  let winsB = 0;
  for (const record of dataset.records) {
    const direct =
      (record.team1 === teamA && record.team2 === teamB) ||
      (record.team1 === teamB && record.team2 === teamA);
    if (!direct) {
      continue;
    }
    directMatches += 1;
    if (record.winner === teamA) {
      winsA += 1;
    } else if (record.winner === teamB) {
      winsB += 1;
    }
  }
  return {
    teams: [teamA, teamB],
    directMatches,
    wins: [
      { label: teamA, value: winsA },
      { label: teamB, value: winsB },
    ],
    noDecision: directMatches - winsA - winsB,
  };
}
