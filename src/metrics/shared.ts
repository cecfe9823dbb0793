import { NOT_APPLICABLE, meanOrNa, type NotApplicable } from "../common/math.js";
import { sortLabels } from "../dataset/accessor.js";
import type { CrossTab, MatchRecord, RecordSubset, ResultType, SeriesPoint } from "../types.js";

export const RESULT_TYPE_ORDER: readonly ResultType[] = ["runs", "wickets", "tie", "no-result"];

export function countBy<T>(items: readonly T[], keyOf: (item: T) => string | null): Map<string, number> {
  const counts = new Map<string, number>();
  for (const item of items) {
    const key = keyOf(item);
    if (key === null) {
      continue;
    }
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return counts;
}

export function seriesByLabel(counts: ReadonlyMap<string, number>): SeriesPoint[] {
  return sortLabels(counts.keys()).map((label) => ({ label, value: counts.get(label) ?? 0 }));
}

/** Highest value first; equal values fall back to label order. */
export function rankedSeries(counts: ReadonlyMap<string, number>, limit?: number): SeriesPoint[] {
  const ranked = [...counts.entries()]
    .map(([label, value]) => ({ label, value }))
    .sort((a, b) => b.value - a.value || (a.label < b.label ? -1 : a.label > b.label ? 1 : 0));
  return typeof limit === "number" ? ranked.slice(0, limit) : ranked;
}

export function countBySeason(records: RecordSubset): SeriesPoint[] {
  return seriesByLabel(countBy(records, (record) => record.season));
}

export function resultTypeCounts(records: RecordSubset): SeriesPoint[] {
  return rankedSeries(countBy(records, (record) => record.result));
}

export function marginDistribution(records: RecordSubset): number[] {
  return numericValues(records, (record) => record.resultMargin);
}

export function averageTargetRuns(records: RecordSubset): number | NotApplicable {
  return meanOrNa("averageTargetRuns", numericValues(records, (record) => record.targetRuns));
}

export function averageResultMargin(records: RecordSubset): number | NotApplicable {
  return meanOrNa("averageResultMargin", marginDistribution(records));
}

export function earliestDate(records: RecordSubset): string | NotApplicable {
  let earliest: string | undefined;
  for (const record of records) {
    if (earliest === undefined || record.date < earliest) {
      earliest = record.date;
    }
  }
  return earliest ?? NOT_APPLICABLE;
}

export function distinctTeams(records: RecordSubset): string[] {
  const teams = new Set<string>();
  for (const record of records) {
    teams.add(record.team1);
    teams.add(record.team2);
  }
  return sortLabels(teams);
}

export function winsByTeam(records: RecordSubset, limit?: number): SeriesPoint[] {
  return rankedSeries(
    countBy(records, (record) => record.winner),
    limit,
  );
}

export function crossTab(
  records: RecordSubset,
  rowOf: (record: MatchRecord) => string,
  columnOf: (record: MatchRecord) => string,
  columnOrder?: readonly string[],
): CrossTab {
  const rows = sortLabels(new Set(records.map(rowOf)));
  const present = new Set(records.map(columnOf));
  const columns = columnOrder
    ? columnOrder.filter((column) => present.has(column))
    : sortLabels(present);

  const counts = rows.map(() => columns.map(() => 0));
  for (const record of records) {
    const row = rows.indexOf(rowOf(record));
    const column = columns.indexOf(columnOf(record));
    if (row >= 0 && column >= 0) {
      counts[row][column] += 1;
    }
  }
  return { rows, columns, counts };
}

// Target and margin only count for matches that produced a result.
function numericValues(
  records: RecordSubset,
  read: (record: MatchRecord) => number | null,
): number[] {
  const values: number[] = [];
  for (const record of records) {
    if (record.result === "no-result") {
      continue;
    }
    const value = read(record);
    if (value !== null) {
      values.push(value);
    }
  }
  return values;
}
