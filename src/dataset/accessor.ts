import type { Dataset, EntityCategory, MatchRecord } from "../types.js";

type ValueReader = (record: MatchRecord) => Array<string | null>;

const CATEGORY_COLUMNS: Record<EntityCategory, ValueReader> = {
  Player: (record) => [record.playerOfMatch],
  Team: (record) => [record.team1, record.team2],
  Venue: (record) => [record.venue],
  Season: (record) => [record.season],
};

export function distinctValues(dataset: Dataset, category: EntityCategory): string[] {
  const read = CATEGORY_COLUMNS[category];
  const values = new Set<string>();
  for (const record of dataset.records) {
    for (const value of read(record)) {
      if (value !== null && value.trim() !== "") {
        values.add(value);
      }
    }
  }
  return sortLabels(values);
}

export function sortLabels(values: Iterable<string>): string[] {
  return [...values].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}
