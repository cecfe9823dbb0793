import { UnknownEntityError } from "../common/errors.js";
import { distinctValues } from "../dataset/accessor.js";
import type { Dataset, EntityCategory, MatchRecord, RecordSubset } from "../types.js";

export type RecordPredicate = (record: MatchRecord) => boolean;

export function matcherFor(category: EntityCategory, value: string): RecordPredicate {
  switch (category) {
    case "Player":
      return (record) => record.playerOfMatch === value;
    case "Team":
      return (record) => record.team1 === value || record.team2 === value;
    case "Venue":
      return (record) => record.venue === value;
    case "Season":
      return (record) => record.season === value;
  }
}

export function assertKnownEntity(dataset: Dataset, category: EntityCategory, value: string): void {
  if (!distinctValues(dataset, category).includes(value)) {
    throw new UnknownEntityError(category, value);
  }
}

export function filterRecords(
  dataset: Dataset,
  category: EntityCategory,
  value: string,
): RecordSubset {
  assertKnownEntity(dataset, category, value);
  return selectRecords(dataset.records, matcherFor(category, value));
}

export function selectRecords(
  records: readonly MatchRecord[],
  predicate: RecordPredicate,
): RecordSubset {
  return Object.freeze(records.filter(predicate));
}
