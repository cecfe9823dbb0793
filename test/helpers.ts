import { fileURLToPath } from "node:url";
import { loadDataset } from "../src/dataset/load.js";
import type { Dataset, MatchRecord } from "../src/types.js";

export const FIXTURE_PATH = fileURLToPath(new URL("./fixtures/matches.csv", import.meta.url));

export function loadFixture(): Promise<Dataset> {
  return loadDataset(FIXTURE_PATH);
}

let nextId = 1;

export function makeRecord(overrides: Partial<MatchRecord> = {}): MatchRecord {
  const id = String(nextId);
  nextId += 1;
  return {
    matchId: id,
    date: "2024-04-01",
    season: "2024",
    team1: "Alpha",
    team2: "Beta",
    winner: "Alpha",
    venue: "Test Ground",
    city: "Test City",
    tossDecision: "bat",
    result: "runs",
    resultMargin: 10,
    targetRuns: 160,
    superOver: false,
    playerOfMatch: "P One",
    ...overrides,
  };
}

export function makeDataset(records: MatchRecord[]): Dataset {
  return { source: "memory", records };
}
