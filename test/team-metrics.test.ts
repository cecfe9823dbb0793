import test from "node:test";
import assert from "node:assert/strict";
import { NOT_APPLICABLE } from "../src/common/math.js";
import {
  headToHead,
  seasonWinLoss,
  seasonWinPercentage,
  teamRecord,
  teamResultTypes,
  tossOutcomes,
} from "../src/metrics/team.js";
import { filterRecords } from "../src/resolve/entityResolver.js";
import { distinctValues } from "../src/dataset/accessor.js";
import { loadFixture, makeDataset, makeRecord } from "./helpers.js";

test("teamRecord counts matches from both sides of the fixture", async () => {
  const dataset = await loadFixture();
  const record = teamRecord("Harbour Hawks", filterRecords(dataset, "Team", "Harbour Hawks"));
  assert.equal(record.totalMatches, 7);
  assert.equal(record.wins, 4);
  assert.equal(record.winPercentage, (4 / 7) * 100);
});

test("teamRecord returns N/A win percentage for a team with no matches", () => {
  const record = teamRecord("Ghost XI", [makeRecord()]);
  assert.deepEqual(record, { totalMatches: 0, wins: 0, winPercentage: NOT_APPLICABLE });
});

test("win percentage stays within 0..100 for every team", async () => {
  const dataset = await loadFixture();
  for (const team of distinctValues(dataset, "Team")) {
    const { winPercentage } = teamRecord(team, dataset.records);
    assert.equal(typeof winPercentage, "number");
    assert.ok(typeof winPercentage === "number" && winPercentage >= 0 && winPercentage <= 100);
  }
});

test("Mumbai scenario: 5 home and 5 away matches give 50% wins", () => {
  const records = [
    ...[true, true, true, false, false].map((won) =>
      makeRecord({ team1: "Mumbai", team2: "Chennai", winner: won ? "Mumbai" : "Chennai" }),
    ),
    ...[true, true, false, false, false].map((won) =>
      makeRecord({ team1: "Delhi", team2: "Mumbai", winner: won ? "Mumbai" : "Delhi" }),
    ),
  ];
  const record = teamRecord("Mumbai", records);
  assert.deepEqual(record, { totalMatches: 10, wins: 5, winPercentage: 50 });
});

test("seasonWinLoss counts decided losses and seasonWinPercentage uses decided matches", async () => {
  const dataset = await loadFixture();
  const subset = filterRecords(dataset, "Team", "Harbour Hawks");
  assert.deepEqual(seasonWinLoss("Harbour Hawks", subset), {
    wins: [
      { label: "2021", value: 2 },
      { label: "2022", value: 2 },
      { label: "2023", value: 0 },
    ],
    losses: [
      { label: "2021", value: 1 },
      { label: "2022", value: 0 },
      { label: "2023", value: 2 },
    ],
  });
  assert.deepEqual(seasonWinPercentage("Harbour Hawks", subset), [
    { label: "2021", value: (2 / 3) * 100 },
    { label: "2022", value: 100 },
    { label: "2023", value: 0 },
  ]);
});

test("seasonWinPercentage skips seasons with only no-result matches", () => {
  const records = [
    makeRecord({ season: "2019", winner: null, result: "no-result", resultMargin: null }),
    makeRecord({ season: "2020", winner: "Beta", result: "wickets" }),
  ];
  assert.deepEqual(seasonWinPercentage("Alpha", records), [{ label: "2020", value: 0 }]);
});

test("tossOutcomes cross-tabulates decision against won/lost", async () => {
  const dataset = await loadFixture();
  const table = tossOutcomes("Harbour Hawks", filterRecords(dataset, "Team", "Harbour Hawks"));
  assert.deepEqual(table, {
    rows: ["bat", "field"],
    columns: ["Won", "Lost"],
    counts: [
      [3, 1],
      [1, 2],
    ],
  });
});

test("teamResultTypes ranks result types by count", async () => {
  const dataset = await loadFixture();
  assert.deepEqual(teamResultTypes("Harbour Hawks", dataset.records), [
    { label: "runs", value: 3 },
    { label: "wickets", value: 3 },
    { label: "tie", value: 1 },
  ]);
});

test("headToHead counts wins in either fixture order", async () => {
  const dataset = await loadFixture();
  assert.deepEqual(headToHead(dataset, "Harbour Hawks", "Valley Kings"), {
    teams: ["Harbour Hawks", "Valley Kings"],
    directMatches: 4,
    wins: [
      { label: "Harbour Hawks", value: 3 },
      { label: "Valley Kings", value: 1 },
    ],
    noDecision: 0,
  });
});

test("headToHead wins sum to direct matches minus no-decision for every pair", async () => {
  const dataset = await loadFixture();
  const teams = distinctValues(dataset, "Team");
  for (const a of teams) {
    for (const b of teams) {
      if (a === b) {
        continue;
      }
      const h2h = headToHead(dataset, a, b);
      const wins = h2h.wins.reduce((sum, point) => sum + point.value, 0);
      assert.equal(wins, h2h.directMatches - h2h.noDecision);
    }
  }
  const kingsRiders = headToHead(dataset, "Valley Kings", "Coast Riders");
  assert.equal(kingsRiders.directMatches, 3);
  assert.equal(kingsRiders.noDecision, 1);
  assert.deepEqual(kingsRiders.wins, [
    { label: "Valley Kings", value: 2 },
    { label: "Coast Riders", value: 0 },
  ]);
});

test("headToHead of two teams that never met is all zeros", () => {
  const dataset = makeDataset([makeRecord({ team1: "Alpha", team2: "Beta" })]);
  const h2h = headToHead(dataset, "Alpha", "Gamma");
  assert.equal(h2h.directMatches, 0);
  assert.equal(h2h.noDecision, 0);
});

test("seasonWinLoss leaves out seasons with only no-result matches", () => {
  const records = [
    makeRecord({ season: "2019", winner: null, result: "no-result", resultMargin: null }),
    makeRecord({ season: "2020", winner: "Alpha", result: "runs" }),
  ];
  assert.deepEqual(seasonWinLoss("Alpha", records), {
    wins: [{ label: "2020", value: 1 }],
    losses: [{ label: "2020", value: 0 }],
  });
});
