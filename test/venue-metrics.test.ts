import test from "node:test";
import assert from "node:assert/strict";
import { NOT_APPLICABLE } from "../src/common/math.js";
import { summarizeVenue, venueCity } from "../src/metrics/venue.js";
import { filterRecords } from "../src/resolve/entityResolver.js";
import { loadFixture, makeRecord } from "./helpers.js";

test("summarizeVenue aggregates a multi-season venue", async () => {
  const dataset = await loadFixture();
  const summary = summarizeVenue(filterRecords(dataset, "Venue", "Riverside Oval"));

  assert.equal(summary.totalMatches, 5);
  assert.equal(summary.city, "Riverton");
  assert.equal(summary.firstMatch, "2021-04-10");
  assert.equal(summary.averageTargetRuns, 821 / 5);
  assert.deepEqual(summary.resultShares, [
    { label: "runs", value: (2 / 5) * 100 },
    { label: "wickets", value: (2 / 5) * 100 },
    { label: "tie", value: (1 / 5) * 100 },
  ]);
  assert.deepEqual(summary.topTeams, [
    { label: "Coast Riders", value: 2 },
    { label: "Harbour Hawks", value: 2 },
    { label: "Valley Kings", value: 1 },
  ]);
  assert.deepEqual(summary.resultsBySeason, {
    rows: ["2021", "2022", "2023"],
    columns: ["runs", "wickets", "tie"],
    counts: [
      [1, 1, 0],
      [0, 1, 1],
      [1, 0, 0],
    ],
  });
  assert.deepEqual(summary.marginDistribution, [20, 6, 8, 10]);
  assert.deepEqual(summary.matchesBySeason, [
    { label: "2021", value: 2 },
    { label: "2022", value: 2 },
    { label: "2023", value: 1 },
  ]);
});

test("summarizeVenue limits the team ranking to the requested size", async () => {
  const dataset = await loadFixture();
  const summary = summarizeVenue(filterRecords(dataset, "Venue", "Riverside Oval"), 1);
  assert.deepEqual(summary.topTeams, [{ label: "Coast Riders", value: 2 }]);
});

test("venueCity skips missing cities and falls back to N/A", async () => {
  const dataset = await loadFixture();
  assert.equal(venueCity(filterRecords(dataset, "Venue", "Hill Park")), "Hillside");
  assert.equal(venueCity([makeRecord({ city: null })]), NOT_APPLICABLE);
  assert.equal(venueCity([]), NOT_APPLICABLE);
});

test("a venue with a single match has a one-value distribution and matching averages", async () => {
  const dataset = await loadFixture();
  const summary = summarizeVenue(filterRecords(dataset, "Venue", "Lake Stadium"));
  assert.equal(summary.totalMatches, 1);
  assert.deepEqual(summary.marginDistribution, [3]);
  assert.equal(summary.averageTargetRuns, 155);
  assert.deepEqual(summary.resultShares, [{ label: "wickets", value: 100 }]);
});

test("summarizeVenue over no matches reports N/A instead of throwing", () => {
  const summary = summarizeVenue([]);
  assert.equal(summary.totalMatches, 0);
  assert.equal(summary.averageTargetRuns, NOT_APPLICABLE);
  assert.equal(summary.firstMatch, NOT_APPLICABLE);
  assert.deepEqual(summary.resultShares, []);
});
