import test from "node:test";
import assert from "node:assert/strict";
import { NOT_APPLICABLE } from "../src/common/math.js";
import { summarizePlayer } from "../src/metrics/player.js";
import { filterRecords } from "../src/resolve/entityResolver.js";
import { loadFixture } from "./helpers.js";

test("summarizePlayer aggregates award matches", async () => {
  const dataset = await loadFixture();
  const summary = summarizePlayer(filterRecords(dataset, "Player", "A Rao"));

  assert.equal(summary.awards, 4);
  assert.equal(summary.teamsInvolved, 3);
  assert.equal(summary.firstAward, "2021-04-10");
  assert.deepEqual(summary.awardsBySeason, [
    { label: "2021", value: 2 },
    { label: "2022", value: 1 },
    { label: "2023", value: 1 },
  ]);
  assert.deepEqual(summary.resultTypes, [
    { label: "runs", value: 3 },
    { label: "wickets", value: 1 },
  ]);
  assert.deepEqual(summary.marginDistribution, [20, 4, 15, 10]);
});

test("summarizePlayer handles an empty subset without throwing", () => {
  const summary = summarizePlayer([]);
  assert.equal(summary.awards, 0);
  assert.equal(summary.teamsInvolved, 0);
  assert.equal(summary.firstAward, NOT_APPLICABLE);
  assert.deepEqual(summary.awardsBySeason, []);
  assert.deepEqual(summary.marginDistribution, []);
});
