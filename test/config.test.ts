import test from "node:test";
import assert from "node:assert/strict";
import { ZodError } from "zod";
import { buildRunConfig } from "../src/config.js";

test("buildRunConfig reads analyze flags and defaults", () => {
  const config = buildRunConfig(
    ["analyze", "--category", "team", "--primary", "Harbour Hawks", "--secondary", "Valley Kings"],
    {},
  );
  assert.deepEqual(config, {
    command: "analyze",
    dataPath: "./data/matches.csv",
    format: "text",
    category: "Team",
    primary: "Harbour Hawks",
    secondary: "Valley Kings",
    views: [],
    venueTopTeams: 10,
    comparativeTopTeams: 5,
    debug: false,
  });
});

test("buildRunConfig infers the command from --category", () => {
  assert.equal(buildRunConfig(["--category", "Season", "--primary", "2021"], {}).command, "analyze");
  assert.equal(buildRunConfig([], {}).command, "categories");
});

test("buildRunConfig takes the dataset path and debug flag from env", () => {
  const config = buildRunConfig(["values", "--category", "VENUE"], {
    MATCH_DATASET_PATH: "/srv/data/matches.csv",
    MATCH_COMPARE_DEBUG: "yes",
  });
  assert.equal(config.dataPath, "/srv/data/matches.csv");
  assert.equal(config.debug, true);
  assert.equal(config.category, "Venue");
});

test("buildRunConfig parses view lists and bare boolean flags", () => {
  const config = buildRunConfig(
    ["--category", "Player", "--views", "Overview, records", "--debug", "--format", "json"],
    {},
  );
  assert.deepEqual(config.views, ["overview", "records"]);
  assert.equal(config.debug, true);
  assert.equal(config.format, "json");
});

test("buildRunConfig rejects invalid values", () => {
  assert.throws(() => buildRunConfig(["--category", "Umpire"], {}), ZodError);
  assert.throws(() => buildRunConfig(["--category", "Team", "--format", "xml"], {}), ZodError);
  assert.throws(() => buildRunConfig(["--category", "Team", "--venue-top", "abc"], {}), ZodError);
  assert.throws(() => buildRunConfig(["--category", "Team", "--views", "summary"], {}), ZodError);
});

test("buildRunConfig requires a category for values and analyze", () => {
  assert.throws(
    () => buildRunConfig(["values"], {}),
    /Command "values" needs --category \(Player, Team, Venue, Season\)\./,
  );
});
