import test from "node:test";
import assert from "node:assert/strict";
import { UndefinedMetricError } from "../src/common/errors.js";
import {
  NOT_APPLICABLE,
  meanOrNa,
  percentageOrNa,
  roundTo,
  strictMean,
  strictPercentage,
} from "../src/common/math.js";

test("strictMean and strictPercentage throw UndefinedMetricError on empty input", () => {
  assert.throws(() => strictMean("avg", []), UndefinedMetricError);
  assert.throws(() => strictPercentage("share", 0, 0), UndefinedMetricError);
});

test("meanOrNa returns the arithmetic mean or N/A", () => {
  assert.equal(meanOrNa("avg", [2, 4, 9]), 5);
  assert.equal(meanOrNa("avg", [155]), 155);
  assert.equal(meanOrNa("avg", []), NOT_APPLICABLE);
});

test("percentageOrNa keeps full precision and guards a zero denominator", () => {
  assert.equal(percentageOrNa("share", 1, 3), (1 / 3) * 100);
  assert.equal(percentageOrNa("share", 5, 10), 50);
  assert.equal(percentageOrNa("share", 0, 0), NOT_APPLICABLE);
});

test("roundTo rounds to the given number of decimals", () => {
  assert.equal(roundTo(57.142857, 1), 57.1);
  assert.equal(roundTo(160.666, 1), 160.7);
});
