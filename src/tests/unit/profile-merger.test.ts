import assert from "node:assert/strict";
import test from "node:test";
import { mergeProfiles, requiresReview } from "../../qualification/profile-merger";
import { Discrepancy } from "../../shared/types/lead-profile.types";

const BUDGET_CONFLICT: Discrepancy = {
  field: "budget",
  model_value: 5_000_000,
  heuristic_value: 3_000_000,
  diff_pct: 40,
  severity: "high",
};

function testHeuristicWinsConflicts(): void {
  const merged = mergeProfiles(
    { budget: 5_000_000, city: "Guadalajara", property_type: "apartment", confidence: "medium" },
    { budget: 3_000_000, city: "Guadalajara", property_type: "apartment" },
    [BUDGET_CONFLICT],
  );
  assert.deepEqual(merged, {
    budget: 3_000_000,
    city: "Guadalajara",
    property_type: "apartment",
    confidence: "medium",
  });
}

function testModelFillsGaps(): void {
  const merged = mergeProfiles(
    { budget: 3_000_000, city: "Monterrey", phone: "5512345678", bedrooms: 3, confidence: "high" },
    { budget: 3_000_000, city: "Monterrey", property_type: "house" },
    [],
  );
  assert.deepEqual(merged, {
    budget: 3_000_000,
    city: "Monterrey",
    property_type: "house",
    phone: "5512345678",
    bedrooms: 3,
    confidence: "high",
  });
}

function testHeuristicValueKeptOverCaseVariant(): void {
  const merged = mergeProfiles({ city: "cdmx" }, { city: "CDMX" }, []);
  assert.equal(merged.city, "CDMX");
}

function testInputsAreNotMutated(): void {
  const heuristic = { city: "CDMX" };
  const merged = mergeProfiles({ area: "Condesa" }, heuristic, []);
  assert.deepEqual(heuristic, { city: "CDMX" });
  assert.deepEqual(merged, { city: "CDMX", area: "Condesa" });
}

function testReviewDecision(): void {
  assert.equal(requiresReview([]), false);
  assert.equal(requiresReview([BUDGET_CONFLICT]), true);
  assert.equal(
    requiresReview([{ ...BUDGET_CONFLICT, diff_pct: 25, severity: "medium" }]),
    true,
  );
  assert.equal(
    requiresReview([{ ...BUDGET_CONFLICT, diff_pct: 20, severity: "medium" }]),
    false,
  );
  assert.equal(
    requiresReview([
      { field: "area", model_value: "Condesa", heuristic_value: "Roma Norte", severity: "medium" },
    ]),
    false,
  );
}

test("keeps the heuristic value on conflicting fields", testHeuristicWinsConflicts);
test("fills fields the heuristic left empty from the model", testModelFillsGaps);
test("keeps the heuristic spelling when values agree", testHeuristicValueKeptOverCaseVariant);
test("does not mutate its inputs", testInputsAreNotMutated);
test("requires review on high severity or a gap above twenty percent", testReviewDecision);
