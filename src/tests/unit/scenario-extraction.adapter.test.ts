import assert from "node:assert/strict";
import test from "node:test";
import { ModelExtractionAdapter } from "../../extraction/model-extraction.adapter";
import { ModelExtractorResolver } from "../../extraction/model-extractor.resolver";
import { ScenarioExtractionAdapter } from "../../extraction/scenario-extraction.adapter";
import { isScenarioName, listScenarioNames, scenarioTurns, SCENARIOS } from "../../extraction/scenarios";
import { CandidateProfile } from "../../shared/types/lead-profile.types";

const liveExtractor: ModelExtractionAdapter = {
  async extract(): Promise<CandidateProfile> {
    return { city: "Puebla", confidence: "low" };
  },
};

async function testKnownScenarioAnswersCanned(): Promise<void> {
  const adapter = new ScenarioExtractionAdapter("budget_mismatch", liveExtractor);
  assert.deepEqual(await adapter.extract([]), {
    budget: 5_000_000,
    city: "Guadalajara",
    property_type: "apartment",
    confidence: "medium",
  });
}

async function testUnknownScenarioUsesFallback(): Promise<void> {
  const adapter = new ScenarioExtractionAdapter("not_a_scenario", liveExtractor);
  assert.deepEqual(await adapter.extract([]), { city: "Puebla", confidence: "low" });
}

async function testUnknownScenarioWithoutFallbackRejects(): Promise<void> {
  await assert.rejects(new ScenarioExtractionAdapter("not_a_scenario").extract([]), {
    message: "model_extraction_unavailable:not_a_scenario",
  });
  await assert.rejects(new ScenarioExtractionAdapter(undefined).extract([]), {
    message: "model_extraction_unavailable:none",
  });
}

async function testCannedResponseIsCopied(): Promise<void> {
  const adapter = new ScenarioExtractionAdapter("budget_seeker");
  const first = await adapter.extract([]);
  first.city = "Puebla";
  assert.equal(SCENARIOS.budget_seeker.modelResponse.city, "CDMX");
}

function testScenarioTurns(): void {
  assert.deepEqual(listScenarioNames(), ["budget_seeker", "budget_mismatch", "phone_vs_budget"]);
  assert.equal(scenarioTurns("budget_seeker").length, 5);
  assert.deepEqual(scenarioTurns("unknown"), []);
  assert.deepEqual(scenarioTurns(undefined), []);
  assert.equal(isScenarioName("toString"), false);
}

async function testResolverUsesScenarioByDefault(): Promise<void> {
  const resolver = new ModelExtractorResolver({ useRealApi: false, liveExtractor });
  assert.equal(resolver.isLiveForced(), false);
  assert.equal((await resolver.resolve("phone_vs_budget").extract([])).phone, "5512345678");
  assert.deepEqual(await resolver.resolve(undefined).extract([]), { city: "Puebla", confidence: "low" });
  assert.equal(resolver.defaultTurns("budget_mismatch").length, 3);
}

async function testResolverForcedLive(): Promise<void> {
  const resolver = new ModelExtractorResolver({ useRealApi: true, liveExtractor });
  assert.equal(resolver.isLiveForced(), true);
  assert.equal(resolver.resolve("budget_mismatch"), liveExtractor);
  assert.deepEqual(resolver.defaultTurns("budget_mismatch"), []);
}

function testResolverNeedsKeyToForceLive(): void {
  const resolver = new ModelExtractorResolver({ useRealApi: true });
  assert.equal(resolver.isLiveForced(), false);
  assert.equal(resolver.defaultTurns("budget_seeker").length, 5);
}

test("answers a known scenario with its canned response", testKnownScenarioAnswersCanned);
test("delegates an unknown scenario to the fallback", testUnknownScenarioUsesFallback);
test("rejects an unknown scenario without a fallback", testUnknownScenarioWithoutFallbackRejects);
test("returns a copy of the canned response", testCannedResponseIsCopied);
test("exposes scenario turns", testScenarioTurns);
test("resolves scenarios unless the live API is forced", testResolverUsesScenarioByDefault);
test("uses the live extractor when forced", testResolverForcedLive);
test("keeps scenarios when no live extractor is configured", testResolverNeedsKeyToForceLive);
