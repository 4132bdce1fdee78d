import { createLogger } from "../src/config/logger";
import { loadEnv } from "../src/config/env";
import { loadCatalogSeed } from "../src/db/catalog-seed";
import { CatalogRepository } from "../src/db/repositories/catalog.repo";
import { ScenarioExtractionAdapter } from "../src/extraction/scenario-extraction.adapter";
import { listScenarioNames, scenarioTurns } from "../src/extraction/scenarios";
import { PropertyScorer } from "../src/matching/property-scorer";
import { LeadQualifierService } from "../src/qualification/lead-qualifier.service";

async function run(): Promise<void> {
  const env = loadEnv();
  const logger = createLogger({ minLevel: "warn" });
  const catalog = new CatalogRepository(logger, undefined, loadCatalogSeed(env.catalogSeedPath));
  const leadQualifier = new LeadQualifierService(logger);
  const propertyScorer = new PropertyScorer(catalog, logger);

  for (const scenario of listScenarioNames()) {
    const turns = scenarioTurns(scenario);
    const qualified = await leadQualifier.qualify(turns, {
      modelExtractor: new ScenarioExtractionAdapter(scenario),
      sessionId: `sim-${scenario}`,
    });
    const matches = qualified.profile.city ? await propertyScorer.call(qualified.profile) : [];

    process.stdout.write(`\n=== ${scenario} ===\n`);
    process.stdout.write(`profile: ${JSON.stringify(qualified.profile)}\n`);
    process.stdout.write(
      `needs_review: ${qualified.needs_review} discrepancies: ${JSON.stringify(qualified.discrepancies)}\n`,
    );
    for (const match of matches) {
      process.stdout.write(
        `  #${match.property_id} ${match.title} score=${match.score} reasons=${match.reasons.join(",")}\n`,
      );
    }
  }
}

run().catch((error: unknown) => {
  process.stderr.write(`simulate-run failed: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exitCode = 1;
});
