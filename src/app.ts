import express, { Express } from "express";
import { LlmClient } from "./ai/llm.client";
import { EnvConfig } from "./config/env";
import { createLogger, Logger } from "./config/logger";
import { loadCatalogSeed } from "./db/catalog-seed";
import { CatalogRepository } from "./db/repositories/catalog.repo";
import { SupabaseRestClient } from "./db/supabase.client";
import {
  LlmProfileExtractionAdapter,
  ModelExtractionAdapter,
} from "./extraction/model-extraction.adapter";
import { ModelExtractorResolver } from "./extraction/model-extractor.resolver";
import { buildHealthController } from "./http/health.controller";
import { buildRunsController } from "./http/runs.controller";
import { PropertyScorer } from "./matching/property-scorer";
import { LeadQualifierService } from "./qualification/lead-qualifier.service";

export interface AppOverrides {
  logger?: Logger;
  catalog?: CatalogRepository;
  liveExtractor?: ModelExtractionAdapter;
  version?: string;
}

export interface AppContext {
  app: Express;
  logger: Logger;
  catalog: CatalogRepository;
}

export function createApp(env: EnvConfig, overrides?: AppOverrides): AppContext {
  const logger = overrides?.logger ?? createLogger({ minLevel: env.logLevel });
  const app = express();

  app.use(express.json({ limit: "1mb" }));

  const catalog = overrides?.catalog ?? buildCatalog(env, logger);
  const liveExtractor = overrides?.liveExtractor ?? buildLiveExtractor(env, logger);
  logger.info("Model extraction", {
    live: Boolean(liveExtractor),
    useRealApi: env.useRealApi,
    model: env.claudeModel,
  });

  const extractorResolver = new ModelExtractorResolver({
    useRealApi: env.useRealApi,
    liveExtractor,
  });
  const leadQualifier = new LeadQualifierService(logger);
  const propertyScorer = new PropertyScorer(catalog, logger);

  app.use(
    "/health",
    buildHealthController({
      catalog,
      version: overrides?.version ?? process.env.npm_package_version ?? "0.1.0",
    }),
  );
  app.use(
    "/run",
    buildRunsController({
      leadQualifier,
      propertyScorer,
      extractorResolver,
      logger,
    }),
  );

  return { app, logger, catalog };
}

function buildCatalog(env: EnvConfig, logger: Logger): CatalogRepository {
  if (env.supabaseUrl && env.supabaseServiceRoleKey) {
    logger.info("Catalog backend", { backend: "supabase" });
    return new CatalogRepository(
      logger,
      new SupabaseRestClient({
        url: env.supabaseUrl,
        serviceRoleKey: env.supabaseServiceRoleKey,
      }),
    );
  }
  const entries = loadCatalogSeed(env.catalogSeedPath);
  logger.info("Catalog backend", {
    backend: "memory",
    seedPath: env.catalogSeedPath,
    entries: entries.length,
  });
  return new CatalogRepository(logger, undefined, entries);
}

function buildLiveExtractor(env: EnvConfig, logger: Logger): ModelExtractionAdapter | undefined {
  if (!env.anthropicApiKey) {
    return undefined;
  }
  const llmClient = new LlmClient(env.anthropicApiKey, logger, env.claudeModel);
  return new LlmProfileExtractionAdapter(llmClient, logger, env.llmTimeoutMs);
}
