import { createApp } from "./app";
import { LEAD_QUALIFICATION_SYSTEM_PROMPT } from "./ai/system/lead-qualification.system";
import { loadEnv } from "./config/env";

async function bootstrap(): Promise<void> {
  const env = loadEnv();
  const { app, logger, catalog } = createApp(env);

  app.listen(env.port, () => {
    logger.info("Server started", { port: env.port, nodeEnv: env.nodeEnv });
    logger.info("LLM system prompt loaded", { length: LEAD_QUALIFICATION_SYSTEM_PROMPT.length });
    logger.info("Catalog ready", { backend: catalog.getBackend() });
  });
}

void bootstrap();
