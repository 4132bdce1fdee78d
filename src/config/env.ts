import dotenv from "dotenv";

dotenv.config();

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface EnvConfig {
  nodeEnv: string;
  port: number;
  logLevel: LogLevel;
  anthropicApiKey?: string;
  claudeModel: string;
  llmTimeoutMs: number;
  useRealApi: boolean;
  supabaseUrl?: string;
  supabaseServiceRoleKey?: string;
  catalogSeedPath: string;
}

function getOptionalTrimmed(source: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = source[name];
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): EnvConfig {
  const portRaw = source.PORT ?? "3000";
  const port = Number(portRaw);
  const llmTimeoutRaw = source.LLM_TIMEOUT_MS ?? "30000";
  const llmTimeoutMs = Number(llmTimeoutRaw);
  const useRealApiRaw = source.USE_REAL_API ?? "false";
  const logLevelRaw = (source.LOG_LEVEL ?? "info").trim().toLowerCase();

  if (!Number.isInteger(port) || port <= 0) {
    throw new Error(`Invalid PORT value: ${portRaw}`);
  }
  if (!Number.isInteger(llmTimeoutMs) || llmTimeoutMs < 1000) {
    throw new Error(`Invalid LLM_TIMEOUT_MS value: ${llmTimeoutRaw}`);
  }

  return {
    nodeEnv: source.NODE_ENV ?? "development",
    port,
    logLevel: parseLogLevel(logLevelRaw),
    anthropicApiKey: getOptionalTrimmed(source, "ANTHROPIC_API_KEY"),
    claudeModel: getOptionalTrimmed(source, "CLAUDE_MODEL") ?? "claude-sonnet-4-5",
    llmTimeoutMs,
    useRealApi: parseBoolean(useRealApiRaw),
    supabaseUrl: getOptionalTrimmed(source, "SUPABASE_URL"),
    supabaseServiceRoleKey: getOptionalTrimmed(source, "SUPABASE_SERVICE_ROLE_KEY"),
    catalogSeedPath: getOptionalTrimmed(source, "CATALOG_SEED_PATH") ?? "data/catalog.seed.json",
  };
}

function parseBoolean(value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1" || normalized === "yes") {
    return true;
  }
  if (normalized === "false" || normalized === "0" || normalized === "no") {
    return false;
  }
  throw new Error(`Invalid boolean value: ${value}`);
}

function parseLogLevel(value: string): LogLevel {
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  throw new Error(`Invalid LOG_LEVEL value: ${value}`);
}
