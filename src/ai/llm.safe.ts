import { Logger } from "../config/logger";

export interface StructuredJsonClient {
  generateStructuredJson(prompt: string, maxTokens: number, options?: { promptName?: string }): Promise<string>;
  getModelName?(): string;
}

/** Why a reply was sent back for one repair round. */
export type JsonRepairReason = "json_parse_failed" | "schema_invalid";

export interface JsonSafeCallArgs<T> {
  llmClient: StructuredJsonClient;
  prompt: string;
  maxTokens: number;
  promptName: string;
  logger?: Logger;
  timeoutMs?: number;
  validate: (value: unknown) => value is T;
  buildRepairPrompt: (input: { raw: string; reason: JsonRepairReason }) => string;
}

type CallFailureCode = "timeout" | "transient_failure" | "llm_failure";

export type SafeJsonErrorCode = CallFailureCode | JsonRepairReason;

export type SafeJsonResult<T> =
  | {
      ok: true;
      data: T;
    }
  | {
      ok: false;
      error_code: SafeJsonErrorCode;
      raw?: string;
    };

const DEFAULT_TIMEOUT_MS = 30_000;
const MAX_ATTEMPTS_PER_CALL = 2;
const TRANSIENT_PATTERNS: ReadonlyArray<RegExp> = [
  /timeout/,
  /econnreset/,
  /network/,
  /\b429\b/,
  /rate limit/,
  /http 5(?:00|02|03|04|29)\b/,
];

/**
 * Runs a JSON prompt, reads the outermost object from the reply and checks it
 * with `validate`. A reply that is not JSON or fails validation gets exactly
 * one repair round built by the caller.
 */
export async function callJsonPromptSafe<T>(args: JsonSafeCallArgs<T>): Promise<SafeJsonResult<T>> {
  const timeoutMs = normalizeTimeout(args.timeoutMs);

  const first = await requestText(args, args.prompt, args.promptName, timeoutMs);
  if (!first.ok) {
    return first;
  }
  const initial = interpretReply(first.raw, args.validate);
  if (initial.ok) {
    return initial;
  }

  const repairName = `${args.promptName}_repair`;
  args.logger?.warn("llm.safe.repair", { promptName: args.promptName, reason: initial.error_code });
  const second = await requestText(
    args,
    args.buildRepairPrompt({ raw: first.raw, reason: initial.error_code }),
    repairName,
    timeoutMs,
  );
  if (!second.ok) {
    return second;
  }
  return interpretReply(second.raw, args.validate);
}

export function tryParseJsonObject(raw: string): { ok: true; data: Record<string, unknown> } | { ok: false } {
  const text = raw.trim();
  const firstBrace = text.indexOf("{");
  const lastBrace = text.lastIndexOf("}");
  if (firstBrace < 0 || lastBrace <= firstBrace) {
    return { ok: false };
  }
  try {
    const parsed: unknown = JSON.parse(text.slice(firstBrace, lastBrace + 1));
    return typeof parsed === "object" && parsed !== null && !Array.isArray(parsed)
      ? { ok: true, data: { ...parsed } }
      : { ok: false };
  } catch {
    return { ok: false };
  }
}

function interpretReply<T>(
  raw: string,
  validate: (value: unknown) => value is T,
): { ok: true; data: T } | { ok: false; error_code: JsonRepairReason; raw: string } {
  const parsed = tryParseJsonObject(raw);
  if (!parsed.ok) {
    return { ok: false, error_code: "json_parse_failed", raw };
  }
  const data = parsed.data;
  return validate(data) ? { ok: true, data } : { ok: false, error_code: "schema_invalid", raw };
}

async function requestText<T>(
  args: JsonSafeCallArgs<T>,
  prompt: string,
  promptName: string,
  timeoutMs: number,
): Promise<{ ok: true; raw: string } | { ok: false; error_code: CallFailureCode }> {
  let failure: CallFailureCode = "llm_failure";
  for (let attempt = 1; attempt <= MAX_ATTEMPTS_PER_CALL; attempt += 1) {
    try {
      const raw = await withTimeout(
        args.llmClient.generateStructuredJson(prompt, args.maxTokens, { promptName }),
        timeoutMs,
      );
      return { ok: true, raw };
    } catch (error) {
      failure = classifyCallFailure(error);
      if (failure === "llm_failure" || attempt === MAX_ATTEMPTS_PER_CALL) {
        break;
      }
      args.logger?.warn("llm.safe.retry.once", {
        promptName,
        modelName: args.llmClient.getModelName?.(),
        reason: failure,
      });
    }
  }
  return { ok: false, error_code: failure };
}

function classifyCallFailure(error: unknown): CallFailureCode {
  const message = error instanceof Error ? error.message.toLowerCase() : "";
  if (message.includes("timeout")) {
    return "timeout";
  }
  return TRANSIENT_PATTERNS.some((pattern) => pattern.test(message)) ? "transient_failure" : "llm_failure";
}

function normalizeTimeout(value?: number): number {
  if (typeof value === "number" && Number.isFinite(value) && value > 0) {
    return Math.round(value);
  }
  return DEFAULT_TIMEOUT_MS;
}

async function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new Error("timeout")), timeoutMs);
  });
  try {
    return await Promise.race([promise, expired]);
  } finally {
    clearTimeout(timer);
  }
}
