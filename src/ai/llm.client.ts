import fetch from "node-fetch";
import { Logger } from "../config/logger";
import { LEAD_QUALIFICATION_SYSTEM_PROMPT } from "./system/lead-qualification.system";

export const DEFAULT_CLAUDE_MODEL = "claude-sonnet-4-5";
const ANTHROPIC_MESSAGES_URL = "https://api.anthropic.com/v1/messages";
const ANTHROPIC_VERSION = "2023-06-01";

export interface MessagesRequestBody {
  model: string;
  max_tokens: number;
  temperature: number;
  system: string;
  messages: Array<{
    role: "user" | "assistant";
    content: string;
  }>;
}

interface LlmCallOptions {
  promptName?: string;
}

export class LlmClient {
  private readonly chatModel: string;

  constructor(
    private readonly apiKey: string,
    private readonly logger: Logger,
    modelOverride?: string,
  ) {
    this.chatModel = modelOverride || DEFAULT_CLAUDE_MODEL;
    if (!apiKey.trim()) {
      throw new Error("ANTHROPIC_API_KEY is empty. Refusing to build the model client.");
    }
  }

  getModelName(): string {
    return this.chatModel;
  }

  async generateStructuredJson(
    prompt: string,
    maxTokens: number,
    options?: LlmCallOptions,
  ): Promise<string> {
    const startedAt = Date.now();
    const promptName = options?.promptName ?? "structured_json";
    const requestBody = this.buildJsonRequestBody(prompt, maxTokens);
    try {
      const response = await fetch(ANTHROPIC_MESSAGES_URL, {
        method: "POST",
        headers: {
          "x-api-key": this.apiKey,
          "anthropic-version": ANTHROPIC_VERSION,
          "content-type": "application/json",
        },
        body: JSON.stringify(requestBody),
      });

      if (!response.ok) {
        const body = await response.text();
        throw new Error(`Anthropic API error: HTTP ${response.status} - ${body}`);
      }

      const body: unknown = await response.json();
      const content = readFirstText(body);
      if (!content) {
        throw new Error("Anthropic response does not contain text content");
      }

      this.logger.info("llm.call.completed", {
        promptName,
        modelName: this.chatModel,
        latencyMs: Date.now() - startedAt,
        maxOutput: maxTokens,
        promptChars: prompt.length,
        outputChars: content.length,
      });
      return content;
    } catch (error) {
      this.logger.warn("llm.call.failed", {
        promptName,
        modelName: this.chatModel,
        latencyMs: Date.now() - startedAt,
        maxOutput: maxTokens,
        error: error instanceof Error ? error.message : "Unknown error",
      });
      throw error;
    }
  }

  buildJsonRequestBody(prompt: string, maxTokens: number): MessagesRequestBody {
    return {
      model: this.chatModel,
      max_tokens: maxTokens,
      temperature: 0,
      system: LEAD_QUALIFICATION_SYSTEM_PROMPT,
      messages: [
        {
          role: "user",
          content: prompt,
        },
      ],
    };
  }
}

function readFirstText(body: unknown): string | null {
  if (typeof body !== "object" || body === null || !("content" in body) || !Array.isArray(body.content)) {
    return null;
  }
  for (const block of body.content) {
    if (
      typeof block === "object" &&
      block !== null &&
      "type" in block &&
      block.type === "text" &&
      "text" in block &&
      typeof block.text === "string"
    ) {
      return block.text;
    }
  }
  return null;
}
