import { Logger } from "../config/logger";
import { callJsonPromptSafe, StructuredJsonClient } from "../ai/llm.safe";
import { buildProfileExtractionV1Prompt } from "../ai/prompts/lead/profile-extraction.v1.prompt";
import { buildProfileRepairV1Prompt } from "../ai/prompts/lead/profile-repair.v1.prompt";
import { ConversationTurn } from "../shared/types/conversation.types";
import { CandidateProfile } from "../shared/types/lead-profile.types";
import { isCandidateProfilePayload, normalizeCandidateProfile } from "./candidate-profile.schema";

export interface ModelExtractionAdapter {
  extract(turns: ReadonlyArray<ConversationTurn>): Promise<CandidateProfile>;
}

const PROFILE_EXTRACTION_MAX_TOKENS = 1024;

export class LlmProfileExtractionAdapter implements ModelExtractionAdapter {
  constructor(
    private readonly llmClient: StructuredJsonClient,
    private readonly logger: Logger,
    private readonly timeoutMs?: number,
  ) {}

  async extract(turns: ReadonlyArray<ConversationTurn>): Promise<CandidateProfile> {
    const safe = await callJsonPromptSafe<Record<string, unknown>>({
      llmClient: this.llmClient,
      prompt: buildProfileExtractionV1Prompt({ turns }),
      maxTokens: PROFILE_EXTRACTION_MAX_TOKENS,
      promptName: "profile_extraction_v1",
      logger: this.logger,
      timeoutMs: this.timeoutMs,
      validate: isCandidateProfilePayload,
      buildRepairPrompt: buildProfileRepairV1Prompt,
    });
    if (!safe.ok) {
      throw new Error(`model_extraction_failed:${safe.error_code}`);
    }
    return normalizeCandidateProfile(safe.data);
  }
}
