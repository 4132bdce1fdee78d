import { Logger } from "../config/logger";
import { ModelExtractionAdapter } from "../extraction/model-extraction.adapter";
import { MIN_QUALIFICATION_DURATION_MS } from "../shared/constants";
import { ConversationTurn } from "../shared/types/conversation.types";
import { CandidateProfile, QualifiedProfile } from "../shared/types/lead-profile.types";
import { crossValidateProfiles } from "./cross-validator";
import { mergeProfiles, requiresReview } from "./profile-merger";
import { extractSignals } from "./signal-extractor";

interface LeadQualifierOptions {
  now?: () => number;
}

export interface QualifyOptions {
  modelExtractor?: ModelExtractionAdapter;
  sessionId?: string;
}

export class LeadQualifierService {
  private readonly now: () => number;

  constructor(
    private readonly logger: Logger,
    private readonly defaultModelExtractor?: ModelExtractionAdapter,
    options?: LeadQualifierOptions,
  ) {
    this.now = options?.now ?? Date.now;
  }

  async qualify(
    turns: ReadonlyArray<ConversationTurn>,
    options?: QualifyOptions,
  ): Promise<QualifiedProfile> {
    const startedAt = this.now();
    const sessionId = options?.sessionId;
    const extractor = options?.modelExtractor ?? this.defaultModelExtractor;

    const modelProfile = await this.extractWithModel(extractor, turns, sessionId);
    const heuristicProfile = extractSignals(turns);
    this.logger.info("heuristic extraction completed", {
      sessionId,
      fields: Object.keys(heuristicProfile),
    });

    const discrepancies = crossValidateProfiles(modelProfile, heuristicProfile);
    const profile = mergeProfiles(modelProfile, heuristicProfile, discrepancies);
    const needsReview = requiresReview(discrepancies);
    const durationMs = Math.max(MIN_QUALIFICATION_DURATION_MS, Math.round(this.now() - startedAt));

    this.logger.info("lead.qualified", {
      sessionId,
      needsReview,
      discrepancyCount: discrepancies.length,
      durationMs,
    });

    return {
      profile,
      discrepancies,
      needs_review: needsReview,
      duration_ms: durationMs,
      status: "qualified",
    };
  }

  // A failing model path degrades the run to heuristic-only.
  private async extractWithModel(
    extractor: ModelExtractionAdapter | undefined,
    turns: ReadonlyArray<ConversationTurn>,
    sessionId: string | undefined,
  ): Promise<CandidateProfile> {
    if (!extractor) {
      this.logger.warn("model extraction failed", {
        sessionId,
        error: "model_extractor_not_configured",
      });
      return {};
    }
    try {
      const profile = await extractor.extract(turns);
      this.logger.info("model extraction completed", {
        sessionId,
        fields: Object.keys(profile),
      });
      return profile;
    } catch (error) {
      this.logger.error("model extraction failed", {
        sessionId,
        error: error instanceof Error ? error.message : "Unknown error",
      });
      return {};
    }
  }
}
