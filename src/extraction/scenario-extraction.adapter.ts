import { ConversationTurn } from "../shared/types/conversation.types";
import { CandidateProfile } from "../shared/types/lead-profile.types";
import { ModelExtractionAdapter } from "./model-extraction.adapter";
import { isScenarioName, SCENARIOS } from "./scenarios";

/**
 * Answers with the canned model response of a known scenario and hands every
 * other request to the fallback adapter, when there is one.
 */
export class ScenarioExtractionAdapter implements ModelExtractionAdapter {
  constructor(
    private readonly scenario: string | undefined,
    private readonly fallback?: ModelExtractionAdapter,
  ) {}

  async extract(turns: ReadonlyArray<ConversationTurn>): Promise<CandidateProfile> {
    if (this.scenario && isScenarioName(this.scenario)) {
      return { ...SCENARIOS[this.scenario].modelResponse };
    }
    if (this.fallback) {
      return this.fallback.extract(turns);
    }
    throw new Error(`model_extraction_unavailable:${this.scenario ?? "none"}`);
  }
}
