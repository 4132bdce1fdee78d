import { ConversationTurn } from "../shared/types/conversation.types";
import { ModelExtractionAdapter } from "./model-extraction.adapter";
import { ScenarioExtractionAdapter } from "./scenario-extraction.adapter";
import { scenarioTurns } from "./scenarios";

export interface ModelExtractorResolverConfig {
  useRealApi: boolean;
  liveExtractor?: ModelExtractionAdapter;
}

/**
 * Picks the model path for one run. With the live API forced on, scenarios
 * are ignored; otherwise a known scenario answers with its canned response.
 */
export class ModelExtractorResolver {
  constructor(private readonly config: ModelExtractorResolverConfig) {}

  isLiveForced(): boolean {
    return this.config.useRealApi && this.config.liveExtractor !== undefined;
  }

  resolve(scenario: string | undefined): ModelExtractionAdapter {
    if (this.isLiveForced() && this.config.liveExtractor) {
      return this.config.liveExtractor;
    }
    return new ScenarioExtractionAdapter(scenario, this.config.liveExtractor);
  }

  defaultTurns(scenario: string | undefined): ConversationTurn[] {
    if (this.isLiveForced()) {
      return [];
    }
    return scenarioTurns(scenario);
  }
}
