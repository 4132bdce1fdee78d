import { Logger } from "../config/logger";
import { CatalogSource, MatchResult } from "../shared/types/catalog.types";
import { CandidateProfile } from "../shared/types/lead-profile.types";
import { rankMatches } from "./scoring/property-score";

export class PropertyScorer {
  constructor(
    private readonly catalog: CatalogSource,
    private readonly logger: Logger,
  ) {}

  async call(profile: Readonly<CandidateProfile>): Promise<MatchResult[]> {
    const city = profile.city?.trim() ?? "";
    if (!city) {
      this.logger.warn("property_matching.skipped", { reason: "missing_city" });
      return [];
    }

    const cityKey = city.toLowerCase();
    const candidates = (await this.catalog.activeInCity(city)).filter(
      (entry) => entry.is_active && entry.city.trim().toLowerCase() === cityKey,
    );
    const matches = rankMatches(candidates, profile);

    this.logger.info("property_matching.completed", {
      city,
      candidateCount: candidates.length,
      matchCount: matches.length,
      topScore: matches[0]?.score ?? null,
    });
    return matches;
  }
}
