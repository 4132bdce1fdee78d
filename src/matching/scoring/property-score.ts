import { MAX_MATCH_RESULTS } from "../../shared/constants";
import {
  CatalogEntry,
  MatchReason,
  MatchResult,
  ScoreComponents,
} from "../../shared/types/catalog.types";
import { CandidateProfile } from "../../shared/types/lead-profile.types";

const BUDGET_MAX = 40;
const BEDROOMS_MAX = 30;
const AREA_MAX = 20;
const PROPERTY_TYPE_MAX = 10;

export interface PropertyScore {
  total: number;
  components: ScoreComponents;
}

/**
 * Scores one listing against the profile. Only dimensions the profile
 * specifies are scored; a listing lacking the attribute gets 0 for it.
 */
export function scoreProperty(entry: CatalogEntry, profile: CandidateProfile): PropertyScore {
  const components: ScoreComponents = {};

  if (profile.budget !== undefined) {
    components.budget = scoreBudget(entry.price, profile.budget);
  }
  if (profile.bedrooms !== undefined) {
    components.bedrooms = scoreBedrooms(entry.bedrooms, profile.bedrooms);
  }
  if (profile.area !== undefined) {
    components.area = scoreArea(entry.area, profile.area);
  }
  if (profile.property_type !== undefined) {
    components.property_type = scorePropertyType(entry.property_type, profile.property_type);
  }

  const total =
    (components.budget ?? 0) +
    (components.bedrooms ?? 0) +
    (components.area ?? 0) +
    (components.property_type ?? 0);

  return { total, components };
}

export function scoreBudget(price: number, budget: number): number {
  if (!Number.isFinite(price) || budget <= 0) {
    return 0;
  }
  const diffPct = (Math.abs(price - budget) * 100) / budget;
  if (diffPct <= 10) {
    return BUDGET_MAX;
  }
  if (diffPct <= 20) {
    return 30;
  }
  if (diffPct <= 30) {
    return 20;
  }
  return 0;
}

export function scoreBedrooms(entryBedrooms: number | undefined, requested: number): number {
  if (entryBedrooms === undefined) {
    return 0;
  }
  if (entryBedrooms === requested) {
    return BEDROOMS_MAX;
  }
  return Math.abs(entryBedrooms - requested) === 1 ? 20 : 0;
}

// "Roma" and "Roma Norte" are a partial match in either direction.
export function scoreArea(entryArea: string | undefined, requested: string): number {
  const listed = (entryArea ?? "").trim().toLowerCase();
  const wanted = requested.trim().toLowerCase();
  if (!listed || !wanted) {
    return 0;
  }
  if (listed === wanted) {
    return AREA_MAX;
  }
  return listed.includes(wanted) || wanted.includes(listed) ? 10 : 0;
}

export function scorePropertyType(entryType: string | undefined, requested: string): number {
  if (entryType === undefined) {
    return 0;
  }
  return entryType.toLowerCase() === requested.toLowerCase() ? PROPERTY_TYPE_MAX : 0;
}

export function buildReasons(components: ScoreComponents): MatchReason[] {
  const reasons: MatchReason[] = [];
  const budget = components.budget;
  if (budget === BUDGET_MAX) {
    reasons.push("budget_exact_match");
  } else if (budget !== undefined && budget >= 20 && budget < BUDGET_MAX) {
    reasons.push("budget_close_match");
  }
  if (components.bedrooms === BEDROOMS_MAX) {
    reasons.push("bedrooms_exact_match");
  } else if (components.bedrooms === 20) {
    reasons.push("bedrooms_close_match");
  }
  if (components.area === AREA_MAX) {
    reasons.push("area_exact_match");
  } else if (components.area === 10) {
    reasons.push("area_partial_match");
  }
  if (components.property_type === PROPERTY_TYPE_MAX) {
    reasons.push("property_type_match");
  }
  return reasons;
}

export function toMatchResult(entry: CatalogEntry, score: PropertyScore): MatchResult {
  return {
    property_id: entry.id,
    title: entry.title,
    price: entry.price,
    city: entry.city,
    area: entry.area ?? null,
    bedrooms: entry.bedrooms ?? null,
    bathrooms: entry.bathrooms ?? null,
    score: score.total,
    score_components: score.components,
    reasons: buildReasons(score.components),
  };
}

/** Score descending, then catalog id ascending; at most `limit` results. */
export function rankMatches(
  entries: ReadonlyArray<CatalogEntry>,
  profile: CandidateProfile,
  limit = MAX_MATCH_RESULTS,
): MatchResult[] {
  return entries
    .map((entry) => toMatchResult(entry, scoreProperty(entry, profile)))
    .sort(
      (a, b) =>
        b.score - a.score ||
        a.property_id.localeCompare(b.property_id, undefined, { numeric: true }),
    )
    .slice(0, Math.max(0, limit));
}
