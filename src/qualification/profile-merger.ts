import { REVIEW_DIFF_PCT } from "../shared/constants";
import { CandidateProfile, Discrepancy, ProfileField } from "../shared/types/lead-profile.types";

/**
 * Heuristic values are taken whole; model values only fill fields the
 * heuristic left empty and the cross-validator did not flag.
 */
export function mergeProfiles(
  modelProfile: CandidateProfile,
  heuristicProfile: CandidateProfile,
  discrepancies: ReadonlyArray<Discrepancy>,
): CandidateProfile {
  const conflicting = new Set<ProfileField>(discrepancies.map((item) => item.field));
  const merged: CandidateProfile = { ...heuristicProfile };

  for (const field of profileFields(modelProfile)) {
    if (conflicting.has(field) || merged[field] !== undefined) {
      continue;
    }
    copyField(merged, modelProfile, field);
  }

  return merged;
}

export function requiresReview(discrepancies: ReadonlyArray<Discrepancy>): boolean {
  return discrepancies.some(
    (item) =>
      item.severity === "high" ||
      (item.diff_pct !== undefined && item.diff_pct > REVIEW_DIFF_PCT),
  );
}

function profileFields(profile: CandidateProfile): ProfileField[] {
  const fields: ProfileField[] = [
    "budget",
    "city",
    "area",
    "bedrooms",
    "bathrooms",
    "property_type",
    "phone",
    "confidence",
  ];
  return fields.filter((field) => profile[field] !== undefined);
}

function copyField<K extends ProfileField>(
  target: CandidateProfile,
  source: CandidateProfile,
  field: K,
): void {
  target[field] = source[field];
}
