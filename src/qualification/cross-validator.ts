import { SEVERITY_HIGH_DIFF_PCT } from "../shared/constants";
import {
  CandidateProfile,
  CategoricalProfileField,
  Discrepancy,
  NumericProfileField,
} from "../shared/types/lead-profile.types";

const NUMERIC_FIELDS: ReadonlyArray<NumericProfileField> = ["budget", "bedrooms", "bathrooms"];
const CATEGORICAL_FIELDS: ReadonlyArray<CategoricalProfileField> = ["city", "area", "property_type"];

/**
 * Field-by-field comparison of the two extraction paths. A field only one
 * side asserts is never a discrepancy.
 */
export function crossValidateProfiles(
  modelProfile: CandidateProfile,
  heuristicProfile: CandidateProfile,
): Discrepancy[] {
  const discrepancies: Discrepancy[] = [];

  for (const field of NUMERIC_FIELDS) {
    const modelValue = modelProfile[field];
    const heuristicValue = heuristicProfile[field];
    if (modelValue === undefined || heuristicValue === undefined) {
      continue;
    }
    if (modelValue === heuristicValue) {
      continue;
    }

    const diffPct = percentDifference(modelValue, heuristicValue);
    discrepancies.push({
      field,
      model_value: modelValue,
      heuristic_value: heuristicValue,
      diff_pct: diffPct,
      severity: diffPct > SEVERITY_HIGH_DIFF_PCT ? "high" : "medium",
    });
  }

  for (const field of CATEGORICAL_FIELDS) {
    const modelValue = modelProfile[field];
    const heuristicValue = heuristicProfile[field];
    if (modelValue === undefined || heuristicValue === undefined) {
      continue;
    }
    if (modelValue.toLowerCase() === heuristicValue.toLowerCase()) {
      continue;
    }

    discrepancies.push({
      field,
      model_value: modelValue,
      heuristic_value: heuristicValue,
      severity: "medium",
    });
  }

  return discrepancies;
}

export function percentDifference(a: number, b: number): number {
  const larger = Math.max(Math.abs(a), Math.abs(b));
  if (larger === 0) {
    return 0;
  }
  return round1((Math.abs(a - b) * 100) / larger);
}

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}
