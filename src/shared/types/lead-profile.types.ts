export type PropertyType = "apartment" | "house" | "land";

export type ExtractionConfidence = "high" | "medium" | "low";

export interface CandidateProfile {
  budget?: number;
  city?: string;
  area?: string;
  bedrooms?: number;
  bathrooms?: number;
  property_type?: PropertyType;
  phone?: string;
  confidence?: ExtractionConfidence;
}

export type ProfileField = keyof CandidateProfile;

export type NumericProfileField = "budget" | "bedrooms" | "bathrooms";

export type CategoricalProfileField = "city" | "area" | "property_type";

export type DiscrepancySeverity = "high" | "medium";

/**
 * One field on which the model and heuristic extractions disagree.
 * `diff_pct` is only set for numeric fields.
 */
export interface Discrepancy {
  field: NumericProfileField | CategoricalProfileField;
  model_value: string | number;
  heuristic_value: string | number;
  diff_pct?: number;
  severity: DiscrepancySeverity;
}

export type QualificationStatus = "qualified";

export interface QualifiedProfile {
  readonly profile: Readonly<CandidateProfile>;
  readonly discrepancies: Discrepancy[];
  readonly needs_review: boolean;
  readonly duration_ms: number;
  readonly status: QualificationStatus;
}
