import { parsePropertyType } from "../qualification/parsers/property-type.parser";
import {
  CandidateProfile,
  ExtractionConfidence,
  PropertyType,
} from "../shared/types/lead-profile.types";

const MAX_TEXT = 120;
const PROPERTY_TYPES: ReadonlyArray<PropertyType> = ["apartment", "house", "land"];
const CONFIDENCE_LEVELS: ReadonlyArray<ExtractionConfidence> = ["high", "medium", "low"];

/**
 * Coerces loosely-typed model output into a CandidateProfile.
 * Unknown or unusable values are dropped; confidence falls back to "medium".
 */
export function normalizeCandidateProfile(raw: unknown): CandidateProfile {
  const source = isRecord(raw) ? raw : {};
  const profile: CandidateProfile = {};

  const budget = toPositiveInteger(source.budget);
  if (budget !== null) {
    profile.budget = budget;
  }
  const city = toText(source.city);
  if (city) {
    profile.city = city;
  }
  const area = toText(source.area);
  if (area) {
    profile.area = area;
  }
  const bedrooms = toPositiveInteger(source.bedrooms);
  if (bedrooms !== null) {
    profile.bedrooms = bedrooms;
  }
  const bathrooms = toPositiveInteger(source.bathrooms);
  if (bathrooms !== null) {
    profile.bathrooms = bathrooms;
  }
  const propertyType = toPropertyType(source.property_type);
  if (propertyType !== null) {
    profile.property_type = propertyType;
  }
  const phone = toPhone(source.phone);
  if (phone) {
    profile.phone = phone;
  }
  profile.confidence = toConfidence(source.confidence);

  return profile;
}

/**
 * Shape check on a parsed model reply. Every field may be missing or null;
 * present fields must have a type `normalizeCandidateProfile` can read.
 */
export function isCandidateProfilePayload(value: unknown): value is Record<string, unknown> {
  if (!isRecord(value)) {
    return false;
  }
  return (
    isAbsentOr(value.budget, isNumeric) &&
    isAbsentOr(value.bedrooms, isNumeric) &&
    isAbsentOr(value.bathrooms, isNumeric) &&
    isAbsentOr(value.city, isString) &&
    isAbsentOr(value.area, isString) &&
    isAbsentOr(value.confidence, isString) &&
    isAbsentOr(value.phone, (phone) => isString(phone) || isFiniteNumber(phone)) &&
    isAbsentOr(value.property_type, (type) => toPropertyType(type) !== null)
  );
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toText(value: unknown): string {
  if (typeof value !== "string") {
    return "";
  }
  return value.trim().slice(0, MAX_TEXT);
}

function isAbsentOr(value: unknown, check: (present: unknown) => boolean): boolean {
  if (value === undefined || value === null || (typeof value === "string" && !value.trim())) {
    return true;
  }
  return check(value);
}

function isString(value: unknown): boolean {
  return typeof value === "string";
}

function isFiniteNumber(value: unknown): boolean {
  return typeof value === "number" && Number.isFinite(value);
}

function isNumeric(value: unknown): boolean {
  return toNumber(value) !== null;
}

function toNumber(value: unknown): number | null {
  let numeric: number;
  if (typeof value === "number") {
    numeric = value;
  } else if (typeof value === "string" && value.trim()) {
    numeric = Number(value.trim().replace(/[,_\s]/g, ""));
  } else {
    return null;
  }
  return Number.isFinite(numeric) ? numeric : null;
}

function toPositiveInteger(value: unknown): number | null {
  const numeric = toNumber(value);
  if (numeric === null) {
    return null;
  }
  const truncated = Math.trunc(numeric);
  return truncated > 0 ? truncated : null;
}

function toPropertyType(value: unknown): PropertyType | null {
  const text = toText(value).toLowerCase();
  if (!text) {
    return null;
  }
  const direct = PROPERTY_TYPES.find((item) => item === text);
  return direct ?? parsePropertyType(text);
}

function toPhone(value: unknown): string {
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(Math.trunc(value));
  }
  return toText(value);
}

function toConfidence(value: unknown): ExtractionConfidence {
  const text = toText(value).toLowerCase();
  return CONFIDENCE_LEVELS.find((item) => item === text) ?? "medium";
}
