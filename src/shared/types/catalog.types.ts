import { PropertyType } from "./lead-profile.types";

export interface CatalogEntry {
  id: string;
  title: string;
  price: number;
  city: string;
  area?: string;
  bedrooms?: number;
  bathrooms?: number;
  property_type?: PropertyType;
  is_active: boolean;
}

export interface ScoreComponents {
  budget?: number;
  bedrooms?: number;
  area?: number;
  property_type?: number;
}

export type MatchReason =
  | "budget_exact_match"
  | "budget_close_match"
  | "bedrooms_exact_match"
  | "bedrooms_close_match"
  | "area_exact_match"
  | "area_partial_match"
  | "property_type_match";

export interface MatchResult {
  property_id: string;
  title: string;
  price: number;
  city: string;
  area: string | null;
  bedrooms: number | null;
  bathrooms: number | null;
  score: number;
  score_components: ScoreComponents;
  reasons: MatchReason[];
}

export interface CatalogSource {
  activeInCity(city: string): Promise<CatalogEntry[]>;
}
