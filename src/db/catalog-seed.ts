import fs from "node:fs";
import path from "node:path";
import { isRecord } from "../extraction/candidate-profile.schema";
import { CatalogEntry } from "../shared/types/catalog.types";
import { PropertyType } from "../shared/types/lead-profile.types";

const PROPERTY_TYPES: ReadonlyArray<PropertyType> = ["apartment", "house", "land"];

/**
 * Validates one catalog row, from the seed file or from the `properties`
 * table. Rows without an id, a title, a positive price or a city are rejected.
 */
export function normalizeCatalogEntry(raw: unknown): CatalogEntry | null {
  if (!isRecord(raw)) {
    return null;
  }
  const id = toId(raw.id);
  const title = toText(raw.title);
  const price = toNumber(raw.price);
  const city = toText(raw.city);
  if (!id || !title || price === null || price <= 0 || !city) {
    return null;
  }

  const entry: CatalogEntry = {
    id,
    title,
    price,
    city,
    is_active: toActive(raw.is_active ?? raw.active),
  };
  const area = toText(raw.area);
  if (area) {
    entry.area = area;
  }
  const bedrooms = toNumber(raw.bedrooms);
  if (bedrooms !== null && Number.isInteger(bedrooms) && bedrooms >= 0) {
    entry.bedrooms = bedrooms;
  }
  const bathrooms = toNumber(raw.bathrooms);
  if (bathrooms !== null && Number.isInteger(bathrooms) && bathrooms >= 0) {
    entry.bathrooms = bathrooms;
  }
  const propertyType = toText(raw.property_type).toLowerCase();
  const knownType = PROPERTY_TYPES.find((item) => item === propertyType);
  if (knownType) {
    entry.property_type = knownType;
  }
  return entry;
}

export function parseCatalogSeed(raw: unknown): CatalogEntry[] {
  const rows = Array.isArray(raw) ? raw : isRecord(raw) && Array.isArray(raw.properties) ? raw.properties : null;
  if (!rows) {
    throw new Error("Catalog seed must be an array or an object with a properties array");
  }
  const entries: CatalogEntry[] = [];
  rows.forEach((row: unknown, index: number) => {
    const entry = normalizeCatalogEntry(row);
    if (!entry) {
      throw new Error(`Invalid catalog seed entry at index ${index}`);
    }
    entries.push(entry);
  });
  return entries;
}

export function loadCatalogSeed(seedPath: string): CatalogEntry[] {
  const resolved = path.resolve(process.cwd(), seedPath);
  const content = fs.readFileSync(resolved, "utf8");
  const parsed: unknown = JSON.parse(content);
  return parseCatalogSeed(parsed);
}

function toId(value: unknown): string {
  if (typeof value === "number" && Number.isInteger(value)) {
    return String(value);
  }
  return toText(value);
}

function toText(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

// numeric columns come back from PostgREST as strings
function toNumber(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "string" && value.trim()) {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function toActive(value: unknown): boolean {
  if (typeof value === "boolean") {
    return value;
  }
  return value === undefined || value === null;
}
