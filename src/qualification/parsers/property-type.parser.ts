import { PropertyType } from "../../shared/types/lead-profile.types";

const PROPERTY_TYPE_KEYWORDS: ReadonlyArray<{ type: PropertyType; pattern: RegExp }> = [
  {
    type: "apartment",
    pattern: /(?<![\p{L}])(?:departamentos?|depas?|apartments?|apt|flat)(?![\p{L}])/iu,
  },
  {
    type: "house",
    pattern: /(?<![\p{L}])(?:casas?|houses?)(?![\p{L}])/iu,
  },
  {
    type: "land",
    pattern: /(?<![\p{L}])(?:terrenos?|lotes?|land|lots?)(?![\p{L}])/iu,
  },
];

export function parsePropertyType(text: string): PropertyType | null {
  for (const keyword of PROPERTY_TYPE_KEYWORDS) {
    if (keyword.pattern.test(text)) {
      return keyword.type;
    }
  }
  return null;
}
