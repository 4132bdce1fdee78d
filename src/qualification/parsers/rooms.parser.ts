import { ROOM_COUNT_MAX, ROOM_COUNT_MIN } from "../../shared/constants";

const BEDROOM_WORD = String.raw`(?:rec[aá]maras?|rec|habitaciones?|cuartos?|bedrooms?|beds?|br)`;
const BATHROOM_WORD = String.raw`(?:ba[nñ]os?|bathrooms?|baths?)`;

function roomPatterns(word: string): RegExp[] {
  return [
    new RegExp(String.raw`(?<!\d)(\d+)\s*${word}(?![\p{L}])`, "iu"),
    new RegExp(String.raw`(?<![\p{L}])${word}\s*:?\s*(\d+)(?!\d)`, "iu"),
  ];
}

const BEDROOM_PATTERNS = roomPatterns(BEDROOM_WORD);
const BATHROOM_PATTERNS = roomPatterns(BATHROOM_WORD);

export function parseBedrooms(text: string): number | null {
  return parseRoomCount(text, BEDROOM_PATTERNS);
}

export function parseBathrooms(text: string): number | null {
  return parseRoomCount(text, BATHROOM_PATTERNS);
}

// Only the first hit of each pattern is considered; an out-of-range count is dropped, not clamped.
function parseRoomCount(text: string, patterns: RegExp[]): number | null {
  for (const pattern of patterns) {
    const match = text.match(pattern);
    if (!match) {
      continue;
    }
    const count = Number(match[1]);
    if (Number.isInteger(count) && count >= ROOM_COUNT_MIN && count <= ROOM_COUNT_MAX) {
      return count;
    }
  }
  return null;
}
