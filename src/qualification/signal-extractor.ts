import { ConversationTurn } from "../shared/types/conversation.types";
import { CandidateProfile } from "../shared/types/lead-profile.types";
import { parseBudget } from "./parsers/budget.parser";
import { parseArea, parseCity } from "./parsers/location.parser";
import { parsePropertyType } from "./parsers/property-type.parser";
import { parseBathrooms, parseBedrooms } from "./parsers/rooms.parser";

/**
 * Heuristic extraction path. Reads only what the buyer wrote, so text the
 * agent echoes back can never plant a value here.
 */
export function extractSignals(turns: ReadonlyArray<ConversationTurn>): CandidateProfile {
  return extractSignalsFromText(buildUserText(turns));
}

export function extractSignalsFromText(text: string): CandidateProfile {
  const profile: CandidateProfile = {};

  const budget = parseBudget(text);
  if (budget !== null) {
    profile.budget = budget;
  }
  const city = parseCity(text);
  if (city !== null) {
    profile.city = city;
  }
  const area = parseArea(text);
  if (area !== null) {
    profile.area = area;
  }
  const bedrooms = parseBedrooms(text);
  if (bedrooms !== null) {
    profile.bedrooms = bedrooms;
  }
  const bathrooms = parseBathrooms(text);
  if (bathrooms !== null) {
    profile.bathrooms = bathrooms;
  }
  const propertyType = parsePropertyType(text);
  if (propertyType !== null) {
    profile.property_type = propertyType;
  }

  return profile;
}

export function buildUserText(turns: ReadonlyArray<ConversationTurn>): string {
  return [...turns]
    .sort((a, b) => a.position - b.position)
    .filter((turn) => turn.role === "user")
    .map((turn) => turn.text)
    .join(" ");
}
