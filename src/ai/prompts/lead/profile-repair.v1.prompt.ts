import { PROFILE_FIELD_RULES, PROFILE_OUTPUT_SHAPE } from "./profile-extraction.v1.prompt";

export type ProfileRepairReason = "json_parse_failed" | "schema_invalid";

const REASON_TEXT: Record<ProfileRepairReason, string> = {
  json_parse_failed: "The previous reply was not a JSON object.",
  schema_invalid: "The previous reply was JSON, but some fields had the wrong type or an unknown value.",
};

const MAX_PREVIOUS_REPLY_CHARS = 4000;

export const PROFILE_REPAIR_V1_PROMPT = `Your previous reply could not be used as a buyer profile.
Rewrite it as ONE JSON object with this shape, keeping every value the buyer actually stated:
${PROFILE_OUTPUT_SHAPE}

Rules:
${PROFILE_FIELD_RULES}
- Write budgets given in words or abbreviations ("3 millones", "3M") as plain numbers (3000000).
- bedrooms and bathrooms are whole numbers.
- Map the property type to apartment, house or land. Drop it when none fits.
- Drop any field that does not fit this shape. Never invent values.
- Return the JSON object only. No markdown, no commentary.`;

export function buildProfileRepairV1Prompt(input: {
  raw: string;
  reason: ProfileRepairReason;
}): string {
  return [
    PROFILE_REPAIR_V1_PROMPT,
    "",
    `Problem: ${REASON_TEXT[input.reason]}`,
    "",
    "Previous reply:",
    input.raw.slice(0, MAX_PREVIOUS_REPLY_CHARS),
  ].join("\n");
}
