import { ConversationTurn } from "../../../shared/types/conversation.types";

export const PROFILE_OUTPUT_SHAPE = `{
  "budget": number,
  "city": "string",
  "area": "string",
  "bedrooms": integer,
  "bathrooms": integer,
  "property_type": "apartment" | "house" | "land",
  "phone": "string",
  "confidence": "high" | "medium" | "low"
}`;

export const PROFILE_FIELD_RULES = `- budget is the total amount in MXN as a plain number.
- area is the neighborhood name.
- phone only if the buyer shared one.
- confidence reflects how clearly the buyer stated the fields.`;

export const PROFILE_EXTRACTION_V1_PROMPT = `You extract a buyer profile from a real estate conversation.

Return STRICT JSON only.
No markdown.
No commentary.

Output JSON (omit any field the buyer did not mention):
${PROFILE_OUTPUT_SHAPE}

Rules:
${PROFILE_FIELD_RULES}`;

// Over the limit the oldest text is cut, never the latest turns.
const MAX_TRANSCRIPT_CHARS = 12000;

export function buildProfileExtractionV1Prompt(input: {
  turns: ReadonlyArray<ConversationTurn>;
}): string {
  const transcript = [...input.turns]
    .sort((a, b) => a.position - b.position)
    .map((turn) => `${turn.role === "user" ? "buyer" : "agent"}: ${turn.text}`)
    .join("\n");
  return [
    PROFILE_EXTRACTION_V1_PROMPT,
    "",
    "Conversation:",
    transcript.slice(-MAX_TRANSCRIPT_CHARS),
  ].join("\n");
}
