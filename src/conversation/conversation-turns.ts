import { isRecord } from "../extraction/candidate-profile.schema";
import { ConversationRole, ConversationTurn } from "../shared/types/conversation.types";

const MAX_TURNS = 200;
const MAX_TURN_TEXT = 4000;

export type TurnsNormalizationResult =
  | { ok: true; turns: ConversationTurn[] }
  | { ok: false; error: string };

/**
 * Validates request turns. `assistant` is read as `agent`, `content` as
 * `text`, and a missing position falls back to the array index.
 */
export function normalizeConversationTurns(raw: unknown): TurnsNormalizationResult {
  if (!Array.isArray(raw)) {
    return { ok: false, error: "turns must be an array" };
  }
  if (raw.length > MAX_TURNS) {
    return { ok: false, error: `turns must contain at most ${MAX_TURNS} items` };
  }

  const turns: ConversationTurn[] = [];
  for (let index = 0; index < raw.length; index += 1) {
    const item: unknown = raw[index];
    if (!isRecord(item)) {
      return { ok: false, error: `turns[${index}] must be an object` };
    }
    const role = toRole(item.role);
    if (!role) {
      return { ok: false, error: `turns[${index}].role must be user or agent` };
    }
    const text = typeof item.text === "string" ? item.text : item.content;
    if (typeof text !== "string") {
      return { ok: false, error: `turns[${index}].text must be a string` };
    }
    if (text.length > MAX_TURN_TEXT) {
      return { ok: false, error: `turns[${index}].text must be at most ${MAX_TURN_TEXT} characters` };
    }
    const position = item.position === undefined ? index : item.position;
    if (typeof position !== "number" || !Number.isInteger(position) || position < 0) {
      return { ok: false, error: `turns[${index}].position must be a non-negative integer` };
    }
    turns.push({ role, text, position });
  }

  return { ok: true, turns: turns.sort((a, b) => a.position - b.position) };
}

function toRole(value: unknown): ConversationRole | null {
  if (typeof value !== "string") {
    return null;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "user") {
    return "user";
  }
  if (normalized === "agent" || normalized === "assistant") {
    return "agent";
  }
  return null;
}
