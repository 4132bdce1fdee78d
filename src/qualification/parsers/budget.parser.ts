import {
  BUDGET_ABSOLUTE_MAX,
  BUDGET_ABSOLUTE_MIN,
  BUDGET_MILLIONS_MAX,
  BUDGET_MILLIONS_MIN,
} from "../../shared/constants";

export interface BudgetMention {
  value: number;
  index: number;
}

const NOT_LETTER_BEFORE = String.raw`(?<![\p{L}\p{N}])`;
const NOT_LETTER_AFTER = String.raw`(?![\p{L}])`;
const MONEY_KEYWORD = String.raw`(?:presupuesto|budget|hasta|up\s+to|m[aá]ximo|maximum|tengo|i\s+have|solo|only)`;
const CONNECTOR = String.raw`(?:\s*(?:de|es|is|of|:)${NOT_LETTER_AFTER})?`;
const MILLIONS_UNIT = String.raw`(?:millones|mill[oó]n|millions?|mdp|m(?![\d²]))`;
// Amounts followed by these are thousands, surfaces or percentages, never a bare budget.
const NON_BUDGET_UNIT = String.raw`(?:mil|k|m2|m²|mts?|metros?|%)`;
const ROOM_WORD = String.raw`(?:rec[aá]maras?|rec|habitaciones?|cuartos?|bedrooms?|beds?|ba[nñ]os?|bathrooms?|baths?)`;

// Ordered: on equal offsets the earlier family wins.
const BUDGET_PATTERN_FAMILIES: ReadonlyArray<RegExp> = [
  new RegExp(
    `${NOT_LETTER_BEFORE}${MONEY_KEYWORD}${CONNECTOR}\\s*(\\d+(?:[.,]\\d{1,2})?)\\s*${MILLIONS_UNIT}${NOT_LETTER_AFTER}`,
    "giu",
  ),
  new RegExp(
    `${NOT_LETTER_BEFORE}${MONEY_KEYWORD}${CONNECTOR}\\s*\\$?\\s*(\\d{1,3}[,.]?\\d{3}(?:[,.]?\\d{3})?)(?!\\d)`,
    "giu",
  ),
  new RegExp(
    `${NOT_LETTER_BEFORE}(?:tengo|have|solo|only)${CONNECTOR}\\s*(\\d+)(?!\\d)(?![.,]\\d)(?!\\s*(?:${ROOM_WORD}|${NON_BUDGET_UNIT})${NOT_LETTER_AFTER})`,
    "giu",
  ),
];

/**
 * Scans the whole text with every pattern family and returns the budget of
 * the last valid mention in document order, or null when none is valid.
 */
export function parseBudget(text: string): number | null {
  const mentions = findBudgetMentions(text);
  if (mentions.length === 0) {
    return null;
  }
  let last = mentions[0];
  for (const mention of mentions) {
    if (mention.index > last.index) {
      last = mention;
    }
  }
  return last.value;
}

export function findBudgetMentions(text: string): BudgetMention[] {
  const mentions: BudgetMention[] = [];
  BUDGET_PATTERN_FAMILIES.forEach((pattern, familyIndex) => {
    for (const match of text.matchAll(pattern)) {
      const rawNumber = match[1] ?? "";
      const value = normalizeBudgetAmount(rawNumber, familyIndex === 0);
      if (value === null) {
        continue;
      }
      mentions.push({
        value,
        index: match.index ?? 0,
      });
    }
  });
  return mentions;
}

/**
 * Small amounts are read as millions; amounts already in currency units must
 * fall inside the plausible price band. Everything else is discarded.
 */
export function normalizeBudgetAmount(rawNumber: string, allowDecimal = false): number | null {
  const numeric = allowDecimal && /^\d+[.,]\d{1,2}$/.test(rawNumber)
    ? Number(rawNumber.replace(",", "."))
    : Number(rawNumber.replace(/[,.]/g, ""));
  if (!Number.isFinite(numeric) || numeric <= 0) {
    return null;
  }
  if (numeric >= BUDGET_MILLIONS_MIN && numeric <= BUDGET_MILLIONS_MAX) {
    return Math.round(numeric * 1_000_000);
  }
  if (numeric >= BUDGET_ABSOLUTE_MIN && numeric <= BUDGET_ABSOLUTE_MAX) {
    return Math.round(numeric);
  }
  return null;
}
