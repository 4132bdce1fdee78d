import { ConversationTurn } from "../shared/types/conversation.types";
import { CandidateProfile } from "../shared/types/lead-profile.types";

export type ScenarioName = "budget_seeker" | "budget_mismatch" | "phone_vs_budget";

export interface ScenarioFixture {
  description: string;
  turns: ReadonlyArray<ConversationTurn>;
  modelResponse: Readonly<CandidateProfile>;
}

export const SCENARIOS: Readonly<Record<ScenarioName, ScenarioFixture>> = {
  budget_seeker: {
    description: "Buyer states city, area, bedrooms and budget plainly.",
    turns: [
      { role: "user", text: "Hola, busco un departamento en CDMX", position: 0 },
      { role: "agent", text: "¿Qué zona te interesa?", position: 1 },
      { role: "user", text: "Roma Norte, con 2 recámaras", position: 2 },
      { role: "agent", text: "¿Cuál es tu presupuesto?", position: 3 },
      { role: "user", text: "Hasta 3 millones", position: 4 },
    ],
    modelResponse: {
      budget: 3_000_000,
      city: "CDMX",
      area: "Roma Norte",
      bedrooms: 2,
      confidence: "high",
    },
  },
  budget_mismatch: {
    description: "Buyer corrects the budget; the model keeps the first amount.",
    turns: [
      { role: "user", text: "Busco depa en Guadalajara", position: 0 },
      { role: "agent", text: "¿Cuánto quieres invertir?", position: 1 },
      { role: "user", text: "Mi presupuesto es 5 millones pero realmente solo tengo 3", position: 2 },
    ],
    modelResponse: {
      budget: 5_000_000,
      city: "Guadalajara",
      property_type: "apartment",
      confidence: "medium",
    },
  },
  phone_vs_budget: {
    description: "A phone number sits next to the budget in the same message.",
    turns: [
      { role: "user", text: "Busco casa en Monterrey", position: 0 },
      { role: "agent", text: "Cuéntame más de lo que necesitas", position: 1 },
      { role: "user", text: "presupuesto 3 millones, mi tel es 5512345678", position: 2 },
    ],
    modelResponse: {
      budget: 3_000_000,
      city: "Monterrey",
      phone: "5512345678",
      property_type: "house",
      confidence: "high",
    },
  },
};

export function isScenarioName(value: string): value is ScenarioName {
  return Object.prototype.hasOwnProperty.call(SCENARIOS, value);
}

export function listScenarioNames(): ScenarioName[] {
  return Object.keys(SCENARIOS).filter(isScenarioName);
}

/** Canned turns for a scenario, or an empty list for an unknown name. */
export function scenarioTurns(name: string | undefined): ConversationTurn[] {
  if (!name || !isScenarioName(name)) {
    return [];
  }
  return SCENARIOS[name].turns.map((turn) => ({ ...turn }));
}
