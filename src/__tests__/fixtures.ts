/**
 * Shared test data: one idea and a schema-exact evaluation for it.
 */

import type { ProviderConfig } from "../config.js";
import type { StartupEvaluation, StartupIdea } from "../lib/schemas/evaluation.js";

export const ECOTRACK_IDEA: StartupIdea = {
  title: "EcoTrack",
  problem: "food waste",
  solution: "app",
  audience: "urban renters",
  businessModel: "freemium",
};

export const ECOTRACK_EVALUATION: StartupEvaluation = {
  score: { overall: 68, marketPotential: 72, technicalFeasibility: 85 },
  swotAnalysis: {
    strengths: ["Simple mobile-first product", "Clear sustainability angle", "Low build cost"],
    weaknesses: ["Habit formation is hard", "Thin differentiation"],
    opportunities: ["Partnerships with grocery chains", "Municipal waste programs", "Carbon reporting"],
    threats: ["Large recipe apps adding tracking", "Low willingness to pay"],
  },
  mvpSuggestions: ["Pantry tracker with expiry reminders", "Weekly waste report", "Shared fridge mode for roommates"],
  businessModelIdeas: ["Freemium with premium analytics", "Grocery partner referrals"],
  marketAnalysis: {
    targetMarket: "Renters aged 20-35 in large cities",
    tam: "$12000000000",
    sam: "$1500000000",
    som: "$30000000",
    growthRate: "11% CAGR driven by rising food prices and sustainability awareness",
    trends: ["Zero-waste living", "Smart kitchen devices"],
    competitors: ["Too Good To Go", "NoWaste"],
    customerNeeds: ["Fewer spoiled groceries", "Lower food bills"],
    barriersToEntry: ["User retention", "Grocery data integrations"],
  },
};

export const ECOTRACK_JSON = JSON.stringify(ECOTRACK_EVALUATION, null, 2);

export function providerConfig(overrides: Partial<ProviderConfig> = {}): ProviderConfig {
  return {
    kind: "ollama",
    model: "mistral",
    baseUrl: "http://localhost:11434",
    apiKeyVars: ["LLM_API_KEY"],
    requiresApiKey: false,
    timeoutMs: 1000,
    stream: true,
    livenessProbe: true,
    ...overrides,
  };
}
