/**
 * Static evaluation returned whenever the pipeline cannot produce a validated result.
 * Deep-frozen: the same instance is shared by every request.
 */

import type { StartupEvaluation } from "../lib/schemas/evaluation.js";

function deepFreeze<T>(value: T): Readonly<T> {
  if (value !== null && typeof value === "object") {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

export const FALLBACK_EVALUATION: Readonly<StartupEvaluation> = deepFreeze<StartupEvaluation>({
  score: { overall: 75, marketPotential: 70, technicalFeasibility: 80 },
  swotAnalysis: {
    strengths: ["Innovative", "Scalable", "Well-targeted"],
    weaknesses: ["High dev cost", "Low adoption risk", "Unclear pricing"],
    opportunities: ["Growing market", "Tech trends", "Global reach"],
    threats: ["Regulations", "Competitors", "Economic instability"],
  },
  mvpSuggestions: ["Build landing page", "Create waitlist", "Offer demo"],
  businessModelIdeas: ["Subscription", "Freemium", "Tiered pricing"],
  marketAnalysis: {
    targetMarket: "Urban eco-conscious youth",
    tam: "$50000000000",
    sam: "$5000000000",
    som: "$100000000",
    growthRate: "15% CAGR due to rising demand for sustainable consumer products globally",
    trends: ["AI for sustainability", "Eco-lifestyle tracking"],
    competitors: ["Greenly", "Joro"],
    customerNeeds: ["Actionable tips", "Progress tracking"],
    barriersToEntry: ["Trust", "Accuracy", "Engagement"],
  },
});
