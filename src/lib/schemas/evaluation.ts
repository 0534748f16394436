/**
 * Evaluation schemas: startup idea input and the structured evaluation result.
 * JSON-serializable types + Zod validation for the API and for model output.
 */

import { z } from "zod";

// ─── Primitives ────────────────────────────────────────────────────────────

/** Numbers may arrive as JSON numbers or as numeric strings ("72", " 80.5 "). */
const NUMERIC_STRING = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

export const NumericScore = z.preprocess(
  (v) => (typeof v === "string" && NUMERIC_STRING.test(v.trim()) ? Number(v.trim()) : v),
  z.number().finite()
);

const StringList = z.array(z.string());

// ─── Input ─────────────────────────────────────────────────────────────────

export const StartupIdeaSchema = z.object({
  title: z.string(),
  problem: z.string(),
  solution: z.string(),
  audience: z.string(),
  businessModel: z.string(),
});
export type StartupIdea = z.infer<typeof StartupIdeaSchema>;

// ─── Evaluation ────────────────────────────────────────────────────────────

/** 0-100 by convention; the range is not enforced. */
export const ScoreSchema = z.object({
  overall: NumericScore,
  marketPotential: NumericScore,
  technicalFeasibility: NumericScore,
});
export type Score = z.infer<typeof ScoreSchema>;

export const SwotAnalysisSchema = z.object({
  strengths: StringList,
  weaknesses: StringList,
  opportunities: StringList,
  threats: StringList,
});
export type SwotAnalysis = z.infer<typeof SwotAnalysisSchema>;

export const MarketAnalysisSchema = z.object({
  targetMarket: z.string(),
  /** Free-form market sizes: "$50B" and "$50000000000" are both valid. */
  tam: z.string(),
  sam: z.string(),
  som: z.string(),
  growthRate: z.string(),
  trends: StringList,
  competitors: StringList,
  customerNeeds: StringList,
  barriersToEntry: StringList,
});
export type MarketAnalysis = z.infer<typeof MarketAnalysisSchema>;

export const StartupEvaluationSchema = z.object({
  score: ScoreSchema,
  swotAnalysis: SwotAnalysisSchema,
  mvpSuggestions: StringList,
  businessModelIdeas: StringList,
  marketAnalysis: MarketAnalysisSchema,
});
export type StartupEvaluation = z.infer<typeof StartupEvaluationSchema>;

