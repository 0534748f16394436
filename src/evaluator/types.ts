/**
 * Evaluation pipeline types: stages, tagged failures and the per-request outcome.
 */

import type { CompletionFailure } from "../executor/types.js";
import type { StartupEvaluation } from "../lib/schemas/evaluation.js";
import type { ValidationIssue } from "./resultValidator.js";

export type PipelineFailure =
  | { stage: "credentials"; kind: "config_missing"; missingVars: string[] }
  | ({ stage: "completion" } & CompletionFailure)
  | { stage: "repair"; kind: "repair_failed"; reason: string }
  | { stage: "validation"; kind: "validation_failed"; fieldPaths: string[]; issues: ValidationIssue[] };

export type EvaluationSource = "model" | "fallback";

export interface EvaluationOutcome {
  runId: string;
  evaluation: Readonly<StartupEvaluation>;
  source: EvaluationSource;
  /** Present exactly when source is "fallback". */
  failure?: PipelineFailure;
  /** Raw provider text, when a completion was received. */
  rawCompletion?: string;
  latencyMs: number;
}
