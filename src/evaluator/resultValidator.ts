/**
 * Result validator: checks a parsed model output against StartupEvaluationSchema.
 * Never throws; failures carry the violated field paths for diagnostics.
 */

import type { ZodIssue } from "zod";
import {
  StartupEvaluationSchema,
  type StartupEvaluation,
} from "../lib/schemas/evaluation.js";

export interface ValidationIssue {
  path: string;
  message: string;
}

export type ValidationOutcome =
  | { ok: true; evaluation: StartupEvaluation }
  | { ok: false; fieldPaths: string[]; issues: ValidationIssue[] };

const ROOT_PATH = "(root)";

function issuePath(issue: ZodIssue): string {
  return issue.path.length > 0 ? issue.path.join(".") : ROOT_PATH;
}

export function validateEvaluation(value: unknown): ValidationOutcome {
  const parsed = StartupEvaluationSchema.safeParse(value);
  if (parsed.success) {
    return { ok: true, evaluation: parsed.data };
  }
  const issues = parsed.error.issues.map((i) => ({ path: issuePath(i), message: i.message }));
  const fieldPaths = [...new Set(issues.map((i) => i.path))];
  return { ok: false, fieldPaths, issues };
}
