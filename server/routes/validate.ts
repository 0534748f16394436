/**
 * Evaluation API routes - validate (evaluate an idea), health.
 */

import type { Request, Response } from "express";
import type { ProviderConfig } from "../../src/config.js";
import { checkProviderCredentials } from "../../src/credentials.js";
import type { EvaluationPipeline } from "../../src/evaluator/evaluationPipeline.js";
import { StartupIdeaSchema } from "../../src/lib/schemas/evaluation.js";

function err(res: Response, status: number, code: string, message: string, details?: unknown) {
  res.status(status).json({ success: false, error: { code, message, details } });
}

export function validatePost(pipeline: EvaluationPipeline) {
  return async (req: Request, res: Response) => {
    try {
      const parsed = StartupIdeaSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        return err(
          res,
          400,
          "VALIDATION_ERROR",
          "Missing or invalid fields: title, problem, solution, audience, businessModel",
          parsed.error.issues.map((i) => ({ path: i.path.join("."), message: i.message }))
        );
      }
      const evaluation = await pipeline.evaluate(parsed.data);
      res.json(evaluation);
    } catch (e) {
      console.error("API /validate error:", e);
      err(res, 500, "INTERNAL_ERROR", "Error generating response");
    }
  };
}

export function healthGet(provider: ProviderConfig) {
  return (_req: Request, res: Response) => {
    const credentials = checkProviderCredentials(provider);
    res.json({
      success: true,
      provider: { kind: provider.kind, model: provider.model, baseUrl: provider.baseUrl ?? null },
      credentials,
    });
  };
}
