/**
 * API route registration for Express.
 * Routes are served at the root (the public /validate contract) and under /api.
 */

import express, { type Express } from "express";
import type { ProviderConfig } from "../../src/config.js";
import type { EvaluationPipeline } from "../../src/evaluator/evaluationPipeline.js";
import * as validate from "./validate.js";

export interface ApiDeps {
  pipeline: EvaluationPipeline;
  provider: ProviderConfig;
}

export function registerApiRoutes(app: Express, deps: ApiDeps): void {
  const api = express.Router();

  api.post("/validate", validate.validatePost(deps.pipeline));
  api.get("/health", validate.healthGet(deps.provider));

  app.use("/api", api);
  app.use(api);
}
