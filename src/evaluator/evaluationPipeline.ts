/**
 * Evaluation pipeline: credentials -> completion -> repair -> validation.
 *
 * A strict waterfall. The first failing stage ends the run with FALLBACK_EVALUATION;
 * nothing is retried within a request. Failure detail goes to the console and the
 * JSONL log, never to the caller.
 */

import { randomUUID } from "crypto";
import type { ProviderConfig } from "../config.js";
import { checkProviderCredentials } from "../credentials.js";
import type { EvaluationLogEvent } from "../evaluationLog.js";
import type { Executor } from "../executor/types.js";
import { repairCompletion, snippet, type RepairStrategy } from "../lib/llm/responseRepair.js";
import type { StartupEvaluation, StartupIdea } from "../lib/schemas/evaluation.js";
import { appendJsonlReported } from "../logger.js";
import { FALLBACK_EVALUATION } from "./fallback.js";
import { buildEvaluationPrompt } from "./prompt.js";
import { validateEvaluation } from "./resultValidator.js";
import type { EvaluationOutcome, PipelineFailure } from "./types.js";

const TAG = "EvaluationPipeline";

export interface EvaluationPipelineArgs {
  provider: ProviderConfig;
  executor: Executor;
  /** JSONL diagnostics path; null or omitted disables the file log. */
  logPath?: string | null;
}

/** Per-run observations collected along the waterfall. */
interface RunTrace {
  completionLatencyMs?: number;
  rawCompletion?: string;
  repairStrategy?: RepairStrategy;
}

type StageResult =
  | { ok: true; evaluation: StartupEvaluation }
  | { ok: false; failure: PipelineFailure };

export function describeFailure(failure: PipelineFailure): string {
  switch (failure.kind) {
    case "config_missing":
      return `credentials missing (${failure.missingVars.join(", ")})`;
    case "provider_http_error":
      return `provider HTTP ${failure.status}: ${failure.message}`;
    case "provider_unreachable":
    case "provider_rejected_auth":
    case "provider_empty_response":
      return `${failure.kind}: ${failure.message}`;
    case "repair_failed":
      return `repair failed: ${failure.reason}`;
    case "validation_failed":
      return `validation failed at ${failure.fieldPaths.join(", ")}`;
  }
}

export class EvaluationPipeline {
  private readonly provider: ProviderConfig;
  private readonly executor: Executor;
  private readonly logPath: string | null;

  constructor(args: EvaluationPipelineArgs) {
    this.provider = args.provider;
    this.executor = args.executor;
    this.logPath = args.logPath ?? null;
  }

  /** Always resolves to a complete evaluation: the model's, or the fallback. */
  async evaluate(idea: StartupIdea): Promise<Readonly<StartupEvaluation>> {
    const outcome = await this.run(idea);
    return outcome.evaluation;
  }

  async run(idea: StartupIdea): Promise<EvaluationOutcome> {
    const runId = randomUUID();
    const start = Date.now();
    const trace: RunTrace = {};
    const result = await this.waterfall(idea, trace);
    const latencyMs = Date.now() - start;

    const outcome: EvaluationOutcome = result.ok
      ? { runId, evaluation: result.evaluation, source: "model", latencyMs }
      : { runId, evaluation: FALLBACK_EVALUATION, source: "fallback", failure: result.failure, latencyMs };
    if (trace.rawCompletion != null) outcome.rawCompletion = trace.rawCompletion;

    if (!result.ok) {
      console.warn(`[${TAG}] ${runId} fallback at ${result.failure.stage}: ${describeFailure(result.failure)}`);
      if (trace.rawCompletion != null) {
        console.warn(`[${TAG}] ${runId} raw completion: ${snippet(trace.rawCompletion)}`);
      }
    }

    if (this.logPath) {
      const event: EvaluationLogEvent = {
        runId,
        ts: new Date().toISOString(),
        ideaTitle: idea.title,
        provider: this.provider.kind,
        modelId: this.provider.model,
        latencyMs,
        ...(trace.completionLatencyMs != null ? { completionLatencyMs: trace.completionLatencyMs } : {}),
        ...(trace.repairStrategy ? { repairStrategy: trace.repairStrategy } : {}),
        ...(trace.rawCompletion != null ? { rawCompletion: trace.rawCompletion } : {}),
        final: { source: outcome.source, ...(outcome.failure ? { failure: outcome.failure } : {}) },
      };
      await appendJsonlReported(this.logPath, event, TAG);
    }

    return outcome;
  }

  private async waterfall(idea: StartupIdea, trace: RunTrace): Promise<StageResult> {
    const credentials = checkProviderCredentials(this.provider);
    if (credentials.status === "missing") {
      return {
        ok: false,
        failure: { stage: "credentials", kind: "config_missing", missingVars: credentials.missingVars ?? [] },
      };
    }

    const completion = await this.executor.execute({
      modelId: this.provider.model,
      prompt: buildEvaluationPrompt(idea),
    });
    if (completion.latencyMs != null) trace.completionLatencyMs = completion.latencyMs;
    if (completion.status === "error") {
      return { ok: false, failure: { stage: "completion", ...completion.failure } };
    }
    trace.rawCompletion = completion.outputText;

    const repaired = repairCompletion(completion.outputText);
    if (!repaired.ok) {
      return { ok: false, failure: { stage: "repair", kind: "repair_failed", reason: repaired.reason } };
    }
    trace.repairStrategy = repaired.strategy;

    const validated = validateEvaluation(repaired.value);
    if (!validated.ok) {
      return {
        ok: false,
        failure: {
          stage: "validation",
          kind: "validation_failed",
          fieldPaths: validated.fieldPaths,
          issues: validated.issues,
        },
      };
    }
    return { ok: true, evaluation: validated.evaluation };
  }
}
