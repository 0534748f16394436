/**
 * Evaluation log event schema for JSONL logging.
 */

import type { ProviderKind } from "./config.js";
import type { EvaluationSource, PipelineFailure } from "./evaluator/types.js";
import type { RepairStrategy } from "./lib/llm/responseRepair.js";

export interface EvaluationLogEvent {
  runId: string;
  ts: string;
  ideaTitle: string;
  provider: ProviderKind;
  modelId: string;
  latencyMs: number;
  /** Completion client latency, when the provider was called */
  completionLatencyMs?: number;
  /** How the JSON object was recovered, when repair succeeded */
  repairStrategy?: RepairStrategy;
  /** Full provider text for offline diagnosis; never returned to the caller */
  rawCompletion?: string;
  final: {
    source: EvaluationSource;
    failure?: PipelineFailure;
  };
}
