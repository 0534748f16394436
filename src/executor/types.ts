/**
 * Completion client abstraction types.
 */

export type CompletionFailure =
  | { kind: "provider_unreachable"; message: string }
  | { kind: "provider_rejected_auth"; message: string }
  | { kind: "provider_empty_response"; message: string }
  | { kind: "provider_http_error"; status: number; message: string };

export interface ExecutionRequest {
  modelId: string;
  prompt: string;
}

export type ExecutionResult =
  | { status: "ok"; outputText: string; latencyMs?: number }
  | { status: "error"; failure: CompletionFailure; latencyMs?: number };

export interface Executor {
  execute(req: ExecutionRequest): Promise<ExecutionResult>;
}

/** Fixed generation parameters shared by every provider. */
export const GENERATION_PARAMS = {
  temperature: 0.2,
  maxTokens: 2048,
  topP: 0.9,
  frequencyPenalty: 0,
} as const;

/** Maps a provider HTTP status to a failure; 401/403 mean the credential was refused. */
export function failureFromStatus(status: number, message: string): CompletionFailure {
  if (status === 401 || status === 403) {
    return { kind: "provider_rejected_auth", message };
  }
  return { kind: "provider_http_error", status, message };
}
