/**
 * Ollama executor: liveness probe on /api/tags, then /api/generate (streamed NDJSON or single body).
 */

import type { ProviderConfig } from "../config.js";
import { snippet } from "../lib/llm/responseRepair.js";
import { accumulateFragments, parseFragment, readLines, type AccumulatedStream } from "./streamAccumulator.js";
import {
  GENERATION_PARAMS,
  failureFromStatus,
  type CompletionFailure,
  type ExecutionRequest,
  type ExecutionResult,
  type Executor,
} from "./types.js";

const DEFAULT_BASE_URL = "http://localhost:11434";

function unreachable(context: string, error: unknown): CompletionFailure {
  const message = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
  return { kind: "provider_unreachable", message: `${context}: ${message}` };
}

export class OllamaExecutor implements Executor {
  private readonly baseUrl: string;

  constructor(private readonly provider: ProviderConfig) {
    this.baseUrl = provider.baseUrl ?? DEFAULT_BASE_URL;
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = { "content-type": "application/json" };
    if (this.provider.apiKey) headers.Authorization = `Bearer ${this.provider.apiKey}`;
    return headers;
  }

  /** Returns null when the provider answers 200 on /api/tags. */
  async probe(): Promise<CompletionFailure | null> {
    try {
      const res = await fetch(`${this.baseUrl}/api/tags`, {
        headers: this.headers(),
        signal: AbortSignal.timeout(this.provider.timeoutMs),
      });
      await res.body?.cancel();
      if (res.status !== 200) {
        return { kind: "provider_unreachable", message: `Liveness probe returned HTTP ${res.status}` };
      }
      return null;
    } catch (error) {
      return unreachable("Liveness probe failed", error);
    }
  }

  async execute(req: ExecutionRequest): Promise<ExecutionResult> {
    const start = Date.now();
    if (this.provider.livenessProbe) {
      const failure = await this.probe();
      if (failure) return { status: "error", failure, latencyMs: Date.now() - start };
    }

    const payload = {
      model: req.modelId,
      prompt: req.prompt,
      stream: this.provider.stream,
      options: {
        temperature: GENERATION_PARAMS.temperature,
        num_predict: GENERATION_PARAMS.maxTokens,
        top_p: GENERATION_PARAMS.topP,
        frequency_penalty: GENERATION_PARAMS.frequencyPenalty,
      },
    };

    let collected: AccumulatedStream;
    try {
      const res = await fetch(`${this.baseUrl}/api/generate`, {
        method: "POST",
        headers: this.headers(),
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.provider.timeoutMs),
      });
      if (!res.ok) {
        const body = await res.text().catch(() => "");
        return {
          status: "error",
          failure: failureFromStatus(res.status, `Ollama ${res.status}: ${snippet(body)}`),
          latencyMs: Date.now() - start,
        };
      }
      if (this.provider.stream) {
        collected = res.body ? await accumulateFragments(readLines(res.body)) : { text: "", fragments: 0, skipped: 0 };
      } else {
        const fragment = parseFragment((await res.text()).trim());
        collected = { text: fragment?.response ?? "", fragments: fragment ? 1 : 0, skipped: fragment ? 0 : 1 };
      }
    } catch (error) {
      return { status: "error", failure: unreachable("Generation call failed", error), latencyMs: Date.now() - start };
    }

    if (collected.skipped > 0) {
      console.warn(`[OllamaExecutor] Skipped ${collected.skipped} malformed fragment(s) of ${collected.fragments + collected.skipped}`);
    }
    if (!collected.text.trim()) {
      const detail = collected.providerError ? ` (provider error: ${collected.providerError})` : "";
      return {
        status: "error",
        failure: { kind: "provider_empty_response", message: `Ollama returned no completion text${detail}` },
        latencyMs: Date.now() - start,
      };
    }
    return { status: "ok", outputText: collected.text, latencyMs: Date.now() - start };
  }
}
