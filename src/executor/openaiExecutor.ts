/**
 * OpenAI executor using the Chat Completions API (any OpenAI-compatible base URL).
 */

import OpenAI from "openai";
import type { ProviderConfig } from "../config.js";
import { failureFromSdkError } from "./sdkErrors.js";
import { GENERATION_PARAMS, type ExecutionRequest, type ExecutionResult, type Executor } from "./types.js";

export class OpenAIExecutor implements Executor {
  private readonly client: OpenAI;

  constructor(private readonly provider: ProviderConfig) {
    // A missing key is reported by the pipeline's credential check, not at construction.
    this.client = new OpenAI({
      apiKey: provider.apiKey ?? "",
      baseURL: provider.baseUrl,
      timeout: provider.timeoutMs,
      maxRetries: 0,
    });
  }

  async execute(req: ExecutionRequest): Promise<ExecutionResult> {
    const start = Date.now();
    if (this.provider.livenessProbe) {
      try {
        await this.client.models.list();
      } catch (error) {
        const failure = failureFromSdkError(error, "Liveness probe failed");
        return {
          status: "error",
          failure: failure.kind === "provider_http_error" ? { kind: "provider_unreachable", message: failure.message } : failure,
          latencyMs: Date.now() - start,
        };
      }
    }

    try {
      const response = await this.client.chat.completions.create({
        model: req.modelId,
        messages: [{ role: "user", content: req.prompt }],
        stream: false,
        temperature: GENERATION_PARAMS.temperature,
        max_tokens: GENERATION_PARAMS.maxTokens,
        top_p: GENERATION_PARAMS.topP,
        frequency_penalty: GENERATION_PARAMS.frequencyPenalty,
      });

      const content = response.choices?.[0]?.message?.content ?? "";
      if (!content.trim()) {
        return {
          status: "error",
          failure: { kind: "provider_empty_response", message: "No choices[0].message.content in completion" },
          latencyMs: Date.now() - start,
        };
      }
      return { status: "ok", outputText: content, latencyMs: Date.now() - start };
    } catch (error) {
      return { status: "error", failure: failureFromSdkError(error, "OpenAI"), latencyMs: Date.now() - start };
    }
  }
}
