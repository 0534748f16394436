/**
 * Anthropic executor using the Messages API.
 * Takes temperature and max tokens only; the API has no frequency penalty.
 */

import Anthropic from "@anthropic-ai/sdk";
import type { ProviderConfig } from "../config.js";
import { failureFromSdkError } from "./sdkErrors.js";
import { GENERATION_PARAMS, type ExecutionRequest, type ExecutionResult, type Executor } from "./types.js";

export class AnthropicExecutor implements Executor {
  private readonly client: Anthropic;

  constructor(provider: ProviderConfig) {
    this.client = new Anthropic({
      apiKey: provider.apiKey ?? "",
      baseURL: provider.baseUrl,
      timeout: provider.timeoutMs,
      maxRetries: 0,
    });
  }

  async execute(req: ExecutionRequest): Promise<ExecutionResult> {
    const start = Date.now();
    try {
      const response = await this.client.messages.create({
        model: req.modelId,
        max_tokens: GENERATION_PARAMS.maxTokens,
        temperature: GENERATION_PARAMS.temperature,
        messages: [{ role: "user", content: req.prompt }],
      });

      const extractedText =
        response.content
          ?.filter((block) => block.type === "text")
          .map((block) => ("text" in block ? block.text : ""))
          .join("") ?? "";

      if (!extractedText.trim()) {
        return {
          status: "error",
          failure: { kind: "provider_empty_response", message: "No text content blocks in message" },
          latencyMs: Date.now() - start,
        };
      }
      return { status: "ok", outputText: extractedText, latencyMs: Date.now() - start };
    } catch (error) {
      return { status: "error", failure: failureFromSdkError(error, "Anthropic"), latencyMs: Date.now() - start };
    }
  }
}
