/**
 * Executor factory: one completion client per configured provider.
 */

import type { ProviderConfig } from "../config.js";
import type { Executor } from "./types.js";
import { OllamaExecutor } from "./ollamaExecutor.js";
import { OpenAIExecutor } from "./openaiExecutor.js";
import { AnthropicExecutor } from "./anthropicExecutor.js";

export function createExecutor(provider: ProviderConfig): Executor {
  switch (provider.kind) {
    case "openai":
      return new OpenAIExecutor(provider);
    case "anthropic":
      return new AnthropicExecutor(provider);
    case "ollama":
      return new OllamaExecutor(provider);
  }
}
