/**
 * Maps errors thrown by the provider SDKs (openai, @anthropic-ai/sdk) to completion failures.
 * Both SDKs attach the HTTP status to API errors; connection and timeout errors carry none.
 */

import { failureFromStatus, type CompletionFailure } from "./types.js";

function statusOf(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null || !("status" in error)) return undefined;
  return typeof error.status === "number" ? error.status : undefined;
}

export function failureFromSdkError(error: unknown, label: string): CompletionFailure {
  const message = error instanceof Error ? error.message : String(error);
  const status = statusOf(error);
  if (status == null) {
    return { kind: "provider_unreachable", message: `${label}: ${message}` };
  }
  return failureFromStatus(status, `${label} ${status}: ${message}`);
}
