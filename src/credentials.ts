/**
 * Provider credential check. Reads the resolved config only, never process.env.
 * Never logs or returns the secret itself.
 */

import type { ProviderConfig, ProviderKind } from "./config.js";

/** Credential status for health output. */
export type CredentialStatus = "connected" | "missing" | "not_required";

export interface CredentialCheckResult {
  providerId: ProviderKind;
  status: CredentialStatus;
  missingVars?: string[];
}

export function checkProviderCredentials(provider: ProviderConfig): CredentialCheckResult {
  if (provider.apiKey) {
    return { providerId: provider.kind, status: "connected" };
  }
  if (!provider.requiresApiKey) {
    return { providerId: provider.kind, status: "not_required" };
  }
  return {
    providerId: provider.kind,
    status: "missing",
    missingVars: [...provider.apiKeyVars],
  };
}
