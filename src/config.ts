/**
 * Process configuration, resolved once at startup from the environment.
 *
 * LLM_PROVIDER (optional): ollama | openai | anthropic (default ollama)
 *   ollama    - local generation API, streamed NDJSON, liveness probe on /api/tags, key optional
 *   openai    - OpenAI-compatible chat completions, key required
 *   anthropic - Messages API, key required, no liveness probe
 *
 * LLM_API_KEY wins over the provider's own variable (OPENAI_API_KEY / ANTHROPIC_API_KEY).
 * The returned config is frozen; pipeline code never reads process.env.
 */

export type ProviderKind = "ollama" | "openai" | "anthropic";

export interface ProviderConfig {
  kind: ProviderKind;
  model: string;
  /** Base URL without trailing slash; undefined means the SDK default. */
  baseUrl?: string;
  apiKey?: string;
  /** Env var names accepted for the API key, in precedence order. */
  apiKeyVars: readonly string[];
  requiresApiKey: boolean;
  timeoutMs: number;
  stream: boolean;
  livenessProbe: boolean;
}

export interface AppConfig {
  port: number;
  frontendUrl: string;
  provider: ProviderConfig;
  /** null disables the JSONL evaluation log. */
  evaluationLogPath: string | null;
}

export const DEFAULT_TIMEOUT_MS = 120_000;
const DEFAULT_PORT = 8000;
const DEFAULT_FRONTEND_URL = "http://localhost:3000";
const DEFAULT_LOG_PATH = "./runs/evaluations.jsonl";

const PROVIDER_DEFAULTS: Record<
  ProviderKind,
  { model: string; baseUrl?: string; apiKeyVars: string[]; requiresApiKey: boolean; livenessProbe: boolean }
> = {
  ollama: {
    model: "mistral",
    baseUrl: "http://localhost:11434",
    apiKeyVars: ["LLM_API_KEY"],
    requiresApiKey: false,
    livenessProbe: true,
  },
  openai: {
    model: "gpt-4o-mini",
    baseUrl: "https://api.openai.com/v1",
    apiKeyVars: ["LLM_API_KEY", "OPENAI_API_KEY"],
    requiresApiKey: true,
    livenessProbe: false,
  },
  anthropic: {
    model: "claude-haiku-4-5-20251001",
    apiKeyVars: ["LLM_API_KEY", "ANTHROPIC_API_KEY"],
    requiresApiKey: true,
    livenessProbe: false,
  },
};

type Env = Record<string, string | undefined>;

function nonEmpty(value: string | undefined): string | undefined {
  const v = value?.trim();
  return v ? v : undefined;
}

function parseProvider(value: string | undefined): ProviderKind {
  const v = (nonEmpty(value) ?? "ollama").toLowerCase();
  if (v === "ollama" || v === "openai" || v === "anthropic") return v;
  throw new Error(`Invalid LLM_PROVIDER "${value}". Must be one of: ollama, openai, anthropic`);
}

function parsePositiveInt(value: string | undefined, defaultVal: number): number {
  if (value == null || value.trim() === "") return defaultVal;
  const n = Number.parseInt(value, 10);
  if (Number.isNaN(n) || n <= 0) return defaultVal;
  return n;
}

function parseBool(value: string | undefined, defaultVal: boolean): boolean {
  const v = nonEmpty(value)?.toLowerCase();
  if (v === "true" || v === "1") return true;
  if (v === "false" || v === "0") return false;
  return defaultVal;
}

export function loadProviderConfig(env: Env = process.env): ProviderConfig {
  const kind = parseProvider(env.LLM_PROVIDER);
  const defaults = PROVIDER_DEFAULTS[kind];
  const baseUrl = (nonEmpty(env.LLM_BASE_URL) ?? defaults.baseUrl)?.replace(/\/+$/, "");
  const apiKey = defaults.apiKeyVars.map((k) => nonEmpty(env[k])).find((v) => v != null);
  return {
    kind,
    model: nonEmpty(env.LLM_MODEL) ?? defaults.model,
    ...(baseUrl != null ? { baseUrl } : {}),
    ...(apiKey != null ? { apiKey } : {}),
    apiKeyVars: defaults.apiKeyVars,
    requiresApiKey: defaults.requiresApiKey,
    timeoutMs: parsePositiveInt(env.LLM_TIMEOUT_MS, DEFAULT_TIMEOUT_MS),
    stream: kind === "ollama" ? parseBool(env.LLM_STREAM, true) : false,
    livenessProbe: kind === "anthropic" ? false : parseBool(env.LLM_LIVENESS_PROBE, defaults.livenessProbe),
  };
}

export function loadConfig(env: Env = process.env): Readonly<AppConfig> {
  const logPath = nonEmpty(env.EVALUATION_LOG_PATH) ?? DEFAULT_LOG_PATH;
  const provider = Object.freeze(loadProviderConfig(env));
  return Object.freeze({
    port: parsePositiveInt(env.PORT, DEFAULT_PORT),
    frontendUrl: nonEmpty(env.FRONTEND_URL) ?? DEFAULT_FRONTEND_URL,
    provider,
    evaluationLogPath: logPath.toLowerCase() === "off" ? null : logPath,
  });
}
