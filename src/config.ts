import type { EngineConfig, ProviderId } from "./types.js";
import { PROVIDER_IDS } from "./types.js";
import { log } from "./logger.js";

const DEFAULT_SYSTEM_PROMPT = "You are a helpful AI assistant.";

function resolveEnvVars(value: string): string {
  return value.replace(/\$\{([^}]+)\}/g, (_, envVar: string) => {
    const envValue = process.env[envVar];
    if (!envValue) {
      throw new Error(`Environment variable ${envVar} is not set`);
    }
    return envValue;
  });
}

function normalizeBaseUrl(value: string, provider: ProviderId): string | undefined {
  const trimmed = value.trim();
  if (trimmed.length === 0) return undefined;

  let parsed: URL;
  try {
    parsed = new URL(trimmed);
  } catch {
    log.warn(`ignoring invalid base URL for ${provider}: not a valid URL`);
    return undefined;
  }

  if (parsed.protocol !== "https:" && parsed.protocol !== "http:") {
    log.warn(
      `ignoring base URL for ${provider}: unsupported URL scheme (${parsed.protocol.replace(":", "")})`,
    );
    return undefined;
  }

  if (parsed.protocol === "http:") {
    log.warn(`base URL for ${provider} is using insecure http; prefer https`);
  }

  return parsed.toString().replace(/\/+$/, "");
}

function count(value: unknown, fallback: number): number {
  return typeof value === "number" && Number.isFinite(value) ? Math.max(0, Math.floor(value)) : fallback;
}

function millis(value: unknown, fallback: number): number {
  return typeof value === "number" && Number.isFinite(value) ? Math.max(1, Math.floor(value)) : fallback;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function parseBaseUrls(raw: unknown): Partial<Record<ProviderId, string>> {
  const urls: Partial<Record<ProviderId, string>> = {};
  if (!isRecord(raw)) return urls;

  for (const provider of PROVIDER_IDS) {
    const value = raw[provider];
    if (typeof value !== "string" || value.length === 0) continue;
    const url = normalizeBaseUrl(resolveEnvVars(value), provider);
    if (url) urls[provider] = url;
  }
  return urls;
}

export function parseConfig(raw: unknown): EngineConfig {
  const cfg: Record<string, unknown> = isRecord(raw) ? raw : {};

  const providerBaseUrls = parseBaseUrls(cfg.providerBaseUrls);
  if (!providerBaseUrls.openai && process.env.OPENAI_BASE_URL) {
    const fromEnv = normalizeBaseUrl(process.env.OPENAI_BASE_URL, "openai");
    if (fromEnv) providerBaseUrls.openai = fromEnv;
  }

  return {
    systemPrompt:
      typeof cfg.systemPrompt === "string" && cfg.systemPrompt.trim().length > 0
        ? cfg.systemPrompt
        : DEFAULT_SYSTEM_PROMPT,
    maxInjectedMemories: count(cfg.maxInjectedMemories, 5),
    maxMemoryChars: count(cfg.maxMemoryChars, 1000),
    historyLimit: count(cfg.historyLimit, 5),
    searchCandidateLimit: count(cfg.searchCandidateLimit, 100),
    searchTopK: count(cfg.searchTopK, 5),
    sanitizeInjectedMemories: cfg.sanitizeInjectedMemories !== false,
    modelPrefix: typeof cfg.modelPrefix === "string" ? cfg.modelPrefix : "model-",
    requestTimeoutMs: millis(cfg.requestTimeoutMs, 60_000),
    fastRequestTimeoutMs: millis(cfg.fastRequestTimeoutMs, 30_000),
    connectionTestTimeoutMs: millis(cfg.connectionTestTimeoutMs, 10_000),
    maxDiagnosticChars: millis(cfg.maxDiagnosticChars, 200),
    temperature:
      typeof cfg.temperature === "number" && cfg.temperature >= 0 && cfg.temperature <= 2
        ? cfg.temperature
        : 0.7,
    maxOutputTokens: millis(cfg.maxOutputTokens, 2000),
    providerBaseUrls,
    autoExtractEnabled: cfg.autoExtractEnabled !== false,
    debug: cfg.debug === true,
  };
}
