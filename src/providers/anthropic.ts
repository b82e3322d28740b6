import { AnthropicMessageResponseSchema } from "../schemas.js";
import type { ConnectionTestResult } from "../types.js";
import { failedStatus, joinUrl, postJson, readJson, resolveFetch } from "./http.js";
import type { AdapterCall, AdapterOutcome, AdapterSettings, ProviderAdapter } from "./types.js";

const DEFAULT_BASE_URL = "https://api.anthropic.com/v1";
const API_VERSION = "2023-06-01";
const PROBE_MODEL = "claude-3-haiku-20240307";

/** Short catalogue names to dated API model ids. */
export const ANTHROPIC_MODEL_ALIASES: Readonly<Record<string, string>> = {
  "claude-3.5-sonnet": "claude-3-5-sonnet-20241022",
  "claude-3-opus": "claude-3-opus-20240229",
  "claude-3-sonnet": "claude-3-sonnet-20240229",
  "claude-3-haiku": "claude-3-haiku-20240307",
};

/**
 * Anthropic Messages API. Instructions and injected memories travel in the
 * top-level `system` field; system-role history turns are dropped.
 */
export class AnthropicAdapter implements ProviderAdapter {
  readonly provider = "anthropic" as const;
  readonly requiresCredential = true;
  readonly defaultTimeoutMs: number;
  private readonly settings: AdapterSettings;

  constructor(settings: AdapterSettings) {
    this.settings = settings;
    this.defaultTimeoutMs = settings.timeoutMs;
  }

  private url(): string {
    return joinUrl(this.settings.baseUrl ?? DEFAULT_BASE_URL, "messages");
  }

  private headers(credential: string): Record<string, string> {
    return { "x-api-key": credential, "anthropic-version": API_VERSION };
  }

  async send(call: AdapterCall): Promise<AdapterOutcome> {
    const { bundle } = call;
    const messages = [
      ...bundle.history
        .filter((m) => m.role !== "system")
        .map((m) => ({ role: m.role, content: m.content })),
      { role: "user", content: bundle.userMessage },
    ];

    const response = await postJson(
      resolveFetch(this.settings),
      this.url(),
      this.headers(call.credential),
      {
        model: ANTHROPIC_MODEL_ALIASES[call.model] ?? call.model,
        system: bundle.system,
        messages,
        max_tokens: this.settings.maxOutputTokens,
        temperature: this.settings.temperature,
      },
      call.signal,
    );

    if (!response.ok) return failedStatus(response, this.settings.maxDiagnosticChars);

    const parsed = AnthropicMessageResponseSchema.safeParse(await readJson(response, call.signal));
    if (!parsed.success) {
      return { ok: false, errorKind: "upstreamError", diagnostic: "malformed response from Anthropic API" };
    }

    const reply = parsed.data.content
      .filter((block) => block.type === "text" && typeof block.text === "string")
      .map((block) => block.text)
      .join("");
    if (!reply) {
      return { ok: false, errorKind: "upstreamError", diagnostic: "Empty response from Anthropic API" };
    }

    const usage = parsed.data.usage;
    return {
      ok: true,
      reply,
      modelUsed: parsed.data.model ?? call.model,
      tokenUsage: (usage?.input_tokens ?? 0) + (usage?.output_tokens ?? 0),
    };
  }

  async probe(credential: string, signal: AbortSignal): Promise<ConnectionTestResult> {
    const response = await postJson(
      resolveFetch(this.settings),
      this.url(),
      this.headers(credential),
      { model: PROBE_MODEL, max_tokens: 1, messages: [{ role: "user", content: "test" }] },
      signal,
    );
    if (response.ok) return { success: true };
    if (response.status === 401) return { success: false, error: "Invalid API key" };
    return { success: false, error: `API returned status ${response.status}` };
  }
}
