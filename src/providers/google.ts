import { GeminiGenerateResponseSchema } from "../schemas.js";
import type { ConnectionTestResult } from "../types.js";
import { failedStatus, joinUrl, postJson, readJson, request, resolveFetch } from "./http.js";
import type { AdapterCall, AdapterOutcome, AdapterSettings, ProviderAdapter } from "./types.js";

const DEFAULT_BASE_URL = "https://generativelanguage.googleapis.com/v1beta";

/**
 * Gemini generateContent. Assistant turns become role "model"; the
 * instructions block goes into `systemInstruction`. Gemini reports no
 * echoed model on older API versions, so the requested id is kept then.
 */
export class GoogleAdapter implements ProviderAdapter {
  readonly provider = "google" as const;
  readonly requiresCredential = true;
  readonly defaultTimeoutMs: number;
  private readonly settings: AdapterSettings;

  constructor(settings: AdapterSettings) {
    this.settings = settings;
    this.defaultTimeoutMs = settings.timeoutMs;
  }

  private base(): string {
    return this.settings.baseUrl ?? DEFAULT_BASE_URL;
  }

  async send(call: AdapterCall): Promise<AdapterOutcome> {
    const { bundle } = call;
    const contents = [
      ...bundle.history
        .filter((m) => m.role !== "system")
        .map((m) => ({ role: m.role === "user" ? "user" : "model", parts: [{ text: m.content }] })),
      { role: "user", parts: [{ text: bundle.userMessage }] },
    ];

    const response = await postJson(
      resolveFetch(this.settings),
      joinUrl(this.base(), `models/${encodeURIComponent(call.model)}:generateContent`),
      { "x-goog-api-key": call.credential },
      {
        systemInstruction: { parts: [{ text: bundle.system }] },
        contents,
        generationConfig: {
          temperature: this.settings.temperature,
          maxOutputTokens: this.settings.maxOutputTokens,
        },
      },
      call.signal,
    );

    if (response.status === 429) {
      return { ok: false, errorKind: "upstreamError", diagnostic: "Rate limit exceeded" };
    }
    if (!response.ok) return failedStatus(response, this.settings.maxDiagnosticChars);

    const parsed = GeminiGenerateResponseSchema.safeParse(await readJson(response, call.signal));
    if (!parsed.success) {
      return { ok: false, errorKind: "upstreamError", diagnostic: "malformed response from Gemini API" };
    }

    const parts = parsed.data.candidates?.[0]?.content?.parts ?? [];
    const reply = parts.map((p) => p.text ?? "").join("");
    if (!reply) {
      return { ok: false, errorKind: "upstreamError", diagnostic: "No response generated" };
    }

    return {
      ok: true,
      reply,
      modelUsed: parsed.data.modelVersion ?? call.model,
      tokenUsage: parsed.data.usageMetadata?.totalTokenCount ?? 0,
    };
  }

  async probe(credential: string, signal: AbortSignal): Promise<ConnectionTestResult> {
    const response = await request(resolveFetch(this.settings), joinUrl(this.base(), "models"), {
      method: "GET",
      headers: { "x-goog-api-key": credential },
      signal,
    });
    if (response.ok) return { success: true };
    // Gemini answers 400 for a bad key.
    if (response.status === 400 || response.status === 401) {
      return { success: false, error: "Invalid API key" };
    }
    return { success: false, error: `API returned status ${response.status}` };
  }
}
