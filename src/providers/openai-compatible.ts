import OpenAI, {
  APIConnectionError,
  APIConnectionTimeoutError,
  APIError,
  APIUserAbortError,
} from "openai";
import { errorMessage, truncate } from "../errors.js";
import { log } from "../logger.js";
import type { ConnectionTestResult, ProviderId } from "../types.js";
import { toChatMessages, type RoleContent } from "../context.js";
import { resolveFetch } from "./http.js";
import type { AdapterCall, AdapterOutcome, AdapterSettings, ProviderAdapter } from "./types.js";

export const OPENAI_COMPATIBLE_BASE_URLS = {
  openai: "https://api.openai.com/v1",
  groq: "https://api.groq.com/openai/v1",
  deepseek: "https://api.deepseek.com",
} as const;

export type OpenAICompatibleProvider = keyof typeof OPENAI_COMPATIBLE_BASE_URLS;

function toOpenAiMessage(m: RoleContent): OpenAI.Chat.ChatCompletionMessageParam {
  switch (m.role) {
    case "system":
      return { role: "system", content: m.content };
    case "assistant":
      return { role: "assistant", content: m.content };
    default:
      return { role: "user", content: m.content };
  }
}

/**
 * Chat Completions through the OpenAI SDK. Serves OpenAI itself and the
 * providers that speak the same protocol (Groq, DeepSeek) from their own base URL.
 * The SDK's own retries are off: one attempt per dispatch.
 */
export class OpenAICompatibleAdapter implements ProviderAdapter {
  readonly provider: ProviderId;
  readonly requiresCredential = true;
  readonly defaultTimeoutMs: number;
  private readonly settings: AdapterSettings;
  private readonly baseUrl: string;

  constructor(provider: OpenAICompatibleProvider, settings: AdapterSettings) {
    this.provider = provider;
    this.settings = settings;
    this.defaultTimeoutMs = settings.timeoutMs;
    this.baseUrl = settings.baseUrl ?? OPENAI_COMPATIBLE_BASE_URLS[provider];
  }

  private client(credential: string, timeoutMs: number): OpenAI {
    const fetchImpl = resolveFetch(this.settings);
    return new OpenAI({
      apiKey: credential,
      baseURL: this.baseUrl,
      timeout: timeoutMs,
      maxRetries: 0,
      fetch: (input, init) => fetchImpl(input, init),
    });
  }

  private failure(err: unknown): AdapterOutcome {
    const max = this.settings.maxDiagnosticChars;
    if (err instanceof APIUserAbortError) throw err;
    if (err instanceof APIConnectionTimeoutError) {
      return { ok: false, errorKind: "timeout", diagnostic: "Request timeout" };
    }
    if (err instanceof APIConnectionError) {
      return { ok: false, errorKind: "transportError", diagnostic: truncate(err.message, max) };
    }
    if (err instanceof APIError) {
      const errorKind = err.status === 401 || err.status === 403 ? "authError" : "upstreamError";
      return { ok: false, errorKind, diagnostic: truncate(err.message, max) };
    }
    throw err;
  }

  async send(call: AdapterCall): Promise<AdapterOutcome> {
    const client = this.client(call.credential, call.timeoutMs);
    try {
      const completion = await client.chat.completions.create(
        {
          model: call.model,
          messages: toChatMessages(call.bundle).map(toOpenAiMessage),
          temperature: this.settings.temperature,
          max_tokens: this.settings.maxOutputTokens,
        },
        { signal: call.signal },
      );

      const reply = completion.choices[0]?.message?.content;
      if (!reply) {
        return { ok: false, errorKind: "upstreamError", diagnostic: `Empty response from ${this.provider}` };
      }
      return {
        ok: true,
        reply,
        modelUsed: completion.model || call.model,
        tokenUsage: completion.usage?.total_tokens ?? 0,
      };
    } catch (err) {
      log.debug(`${this.provider}: chat completion failed: ${errorMessage(err)}`);
      return this.failure(err);
    }
  }

  async probe(credential: string, signal: AbortSignal): Promise<ConnectionTestResult> {
    try {
      await this.client(credential, this.settings.timeoutMs).models.list({ signal });
      return { success: true };
    } catch (err) {
      if (err instanceof APIUserAbortError) throw err;
      if (err instanceof APIConnectionTimeoutError) {
        return { success: false, error: "Connection timeout - API did not respond in time" };
      }
      if (err instanceof APIConnectionError) {
        return { success: false, error: "Connection error - unable to reach API" };
      }
      if (err instanceof APIError && err.status === 401) {
        return { success: false, error: "Invalid API key" };
      }
      if (err instanceof APIError && typeof err.status === "number") {
        return { success: false, error: `API returned status ${err.status}` };
      }
      throw err;
    }
  }
}
